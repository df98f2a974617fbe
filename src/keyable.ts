import type { DynamicOps } from './dynamic-ops.ts';

/**
 * Something that can list the record keys it reads or writes.
 */
export interface Keyable {
  keys<T>(ops: DynamicOps<T>): T[];
}

/**
 * A {@link Keyable} over a fixed set of string keys.
 */
export function forStrings(keys: () => Iterable<string>): Keyable {
  return {
    keys: (ops) => Array.from(keys(), (key) => ops.createString(key)),
  };
}

export const Keyable = {
  forStrings,
} as const;
