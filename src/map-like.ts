import type { DynamicOps } from './dynamic-ops.ts';
import type { NodeMap } from './lib/node-map.ts';
import type { Pair } from './lib/pair.ts';

/**
 * A read-only view of a record that is being decoded.
 */
export interface MapLike<T> {
  /** Looks up a value by a key node. */
  get(key: T): T | undefined;
  /** Looks up a value by a string key. */
  getString(key: string): T | undefined;
  entries(): Iterable<Pair<T, T>>;
  toString(): string;
}

/**
 * Views a {@link NodeMap} of nodes as a {@link MapLike}.
 */
export function forMap<T>(map: NodeMap<T, T>, ops: DynamicOps<T>): MapLike<T> {
  return {
    get: (key) => map.get(key),
    getString: (key) => map.get(ops.createString(key)),
    *entries() {
      for (const [key, value] of map) {
        yield [key, value] as const;
      }
    },
    toString: () => `MapLike[${[...map].map(([k, v]) => `${ops.describe(k)}=${ops.describe(v)}`).join(', ')}]`,
  };
}

export const MapLike = {
  forMap,
} as const;
