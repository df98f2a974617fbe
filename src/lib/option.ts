/**
 * An optional value that keeps "absent" apart from a present `undefined`.
 */
export type Option<T> =
  | { readonly some: true; readonly value: T }
  | { readonly some: false };

const NONE: Option<never> = Object.freeze({ some: false });

export function some<T>(value: T): Option<T> {
  return { some: true, value };
}

export function none<T = never>(): Option<T> {
  return NONE;
}

/**
 * Wraps a nullable value; `null` and `undefined` become {@link none}.
 */
export function fromNullable<T>(value: T | null | undefined): Option<T> {
  return value === null || value === undefined ? NONE : some(value);
}

export function map<T, U>(option: Option<T>, fn: (value: T) => U): Option<U> {
  return option.some ? some(fn(option.value)) : NONE;
}

export function getOrElse<T>(option: Option<T>, fallback: () => T): T {
  return option.some ? option.value : fallback();
}

export function toUndefined<T>(option: Option<T>): T | undefined {
  return option.some ? option.value : undefined;
}

export const Option = {
  some,
  none,
  fromNullable,
  map,
  getOrElse,
  toUndefined,
} as const;
