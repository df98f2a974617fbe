/**
 * A value of one of two types, tagged by side.
 *
 * @example
 * ```typescript
 * const value: Either<number, string> = left(42);
 * if (value.tag === 'left') {
 *   console.log(value.value + 1);
 * }
 * ```
 */
export type Either<L, R> =
  | { readonly tag: 'left'; readonly value: L }
  | { readonly tag: 'right'; readonly value: R };

export function left<L, R = never>(value: L): Either<L, R> {
  return { tag: 'left', value };
}

export function right<R, L = never>(value: R): Either<L, R> {
  return { tag: 'right', value };
}

export function fold<L, R, U>(
  either: Either<L, R>,
  onLeft: (value: L) => U,
  onRight: (value: R) => U
): U {
  return either.tag === 'left' ? onLeft(either.value) : onRight(either.value);
}

export const Either = {
  left,
  right,
  fold,
} as const;
