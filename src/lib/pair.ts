/** An ordered pair, e.g. a decoded value and the unread remainder of the input. */
export type Pair<F, S> = readonly [F, S];

export function pair<F, S>(first: F, second: S): Pair<F, S> {
  return [first, second];
}
