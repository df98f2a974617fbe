import { DataResult } from './data-result.ts';
import { Lifecycle } from './lifecycle.ts';
import { Option } from './lib/option.ts';

/**
 * Appends the value of `next` to the list in `acc`, collecting errors.
 *
 * `acc` is applied last, so its messages come before those of `next` and
 * read in the order the values were added.
 */
export function appendResult<A>(acc: DataResult<A[]>, next: DataResult<A>): DataResult<A[]> {
  return DataResult.apply2Stable(
    (value: A, values: A[]) => {
      values.push(value);
      return values;
    },
    next,
    acc
  );
}

/**
 * Applies `fn` to every value, collecting all errors.
 *
 * The result is a success only if every call succeeded. Otherwise it is an
 * error listing every message, with a partial list when every failed call had
 * a partial value.
 */
export function traverse<A, B>(values: Iterable<A>, fn: (value: A) => DataResult<B>): DataResult<B[]> {
  let acc: DataResult<B[]> = DataResult.success([], Lifecycle.stable());
  for (const value of values) {
    acc = appendResult(acc, fn(value));
  }
  return acc;
}

/**
 * Applies `fn` to every value, stopping at the first error.
 */
export function traverseShortCircuit<A, B>(values: Iterable<A>, fn: (value: A) => DataResult<B>): DataResult<B[]> {
  const results: B[] = [];
  let lifecycle = Lifecycle.stable();
  for (const value of values) {
    const result = fn(value);
    lifecycle = Lifecycle.add(lifecycle, result.lifecycle);
    if (result.kind === 'error') {
      return DataResult.error(result.message, Option.none(), lifecycle);
    }
    results.push(result.value);
  }
  return DataResult.success(results, lifecycle);
}
