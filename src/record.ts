import { DataResult } from './data-result.ts';
import { Lifecycle } from './lifecycle.ts';
import { appendResult } from './traverse.ts';
import type { MapCodec } from './types.ts';

/**
 * One field of a record: how to read and write it, and how to get it from
 * the record value.
 */
export interface RecordField<O, A> {
  readonly codec: MapCodec<A>;
  readonly getter: (value: O) => A;
}

export type FieldValues<F extends readonly RecordField<never, unknown>[]> = {
  [K in keyof F]: F[K] extends RecordField<never, infer A> ? A : never;
};

export function forGetter<O, A>(codec: MapCodec<A>, getter: (value: O) => A): RecordField<O, A> {
  return { codec, getter };
}

/**
 * Builds a map codec for `O` from one map codec per field.
 *
 * Every field is decoded even when an earlier one fails, so the error lists
 * every bad field. A field with no usable value leaves the record with no
 * partial value.
 *
 * @example
 * ```typescript
 * class Point {
 *   constructor(readonly x: number, readonly y: number) {}
 * }
 * const PointCodec = record(
 *   [forGetter(fieldOf(int, 'x'), (p: Point) => p.x), forGetter(fieldOf(int, 'y'), (p: Point) => p.y)],
 *   (x, y) => new Point(x, y)
 * );
 * ```
 */
export function record<O, F extends RecordField<O, unknown>[]>(
  fields: [...F],
  combine: (...values: FieldValues<F>) => O
): MapCodec<O> {
  return {
    keys: (ops) => fields.flatMap((field) => field.codec.keys(ops)),
    decode: (ops, input) => {
      let acc: DataResult<unknown[]> = DataResult.success([], Lifecycle.stable());
      for (const field of fields) {
        acc = appendResult(acc, field.codec.decode(ops, input));
      }
      return DataResult.map(acc, (values) => combine(...(values as unknown as FieldValues<F>)));
    },
    encode: (input, ops, prefix) => {
      for (const field of fields) {
        field.codec.encode(field.getter(input), ops, prefix);
      }
      return prefix;
    },
    toString: () => `RecordCodec[${fields.map((field) => field.codec.toString()).join(', ')}]`,
  };
}

/**
 * Builds a map codec for a plain object from one map codec per property.
 *
 * @example
 * ```typescript
 * const Person = object({
 *   name: fieldOf(string, 'name'),
 *   age: optionalFieldOf(int, 'age', 0),
 * });
 * ```
 */
export function object<T extends Record<string, unknown>>(fields: { [K in keyof T]: MapCodec<T[K]> }): MapCodec<T> {
  const fieldNames = Object.keys(fields) as (keyof T)[];

  return {
    keys: (ops) => fieldNames.flatMap((name) => fields[name].keys(ops)),
    decode: (ops, input) => {
      let acc: DataResult<[keyof T, unknown][]> = DataResult.success([], Lifecycle.stable());
      for (const name of fieldNames) {
        acc = appendResult(
          acc,
          DataResult.map(fields[name].decode(ops, input), (value): [keyof T, unknown] => [name, value])
        );
      }
      return DataResult.map(acc, (entries) => Object.fromEntries(entries) as T);
    },
    encode: (input, ops, prefix) => {
      for (const name of fieldNames) {
        fields[name].encode(input[name], ops, prefix);
      }
      return prefix;
    },
    toString: () => `ObjectCodec[${fieldNames.map(String).join(', ')}]`,
  };
}
