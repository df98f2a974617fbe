import { isDeepStrictEqual } from 'node:util';

import { DataResult } from './data-result.ts';
import { parse } from './decoder.ts';
import type { DynamicOps } from './dynamic-ops.ts';
import { Lifecycle } from './lifecycle.ts';
import type { Pair } from './lib/pair.ts';
import type { Codec, Decoder } from './types.ts';

/**
 * A node together with the ops that understand it.
 *
 * Useful to carry a piece of data whose schema is not known, and to move it
 * between formats.
 */
export class Dynamic<T> {
  readonly ops: DynamicOps<T>;
  readonly value: T;

  constructor(ops: DynamicOps<T>, value: T = ops.empty()) {
    this.ops = ops;
    this.value = value;
  }

  static convert<S, T>(inOps: DynamicOps<S>, outOps: DynamicOps<T>, input: S): T {
    return inOps.convertTo(outOps, input);
  }

  map(fn: (value: T) => T): Dynamic<T> {
    return new Dynamic(this.ops, fn(this.value));
  }

  convert<U>(outOps: DynamicOps<U>): Dynamic<U> {
    return new Dynamic(outOps, Dynamic.convert(this.ops, outOps, this.value));
  }

  cast<U>(outOps: DynamicOps<U>): U {
    return this.convert(outOps).value;
  }

  // ==========================================================================
  // Reading
  // ==========================================================================

  asNumber(): DataResult<number> {
    return this.ops.getNumberValue(this.value);
  }

  asString(): DataResult<string> {
    return this.ops.getStringValue(this.value);
  }

  asBoolean(): DataResult<boolean> {
    return this.ops.getBooleanValue(this.value);
  }

  asList<U>(fn: (element: Dynamic<T>) => U): DataResult<U[]> {
    return DataResult.map(this.ops.getStream(this.value), (values) =>
      values.map((value) => fn(new Dynamic(this.ops, value)))
    );
  }

  asMap(): DataResult<Pair<Dynamic<T>, Dynamic<T>>[]> {
    return DataResult.map(this.ops.getMapValues(this.value), (entries) =>
      entries.map(([key, value]) => [new Dynamic(this.ops, key), new Dynamic(this.ops, value)] as const)
    );
  }

  get(key: string): DataResult<Dynamic<T>> {
    return DataResult.flatMap(this.ops.getMap(this.value), (map) => {
      const value = map.getString(key);
      return value === undefined
        ? DataResult.error(() => `key missing: ${key} in ${this.ops.describe(this.value)}`)
        : DataResult.success(new Dynamic(this.ops, value));
    });
  }

  getElement(key: string): DataResult<T> {
    return this.ops.get(this.value, key);
  }

  decode<A>(decoder: Decoder<A>): DataResult<Pair<A, T>> {
    return decoder.decode(this.ops, this.value);
  }

  read<A>(decoder: Decoder<A>): DataResult<A> {
    return parse(decoder, this.ops, this.value);
  }

  // ==========================================================================
  // Updating
  // ==========================================================================

  set(key: string, value: Dynamic<unknown>): Dynamic<T> {
    return new Dynamic(this.ops, this.ops.set(this.value, key, value.cast(this.ops)));
  }

  remove(key: string): Dynamic<T> {
    return new Dynamic(this.ops, this.ops.remove(this.value, key));
  }

  update(key: string, fn: (value: Dynamic<T>) => Dynamic<unknown>): Dynamic<T> {
    const current = this.get(key);
    return current.kind === 'success' ? this.set(key, fn(current.value)) : this;
  }

  // ==========================================================================
  // Creating
  // ==========================================================================

  createString(value: string): Dynamic<T> {
    return new Dynamic(this.ops, this.ops.createString(value));
  }

  createNumeric(value: number): Dynamic<T> {
    return new Dynamic(this.ops, this.ops.createNumeric(value));
  }

  createBoolean(value: boolean): Dynamic<T> {
    return new Dynamic(this.ops, this.ops.createBoolean(value));
  }

  createList(values: Iterable<Dynamic<unknown>>): Dynamic<T> {
    return new Dynamic(this.ops, this.ops.createList(Array.from(values, (value) => value.cast(this.ops))));
  }

  createMap(entries: Iterable<Pair<Dynamic<unknown>, Dynamic<unknown>>>): Dynamic<T> {
    return new Dynamic(
      this.ops,
      this.ops.createMap(Array.from(entries, ([key, value]) => [key.cast(this.ops), value.cast(this.ops)] as const))
    );
  }

  equals(other: Dynamic<unknown>): boolean {
    return this.ops === other.ops && isDeepStrictEqual(this.value, other.value);
  }

  toString(): string {
    return `${this.ops} ${this.ops.describe(this.value)}`;
  }
}

/**
 * Reads any node as a {@link Dynamic} and writes a `Dynamic` back,
 * converting it to the target format.
 */
export const passthrough: Codec<Dynamic<unknown>> = {
  decode: (ops, input) => DataResult.success([new Dynamic(ops, input), ops.empty()] as const),
  encode: (input, ops, prefix) => {
    if (input.ops.equals(input.value, input.ops.empty())) {
      return DataResult.success(prefix, Lifecycle.experimental());
    }
    const casted = input.cast(ops);
    if (ops.equals(prefix, ops.empty())) {
      return DataResult.success(casted, Lifecycle.experimental());
    }
    const toMap = DataResult.flatMap(ops.getMap(casted), (map) => ops.mergeToMapLike(prefix, map));
    if (toMap.kind === 'success') {
      return toMap;
    }
    const toList = DataResult.flatMap(ops.getStream(casted), (values) => ops.mergeToListAll(prefix, values));
    if (toList.kind === 'success') {
      return toList;
    }
    return DataResult.errorWithPartial(() => `Don't know how to merge ${ops.describe(prefix)} and ${ops.describe(casted)}`, prefix);
  },
  toString: () => 'passthrough',
};
