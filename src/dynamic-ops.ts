import { isDeepStrictEqual } from 'node:util';

import { DataResult } from './data-result.ts';
import { KeyCompressor } from './key-compressor.ts';
import type { Keyable } from './keyable.ts';
import { NodeMap } from './lib/node-map.ts';
import { toByte, toInt, toLong } from './lib/numbers.ts';
import type { Pair } from './lib/pair.ts';
import { show } from './lib/show.ts';
import { DefaultListBuilder, type ListBuilder } from './list-builder.ts';
import { forMap, type MapLike } from './map-like.ts';
import { MapBuilder, type RecordBuilder } from './record-builder.ts';
import type { Decoder, Encoder } from './types.ts';

const INTEGER = /^[+-]?\d+$/;

/**
 * The adapter between codecs and one concrete tree format.
 *
 * `T` is the format's node type. Codecs never look inside a node themselves:
 * every read and write goes through these operations, which is what lets one
 * codec serve any format. Implementations usually extend
 * {@link BaseDynamicOps}, which derives most operations from a small core.
 */
export interface DynamicOps<T> {
  /** The node that stands for "nothing written yet". */
  empty(): T;
  emptyMap(): T;
  emptyList(): T;

  convertTo<U>(outOps: DynamicOps<U>, input: T): U;

  getNumberValue(input: T): DataResult<number>;
  /**
   * Reads a 64-bit integer without going through a `number` where that
   * would round it.
   */
  getLongValue(input: T): DataResult<bigint>;
  getNumberValueOr(input: T, defaultValue: number): number;
  createNumeric(value: number): T;
  createByte(value: number): T;
  createShort(value: number): T;
  createInt(value: number): T;
  createLong(value: bigint): T;
  createFloat(value: number): T;
  createDouble(value: number): T;

  getBooleanValue(input: T): DataResult<boolean>;
  createBoolean(value: boolean): T;

  getStringValue(input: T): DataResult<string>;
  createString(value: string): T;

  /** Appends one element to a list node. */
  mergeToList(list: T, value: T): DataResult<T>;
  mergeToListAll(list: T, values: readonly T[]): DataResult<T>;
  /** Adds one entry to a map node. */
  mergeToMap(map: T, key: T, value: T): DataResult<T>;
  mergeToMapAll(map: T, values: Iterable<Pair<T, T>>): DataResult<T>;
  mergeToMapLike(map: T, values: MapLike<T>): DataResult<T>;
  /** Writes a primitive; only an empty prefix can take one. */
  mergeToPrimitive(prefix: T, value: T): DataResult<T>;

  getMapValues(input: T): DataResult<Pair<T, T>[]>;
  getMapEntries(input: T): DataResult<(visit: (key: T, value: T) => void) => void>;
  createMap(entries: Iterable<Pair<T, T>>): T;
  getMap(input: T): DataResult<MapLike<T>>;

  getStream(input: T): DataResult<T[]>;
  getList(input: T): DataResult<(visit: (value: T) => void) => void>;
  createList(values: Iterable<T>): T;

  getByteBuffer(input: T): DataResult<Uint8Array>;
  createByteList(input: Uint8Array): T;

  getIntStream(input: T): DataResult<number[]>;
  createIntList(input: readonly number[]): T;
  getLongStream(input: T): DataResult<bigint[]>;
  createLongList(input: readonly bigint[]): T;

  remove(input: T, key: string): T;

  /** Whether records are written as lists indexed by a {@link KeyCompressor}. */
  compressMaps(): boolean;
  /** The key compressor for `keyable` in this format, built once and cached. */
  compressor(keyable: Keyable): KeyCompressor<T>;

  get(input: T, key: string): DataResult<T>;
  getGeneric(input: T, key: T): DataResult<T>;
  set(input: T, key: string, value: T): T;
  update(input: T, key: string, fn: (value: T) => T): T;
  updateGeneric(input: T, key: T, fn: (value: T) => T): T;

  listBuilder(): ListBuilder<T>;
  mapBuilder(): RecordBuilder<T>;

  withEncoder<E>(encoder: Encoder<E>): (value: E) => DataResult<T>;
  withDecoder<E>(decoder: Decoder<E>): (input: T) => DataResult<Pair<E, T>>;
  withParser<E>(decoder: Decoder<E>): (input: T) => DataResult<E>;

  convertList<U>(outOps: DynamicOps<U>, input: T): U;
  convertMap<U>(outOps: DynamicOps<U>, input: T): U;

  /** Whether two nodes hold the same data. Record keys are matched with it. */
  equals(a: T, b: T): boolean;
  /** Renders a node for error messages. */
  describe(input: T): string;
  toString(): string;
}

/**
 * Derives the optional {@link DynamicOps} operations from the required core.
 */
export abstract class BaseDynamicOps<T> implements DynamicOps<T> {
  private readonly compressors = new WeakMap<Keyable, KeyCompressor<T>>();

  abstract empty(): T;
  abstract convertTo<U>(outOps: DynamicOps<U>, input: T): U;
  abstract getNumberValue(input: T): DataResult<number>;
  abstract createNumeric(value: number): T;
  abstract getStringValue(input: T): DataResult<string>;
  abstract createString(value: string): T;
  abstract mergeToList(list: T, value: T): DataResult<T>;
  abstract mergeToMap(map: T, key: T, value: T): DataResult<T>;
  abstract getMapValues(input: T): DataResult<Pair<T, T>[]>;
  abstract createMap(entries: Iterable<Pair<T, T>>): T;
  abstract getStream(input: T): DataResult<T[]>;
  abstract createList(values: Iterable<T>): T;
  abstract remove(input: T, key: string): T;
  abstract toString(): string;

  emptyMap(): T {
    return this.createMap([]);
  }

  emptyList(): T {
    return this.createList([]);
  }

  // ==========================================================================
  // Primitives
  // ==========================================================================

  getNumberValueOr(input: T, defaultValue: number): number {
    const result = this.getNumberValue(input);
    return result.kind === 'success' ? result.value : defaultValue;
  }

  createByte(value: number): T {
    return this.createNumeric(value);
  }

  createShort(value: number): T {
    return this.createNumeric(value);
  }

  createInt(value: number): T {
    return this.createNumeric(value);
  }

  getLongValue(input: T): DataResult<bigint> {
    const number = this.getNumberValue(input);
    if (number.kind === 'success' && Number.isSafeInteger(Math.trunc(number.value))) {
      return DataResult.success(toLong(BigInt(Math.trunc(number.value))));
    }
    const text = this.getStringValue(input);
    if (text.kind === 'success' && INTEGER.test(text.value)) {
      return DataResult.success(toLong(BigInt(text.value)));
    }
    if (number.kind === 'success') {
      return DataResult.error(() => `Not a safe integer: ${this.describe(input)}`);
    }
    return DataResult.error(number.message);
  }

  /**
   * Writes a long as a number when that is exact, and as its decimal text
   * otherwise. {@link getLongValue} reads both back.
   */
  createLong(value: bigint): T {
    const number = Number(value);
    return Number.isSafeInteger(number) ? this.createNumeric(number) : this.createString(value.toString());
  }

  createFloat(value: number): T {
    return this.createNumeric(value);
  }

  createDouble(value: number): T {
    return this.createNumeric(value);
  }

  getBooleanValue(input: T): DataResult<boolean> {
    return DataResult.map(this.getNumberValue(input), (n) => toByte(n) !== 0);
  }

  createBoolean(value: boolean): T {
    return this.createByte(value ? 1 : 0);
  }

  mergeToPrimitive(prefix: T, value: T): DataResult<T> {
    if (!this.equals(prefix, this.empty())) {
      return DataResult.errorWithPartial(
        () => `Do not know how to append a primitive value ${this.describe(value)} to ${this.describe(prefix)}`,
        value
      );
    }
    return DataResult.success(value);
  }

  // ==========================================================================
  // Merging
  // ==========================================================================

  mergeToListAll(list: T, values: readonly T[]): DataResult<T> {
    let result: DataResult<T> = DataResult.success(list);
    for (const value of values) {
      result = DataResult.flatMap(result, (r) => this.mergeToList(r, value));
    }
    return result;
  }

  mergeToMapAll(map: T, values: Iterable<Pair<T, T>>): DataResult<T> {
    let result: DataResult<T> = DataResult.success(map);
    for (const [key, value] of values) {
      result = DataResult.flatMap(result, (r) => this.mergeToMap(r, key, value));
    }
    return result;
  }

  mergeToMapLike(map: T, values: MapLike<T>): DataResult<T> {
    let result: DataResult<T> = DataResult.success(map);
    for (const [key, value] of values.entries()) {
      result = DataResult.flatMap(result, (r) => this.mergeToMap(r, key, value));
    }
    return result;
  }

  // ==========================================================================
  // Maps and lists
  // ==========================================================================

  getMapEntries(input: T): DataResult<(visit: (key: T, value: T) => void) => void> {
    return DataResult.map(this.getMapValues(input), (entries) => (visit: (key: T, value: T) => void) => {
      for (const [key, value] of entries) {
        visit(key, value);
      }
    });
  }

  getMap(input: T): DataResult<MapLike<T>> {
    return DataResult.flatMap(this.getMapValues(input), (entries) => {
      const map = new NodeMap<T, T>((a, b) => this.equals(a, b));
      for (const [key, value] of entries) {
        if (map.has(key)) {
          return DataResult.error(() => `Error while building map: Duplicate key ${this.describe(key)}`);
        }
        map.set(key, value);
      }
      return DataResult.success(forMap(map, this));
    });
  }

  getList(input: T): DataResult<(visit: (value: T) => void) => void> {
    return DataResult.map(this.getStream(input), (values) => (visit: (value: T) => void) => {
      values.forEach((value) => visit(value));
    });
  }

  private getNumbers(input: T, kind: string): DataResult<number[]> {
    return DataResult.flatMap(this.getStream(input), (values) => {
      const numbers: number[] = [];
      for (const value of values) {
        const number = this.getNumberValue(value);
        if (number.kind === 'error') {
          return DataResult.error(() => `Some elements are not ${kind}: ${this.describe(input)}`);
        }
        numbers.push(number.value);
      }
      return DataResult.success(numbers);
    });
  }

  getByteBuffer(input: T): DataResult<Uint8Array> {
    return DataResult.map(this.getNumbers(input, 'bytes'), (numbers) => Uint8Array.from(numbers, (n) => toByte(n) & 0xff));
  }

  createByteList(input: Uint8Array): T {
    return this.createList(Array.from(input, (b) => this.createByte(toByte(b))));
  }

  getIntStream(input: T): DataResult<number[]> {
    return DataResult.map(this.getNumbers(input, 'ints'), (numbers) => numbers.map(toInt));
  }

  createIntList(input: readonly number[]): T {
    return this.createList(input.map((value) => this.createInt(value)));
  }

  getLongStream(input: T): DataResult<bigint[]> {
    return DataResult.flatMap(this.getStream(input), (values) => {
      const longs: bigint[] = [];
      for (const value of values) {
        const long = this.getLongValue(value);
        if (long.kind === 'error') {
          return DataResult.error(() => `Some elements are not longs: ${this.describe(input)}`);
        }
        longs.push(long.value);
      }
      return DataResult.success(longs);
    });
  }

  createLongList(input: readonly bigint[]): T {
    return this.createList(input.map((value) => this.createLong(value)));
  }

  // ==========================================================================
  // Records
  // ==========================================================================

  compressMaps(): boolean {
    return false;
  }

  compressor(keyable: Keyable): KeyCompressor<T> {
    let compressor = this.compressors.get(keyable);
    if (!compressor) {
      compressor = new KeyCompressor(this, keyable.keys(this));
      this.compressors.set(keyable, compressor);
    }
    return compressor;
  }

  get(input: T, key: string): DataResult<T> {
    return this.getGeneric(input, this.createString(key));
  }

  getGeneric(input: T, key: T): DataResult<T> {
    return DataResult.flatMap(this.getMap(input), (map) => {
      const value = map.get(key);
      return value === undefined
        ? DataResult.error(() => `No element ${this.describe(key)} in the map ${this.describe(input)}`)
        : DataResult.success(value);
    });
  }

  set(input: T, key: string, value: T): T {
    const result = this.mergeToMap(input, this.createString(key), value);
    return result.kind === 'success' ? result.value : input;
  }

  update(input: T, key: string, fn: (value: T) => T): T {
    const result = DataResult.map(this.get(input, key), (value) => this.set(input, key, fn(value)));
    return result.kind === 'success' ? result.value : input;
  }

  updateGeneric(input: T, key: T, fn: (value: T) => T): T {
    const result = DataResult.flatMap(this.getGeneric(input, key), (value) => this.mergeToMap(input, key, fn(value)));
    return result.kind === 'success' ? result.value : input;
  }

  listBuilder(): ListBuilder<T> {
    return new DefaultListBuilder(this);
  }

  mapBuilder(): RecordBuilder<T> {
    return new MapBuilder(this);
  }

  withEncoder<E>(encoder: Encoder<E>): (value: E) => DataResult<T> {
    return (value) => encoder.encode(value, this, this.empty());
  }

  withDecoder<E>(decoder: Decoder<E>): (input: T) => DataResult<Pair<E, T>> {
    return (input) => decoder.decode(this, input);
  }

  withParser<E>(decoder: Decoder<E>): (input: T) => DataResult<E> {
    return (input) => DataResult.map(decoder.decode(this, input), ([value]) => value);
  }

  convertList<U>(outOps: DynamicOps<U>, input: T): U {
    const values = this.getStream(input);
    const elements = values.kind === 'success' ? values.value : [];
    return outOps.createList(elements.map((element) => this.convertTo(outOps, element)));
  }

  convertMap<U>(outOps: DynamicOps<U>, input: T): U {
    const values = this.getMapValues(input);
    const entries = values.kind === 'success' ? values.value : [];
    return outOps.createMap(
      entries.map(([key, value]) => [this.convertTo(outOps, key), this.convertTo(outOps, value)] as const)
    );
  }

  equals(a: T, b: T): boolean {
    return isDeepStrictEqual(a, b);
  }

  describe(input: T): string {
    return show(input);
  }
}
