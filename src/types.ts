import type { DataResult } from './data-result.ts';
import type { DynamicOps } from './dynamic-ops.ts';
import type { Keyable } from './keyable.ts';
import type { Pair } from './lib/pair.ts';
import type { MapLike } from './map-like.ts';
import type { RecordBuilder } from './record-builder.ts';

/**
 * Reads a value of type `A` from a node of any format.
 *
 * Returns the value together with the part of the input it did not consume.
 */
export interface Decoder<A> {
  decode<T>(ops: DynamicOps<T>, input: T): DataResult<Pair<A, T>>;
  toString(): string;
}

/**
 * Writes a value of type `A` on top of `prefix`, a node of any format.
 */
export interface Encoder<A> {
  encode<T>(input: A, ops: DynamicOps<T>, prefix: T): DataResult<T>;
  toString(): string;
}

/**
 * A bidirectional schema for `A`.
 *
 * Codecs are immutable: build them once and share them.
 */
export interface Codec<A> extends Encoder<A>, Decoder<A> {}

/**
 * Reads a value from some of the fields of a record.
 */
export interface MapDecoder<A> extends Keyable {
  decode<T>(ops: DynamicOps<T>, input: MapLike<T>): DataResult<A>;
  toString(): string;
}

/**
 * Writes a value as some of the fields of a record under construction.
 */
export interface MapEncoder<A> extends Keyable {
  encode<T>(input: A, ops: DynamicOps<T>, prefix: RecordBuilder<T>): RecordBuilder<T>;
  toString(): string;
}

/**
 * A bidirectional schema for a fixed set of record fields. Several map codecs
 * can share one record.
 */
export interface MapCodec<A> extends MapEncoder<A>, MapDecoder<A> {}

/**
 * Infer the value type of a codec.
 */
export type Infer<C> = C extends Codec<infer A> ? A : C extends MapCodec<infer A> ? A : never;

/**
 * Post-processes the results of a codec in both directions.
 */
export interface ResultFunction<A> {
  apply<T>(ops: DynamicOps<T>, input: T, result: DataResult<Pair<A, T>>): DataResult<Pair<A, T>>;
  coApply<T>(ops: DynamicOps<T>, input: A, result: DataResult<T>): DataResult<T>;
  toString(): string;
}
