import { DataResult } from './data-result.ts';
import type { DynamicOps } from './dynamic-ops.ts';
import type { KeyCompressor } from './key-compressor.ts';
import type { Lifecycle } from './lifecycle.ts';
import { AbstractUniversalBuilder, type RecordBuilder } from './record-builder.ts';
import type { Encoder, MapEncoder } from './types.ts';

type CompressedSlots<T> = {
  readonly slots: (T | undefined)[];
  readonly unknown: T[];
};

/**
 * Writes a record as a list with one slot per key the compressor knows.
 * Unset slots are written as `ops.empty()`.
 */
export class CompressedRecordBuilder<T> extends AbstractUniversalBuilder<T, CompressedSlots<T>> {
  private readonly compressor: KeyCompressor<T>;

  constructor(ops: DynamicOps<T>, compressor: KeyCompressor<T>) {
    super(ops, () => ({ slots: new Array<T | undefined>(compressor.size()).fill(undefined), unknown: [] }));
    this.compressor = compressor;
  }

  protected append(key: T, value: T, builder: CompressedSlots<T>): CompressedSlots<T> {
    const index = this.compressor.compress(key);
    if (index < 0) {
      builder.unknown.push(key);
    } else {
      builder.slots[index] = value;
    }
    return builder;
  }

  protected buildFrom(builder: CompressedSlots<T>, prefix: T): DataResult<T> {
    const empty = this.ops.empty();
    const list = this.ops.mergeToListAll(
      prefix,
      builder.slots.map((value) => value ?? empty)
    );
    if (builder.unknown.length > 0) {
      const keys = builder.unknown.map((key) => this.ops.describe(key)).join(', ');
      return DataResult.flatMap(list, (partial) =>
        DataResult.errorWithPartial(() => `Keys not known to the record layout: [${keys}]`, partial)
      );
    }
    return list;
  }
}

/**
 * The record builder to encode `encoder` with: a compressed one when the
 * format compresses records, `ops.mapBuilder()` otherwise.
 */
export function compressedBuilder<A, T>(encoder: MapEncoder<A>, ops: DynamicOps<T>): RecordBuilder<T> {
  if (ops.compressMaps()) {
    return new CompressedRecordBuilder(ops, ops.compressor(encoder));
  }
  return ops.mapBuilder();
}

/**
 * Lifts a map encoder to an encoder of whole records.
 */
export function asEncoder<A>(encoder: MapEncoder<A>): Encoder<A> {
  return {
    encode: (input, ops, prefix) => encoder.encode(input, ops, compressedBuilder(encoder, ops)).build(prefix),
    toString: () => encoder.toString(),
  };
}

export function mapEncoderComap<A, B>(encoder: MapEncoder<A>, fn: (value: B) => A): MapEncoder<B> {
  return {
    keys: (ops) => encoder.keys(ops),
    encode: (input, ops, prefix) => encoder.encode(fn(input), ops, prefix),
    toString: () => `${encoder}[comapped]`,
  };
}

/**
 * Like {@link mapEncoderComap} with a fallible function. A failure is recorded
 * on the builder and nothing is written.
 */
export function mapEncoderFlatComap<A, B>(encoder: MapEncoder<A>, fn: (value: B) => DataResult<A>): MapEncoder<B> {
  return {
    keys: (ops) => encoder.keys(ops),
    encode: (input, ops, prefix) => {
      const result = fn(input);
      const builder = prefix.withErrorsFrom(result);
      return result.kind === 'success' ? encoder.encode(result.value, ops, builder) : builder;
    },
    toString: () => `${encoder}[flatComapped]`,
  };
}

export function mapEncoderWithLifecycle<A>(encoder: MapEncoder<A>, lifecycle: Lifecycle): MapEncoder<A> {
  return {
    keys: (ops) => encoder.keys(ops),
    encode: (input, ops, prefix) => encoder.encode(input, ops, prefix).setLifecycle(lifecycle),
    toString: () => encoder.toString(),
  };
}
