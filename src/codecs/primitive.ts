import { DataResult } from '../data-result.ts';
import type { DynamicOps } from '../dynamic-ops.ts';
import { toByte, toFloat, toInt, toLong, toShort } from '../lib/numbers.ts';
import { mapUnit } from '../map-codec.ts';
import type { Codec, MapCodec } from '../types.ts';

type PrimitiveRead<A> = <T>(ops: DynamicOps<T>, input: T) => DataResult<A>;
type PrimitiveWrite<A> = <T>(ops: DynamicOps<T>, value: A) => T;

/**
 * A codec for a value stored directly in one node. Primitives consume their
 * whole input and can only be written into an empty prefix.
 */
export function createPrimitiveCodec<A>(name: string, read: PrimitiveRead<A>, write: PrimitiveWrite<A>): Codec<A> {
  return {
    decode: (ops, input) => DataResult.map(read(ops, input), (value) => [value, ops.empty()] as const),
    encode: (input, ops, prefix) => ops.mergeToPrimitive(prefix, write(ops, input)),
    toString: () => name,
  };
}

export const bool: Codec<boolean> = createPrimitiveCodec(
  'Bool',
  (ops, input) => ops.getBooleanValue(input),
  (ops, value) => ops.createBoolean(value)
);

export const byte: Codec<number> = createPrimitiveCodec(
  'Byte',
  (ops, input) => DataResult.map(ops.getNumberValue(input), toByte),
  (ops, value) => ops.createByte(value)
);

export const short: Codec<number> = createPrimitiveCodec(
  'Short',
  (ops, input) => DataResult.map(ops.getNumberValue(input), toShort),
  (ops, value) => ops.createShort(value)
);

export const int: Codec<number> = createPrimitiveCodec(
  'Int',
  (ops, input) => DataResult.map(ops.getNumberValue(input), toInt),
  (ops, value) => ops.createInt(value)
);

export const long: Codec<bigint> = createPrimitiveCodec(
  'Long',
  (ops, input) => ops.getLongValue(input),
  (ops, value) => ops.createLong(toLong(value))
);

export const float: Codec<number> = createPrimitiveCodec(
  'Float',
  (ops, input) => DataResult.map(ops.getNumberValue(input), toFloat),
  (ops, value) => ops.createFloat(value)
);

export const double: Codec<number> = createPrimitiveCodec(
  'Double',
  (ops, input) => ops.getNumberValue(input),
  (ops, value) => ops.createDouble(value)
);

export const string: Codec<string> = createPrimitiveCodec(
  'String',
  (ops, input) => ops.getStringValue(input),
  (ops, value) => ops.createString(value)
);

export const byteBuffer: Codec<Uint8Array> = createPrimitiveCodec(
  'ByteBuffer',
  (ops, input) => ops.getByteBuffer(input),
  (ops, value) => ops.createByteList(value)
);

export const intStream: Codec<number[]> = createPrimitiveCodec(
  'IntStream',
  (ops, input) => ops.getIntStream(input),
  (ops, value) => ops.createIntList(value)
);

export const longStream: Codec<bigint[]> = createPrimitiveCodec(
  'LongStream',
  (ops, input) => ops.getLongStream(input),
  (ops, value) => ops.createLongList(value)
);

/**
 * Reads and writes no fields; decodes to `null`.
 */
export const empty: MapCodec<null> = mapUnit(null);
