import { DataResult } from './data-result.ts';
import type { DynamicOps } from './dynamic-ops.ts';
import { Lifecycle } from './lifecycle.ts';
import type { MapLike } from './map-like.ts';
import type { Decoder, MapDecoder } from './types.ts';

/**
 * Views a compressed record (a list indexed by key position) as a map.
 * Slots holding `ops.empty()` read as absent.
 */
function compressedView<T>(ops: DynamicOps<T>, decoder: MapDecoder<unknown>, slots: readonly T[]): MapLike<T> {
  const compressor = ops.compressor(decoder);
  const at = (index: number): T | undefined => {
    const value = index < 0 ? undefined : slots[index];
    return value === undefined || ops.equals(value, ops.empty()) ? undefined : value;
  };

  return {
    get: (key) => at(compressor.compress(key)),
    getString: (key) => at(compressor.compressString(key)),
    *entries() {
      for (let i = 0; i < slots.length; i++) {
        const key = compressor.decompress(i);
        const value = at(i);
        if (key !== undefined && value !== undefined) {
          yield [key, value] as const;
        }
      }
    },
    toString: () => `CompressedMapLike[${slots.map((slot) => ops.describe(slot)).join(', ')}]`,
  };
}

/**
 * Decodes a whole record node, reading it as a list when the format
 * compresses records and as a map otherwise.
 */
export function compressedDecode<A, T>(decoder: MapDecoder<A>, ops: DynamicOps<T>, input: T): DataResult<A> {
  if (ops.compressMaps()) {
    const slots = ops.getStream(input);
    if (slots.kind === 'error') {
      return DataResult.error('Input is not a list');
    }
    return decoder.decode(ops, compressedView(ops, decoder, slots.value));
  }
  return DataResult.flatMap(DataResult.setLifecycle(ops.getMap(input), Lifecycle.stable()), (map) =>
    decoder.decode(ops, map)
  );
}

/**
 * Lifts a map decoder to a decoder of whole records. The input is returned
 * as the remainder, since the fields are not removed from it.
 */
export function asDecoder<A>(decoder: MapDecoder<A>): Decoder<A> {
  return {
    decode: (ops, input) => DataResult.map(compressedDecode(decoder, ops, input), (value) => [value, input] as const),
    toString: () => decoder.toString(),
  };
}

export function mapDecoderMap<A, B>(decoder: MapDecoder<A>, fn: (value: A) => B): MapDecoder<B> {
  return {
    keys: (ops) => decoder.keys(ops),
    decode: (ops, input) => DataResult.map(decoder.decode(ops, input), fn),
    toString: () => `${decoder}[mapped]`,
  };
}

export function mapDecoderFlatMap<A, B>(decoder: MapDecoder<A>, fn: (value: A) => DataResult<B>): MapDecoder<B> {
  return {
    keys: (ops) => decoder.keys(ops),
    decode: (ops, input) => DataResult.flatMap(decoder.decode(ops, input), fn),
    toString: () => `${decoder}[flatMapped]`,
  };
}

/**
 * Combines a value decoder with a decoder of functions over that value, both
 * reading the same record.
 */
export function mapDecoderAp<A, B>(decoder: MapDecoder<A>, fnDecoder: MapDecoder<(value: A) => B>): MapDecoder<B> {
  return {
    keys: (ops) => [...decoder.keys(ops), ...fnDecoder.keys(ops)],
    decode: (ops, input) =>
      DataResult.flatMap(decoder.decode(ops, input), (value) =>
        DataResult.map(fnDecoder.decode(ops, input), (fn) => fn(value))
      ),
    toString: () => `${fnDecoder} * ${decoder}`,
  };
}

export function mapDecoderWithLifecycle<A>(decoder: MapDecoder<A>, lifecycle: Lifecycle): MapDecoder<A> {
  return {
    keys: (ops) => decoder.keys(ops),
    decode: (ops, input) => DataResult.setLifecycle(decoder.decode(ops, input), lifecycle),
    toString: () => decoder.toString(),
  };
}
