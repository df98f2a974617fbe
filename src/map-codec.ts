import { DataResult } from './data-result.ts';
import { parse, unitDecoder } from './decoder.ts';
import type { DynamicOps } from './dynamic-ops.ts';
import { emptyEncoder, encodeStart } from './encoder.ts';
import { Lifecycle } from './lifecycle.ts';
import type { Pair } from './lib/pair.ts';
import {
  asDecoder,
  mapDecoderFlatMap,
  mapDecoderMap,
} from './map-decoder.ts';
import type { MapLike } from './map-like.ts';
import {
  asEncoder,
  mapEncoderComap,
  mapEncoderFlatComap,
} from './map-encoder.ts';
import type { RecordBuilder } from './record-builder.ts';
import type { Codec, MapCodec, MapDecoder, MapEncoder } from './types.ts';

/**
 * Post-processes the results of a map codec in both directions.
 */
export interface MapResultFunction<A> {
  apply<T>(ops: DynamicOps<T>, input: MapLike<T>, result: DataResult<A>): DataResult<A>;
  coApply<T>(ops: DynamicOps<T>, input: A, builder: RecordBuilder<T>): RecordBuilder<T>;
  toString(): string;
}

export const COMPRESSED_VALUE_KEY = 'value';

export function mapCodecOf<A>(
  encoder: MapEncoder<A>,
  decoder: MapDecoder<A>,
  name: () => string = () => `MapCodec[${encoder} ${decoder}]`
): MapCodec<A> {
  return {
    keys: (ops) => [...encoder.keys(ops), ...decoder.keys(ops)],
    decode: (ops, input) => decoder.decode(ops, input),
    encode: (input, ops, prefix) => encoder.encode(input, ops, prefix),
    toString: name,
  };
}

/**
 * A map codec that reads and writes nothing and always decodes to `value`.
 */
export function mapUnit<A>(value: A): MapCodec<A> {
  return mapUnitGet(() => value);
}

export function mapUnitGet<A>(value: () => A): MapCodec<A> {
  return mapCodecOf(emptyEncoder<A>(), unitDecoder(value));
}

/**
 * Lifts a map codec to a codec of whole record nodes.
 */
export function toCodec<A>(codec: MapCodec<A>): Codec<A> {
  const decoder = asDecoder(codec);
  const encoder = asEncoder(codec);
  return {
    decode: (ops, input) => decoder.decode(ops, input),
    encode: (input, ops, prefix) => encoder.encode(input, ops, prefix),
    toString: () => codec.toString(),
  };
}

/**
 * Treats a codec that happens to produce records as a map codec.
 *
 * Compressed formats store the whole value under a `"value"` key. Nothing
 * checks that the codec really produces records; encoding anything else
 * fails at run time.
 */
export function assumeMapUnsafe<A>(codec: Codec<A>): MapCodec<A> {
  return {
    keys: (ops) => [ops.createString(COMPRESSED_VALUE_KEY)],
    decode: (ops, input) => {
      if (ops.compressMaps()) {
        const value = input.getString(COMPRESSED_VALUE_KEY);
        if (value === undefined) {
          return DataResult.error('Missing value');
        }
        return parse(codec, ops, value);
      }
      return parse(codec, ops, ops.createMap(input.entries()));
    },
    encode: (input, ops, prefix) => {
      const encoded = encodeStart(codec, ops, input);
      if (ops.compressMaps()) {
        return prefix.addStringResult(COMPRESSED_VALUE_KEY, encoded);
      }
      const map = DataResult.flatMap(encoded, (value) => ops.getMap(value));
      if (map.kind === 'error') {
        return prefix.withErrorsFrom(map);
      }
      for (const [key, value] of map.value.entries()) {
        prefix.add(key, value);
      }
      return prefix;
    },
    toString: () => `AssumeMap[${codec}]`,
  };
}

// ============================================================================
// Transformations
// ============================================================================

export function mapCodecXmap<A, S>(codec: MapCodec<A>, to: (value: A) => S, from: (value: S) => A): MapCodec<S> {
  return mapCodecOf(mapEncoderComap(codec, from), mapDecoderMap(codec, to), () => `${codec}[xmapped]`);
}

export function mapCodecFlatXmap<A, S>(
  codec: MapCodec<A>,
  to: (value: A) => DataResult<S>,
  from: (value: S) => DataResult<A>
): MapCodec<S> {
  return mapCodecOf(mapEncoderFlatComap(codec, from), mapDecoderFlatMap(codec, to), () => `${codec}[flatXmapped]`);
}

/**
 * Runs `checker` on every value read or written.
 */
export function mapCodecValidate<A>(codec: MapCodec<A>, checker: (value: A) => DataResult<A>): MapCodec<A> {
  return mapCodecFlatXmap(codec, checker, checker);
}

export function mapCodecWithLifecycle<A>(codec: MapCodec<A>, lifecycle: Lifecycle): MapCodec<A> {
  return {
    keys: (ops) => codec.keys(ops),
    decode: (ops, input) => DataResult.setLifecycle(codec.decode(ops, input), lifecycle),
    encode: (input, ops, prefix) => codec.encode(input, ops, prefix).setLifecycle(lifecycle),
    toString: () => codec.toString(),
  };
}

export function mapCodecStable<A>(codec: MapCodec<A>): MapCodec<A> {
  return mapCodecWithLifecycle(codec, Lifecycle.stable());
}

export function mapCodecDeprecated<A>(codec: MapCodec<A>, since: number): MapCodec<A> {
  return mapCodecWithLifecycle(codec, Lifecycle.deprecated(since));
}

export function mapCodecMapResult<A>(codec: MapCodec<A>, fn: MapResultFunction<A>): MapCodec<A> {
  return {
    keys: (ops) => codec.keys(ops),
    decode: (ops, input) => fn.apply(ops, input, codec.decode(ops, input)),
    encode: (input, ops, prefix) => fn.coApply(ops, input, codec.encode(input, ops, prefix)),
    toString: () => `${codec}[mapResult ${fn}]`,
  };
}

/**
 * Replaces a failed decode with `value`, reporting the message to `onError`.
 */
export function mapCodecOrElse<A>(codec: MapCodec<A>, value: A, onError?: (message: string) => void): MapCodec<A> {
  return mapCodecOrElseGet(codec, () => value, onError);
}

export function mapCodecOrElseGet<A>(
  codec: MapCodec<A>,
  value: () => A,
  onError?: (message: string) => void
): MapCodec<A> {
  return mapCodecMapResult(codec, {
    apply: (_ops, _input, result) => {
      if (result.kind === 'success') {
        return result;
      }
      onError?.(result.message());
      return DataResult.success(value());
    },
    coApply: (_ops, _input, builder) => builder,
    toString: () => `OrElseGet[${String(value())}]`,
  });
}

/**
 * Gives every failed decode the partial value `value()`.
 */
export function mapCodecSetPartial<A>(codec: MapCodec<A>, value: () => A): MapCodec<A> {
  return mapCodecMapResult(codec, {
    apply: (_ops, _input, result) => DataResult.setPartial(result, value()),
    coApply: (_ops, _input, builder) => builder,
    toString: () => 'SetPartial',
  });
}

/**
 * A map codec where part of the record is read by a codec chosen from the
 * value the base codec has already read.
 *
 * `splitter` picks the secondary codec (and, when encoding, the secondary
 * value) from a base value; `combiner` merges the secondary value back in.
 * Results are always experimental.
 */
export function dependent<A, E>(
  codec: MapCodec<A>,
  initialInstance: MapCodec<E>,
  splitter: (value: A) => Pair<E, MapCodec<E>>,
  combiner: (base: A, extra: E) => A
): MapCodec<A> {
  return {
    keys: (ops) => [...codec.keys(ops), ...initialInstance.keys(ops)],
    decode: (ops, input) =>
      DataResult.flatMap(codec.decode(ops, input), (base) =>
        DataResult.setLifecycle(
          DataResult.map(splitter(base)[1].decode(ops, input), (extra) => combiner(base, extra)),
          Lifecycle.experimental()
        )
      ),
    encode: (input, ops, prefix) => {
      codec.encode(input, ops, prefix);
      const [extra, extraCodec] = splitter(input);
      extraCodec.encode(extra, ops, prefix);
      return prefix.setLifecycle(Lifecycle.experimental());
    },
    toString: () => `Dependent[${codec}]`,
  };
}
