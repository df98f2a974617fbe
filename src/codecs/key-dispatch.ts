import { isDeepStrictEqual } from 'node:util';

import { DataResult } from '../data-result.ts';
import { parse } from '../decoder.ts';
import { encodeStart } from '../encoder.ts';
import { COMPRESSED_VALUE_KEY } from '../map-codec.ts';
import { asDecoder } from '../map-decoder.ts';
import { asEncoder } from '../map-encoder.ts';
import type { Codec, MapCodec, MapDecoder, MapEncoder } from '../types.ts';

export type KeyDispatchOptions<K, V> = {
  /** Record key holding the type key. */
  typeKey: string;
  keyCodec: Codec<K>;
  /** The type key of a value. */
  typeOf: (value: V) => DataResult<K>;
  decoderFor: (key: K) => DataResult<MapDecoder<V>>;
  encoderFor: (value: V) => DataResult<MapEncoder<V>>;
};

/**
 * A map codec for a sum type: the record carries a type key, and the rest
 * of the record is read by the codec registered for that key.
 *
 * In compressed formats the variant's fields are nested under `"value"`;
 * otherwise they sit next to the type key. After decoding, the type key of
 * the decoded value must match the key that was read, so a variant codec
 * that builds the wrong variant is reported instead of passed on.
 */
export function keyDispatchCodec<K, V>(options: KeyDispatchOptions<K, V>): MapCodec<V> {
  const { typeKey, keyCodec, typeOf, decoderFor, encoderFor } = options;

  const checkType = (key: K, value: V): DataResult<V> =>
    DataResult.flatMap(typeOf(value), (actual) =>
      isDeepStrictEqual(actual, key)
        ? DataResult.success(value)
        : DataResult.error(
            () => `Codec for key ${String(key)} produced a value of type ${String(actual)}`
          )
    );

  return {
    keys: (ops) => [ops.createString(typeKey), ops.createString(COMPRESSED_VALUE_KEY)],

    decode: (ops, input) => {
      const elementName = input.getString(typeKey);
      if (elementName === undefined) {
        return DataResult.error(() => `Input does not contain a key [${typeKey}]: ${input}`);
      }
      return DataResult.flatMap(keyCodec.decode(ops, elementName), ([key]) =>
        DataResult.flatMap(decoderFor(key), (elementDecoder) => {
          let decoded: DataResult<V>;
          if (ops.compressMaps()) {
            const value = input.getString(COMPRESSED_VALUE_KEY);
            if (value === undefined) {
              return DataResult.error(() => `Input does not have a "value" entry: ${input}`);
            }
            decoded = parse(asDecoder(elementDecoder), ops, value);
          } else {
            decoded = elementDecoder.decode(ops, input);
          }
          return DataResult.setLifecycle(
            DataResult.flatMap(decoded, (value) => checkType(key, value)),
            decoded.lifecycle
          );
        })
      );
    },

    encode: (input, ops, prefix) => {
      const encoderResult = encoderFor(input);
      const builder = prefix.withErrorsFrom(encoderResult);
      if (encoderResult.kind === 'error') {
        return builder;
      }
      const elementEncoder = encoderResult.value;
      const typeValue = DataResult.flatMap(typeOf(input), (type) => encodeStart(keyCodec, ops, type));
      if (ops.compressMaps()) {
        return prefix
          .addStringResult(typeKey, typeValue)
          .addStringResult(COMPRESSED_VALUE_KEY, encodeStart(asEncoder(elementEncoder), ops, input));
      }
      return elementEncoder.encode(input, ops, prefix).addStringResult(typeKey, typeValue);
    },

    toString: () => `KeyDispatchCodec[${keyCodec} ${typeKey}]`,
  };
}
