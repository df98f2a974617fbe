import { DataResult } from '../data-result.ts';
import { parse } from '../decoder.ts';
import { encodeStart } from '../encoder.ts';
import type { Codec, MapCodec } from '../types.ts';

/**
 * Reads and writes `codec` under the record key `name`.
 *
 * A missing key is a failure with no partial value.
 *
 * @example
 * ```typescript
 * const age = fieldOf(int, 'age');
 * ```
 */
export function fieldOf<A>(codec: Codec<A>, name: string): MapCodec<A> {
  return {
    keys: (ops) => [ops.createString(name)],
    decode: (ops, input) => {
      const value = input.getString(name);
      if (value === undefined) {
        return DataResult.error(() => `No key ${name} in ${input}`);
      }
      return parse(codec, ops, value);
    },
    encode: (input, ops, prefix) => prefix.addStringResult(name, encodeStart(codec, ops, input)),
    toString: () => `Field[${name}: ${codec}]`,
  };
}
