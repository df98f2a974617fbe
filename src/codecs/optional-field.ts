import { DataResult } from '../data-result.ts';
import { parse } from '../decoder.ts';
import { encodeStart } from '../encoder.ts';
import type { Codec, MapCodec } from '../types.ts';

/**
 * Reads and writes `codec` under the record key `name`, where the key may be
 * absent. Absence is `undefined`, and `undefined` is not written.
 *
 * A present value that fails to decode fails the record, with "absent" as the
 * partial value unless the codec produced one. When `lenient` is set, such a
 * value reads as absent instead.
 */
export function optionalField<A>(name: string, codec: Codec<A>, lenient = false): MapCodec<A | undefined> {
  return {
    keys: (ops) => [ops.createString(name)],
    decode: (ops, input) => {
      const value = input.getString(name);
      if (value === undefined) {
        return DataResult.success(undefined);
      }
      const parsed = parse(codec, ops, value);
      if (parsed.kind === 'error' && lenient) {
        return DataResult.success(undefined);
      }
      const partial = DataResult.resultOrPartial(parsed);
      return DataResult.setPartial(
        DataResult.map(parsed, (v): A | undefined => v),
        partial.some ? partial.value : undefined
      );
    },
    encode: (input, ops, prefix) => {
      if (input !== undefined) {
        return prefix.addStringResult(name, encodeStart(codec, ops, input));
      }
      return prefix;
    },
    toString: () => `OptionalFieldCodec[${name}: ${codec}]`,
  };
}
