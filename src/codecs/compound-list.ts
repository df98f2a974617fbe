import { DataResult } from '../data-result.ts';
import { parse } from '../decoder.ts';
import { encodeStart } from '../encoder.ts';
import { Lifecycle } from '../lifecycle.ts';
import type { Pair } from '../lib/pair.ts';
import type { Codec } from '../types.ts';

/**
 * Reads a record as an ordered list of key/value pairs, so that keys need not
 * be unique or of a map-friendly type. Entries that fail are returned as the
 * remainder.
 */
export function compoundList<K, V>(keyCodec: Codec<K>, valueCodec: Codec<V>): Codec<Pair<K, V>[]> {
  return {
    decode: (ops, input) =>
      DataResult.flatMap(ops.getMapEntries(input), (visit) => {
        const read: Pair<K, V>[] = [];
        const failed: Pair<typeof input, typeof input>[] = [];
        let result: DataResult<null> = DataResult.success(null, Lifecycle.experimental());

        visit((key, value) => {
          const entry = DataResult.apply2Stable(
            (k: K, v: V) => [k, v] as const,
            parse(keyCodec, ops, key),
            parse(valueCodec, ops, value)
          );
          if (entry.kind === 'error') {
            failed.push([key, value]);
          }
          const partial = DataResult.resultOrPartial(entry);
          if (partial.some) {
            read.push(partial.value);
          }
          result = DataResult.apply2Stable((_entry, u) => u, entry, result);
        });

        const pair = [read, ops.createMap(failed)] as const;
        return DataResult.setPartial(
          DataResult.map(result, () => pair),
          pair
        );
      }),
    encode: (input, ops, prefix) => {
      const builder = ops.mapBuilder();
      for (const [key, value] of input) {
        builder.addResults(encodeStart(keyCodec, ops, key), encodeStart(valueCodec, ops, value));
      }
      return builder.build(prefix);
    },
    toString: () => `CompoundListCodec[${keyCodec} -> ${valueCodec}]`,
  };
}
