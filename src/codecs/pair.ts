import { DataResult } from '../data-result.ts';
import type { Pair } from '../lib/pair.ts';
import type { Codec, MapCodec } from '../types.ts';

/**
 * Reads `first`, then `second` from what `first` left over.
 */
export function pairCodec<F, S>(first: Codec<F>, second: Codec<S>): Codec<Pair<F, S>> {
  return {
    decode: (ops, input) =>
      DataResult.flatMap(first.decode(ops, input), ([f, rest]) =>
        DataResult.map(second.decode(ops, rest), ([s, remainder]) => [[f, s] as const, remainder] as const)
      ),
    encode: ([f, s], ops, prefix) =>
      DataResult.flatMap(second.encode(s, ops, prefix), (written) => first.encode(f, ops, written)),
    toString: () => `PairCodec[${first}, ${second}]`,
  };
}

/**
 * Two map codecs sharing one record.
 */
export function mapPair<F, S>(first: MapCodec<F>, second: MapCodec<S>): MapCodec<Pair<F, S>> {
  return {
    keys: (ops) => [...first.keys(ops), ...second.keys(ops)],
    decode: (ops, input) =>
      DataResult.flatMap(first.decode(ops, input), (f) =>
        DataResult.map(second.decode(ops, input), (s) => [f, s] as const)
      ),
    encode: ([f, s], ops, prefix) => first.encode(f, ops, second.encode(s, ops, prefix)),
    toString: () => `PairMapCodec[${first}, ${second}]`,
  };
}
