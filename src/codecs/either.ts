import { DataResult } from '../data-result.ts';
import { Either, left, right } from '../lib/either.ts';
import type { Codec, MapCodec } from '../types.ts';

/**
 * Tries `first`, then `second`.
 *
 * When neither succeeds, a side with a partial value wins (first before
 * second); otherwise both messages are reported.
 */
export function eitherCodec<F, S>(first: Codec<F>, second: Codec<S>): Codec<Either<F, S>> {
  return {
    decode: (ops, input) => {
      const firstRead = DataResult.map(first.decode(ops, input), ([value, rest]) => [left<F, S>(value), rest] as const);
      if (firstRead.kind === 'success') {
        return firstRead;
      }
      const secondRead = DataResult.map(second.decode(ops, input), ([value, rest]) => [right<S, F>(value), rest] as const);
      if (secondRead.kind === 'success') {
        return secondRead;
      }
      if (firstRead.partial.some) {
        return firstRead;
      }
      if (secondRead.partial.some) {
        return secondRead;
      }
      const firstMessage = firstRead.message;
      const secondMessage = secondRead.message;
      return DataResult.error(() => `Failed to parse either. First: ${firstMessage()}; Second: ${secondMessage()}`);
    },
    encode: (input, ops, prefix) =>
      input.tag === 'left' ? first.encode(input.value, ops, prefix) : second.encode(input.value, ops, prefix),
    toString: () => `EitherCodec[${first}, ${second}]`,
  };
}

/**
 * Like {@link eitherCodec}, but fails when both sides read successfully.
 */
export function xorCodec<F, S>(first: Codec<F>, second: Codec<S>): Codec<Either<F, S>> {
  return {
    decode: (ops, input) => {
      const firstRead = DataResult.map(first.decode(ops, input), ([value, rest]) => [left<F, S>(value), rest] as const);
      const secondRead = DataResult.map(second.decode(ops, input), ([value, rest]) => [right<S, F>(value), rest] as const);
      if (firstRead.kind === 'success' && secondRead.kind === 'success') {
        const firstValue = String(firstRead.value[0].value);
        const secondValue = String(secondRead.value[0].value);
        return DataResult.error(
          `Both alternatives read successfully, can not pick the correct one; first: ${firstValue} second: ${secondValue}`
        );
      }
      if (firstRead.kind === 'success') {
        return firstRead;
      }
      if (secondRead.kind === 'success') {
        return secondRead;
      }
      return DataResult.apply2((_f, s) => s, firstRead, secondRead);
    },
    encode: (input, ops, prefix) =>
      input.tag === 'left' ? first.encode(input.value, ops, prefix) : second.encode(input.value, ops, prefix),
    toString: () => `XorCodec[${first}, ${second}]`,
  };
}

/**
 * Two alternative map codecs for the same record.
 */
export function mapEither<F, S>(first: MapCodec<F>, second: MapCodec<S>): MapCodec<Either<F, S>> {
  return {
    keys: (ops) => [...first.keys(ops), ...second.keys(ops)],
    decode: (ops, input) => {
      const firstRead = DataResult.map(first.decode(ops, input), (value) => left<F, S>(value));
      if (firstRead.kind === 'success') {
        return firstRead;
      }
      const secondRead = DataResult.map(second.decode(ops, input), (value) => right<S, F>(value));
      if (secondRead.kind === 'success') {
        return secondRead;
      }
      return DataResult.apply2((_f, s) => s, firstRead, secondRead);
    },
    encode: (input, ops, prefix) =>
      input.tag === 'left' ? first.encode(input.value, ops, prefix) : second.encode(input.value, ops, prefix),
    toString: () => `EitherMapCodec[${first}, ${second}]`,
  };
}

/**
 * Reads with `primary`, falling back to `alternative` (converted to the
 * primary type by `converter`). Always writes with `primary`.
 */
export function withAlternative<A, B>(
  primary: Codec<A>,
  alternative: Codec<B>,
  converter: (value: B) => A
): Codec<A> {
  const either = eitherCodec(primary, alternative);
  return {
    decode: (ops, input) =>
      DataResult.map(either.decode(ops, input), ([value, rest]) =>
        [Either.fold(value, (a) => a, converter), rest] as const
      ),
    encode: (input, ops, prefix) => primary.encode(input, ops, prefix),
    toString: () => `WithAlternative[${primary}, ${alternative}]`,
  };
}
