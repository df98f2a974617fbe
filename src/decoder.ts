import { DataResult } from './data-result.ts';
import type { DynamicOps } from './dynamic-ops.ts';
import type { Lifecycle } from './lifecycle.ts';
import type { Decoder, MapDecoder } from './types.ts';

/**
 * A read function that consumes its whole input.
 */
export type TerminalRead<A> = <T>(ops: DynamicOps<T>, input: T) => DataResult<A>;

/**
 * Decodes `input` and drops the remainder.
 */
export function parse<A, T>(decoder: Decoder<A>, ops: DynamicOps<T>, input: T): DataResult<A> {
  return DataResult.map(decoder.decode(ops, input), ([value]) => value);
}

/**
 * A decoder built from a read function; the remainder is always `ops.empty()`.
 */
export function terminalDecoder<A>(read: TerminalRead<A>, name = 'TerminalDecoder'): Decoder<A> {
  return {
    decode: (ops, input) => DataResult.map(read(ops, input), (value) => [value, ops.empty()] as const),
    toString: () => name,
  };
}

export function decoderMap<A, B>(decoder: Decoder<A>, fn: (value: A) => B): Decoder<B> {
  return {
    decode: (ops, input) => DataResult.map(decoder.decode(ops, input), ([value, rest]) => [fn(value), rest] as const),
    toString: () => `${decoder}[mapped]`,
  };
}

export function decoderFlatMap<A, B>(decoder: Decoder<A>, fn: (value: A) => DataResult<B>): Decoder<B> {
  return {
    decode: (ops, input) =>
      DataResult.flatMap(decoder.decode(ops, input), ([value, rest]) =>
        DataResult.map(fn(value), (mapped) => [mapped, rest] as const)
      ),
    toString: () => `${decoder}[flatMapped]`,
  };
}

export function decoderPromotePartial<A>(decoder: Decoder<A>, onError: (message: string) => void): Decoder<A> {
  return {
    decode: (ops, input) => DataResult.promotePartial(decoder.decode(ops, input), onError),
    toString: () => `${decoder}[promotePartial]`,
  };
}

export function decoderWithLifecycle<A>(decoder: Decoder<A>, lifecycle: Lifecycle): Decoder<A> {
  return {
    decode: (ops, input) => DataResult.setLifecycle(decoder.decode(ops, input), lifecycle),
    toString: () => decoder.toString(),
  };
}

/**
 * A map decoder that reads nothing and always yields `value`.
 */
export function unitDecoder<A>(value: () => A): MapDecoder<A> {
  return {
    keys: () => [],
    decode: () => DataResult.success(value()),
    toString: () => `UnitDecoder[${String(value())}]`,
  };
}

export function errorDecoder<A>(message: string): Decoder<A> {
  return {
    decode: () => DataResult.error(message),
    toString: () => `ErrorDecoder[${message}]`,
  };
}
