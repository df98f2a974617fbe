import { DataResult } from './data-result.ts';
import type { DynamicOps } from './dynamic-ops.ts';
import type { Lifecycle } from './lifecycle.ts';
import { show } from './lib/show.ts';
import type { Encoder, MapEncoder } from './types.ts';

/**
 * Encodes `value` into a fresh node.
 */
export function encodeStart<A, T>(encoder: Encoder<A>, ops: DynamicOps<T>, value: A): DataResult<T> {
  return encoder.encode(value, ops, ops.empty());
}

export function comap<A, B>(encoder: Encoder<A>, fn: (value: B) => A): Encoder<B> {
  return {
    encode: (input, ops, prefix) => encoder.encode(fn(input), ops, prefix),
    toString: () => `${encoder}[comapped]`,
  };
}

export function flatComap<A, B>(encoder: Encoder<A>, fn: (value: B) => DataResult<A>): Encoder<B> {
  return {
    encode: (input, ops, prefix) => DataResult.flatMap(fn(input), (a) => encoder.encode(a, ops, prefix)),
    toString: () => `${encoder}[flatComapped]`,
  };
}

export function encoderWithLifecycle<A>(encoder: Encoder<A>, lifecycle: Lifecycle): Encoder<A> {
  return {
    encode: (input, ops, prefix) => DataResult.setLifecycle(encoder.encode(input, ops, prefix), lifecycle),
    toString: () => encoder.toString(),
  };
}

/**
 * A map encoder that writes nothing.
 */
export function emptyEncoder<A>(): MapEncoder<A> {
  return {
    keys: () => [],
    encode: (_input, _ops, prefix) => prefix,
    toString: () => 'EmptyEncoder',
  };
}

export function errorEncoder<A>(message: string): Encoder<A> {
  return {
    encode: (input) => DataResult.error(() => `${message} ${show(input)}`),
    toString: () => `ErrorEncoder[${message}]`,
  };
}
