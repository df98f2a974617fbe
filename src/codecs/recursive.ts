import type { DataResult } from '../data-result.ts';
import type { DynamicOps } from '../dynamic-ops.ts';
import { Lazy } from '../lib/lazy.ts';
import type { Pair } from '../lib/pair.ts';
import { toCodec } from '../map-codec.ts';
import type { MapLike } from '../map-like.ts';
import type { RecordBuilder } from '../record-builder.ts';
import type { Codec, MapCodec } from '../types.ts';

/**
 * A codec that can refer to itself.
 *
 * `wrapped` receives this codec and returns the real one. It runs once, on
 * first use; calling the codec from inside `wrapped` throws.
 *
 * @example
 * ```typescript
 * type Tree = { value: number; children: Tree[] };
 * const TreeCodec = new RecursiveCodec<Tree>('Tree', (self) =>
 *   toCodec(
 *     object({
 *       value: fieldOf(int, 'value'),
 *       children: fieldOf(listOf(self), 'children'),
 *     })
 *   )
 * );
 * ```
 */
export class RecursiveCodec<A> implements Codec<A> {
  readonly name: string;
  private readonly wrapped: Lazy<Codec<A>>;

  constructor(name: string, wrapped: (self: Codec<A>) => Codec<A>) {
    this.name = name;
    this.wrapped = new Lazy(() => wrapped(this));
  }

  decode<T>(ops: DynamicOps<T>, input: T): DataResult<Pair<A, T>> {
    return this.wrapped.get().decode(ops, input);
  }

  encode<T>(input: A, ops: DynamicOps<T>, prefix: T): DataResult<T> {
    return this.wrapped.get().encode(input, ops, prefix);
  }

  toString(): string {
    return `RecursiveCodec[${this.name}]`;
  }
}

/**
 * The map codec counterpart of {@link RecursiveCodec}. `wrapped` receives
 * this map codec lifted to a codec of whole records.
 */
export class RecursiveMapCodec<A> implements MapCodec<A> {
  readonly name: string;
  private readonly wrapped: Lazy<MapCodec<A>>;

  constructor(name: string, wrapped: (self: Codec<A>) => MapCodec<A>) {
    this.name = name;
    this.wrapped = new Lazy(() => wrapped(toCodec(this)));
  }

  keys<T>(ops: DynamicOps<T>): T[] {
    return this.wrapped.get().keys(ops);
  }

  decode<T>(ops: DynamicOps<T>, input: MapLike<T>): DataResult<A> {
    return this.wrapped.get().decode(ops, input);
  }

  encode<T>(input: A, ops: DynamicOps<T>, prefix: RecordBuilder<T>): RecordBuilder<T> {
    return this.wrapped.get().encode(input, ops, prefix);
  }

  toString(): string {
    return `RecursiveMapCodec[${this.name}]`;
  }
}

export function recursive<A>(name: string, wrapped: (self: Codec<A>) => Codec<A>): Codec<A> {
  return new RecursiveCodec(name, wrapped);
}

export function mapRecursive<A>(name: string, wrapped: (self: Codec<A>) => MapCodec<A>): MapCodec<A> {
  return new RecursiveMapCodec(name, wrapped);
}

/**
 * Defers building a codec until it is first used.
 */
export function lazyInitialized<A>(supplier: () => Codec<A>): Codec<A> {
  const delegate = new Lazy(supplier);
  return {
    decode: (ops, input) => delegate.get().decode(ops, input),
    encode: (input, ops, prefix) => delegate.get().encode(input, ops, prefix),
    toString: () => `LazyCodec[${delegate.initialized ? delegate.get() : 'uninitialized'}]`,
  };
}
