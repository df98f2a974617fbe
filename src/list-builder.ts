import { DataResult } from './data-result.ts';
import type { DynamicOps } from './dynamic-ops.ts';
import { Lifecycle } from './lifecycle.ts';
import type { Encoder } from './types.ts';

/**
 * Accumulates the elements of one list while encoding. Works like
 * {@link RecordBuilder}: errors are collected, `build` resets the builder.
 */
export interface ListBuilder<T> {
  readonly ops: DynamicOps<T>;

  add(value: T): ListBuilder<T>;
  addResult(value: DataResult<T>): ListBuilder<T>;
  addEncoded<E>(value: E, encoder: Encoder<E>): ListBuilder<T>;
  addAll<E>(values: Iterable<E>, encoder: Encoder<E>): ListBuilder<T>;

  withErrorsFrom(result: DataResult<unknown>): ListBuilder<T>;
  mapError(onError: (message: string) => string): ListBuilder<T>;

  build(prefix: T): DataResult<T>;
  buildResult(prefix: DataResult<T>): DataResult<T>;
}

export class DefaultListBuilder<T> implements ListBuilder<T> {
  readonly ops: DynamicOps<T>;
  private builder: DataResult<T[]> = DataResult.success([], Lifecycle.stable());

  constructor(ops: DynamicOps<T>) {
    this.ops = ops;
  }

  add(value: T): ListBuilder<T> {
    this.builder = DataResult.map(this.builder, (b) => {
      b.push(value);
      return b;
    });
    return this;
  }

  addResult(value: DataResult<T>): ListBuilder<T> {
    this.builder = DataResult.apply2Stable(
      (v: T, b: T[]) => {
        b.push(v);
        return b;
      },
      value,
      this.builder
    );
    return this;
  }

  addEncoded<E>(value: E, encoder: Encoder<E>): ListBuilder<T> {
    return this.addResult(encoder.encode(value, this.ops, this.ops.empty()));
  }

  addAll<E>(values: Iterable<E>, encoder: Encoder<E>): ListBuilder<T> {
    for (const value of values) {
      this.addEncoded(value, encoder);
    }
    return this;
  }

  withErrorsFrom(result: DataResult<unknown>): ListBuilder<T> {
    this.builder = DataResult.flatMap(this.builder, (b) => DataResult.map(result, () => b));
    return this;
  }

  mapError(onError: (message: string) => string): ListBuilder<T> {
    this.builder = DataResult.mapError(this.builder, onError);
    return this;
  }

  build(prefix: T): DataResult<T> {
    const result = DataResult.flatMap(this.builder, (b) => this.ops.mergeToListAll(prefix, b));
    this.builder = DataResult.success([], Lifecycle.stable());
    return result;
  }

  buildResult(prefix: DataResult<T>): DataResult<T> {
    return DataResult.flatMap(prefix, (p) => this.build(p));
  }
}
