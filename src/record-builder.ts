import { DataResult } from './data-result.ts';
import type { DynamicOps } from './dynamic-ops.ts';
import { NodeMap } from './lib/node-map.ts';
import { Lifecycle } from './lifecycle.ts';
import type { Encoder } from './types.ts';

/**
 * Accumulates the fields of one record while encoding.
 *
 * Every `add` folds into an internal result: a failing field does not stop
 * later fields from being added, and {@link RecordBuilder.build} returns an
 * error carrying the partially built record. `build` resets the builder.
 */
export interface RecordBuilder<T> {
  readonly ops: DynamicOps<T>;

  add(key: T, value: T): RecordBuilder<T>;
  addResult(key: T, value: DataResult<T>): RecordBuilder<T>;
  addResults(key: DataResult<T>, value: DataResult<T>): RecordBuilder<T>;
  addString(key: string, value: T): RecordBuilder<T>;
  addStringResult(key: string, value: DataResult<T>): RecordBuilder<T>;
  addEncoded<E>(key: string, value: E, encoder: Encoder<E>): RecordBuilder<T>;

  /** Fails the record if `result` is an error, keeping the fields added so far as partial. */
  withErrorsFrom(result: DataResult<unknown>): RecordBuilder<T>;
  setLifecycle(lifecycle: Lifecycle): RecordBuilder<T>;
  mapError(onError: (message: string) => string): RecordBuilder<T>;

  build(prefix: T): DataResult<T>;
  buildResult(prefix: DataResult<T>): DataResult<T>;
}

// ============================================================================
// Base implementations
// ============================================================================

export abstract class AbstractRecordBuilder<T, R> implements RecordBuilder<T> {
  readonly ops: DynamicOps<T>;
  private readonly initBuilder: () => R;
  protected builder: DataResult<R>;

  protected constructor(ops: DynamicOps<T>, initBuilder: () => R) {
    this.ops = ops;
    this.initBuilder = initBuilder;
    this.builder = DataResult.success(initBuilder(), Lifecycle.stable());
  }

  protected abstract buildFrom(builder: R, prefix: T): DataResult<T>;

  abstract add(key: T, value: T): RecordBuilder<T>;
  abstract addResult(key: T, value: DataResult<T>): RecordBuilder<T>;
  abstract addResults(key: DataResult<T>, value: DataResult<T>): RecordBuilder<T>;

  addString(key: string, value: T): RecordBuilder<T> {
    return this.add(this.ops.createString(key), value);
  }

  addStringResult(key: string, value: DataResult<T>): RecordBuilder<T> {
    return this.addResult(this.ops.createString(key), value);
  }

  addEncoded<E>(key: string, value: E, encoder: Encoder<E>): RecordBuilder<T> {
    return this.addStringResult(key, encoder.encode(value, this.ops, this.ops.empty()));
  }

  build(prefix: T): DataResult<T> {
    const result = DataResult.flatMap(this.builder, (b) => this.buildFrom(b, prefix));
    this.builder = DataResult.success(this.initBuilder(), Lifecycle.stable());
    return result;
  }

  buildResult(prefix: DataResult<T>): DataResult<T> {
    return DataResult.flatMap(prefix, (p) => this.build(p));
  }

  withErrorsFrom(result: DataResult<unknown>): RecordBuilder<T> {
    this.builder = DataResult.flatMap(this.builder, (b) => DataResult.map(result, () => b));
    return this;
  }

  setLifecycle(lifecycle: Lifecycle): RecordBuilder<T> {
    this.builder = DataResult.setLifecycle(this.builder, lifecycle);
    return this;
  }

  mapError(onError: (message: string) => string): RecordBuilder<T> {
    this.builder = DataResult.mapError(this.builder, onError);
    return this;
  }
}

/**
 * A builder for formats whose record keys are always strings. Node keys are
 * read through `ops.getStringValue` first.
 */
export abstract class AbstractStringBuilder<T, R> extends AbstractRecordBuilder<T, R> {
  protected abstract append(key: string, value: T, builder: R): R;

  override addString(key: string, value: T): RecordBuilder<T> {
    this.builder = DataResult.map(this.builder, (b) => this.append(key, value, b));
    return this;
  }

  override addStringResult(key: string, value: DataResult<T>): RecordBuilder<T> {
    this.builder = DataResult.apply2Stable((v, b) => this.append(key, v, b), value, this.builder);
    return this;
  }

  add(key: T, value: T): RecordBuilder<T> {
    this.builder = DataResult.flatMap(this.ops.getStringValue(key), (k) => {
      this.addString(k, value);
      return this.builder;
    });
    return this;
  }

  addResult(key: T, value: DataResult<T>): RecordBuilder<T> {
    this.builder = DataResult.flatMap(this.ops.getStringValue(key), (k) => {
      this.addStringResult(k, value);
      return this.builder;
    });
    return this;
  }

  addResults(key: DataResult<T>, value: DataResult<T>): RecordBuilder<T> {
    const name = DataResult.flatMap(key, (k) => this.ops.getStringValue(k));
    this.builder = DataResult.flatMap(name, (k) => {
      this.addStringResult(k, value);
      return this.builder;
    });
    return this;
  }
}

/**
 * A builder whose keys are arbitrary nodes.
 */
export abstract class AbstractUniversalBuilder<T, R> extends AbstractRecordBuilder<T, R> {
  protected abstract append(key: T, value: T, builder: R): R;

  add(key: T, value: T): RecordBuilder<T> {
    this.builder = DataResult.map(this.builder, (b) => this.append(key, value, b));
    return this;
  }

  addResult(key: T, value: DataResult<T>): RecordBuilder<T> {
    this.builder = DataResult.apply2Stable((v, b) => this.append(key, v, b), value, this.builder);
    return this;
  }

  addResults(key: DataResult<T>, value: DataResult<T>): RecordBuilder<T> {
    const entry = DataResult.apply2Stable((k: T, v: T) => (b: R) => this.append(k, v, b), key, value);
    this.builder = DataResult.ap(this.builder, entry);
    return this;
  }
}

/**
 * The default record builder: collects entries in a {@link NodeMap} (a
 * repeated key keeps its last value) and merges them into the prefix with
 * `ops.mergeToMapAll`.
 */
export class MapBuilder<T> extends AbstractUniversalBuilder<T, NodeMap<T, T>> {
  constructor(ops: DynamicOps<T>) {
    super(ops, () => new NodeMap<T, T>((a, b) => ops.equals(a, b)));
  }

  protected append(key: T, value: T, builder: NodeMap<T, T>): NodeMap<T, T> {
    builder.set(key, value);
    return builder;
  }

  protected buildFrom(builder: NodeMap<T, T>, prefix: T): DataResult<T> {
    return this.ops.mergeToMapAll(prefix, builder);
  }
}
