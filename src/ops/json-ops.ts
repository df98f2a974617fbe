import { DataResult } from '../data-result.ts';
import { BaseDynamicOps, type DynamicOps } from '../dynamic-ops.ts';
import type { Pair } from '../lib/pair.ts';
import type { MapLike } from '../map-like.ts';
import { AbstractStringBuilder, type RecordBuilder } from '../record-builder.ts';

export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

const INTEGER = /^[+-]?\d+$/;

function isObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function show(value: JsonValue): string {
  return JSON.stringify(value);
}

function keyOf(key: JsonValue): string {
  return typeof key === 'string' ? key : show(key);
}

function objectEntries(input: JsonObject): Pair<JsonValue, JsonValue>[] {
  const entries: Pair<JsonValue, JsonValue>[] = [];
  for (const [key, value] of Object.entries(input)) {
    if (value !== null) {
      entries.push([key, value]);
    }
  }
  return entries;
}

/**
 * Collects string-keyed entries and merges them into a JSON object prefix.
 */
class JsonRecordBuilder extends AbstractStringBuilder<JsonValue, Map<string, JsonValue>> {
  constructor(ops: DynamicOps<JsonValue>) {
    super(ops, () => new Map());
  }

  protected append(key: string, value: JsonValue, builder: Map<string, JsonValue>): Map<string, JsonValue> {
    builder.set(key, value);
    return builder;
  }

  protected buildFrom(builder: Map<string, JsonValue>, prefix: JsonValue): DataResult<JsonValue> {
    if (prefix === null) {
      return DataResult.success(Object.fromEntries(builder));
    }
    if (isObject(prefix)) {
      return DataResult.success(Object.fromEntries([...Object.entries(prefix), ...builder]));
    }
    return DataResult.errorWithPartial(() => `mergeToMap called with not a map: ${show(prefix)}`, prefix);
  }
}

/**
 * {@link DynamicOps} over plain JSON values, as produced by `JSON.parse`.
 *
 * `null` is the empty node, and an object entry whose value is `null` reads
 * as absent. The compressed variant writes records as arrays and accepts
 * numbers and numeric strings in place of each other.
 *
 * @example
 * ```typescript
 * const json = getOrThrow(encodeStart(PersonCodec, JsonOps.INSTANCE, person));
 * const back = getOrThrow(parse(PersonCodec, JsonOps.INSTANCE, JSON.parse(text)));
 * ```
 */
export class JsonOps extends BaseDynamicOps<JsonValue> {
  static readonly INSTANCE = new JsonOps(false);
  static readonly COMPRESSED = new JsonOps(true);

  private readonly compressed: boolean;

  protected constructor(compressed: boolean) {
    super();
    this.compressed = compressed;
  }

  empty(): JsonValue {
    return null;
  }

  convertTo<U>(outOps: DynamicOps<U>, input: JsonValue): U {
    if (input === null) {
      return outOps.empty();
    }
    if (Array.isArray(input)) {
      return this.convertList(outOps, input);
    }
    switch (typeof input) {
      case 'string':
        return outOps.createString(input);
      case 'boolean':
        return outOps.createBoolean(input);
      case 'number':
        return outOps.createNumeric(input);
      default:
        return this.convertMap(outOps, input);
    }
  }

  // ==========================================================================
  // Primitives
  // ==========================================================================

  getNumberValue(input: JsonValue): DataResult<number> {
    if (typeof input === 'number') {
      return DataResult.success(input);
    }
    if (typeof input === 'boolean') {
      return DataResult.success(input ? 1 : 0);
    }
    if (this.compressed && typeof input === 'string' && INTEGER.test(input)) {
      return DataResult.success(Number.parseInt(input, 10));
    }
    return DataResult.error(() => `Not a number: ${show(input)}`);
  }

  createNumeric(value: number): JsonValue {
    return value;
  }

  override getBooleanValue(input: JsonValue): DataResult<boolean> {
    if (typeof input === 'boolean') {
      return DataResult.success(input);
    }
    if (typeof input === 'number') {
      return DataResult.success(((Math.trunc(input) << 24) >> 24) !== 0);
    }
    return DataResult.error(() => `Not a boolean: ${show(input)}`);
  }

  override createBoolean(value: boolean): JsonValue {
    return value;
  }

  getStringValue(input: JsonValue): DataResult<string> {
    if (typeof input === 'string') {
      return DataResult.success(input);
    }
    if (this.compressed && typeof input === 'number') {
      return DataResult.success(String(input));
    }
    return DataResult.error(() => `Not a string: ${show(input)}`);
  }

  createString(value: string): JsonValue {
    return value;
  }

  // ==========================================================================
  // Merging
  // ==========================================================================

  mergeToList(list: JsonValue, value: JsonValue): DataResult<JsonValue> {
    return this.mergeToListAll(list, [value]);
  }

  override mergeToListAll(list: JsonValue, values: readonly JsonValue[]): DataResult<JsonValue> {
    if (list === null) {
      return DataResult.success([...values]);
    }
    if (Array.isArray(list)) {
      return DataResult.success([...list, ...values]);
    }
    return DataResult.errorWithPartial(() => `mergeToList called with not a list: ${show(list)}`, list);
  }

  mergeToMap(map: JsonValue, key: JsonValue, value: JsonValue): DataResult<JsonValue> {
    if (map !== null && !isObject(map)) {
      return DataResult.errorWithPartial(() => `mergeToMap called with not a map: ${show(map)}`, map);
    }
    if (typeof key !== 'string' && !(this.compressed && typeof key === 'number')) {
      return DataResult.errorWithPartial(() => `key is not a string: ${show(key)}`, map);
    }
    return DataResult.success(Object.fromEntries([...Object.entries(map ?? {}), [String(key), value]]));
  }

  override mergeToMapLike(map: JsonValue, values: MapLike<JsonValue>): DataResult<JsonValue> {
    if (map !== null && !isObject(map)) {
      return DataResult.errorWithPartial(() => `mergeToMap called with not a map: ${show(map)}`, map);
    }
    const entries = Object.entries(map ?? {});
    const missed: JsonValue[] = [];
    for (const [key, value] of values.entries()) {
      if (typeof key === 'string' || (this.compressed && typeof key === 'number')) {
        entries.push([String(key), value]);
      } else {
        missed.push(key);
      }
    }
    const output = Object.fromEntries(entries);
    if (missed.length > 0) {
      return DataResult.errorWithPartial(() => `some keys are not strings: ${show(missed)}`, output);
    }
    return DataResult.success(output);
  }

  // ==========================================================================
  // Maps and lists
  // ==========================================================================

  getMapValues(input: JsonValue): DataResult<Pair<JsonValue, JsonValue>[]> {
    if (isObject(input)) {
      return DataResult.success(objectEntries(input));
    }
    return DataResult.error(() => `Not a JSON object: ${show(input)}`);
  }

  createMap(entries: Iterable<Pair<JsonValue, JsonValue>>): JsonValue {
    return Object.fromEntries(Array.from(entries, ([key, value]) => [keyOf(key), value] as const));
  }

  override getMap(input: JsonValue): DataResult<MapLike<JsonValue>> {
    if (!isObject(input)) {
      return DataResult.error(() => `Not a JSON object: ${show(input)}`);
    }
    const object = input;
    const getString = (key: string): JsonValue | undefined =>
      Object.hasOwn(object, key) && object[key] !== null ? object[key] : undefined;
    return DataResult.success({
      get: (key) => (typeof key === 'string' ? getString(key) : undefined),
      getString,
      entries: () => objectEntries(object),
      toString: () => `MapLike[${show(object)}]`,
    });
  }

  getStream(input: JsonValue): DataResult<JsonValue[]> {
    if (Array.isArray(input)) {
      return DataResult.success(input);
    }
    return DataResult.error(() => `Not a json array: ${show(input)}`);
  }

  createList(values: Iterable<JsonValue>): JsonValue {
    return Array.from(values);
  }

  remove(input: JsonValue, key: string): JsonValue {
    if (isObject(input)) {
      return Object.fromEntries(Object.entries(input).filter(([k]) => k !== key));
    }
    return input;
  }

  override compressMaps(): boolean {
    return this.compressed;
  }

  override mapBuilder(): RecordBuilder<JsonValue> {
    return this.compressed ? super.mapBuilder() : new JsonRecordBuilder(this);
  }

  override describe(input: JsonValue): string {
    return show(input);
  }

  override toString(): string {
    return this.compressed ? 'JSON (compressed)' : 'JSON';
  }
}
