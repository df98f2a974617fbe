import { DataResult } from '../data-result.ts';
import { parse } from '../decoder.ts';
import type { DynamicOps } from '../dynamic-ops.ts';
import { encodeStart } from '../encoder.ts';
import type { Keyable } from '../keyable.ts';
import { Lifecycle } from '../lifecycle.ts';
import type { Pair } from '../lib/pair.ts';
import type { MapLike } from '../map-like.ts';
import type { RecordBuilder } from '../record-builder.ts';
import type { Codec, MapCodec } from '../types.ts';

type EntryReader<K, V> = <T>(ops: DynamicOps<T>, key: T, value: T) => DataResult<Pair<K, V>>;

/**
 * Reads every entry of a record, keeping the entries that decode.
 *
 * Keys are compared the way `Map` compares them. A failed or duplicate entry
 * makes the result an error whose partial value is the map of good entries;
 * the message ends with the failed entries.
 */
function decodeEntries<K, V, T>(
  ops: DynamicOps<T>,
  input: MapLike<T>,
  readEntry: EntryReader<K, V>
): DataResult<Map<K, V>> {
  const read = new Map<K, V>();
  const failed: Pair<T, T>[] = [];
  let result: DataResult<null> = DataResult.success(null, Lifecycle.stable());

  for (const entry of input.entries()) {
    const entryResult = readEntry(ops, entry[0], entry[1]);
    const value = DataResult.resultOrPartial(entryResult);
    if (value.some) {
      const [k, v] = value.value;
      if (read.has(k)) {
        failed.push(entry);
        result = DataResult.apply2Stable(
          (_duplicate, u) => u,
          DataResult.error(() => `Duplicate entry for key: '${String(k)}'`),
          result
        );
        continue;
      }
      read.set(k, v);
    }
    if (entryResult.kind === 'error') {
      failed.push(entry);
    }
    result = DataResult.apply2Stable((_entry, u) => u, entryResult, result);
  }

  const errors = ops.createMap(failed);
  return DataResult.mapError(
    DataResult.setPartial(
      DataResult.map(result, () => read),
      read
    ),
    (message) => `${message} missed input: ${ops.describe(errors)}`
  );
}

function encodeEntries<K, V, T>(
  entries: ReadonlyMap<K, V>,
  ops: DynamicOps<T>,
  prefix: RecordBuilder<T>,
  keyCodec: Codec<K>,
  valueCodec: (key: K) => Codec<V>
): RecordBuilder<T> {
  for (const [key, value] of entries) {
    prefix.addResults(encodeStart(keyCodec, ops, key), encodeStart(valueCodec(key), ops, value));
  }
  return prefix;
}

function simpleEntryReader<K, V>(keyCodec: Codec<K>, valueCodec: Codec<V>): EntryReader<K, V> {
  return (ops, key, value) =>
    DataResult.apply2Stable((k: K, v: V) => [k, v] as const, parse(keyCodec, ops, key), parse(valueCodec, ops, value));
}

/**
 * A codec for maps with any keys the key codec accepts.
 *
 * @example
 * ```typescript
 * const scores = unboundedMap(string, int); // Codec<Map<string, number>>
 * ```
 */
export function unboundedMap<K, V>(keyCodec: Codec<K>, valueCodec: Codec<V>): Codec<Map<K, V>> {
  const readEntry = simpleEntryReader(keyCodec, valueCodec);
  return {
    decode: (ops, input) =>
      DataResult.map(
        DataResult.flatMap(DataResult.setLifecycle(ops.getMap(input), Lifecycle.stable()), (map) =>
          decodeEntries(ops, map, readEntry)
        ),
        (read) => [read, input] as const
      ),
    encode: (input, ops, prefix) => encodeEntries(input, ops, ops.mapBuilder(), keyCodec, () => valueCodec).build(prefix),
    toString: () => `UnboundedMapCodec[${keyCodec} -> ${valueCodec}]`,
  };
}

/**
 * A map codec over a known set of keys, so that it can share a record with
 * other fields and be compressed.
 */
export function simpleMap<K, V>(keyCodec: Codec<K>, valueCodec: Codec<V>, keys: Keyable): MapCodec<Map<K, V>> {
  const readEntry = simpleEntryReader(keyCodec, valueCodec);
  return {
    keys: (ops) => keys.keys(ops),
    decode: (ops, input) => decodeEntries(ops, input, readEntry),
    encode: (input, ops, prefix) => encodeEntries(input, ops, prefix, keyCodec, () => valueCodec),
    toString: () => `SimpleMapCodec[${keyCodec} -> ${valueCodec}]`,
  };
}

/**
 * A codec for maps whose value codec depends on the key.
 */
export function dispatchedMap<K, V>(keyCodec: Codec<K>, valueCodecFor: (key: K) => Codec<V>): Codec<Map<K, V>> {
  const readEntry: EntryReader<K, V> = (ops, key, value) => {
    const k = parse(keyCodec, ops, key);
    const v = DataResult.flatMap(k, (decodedKey) => parse(valueCodecFor(decodedKey), ops, value));
    return DataResult.apply2Stable((a: K, b: V) => [a, b] as const, k, v);
  };
  return {
    decode: (ops, input) =>
      DataResult.map(
        DataResult.flatMap(DataResult.setLifecycle(ops.getMap(input), Lifecycle.stable()), (map) =>
          decodeEntries(ops, map, readEntry)
        ),
        (read) => [read, input] as const
      ),
    encode: (input, ops, prefix) => encodeEntries(input, ops, ops.mapBuilder(), keyCodec, valueCodecFor).build(prefix),
    toString: () => `DispatchedMapCodec[${keyCodec}]`,
  };
}
