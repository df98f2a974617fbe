import { isDeepStrictEqual } from 'node:util';

import { compoundList } from './codecs/compound-list.ts';
import { eitherCodec, withAlternative as alternativeCodec, xorCodec } from './codecs/either.ts';
import { fieldOf } from './codecs/field.ts';
import { keyDispatchCodec } from './codecs/key-dispatch.ts';
import { listCodec, MAX_LIST_SIZE } from './codecs/list.ts';
import { dispatchedMap, simpleMap, unboundedMap } from './codecs/map.ts';
import { optionalField } from './codecs/optional-field.ts';
import { pairCodec } from './codecs/pair.ts';
import {
  bool,
  byte,
  byteBuffer,
  double,
  empty,
  float,
  int,
  intStream,
  long,
  longStream,
  short,
  string,
} from './codecs/primitive.ts';
import { lazyInitialized, recursive } from './codecs/recursive.ts';
import { DataResult } from './data-result.ts';
import {
  decoderFlatMap,
  decoderMap,
  decoderPromotePartial,
  decoderWithLifecycle,
  parse,
} from './decoder.ts';
import { passthrough } from './dynamic.ts';
import { comap, encoderWithLifecycle, encodeStart, flatComap } from './encoder.ts';
import { Lifecycle } from './lifecycle.ts';
import {
  mapCodecFlatXmap,
  mapCodecStable,
  mapCodecXmap,
  mapUnit,
  mapUnitGet,
  toCodec,
} from './map-codec.ts';
import { forGetter, object, record } from './record.ts';
import type { Codec, Decoder, Encoder, Infer, MapCodec, ResultFunction } from './types.ts';

// ============================================================================
// Construction and transformation
// ============================================================================

/**
 * Pairs an encoder and a decoder into a codec.
 */
export function codecOf<A>(
  encoder: Encoder<A>,
  decoder: Decoder<A>,
  name: () => string = () => `Codec[${encoder} ${decoder}]`
): Codec<A> {
  return {
    decode: (ops, input) => decoder.decode(ops, input),
    encode: (input, ops, prefix) => encoder.encode(input, ops, prefix),
    toString: name,
  };
}

/**
 * Transform a codec with conversion functions in both directions.
 *
 * @example
 * ```typescript
 * const DateCodec = xmap(string, (s) => new Date(s), (d) => d.toISOString());
 * ```
 */
export function xmap<A, S>(codec: Codec<A>, to: (value: A) => S, from: (value: S) => A): Codec<S> {
  return codecOf(comap(codec, from), decoderMap(codec, to), () => `${codec}[xmapped]`);
}

/**
 * Like {@link xmap}, with conversions that may fail in both directions.
 */
export function flatXmap<A, S>(
  codec: Codec<A>,
  to: (value: A) => DataResult<S>,
  from: (value: S) => DataResult<A>
): Codec<S> {
  return codecOf(flatComap(codec, from), decoderFlatMap(codec, to), () => `${codec}[flatXmapped]`);
}

/**
 * A conversion that may fail when decoding only.
 */
export function comapFlatMap<A, S>(codec: Codec<A>, to: (value: A) => DataResult<S>, from: (value: S) => A): Codec<S> {
  return codecOf(comap(codec, from), decoderFlatMap(codec, to), () => `${codec}[comapFlatMapped]`);
}

/**
 * A conversion that may fail when encoding only.
 */
export function flatComapMap<A, S>(codec: Codec<A>, to: (value: A) => S, from: (value: S) => DataResult<A>): Codec<S> {
  return codecOf(flatComap(codec, from), decoderMap(codec, to), () => `${codec}[flatComapMapped]`);
}

export function withLifecycle<A>(codec: Codec<A>, lifecycle: Lifecycle): Codec<A> {
  return codecOf(encoderWithLifecycle(codec, lifecycle), decoderWithLifecycle(codec, lifecycle), () =>
    codec.toString()
  );
}

export function stable<A>(codec: Codec<A>): Codec<A> {
  return withLifecycle(codec, Lifecycle.stable());
}

export function deprecated<A>(codec: Codec<A>, since: number): Codec<A> {
  return withLifecycle(codec, Lifecycle.deprecated(since));
}

/**
 * Accepts partially decoded values as successes, reporting the message to
 * `onError`.
 */
export function promotePartial<A>(codec: Codec<A>, onError: (message: string) => void): Codec<A> {
  return codecOf(codec, decoderPromotePartial(codec, onError), () => `${codec}[promotePartial]`);
}

export function mapResult<A>(codec: Codec<A>, fn: ResultFunction<A>): Codec<A> {
  return {
    decode: (ops, input) => fn.apply(ops, input, codec.decode(ops, input)),
    encode: (input, ops, prefix) => fn.coApply(ops, input, codec.encode(input, ops, prefix)),
    toString: () => `${codec}[mapResult ${fn}]`,
  };
}

/**
 * Decodes to `value` wherever `codec` fails, leaving the input unconsumed.
 * Encoding is unchanged.
 *
 * @example
 * ```typescript
 * const Volume = orElse(intRange(0, 10), 5, (message) => log.warn(message));
 * ```
 */
export function orElse<A>(codec: Codec<A>, value: A, onError?: (message: string) => void): Codec<A> {
  return orElseGet(codec, () => value, onError);
}

export function orElseGet<A>(codec: Codec<A>, value: () => A, onError?: (message: string) => void): Codec<A> {
  return mapResult(codec, {
    apply: (_ops, input, result) => {
      if (result.kind === 'success') {
        return result;
      }
      onError?.(result.message());
      return DataResult.success([value(), input] as const);
    },
    coApply: (_ops, _input, result) => result,
    toString: () => `OrElse[${String(value())}]`,
  });
}

/**
 * Runs `checker` on every value read or written.
 */
export function validate<A>(codec: Codec<A>, checker: (value: A) => DataResult<A>): Codec<A> {
  return flatXmap(codec, checker, checker);
}

// ============================================================================
// Fields
// ============================================================================

/**
 * Nests all fields of `codec` in a record under the key `name`.
 */
export function mapCodecFieldOf<A>(codec: MapCodec<A>, name: string): MapCodec<A> {
  return fieldOf(toCodec(codec), name);
}

/**
 * A record field that may be absent.
 *
 * Without a default, absence reads as `undefined`. With a default, absence
 * reads as the default, and a value structurally equal to the default is not
 * written.
 *
 * @example
 * ```typescript
 * const nickname = optionalFieldOf(string, 'nickname'); // MapCodec<string | undefined>
 * const retries = optionalFieldOf(int, 'retries', 3); // MapCodec<number>
 * ```
 */
export function optionalFieldOf<A>(codec: Codec<A>, name: string): MapCodec<A | undefined>;
export function optionalFieldOf<A>(codec: Codec<A>, name: string, defaultValue: A): MapCodec<A>;
export function optionalFieldOf<A>(
  codec: Codec<A>,
  name: string,
  ...defaultValue: [] | [A]
): MapCodec<A | undefined> | MapCodec<A> {
  const field = optionalField(name, codec);
  return defaultValue.length === 0 ? field : withDefault(field, defaultValue[0]);
}

/**
 * Like {@link optionalFieldOf}, but a present value that fails to decode
 * reads as absent.
 */
export function lenientOptionalFieldOf<A>(codec: Codec<A>, name: string): MapCodec<A | undefined>;
export function lenientOptionalFieldOf<A>(codec: Codec<A>, name: string, defaultValue: A): MapCodec<A>;
export function lenientOptionalFieldOf<A>(
  codec: Codec<A>,
  name: string,
  ...defaultValue: [] | [A]
): MapCodec<A | undefined> | MapCodec<A> {
  const field = optionalField(name, codec, true);
  return defaultValue.length === 0 ? field : withDefault(field, defaultValue[0]);
}

function withDefault<A>(field: MapCodec<A | undefined>, defaultValue: A): MapCodec<A> {
  return mapCodecXmap(
    field,
    (value): A => (value === undefined ? defaultValue : value),
    (value): A | undefined => (isDeepStrictEqual(value, defaultValue) ? undefined : value)
  );
}

/**
 * An optional field with a default, where a present value decodes with
 * `fieldLifecycle` and the default with `defaultLifecycle`.
 */
export function optionalFieldOfWithLifecycle<A>(
  codec: Codec<A>,
  name: string,
  defaultValue: A,
  fieldLifecycle: Lifecycle,
  defaultLifecycle: Lifecycle,
  lenient = false
): MapCodec<A> {
  return mapCodecFlatXmap(
    mapCodecStable(optionalField(name, codec, lenient)),
    (value) =>
      value === undefined
        ? DataResult.success(defaultValue, defaultLifecycle)
        : DataResult.success(value, fieldLifecycle),
    (value) =>
      isDeepStrictEqual(value, defaultValue)
        ? DataResult.success<A | undefined>(undefined, defaultLifecycle)
        : DataResult.success<A | undefined>(value, fieldLifecycle)
  );
}

// ============================================================================
// Compound codecs
// ============================================================================

/**
 * A codec for lists of `codec` with `min` to `max` elements.
 */
export function listOf<A>(codec: Codec<A>, min = 0, max = MAX_LIST_SIZE): Codec<A[]> {
  return listCodec(codec, min, max);
}

export function sizeLimitedListOf<A>(codec: Codec<A>, max: number): Codec<A[]> {
  return listCodec(codec, 0, max);
}

/**
 * Reads `primary`, or `alternative` converted by `converter`. Writes with
 * `primary`.
 */
export function withAlternative<A, B>(primary: Codec<A>, alternative: Codec<B>, converter: (value: B) => A): Codec<A>;
export function withAlternative<A>(primary: Codec<A>, alternative: Codec<A>): Codec<A>;
export function withAlternative<A>(
  primary: Codec<A>,
  alternative: Codec<A>,
  converter: (value: A) => A = (value) => value
): Codec<A> {
  return alternativeCodec(primary, alternative, converter);
}

// ============================================================================
// Validation
// ============================================================================

function checkRange(min: number, max: number): (value: number) => DataResult<number> {
  return (value) =>
    value >= min && value <= max
      ? DataResult.success(value)
      : DataResult.errorWithPartial(() => `Value ${value} outside of range [${min}:${max}]`, value);
}

export function intRange(min: number, max: number): Codec<number> {
  return validate(int, checkRange(min, max));
}

export function floatRange(min: number, max: number): Codec<number> {
  return validate(float, checkRange(min, max));
}

export function doubleRange(min: number, max: number): Codec<number> {
  return validate(double, checkRange(min, max));
}

/**
 * A string codec accepting `min` to `max` UTF-16 code units.
 */
export function boundedString(min: number, max: number): Codec<string> {
  return validate(string, (value) => {
    const { length } = value;
    if (length < min) {
      return DataResult.error(() => `String "${value}" is too short: ${length}, expected range [${min}-${max}]`);
    }
    if (length > max) {
      return DataResult.error(() => `String "${value}" is too long: ${length}, expected range [${min}-${max}]`);
    }
    return DataResult.success(value);
  });
}

export function sizeLimitedString(max: number): Codec<string> {
  return boundedString(0, max);
}

/**
 * A codec for values named by strings, such as registry entries or enum
 * members.
 *
 * @example
 * ```typescript
 * const Color = stringResolver<Color>((c) => c.name, (name) => COLORS.get(name));
 * ```
 */
export function stringResolver<A>(
  toName: (value: A) => string | undefined,
  fromName: (name: string) => A | undefined
): Codec<A> {
  return flatXmap<string, A>(
    string,
    (name) => {
      const value = fromName(name);
      return value === undefined ? DataResult.error(() => `Unknown element name:${name}`) : DataResult.success(value);
    },
    (value) => {
      const name = toName(value);
      return name === undefined
        ? DataResult.error(() => `Element with unknown name: ${String(value)}`)
        : DataResult.success(name);
    }
  );
}

// ============================================================================
// Dispatch
// ============================================================================

function resolveCodec<K, V>(
  codecFor: (key: K) => MapCodec<V> | undefined,
  lifecycle: Lifecycle
): (key: K) => DataResult<MapCodec<V>> {
  return (key) => {
    const codec = codecFor(key);
    return codec === undefined
      ? DataResult.error(() => `No codec for key ${String(key)}`)
      : DataResult.success(codec, lifecycle);
  };
}

/**
 * A map codec for a sum type whose variants are told apart by their type
 * keys, and whose variant codecs may fail to resolve.
 */
export function partialDispatchMap<K, V>(
  keyCodec: Codec<K>,
  typeKey: string,
  typeOf: (value: V) => DataResult<K>,
  codecFor: (key: K) => DataResult<MapCodec<V>>
): MapCodec<V> {
  return keyDispatchCodec({
    typeKey,
    keyCodec,
    typeOf,
    decoderFor: codecFor,
    encoderFor: (value) => DataResult.flatMap(typeOf(value), codecFor),
  });
}

export function partialDispatch<K, V>(
  keyCodec: Codec<K>,
  typeKey: string,
  typeOf: (value: V) => DataResult<K>,
  codecFor: (key: K) => DataResult<MapCodec<V>>
): Codec<V> {
  return toCodec(partialDispatchMap(keyCodec, typeKey, typeOf, codecFor));
}

export function dispatchMap<K, V>(
  keyCodec: Codec<K>,
  typeKey: string,
  typeOf: (value: V) => K,
  codecFor: (key: K) => MapCodec<V> | undefined
): MapCodec<V> {
  return partialDispatchMap(
    keyCodec,
    typeKey,
    (value) => DataResult.success(typeOf(value)),
    resolveCodec(codecFor, Lifecycle.experimental())
  );
}

/**
 * A codec for a sum type. The record holds the variant's type key under
 * `typeKey`, and the variant's own fields are read by `codecFor(key)`.
 *
 * @example
 * ```typescript
 * const Animal = dispatch(string, 'type', (a: Animal) => a.type, (type) => ANIMAL_CODECS[type]);
 * ```
 */
export function dispatch<K, V>(
  keyCodec: Codec<K>,
  typeKey: string,
  typeOf: (value: V) => K,
  codecFor: (key: K) => MapCodec<V> | undefined
): Codec<V> {
  return toCodec(dispatchMap(keyCodec, typeKey, typeOf, codecFor));
}

/**
 * Like {@link dispatch}, without making the results experimental.
 */
export function dispatchStable<K, V>(
  keyCodec: Codec<K>,
  typeKey: string,
  typeOf: (value: V) => K,
  codecFor: (key: K) => MapCodec<V> | undefined
): Codec<V> {
  return partialDispatch(
    keyCodec,
    typeKey,
    (value) => DataResult.success(typeOf(value), Lifecycle.stable()),
    resolveCodec(codecFor, Lifecycle.stable())
  );
}

// ============================================================================
// Units
// ============================================================================

/**
 * A codec that reads and writes nothing and always decodes to `value`.
 */
export function unit<A>(value: A): Codec<A> {
  return toCodec(mapUnit(value));
}

export function unitGet<A>(value: () => A): Codec<A> {
  return toCodec(mapUnitGet(value));
}

// ============================================================================
// Namespace
// ============================================================================

/**
 * All codecs and combinators in one object.
 *
 * @example
 * ```typescript
 * import { c } from 'polycodec';
 *
 * const Person = c.toCodec(
 *   c.object({
 *     name: c.fieldOf(c.string, 'name'),
 *     age: c.optionalFieldOf(c.int, 'age', 0),
 *   })
 * );
 *
 * type Person = c.infer<typeof Person>;
 * ```
 */
export const c = {
  // Primitives
  bool,
  byte,
  short,
  int,
  long,
  float,
  double,
  string,
  byteBuffer,
  intStream,
  longStream,
  passthrough,
  empty,

  // Transformations
  codecOf,
  xmap,
  flatXmap,
  comapFlatMap,
  flatComapMap,
  withLifecycle,
  stable,
  deprecated,
  promotePartial,
  mapResult,
  orElse,
  orElseGet,
  validate,

  // Fields
  fieldOf,
  mapCodecFieldOf,
  optionalFieldOf,
  lenientOptionalFieldOf,
  optionalFieldOfWithLifecycle,
  toCodec,
  object,
  record,
  forGetter,

  // Compounds
  listOf,
  sizeLimitedListOf,
  pair: pairCodec,
  either: eitherCodec,
  xor: xorCodec,
  withAlternative,
  unboundedMap,
  simpleMap,
  compoundList,
  dispatchedMap,

  // Validation
  intRange,
  floatRange,
  doubleRange,
  boundedString,
  sizeLimitedString,
  stringResolver,

  // Sum types and recursion
  dispatch,
  dispatchStable,
  dispatchMap,
  partialDispatch,
  partialDispatchMap,
  recursive,
  lazyInitialized,
  unit,
  unitGet,

  // Functions
  parse,
  encodeStart,
} as const;

export declare namespace c {
  export type infer<C> = Infer<C>;
}
