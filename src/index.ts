/**
 * polycodec: format-agnostic, bidirectional codecs for TypeScript.
 *
 * A codec describes a value type once and then encodes it to, and decodes it
 * from, any tree-shaped format through a {@link DynamicOps} adapter. Decoding
 * keeps whatever it can read: errors carry a best-effort partial value, and
 * every result records how stable the schema behind it is.
 *
 * @example
 * ```typescript
 * import { c, getOrThrow, JsonOps } from 'polycodec';
 *
 * const Person = c.toCodec(
 *   c.object({
 *     name: c.fieldOf(c.string, 'name'),
 *     age: c.optionalFieldOf(c.int, 'age', 0),
 *   })
 * );
 * type Person = c.infer<typeof Person>;
 *
 * const json = getOrThrow(c.encodeStart(Person, JsonOps.INSTANCE, { name: 'Ada', age: 36 }));
 * const person = getOrThrow(c.parse(Person, JsonOps.INSTANCE, json));
 * ```
 *
 * @packageDocumentation
 */

export type { Codec, Decoder, Encoder, Infer, MapCodec, MapDecoder, MapEncoder, ResultFunction } from './types.ts';

// === Results ===

export { DataResult } from './data-result.ts';
export type { DataFailure, DataSuccess, MessageSupplier } from './data-result.ts';
export {
  success,
  error,
  errorWithPartial,
  isSuccess,
  isError,
  getOrThrow,
  getPartialOrThrow,
  resultOrPartial,
} from './data-result.ts';
export { Lifecycle } from './lifecycle.ts';
export { traverse, traverseShortCircuit } from './traverse.ts';

// === Values ===

export { Option } from './lib/option.ts';
export { Either } from './lib/either.ts';
export { pair as pairOf } from './lib/pair.ts';
export type { Pair } from './lib/pair.ts';
export { Lazy, lazy } from './lib/lazy.ts';

// === Formats ===

export { BaseDynamicOps } from './dynamic-ops.ts';
export type { DynamicOps } from './dynamic-ops.ts';
export { JsonOps } from './ops/json-ops.ts';
export type { JsonObject, JsonValue } from './ops/json-ops.ts';
export { MapLike } from './map-like.ts';
export { Keyable } from './keyable.ts';
export { KeyCompressor, UNKNOWN_KEY } from './key-compressor.ts';
export {
  AbstractRecordBuilder,
  AbstractStringBuilder,
  AbstractUniversalBuilder,
  MapBuilder,
} from './record-builder.ts';
export type { RecordBuilder } from './record-builder.ts';
export { DefaultListBuilder } from './list-builder.ts';
export type { ListBuilder } from './list-builder.ts';
export { Dynamic, passthrough } from './dynamic.ts';

// === Decoders and encoders ===

export {
  parse,
  terminalDecoder,
  decoderMap,
  decoderFlatMap,
  decoderPromotePartial,
  decoderWithLifecycle,
  unitDecoder,
  errorDecoder,
} from './decoder.ts';
export type { TerminalRead } from './decoder.ts';
export { encodeStart, comap, flatComap, encoderWithLifecycle, emptyEncoder, errorEncoder } from './encoder.ts';
export {
  compressedDecode,
  asDecoder,
  mapDecoderMap,
  mapDecoderFlatMap,
  mapDecoderAp,
  mapDecoderWithLifecycle,
} from './map-decoder.ts';
export {
  compressedBuilder,
  asEncoder,
  mapEncoderComap,
  mapEncoderFlatComap,
  mapEncoderWithLifecycle,
} from './map-encoder.ts';

// === Codecs ===

export {
  COMPRESSED_VALUE_KEY,
  mapCodecOf,
  mapUnit,
  mapUnitGet,
  toCodec,
  assumeMapUnsafe,
  mapCodecXmap,
  mapCodecFlatXmap,
  mapCodecValidate,
  mapCodecWithLifecycle,
  mapCodecStable,
  mapCodecDeprecated,
  mapCodecMapResult,
  mapCodecOrElse,
  mapCodecOrElseGet,
  mapCodecSetPartial,
  dependent,
} from './map-codec.ts';
export type { MapResultFunction } from './map-codec.ts';

export {
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
  empty,
  createPrimitiveCodec,
} from './codecs/primitive.ts';
export { fieldOf } from './codecs/field.ts';
export { MAX_LIST_SIZE } from './codecs/list.ts';
export { pairCodec as pair, mapPair } from './codecs/pair.ts';
export { eitherCodec as either, xorCodec as xor, mapEither } from './codecs/either.ts';
export { unboundedMap, simpleMap, dispatchedMap } from './codecs/map.ts';
export { compoundList } from './codecs/compound-list.ts';
export { keyDispatchCodec } from './codecs/key-dispatch.ts';
export type { KeyDispatchOptions } from './codecs/key-dispatch.ts';
export { RecursiveCodec, RecursiveMapCodec, recursive, mapRecursive, lazyInitialized } from './codecs/recursive.ts';
export { record, object, forGetter } from './record.ts';
export type { FieldValues, RecordField } from './record.ts';

export {
  c,
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
  mapCodecFieldOf,
  optionalFieldOf,
  lenientOptionalFieldOf,
  optionalFieldOfWithLifecycle,
  listOf,
  sizeLimitedListOf,
  withAlternative,
  intRange,
  floatRange,
  doubleRange,
  boundedString,
  sizeLimitedString,
  stringResolver,
  dispatch,
  dispatchStable,
  dispatchMap,
  partialDispatch,
  partialDispatchMap,
  unit,
  unitGet,
} from './codec.ts';

// === Ambient ===

export { CodecError, DataResultError, IllegalStateError, serializeError } from './errors.ts';
export type { CodecErrorOptions, ErrorContext, SerializedError } from './errors.ts';
export { createLogger, createNullLogger, onErrorLogger, NullLogger, PinoLogger } from './logger.ts';
export type { LogMeta, Logger, LoggerOptions } from './logger.ts';
export { DEFAULT_CONFIG, LOG_LEVELS, resolveConfig } from './config.ts';
export type { Environment, LogLevelName, PolycodecConfig } from './config.ts';
