import { DataResultError } from './errors.ts';
import { Lifecycle } from './lifecycle.ts';
import { Option } from './lib/option.ts';
import { show } from './lib/show.ts';

export type MessageSupplier = () => string;

export interface DataSuccess<R> {
  readonly kind: 'success';
  readonly value: R;
  readonly lifecycle: Lifecycle;
}

export interface DataFailure<R> {
  readonly kind: 'error';
  readonly message: MessageSupplier;
  readonly partial: Option<R>;
  readonly lifecycle: Lifecycle;
}

/**
 * The outcome of every decode and encode operation.
 *
 * A success always holds a value. An error holds a lazily built message and
 * may still hold a best-effort partial value, so that one broken element does
 * not discard everything else that was read. Both sides carry a
 * {@link Lifecycle} describing how stable the schema that produced them is.
 */
export type DataResult<R> = DataSuccess<R> | DataFailure<R>;

function toSupplier(message: string | MessageSupplier): MessageSupplier {
  return typeof message === 'string' ? () => message : message;
}

function failure<R>(message: MessageSupplier, partial: Option<R>, lifecycle: Lifecycle): DataFailure<R> {
  return { kind: 'error', message, partial, lifecycle };
}

// ============================================================================
// Construction
// ============================================================================

export function success<R>(value: R, lifecycle: Lifecycle = Lifecycle.experimental()): DataResult<R> {
  return { kind: 'success', value, lifecycle };
}

export function error<R = never>(
  message: string | MessageSupplier,
  partial: Option<R> = Option.none(),
  lifecycle: Lifecycle = Lifecycle.experimental()
): DataResult<R> {
  return failure(toSupplier(message), partial, lifecycle);
}

export function errorWithPartial<R>(
  message: string | MessageSupplier,
  partial: R,
  lifecycle: Lifecycle = Lifecycle.experimental()
): DataResult<R> {
  return failure(toSupplier(message), Option.some(partial), lifecycle);
}

/**
 * Wraps a lookup that may miss into one that returns an error naming the key.
 */
export function partialGet<K, V>(
  lookup: (key: K) => V | undefined,
  errorPrefix: MessageSupplier
): (key: K) => DataResult<V> {
  return (key) => {
    const value = lookup(key);
    return value === undefined ? error(() => errorPrefix() + String(key)) : success(value);
  };
}

export function appendMessages(first: MessageSupplier, second: MessageSupplier): MessageSupplier {
  return () => `${first()}; ${second()}`;
}

// ============================================================================
// Inspection
// ============================================================================

export function isSuccess<R>(result: DataResult<R>): result is DataSuccess<R> {
  return result.kind === 'success';
}

export function isError<R>(result: DataResult<R>): result is DataFailure<R> {
  return result.kind === 'error';
}

export function result<R>(result: DataResult<R>): Option<R> {
  return result.kind === 'success' ? Option.some(result.value) : Option.none();
}

export function errorOf<R>(result: DataResult<R>): Option<DataFailure<R>> {
  return result.kind === 'error' ? Option.some(result) : Option.none();
}

export function message<R>(result: DataResult<R>): string | undefined {
  return result.kind === 'error' ? result.message() : undefined;
}

export function hasResultOrPartial<R>(result: DataResult<R>): boolean {
  return result.kind === 'success' || result.partial.some;
}

/**
 * The value, or the partial value of an error. `onError` sees the message of
 * an error whether or not it has a partial value.
 */
export function resultOrPartial<R>(result: DataResult<R>, onError?: (message: string) => void): Option<R> {
  if (result.kind === 'success') {
    return Option.some(result.value);
  }
  onError?.(result.message());
  return result.partial;
}

export function getOrThrow<R>(
  result: DataResult<R>,
  toError: (message: string) => Error = (message) => new DataResultError(message)
): R {
  if (result.kind === 'success') {
    return result.value;
  }
  throw toError(result.message());
}

export function getPartialOrThrow<R>(
  result: DataResult<R>,
  toError: (message: string) => Error = (message) => new DataResultError(message)
): R {
  if (result.kind === 'success') {
    return result.value;
  }
  if (result.partial.some) {
    return result.partial.value;
  }
  throw toError(result.message());
}

export function ifSuccess<R>(result: DataResult<R>, fn: (value: R) => void): DataResult<R> {
  if (result.kind === 'success') {
    fn(result.value);
  }
  return result;
}

export function ifError<R>(result: DataResult<R>, fn: (error: DataFailure<R>) => void): DataResult<R> {
  if (result.kind === 'error') {
    fn(result);
  }
  return result;
}

export function mapOrElse<R, U>(
  result: DataResult<R>,
  onSuccess: (value: R) => U,
  onError: (error: DataFailure<R>) => U
): U {
  return result.kind === 'success' ? onSuccess(result.value) : onError(result);
}

export function toString<R>(result: DataResult<R>): string {
  if (result.kind === 'success') {
    return `DataResult.Success[${show(result.value)}]`;
  }
  const partial = result.partial.some ? `: ${show(result.partial.value)}` : '';
  return `DataResult.Error['${result.message()}'${partial}]`;
}

// ============================================================================
// Transformation
// ============================================================================

/**
 * Maps the value of a success, or the partial value of an error.
 */
export function map<R, U>(result: DataResult<R>, fn: (value: R) => U): DataResult<U> {
  if (result.kind === 'success') {
    return success(fn(result.value), result.lifecycle);
  }
  return failure(result.message, Option.map(result.partial, fn), result.lifecycle);
}

/**
 * Chains a fallible step.
 *
 * An error with a partial value still runs `fn` on it: if `fn` succeeds the
 * original message is kept with the new partial value, otherwise both messages
 * are kept. An error without a partial value stops the chain.
 */
export function flatMap<R, U>(result: DataResult<R>, fn: (value: R) => DataResult<U>): DataResult<U> {
  if (result.kind === 'success') {
    return addLifecycle(fn(result.value), result.lifecycle);
  }
  if (!result.partial.some) {
    return failure(result.message, Option.none(), result.lifecycle);
  }
  const second = fn(result.partial.value);
  const lifecycle = Lifecycle.add(result.lifecycle, second.lifecycle);
  if (second.kind === 'success') {
    return failure(result.message, Option.some(second.value), lifecycle);
  }
  return failure(appendMessages(result.message, second.message), second.partial, lifecycle);
}

/**
 * Applies a wrapped function to a wrapped argument. Messages of failing sides
 * are joined, the argument's first.
 */
export function ap<A, R>(arg: DataResult<A>, func: DataResult<(value: A) => R>): DataResult<R> {
  const lifecycle = Lifecycle.add(arg.lifecycle, func.lifecycle);
  if (arg.kind === 'success') {
    if (func.kind === 'success') {
      return success(func.value(arg.value), lifecycle);
    }
    const value = arg.value;
    return failure(func.message, Option.map(func.partial, (fn) => fn(value)), lifecycle);
  }
  if (func.kind === 'success') {
    return failure(arg.message, Option.map(arg.partial, func.value), lifecycle);
  }
  const partial =
    arg.partial.some && func.partial.some ? Option.some(func.partial.value(arg.partial.value)) : Option.none<R>();
  return failure(appendMessages(arg.message, func.message), partial, lifecycle);
}

export function ap2<A, B, R>(
  func: DataResult<(a: A, b: B) => R>,
  a: DataResult<A>,
  b: DataResult<B>
): DataResult<R> {
  if (func.kind === 'success' && a.kind === 'success' && b.kind === 'success') {
    return success(
      func.value(a.value, b.value),
      Lifecycle.add(Lifecycle.add(func.lifecycle, a.lifecycle), b.lifecycle)
    );
  }
  const curried = map(func, (fn) => (x: A) => (y: B) => fn(x, y));
  return ap(b, ap(a, curried));
}

export function ap3<A, B, C, R>(
  func: DataResult<(a: A, b: B, c: C) => R>,
  a: DataResult<A>,
  b: DataResult<B>,
  c: DataResult<C>
): DataResult<R> {
  if (func.kind === 'success' && a.kind === 'success' && b.kind === 'success' && c.kind === 'success') {
    return success(
      func.value(a.value, b.value, c.value),
      Lifecycle.add(Lifecycle.add(Lifecycle.add(func.lifecycle, a.lifecycle), b.lifecycle), c.lifecycle)
    );
  }
  const curried = map(func, (fn) => (x: A) => (y: B, z: C) => fn(x, y, z));
  return ap2(ap(a, curried), b, c);
}

export function apply2<A, B, R>(fn: (a: A, b: B) => R, a: DataResult<A>, b: DataResult<B>): DataResult<R> {
  return ap2(success(fn), a, b);
}

/**
 * Like {@link apply2}, but the combining function does not make the result
 * experimental.
 */
export function apply2Stable<A, B, R>(fn: (a: A, b: B) => R, a: DataResult<A>, b: DataResult<B>): DataResult<R> {
  return ap2(success(fn, Lifecycle.stable()), a, b);
}

export function apply3<A, B, C, R>(
  fn: (a: A, b: B, c: C) => R,
  a: DataResult<A>,
  b: DataResult<B>,
  c: DataResult<C>
): DataResult<R> {
  return ap3(success(fn), a, b, c);
}

/**
 * Accepts the partial value of an error as a success, reporting the message
 * to `onError`.
 */
export function promotePartial<R>(result: DataResult<R>, onError: (message: string) => void): DataResult<R> {
  if (result.kind === 'success') {
    return result;
  }
  onError(result.message());
  return result.partial.some ? success(result.partial.value, result.lifecycle) : result;
}

export function setPartial<R>(result: DataResult<R>, partial: R): DataResult<R> {
  if (result.kind === 'success') {
    return result;
  }
  return failure(result.message, Option.some(partial), result.lifecycle);
}

export function mapError<R>(result: DataResult<R>, fn: (message: string) => string): DataResult<R> {
  if (result.kind === 'success') {
    return result;
  }
  const { message } = result;
  return failure(() => fn(message()), result.partial, result.lifecycle);
}

export function setLifecycle<R>(result: DataResult<R>, lifecycle: Lifecycle): DataResult<R> {
  return result.kind === 'success'
    ? success(result.value, lifecycle)
    : failure(result.message, result.partial, lifecycle);
}

export function addLifecycle<R>(result: DataResult<R>, lifecycle: Lifecycle): DataResult<R> {
  return setLifecycle(result, Lifecycle.add(result.lifecycle, lifecycle));
}

export const DataResult = {
  success,
  error,
  errorWithPartial,
  partialGet,
  appendMessages,

  isSuccess,
  isError,
  result,
  errorOf,
  message,
  hasResultOrPartial,
  resultOrPartial,
  getOrThrow,
  getPartialOrThrow,
  ifSuccess,
  ifError,
  mapOrElse,
  toString,

  map,
  flatMap,
  ap,
  ap2,
  ap3,
  apply2,
  apply2Stable,
  apply3,
  promotePartial,
  setPartial,
  mapError,
  setLifecycle,
  addLifecycle,
} as const;
