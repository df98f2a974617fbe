export type ErrorContext = Readonly<Record<string, unknown>>;

export type CodecErrorOptions<C extends string = string> = Readonly<{
  code: C;
  context?: ErrorContext;
  cause?: unknown;
}>;

export type SerializedError = {
  name: string;
  code: string;
  message: string;
  context: Record<string, unknown>;
  cause?: SerializedError;
};

/**
 * Base class for every error this library throws.
 *
 * Decoding and encoding never throw; errors are returned as values inside a
 * `DataResult`. These classes are raised only when the caller asks for it
 * (`getOrThrow`) or when a codec is wired up incorrectly.
 */
export class CodecError<C extends string = string> extends Error {
  readonly code: C;
  readonly context: ErrorContext;

  constructor(message: string, options: CodecErrorOptions<C>) {
    super(message, { cause: options.cause });

    this.name = this.constructor.name;
    this.code = options.code;
    this.context = Object.freeze({ ...options.context });

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): SerializedError {
    return serializeError(this);
  }
}

/**
 * Thrown by `getOrThrow` / `getPartialOrThrow` when a result holds no usable value.
 */
export class DataResultError extends CodecError<'data_result'> {
  constructor(message: string, context?: ErrorContext) {
    super(message, { code: 'data_result', context });
  }
}

/**
 * Thrown when a codec is used in a state it does not support, such as a
 * recursive codec reading itself while it is still being built.
 */
export class IllegalStateError extends CodecError<'illegal_state'> {
  constructor(message: string, context?: ErrorContext) {
    super(message, { code: 'illegal_state', context });
  }
}

export function serializeError(err: unknown): SerializedError {
  if (err instanceof CodecError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      ...(err.cause !== undefined && { cause: serializeError(err.cause) }),
    };
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: 'UNKNOWN',
      message: err.message,
      context: {},
      ...(err.cause !== undefined && { cause: serializeError(err.cause) }),
    };
  }

  return {
    name: 'NonErrorThrown',
    code: 'UNKNOWN',
    message: typeof err === 'string' ? err : 'Unknown error',
    context: { value: err },
  };
}
