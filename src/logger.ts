import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from 'pino';
import { errWithCause } from 'pino-std-serializers';

import { resolveConfig, type LogLevelName } from './config.ts';

export type LogMeta = Record<string, unknown> & {
  err?: unknown;
};

export interface Logger {
  trace(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  fatal(message: string, meta?: LogMeta): void;
  /**
   * Creates a logger that adds `bindings` to every entry it emits.
   */
  child(bindings: Record<string, unknown>): Logger;
}

export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   */
  level: LogLevelName;

  /**
   * Pretty-print through pino-pretty. Ignored when `destination` is set.
   */
  prettify?: boolean;

  /**
   * Where JSON lines are written. Default is stdout.
   */
  destination?: DestinationStream;
};

export class PinoLogger implements Logger {
  protected readonly logger: PinoLoggerBase;
  protected readonly opts: Partial<LoggerOptions>;

  constructor(opts: Partial<LoggerOptions> = {}, bindings: Record<string, unknown> = {}, base?: PinoLoggerBase) {
    this.opts = opts;
    this.logger = this.init(bindings, base);
  }

  private init(bindings: Record<string, unknown>, base?: PinoLoggerBase): PinoLoggerBase {
    if (base) return base.child(bindings);

    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
      ...(this.opts.prettify &&
        !this.opts.destination && {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss.l',
              ignore: 'hostname',
            },
          },
        }),
    };

    const logger = this.opts.destination ? pino(pinoOpts, this.opts.destination) : pino(pinoOpts);
    return logger.child(bindings);
  }

  trace(message: string, meta: LogMeta = {}): void {
    this.logger.trace(meta, message);
  }

  debug(message: string, meta: LogMeta = {}): void {
    this.logger.debug(meta, message);
  }

  info(message: string, meta: LogMeta = {}): void {
    this.logger.info(meta, message);
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.logger.warn(meta, message);
  }

  error(message: string, meta: LogMeta = {}): void {
    this.logger.error(meta, message);
  }

  fatal(message: string, meta: LogMeta = {}): void {
    this.logger.fatal(meta, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new PinoLogger(this.opts, bindings, this.logger);
  }
}

export class NullLogger implements Logger {
  trace(_message: string, _meta?: LogMeta): void {}

  debug(_message: string, _meta?: LogMeta): void {}

  info(_message: string, _meta?: LogMeta): void {}

  warn(_message: string, _meta?: LogMeta): void {}

  error(_message: string, _meta?: LogMeta): void {}

  fatal(_message: string, _meta?: LogMeta): void {}

  child(_bindings: Record<string, unknown>): Logger {
    return new NullLogger();
  }
}

/**
 * Creates a pino-backed logger. Options not given are taken from
 * {@link resolveConfig}.
 */
export function createLogger(opts: Partial<LoggerOptions> = {}, bindings: Record<string, unknown> = {}): Logger {
  const config = resolveConfig();
  return new PinoLogger(
    {
      level: opts.level ?? config.logLevel,
      prettify: opts.prettify ?? config.prettyLogs,
      destination: opts.destination,
    },
    bindings
  );
}

export function createNullLogger(): Logger {
  return new NullLogger();
}

/**
 * An `onError` callback for `promotePartial`, `orElse` and
 * `DataResult.resultOrPartial` that logs each message as a warning.
 *
 * @example
 * ```typescript
 * const settings = promotePartial(SettingsCodec, onErrorLogger(logger, { codec: 'settings' }));
 * ```
 */
export function onErrorLogger(logger: Logger, context: Record<string, unknown> = {}): (message: string) => void {
  return (message) => logger.warn(message, context);
}
