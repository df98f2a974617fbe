/**
 * Log levels understood by the library logger, lowest first.
 */
export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

/**
 * Library-wide settings.
 */
export interface PolycodecConfig {
  /**
   * Minimum level the library logger emits.
   * Default is 'warn', so that promoted partial results are visible.
   */
  logLevel: LogLevelName;

  /**
   * Whether to pretty-print log output through pino-pretty.
   * Default is false (JSON lines).
   */
  prettyLogs: boolean;
}

export const DEFAULT_CONFIG: PolycodecConfig = {
  logLevel: 'warn',
  prettyLogs: false,
};

export type Environment = Readonly<Record<string, string | undefined>>;

function isLogLevel(value: string): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

function parseFlag(value: string | undefined): boolean | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      return undefined;
  }
}

/**
 * Reads the configuration from environment variables, falling back to
 * {@link DEFAULT_CONFIG} for anything unset or unrecognized.
 *
 * - `POLYCODEC_LOG_LEVEL`: one of {@link LOG_LEVELS}
 * - `POLYCODEC_PRETTY_LOGS`: `true`/`false` (also `1`/`0`, `yes`/`no`)
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ POLYCODEC_LOG_LEVEL: 'debug' });
 * // { logLevel: 'debug', prettyLogs: false }
 * ```
 */
export function resolveConfig(env: Environment = process.env): PolycodecConfig {
  const level = env.POLYCODEC_LOG_LEVEL?.trim().toLowerCase();
  return {
    logLevel: level !== undefined && isLogLevel(level) ? level : DEFAULT_CONFIG.logLevel,
    prettyLogs: parseFlag(env.POLYCODEC_PRETTY_LOGS) ?? DEFAULT_CONFIG.prettyLogs,
  };
}
