import pino, { type DestinationStream, type Level, type LoggerOptions } from 'pino';

export interface LoggerLike {
  info(...args: unknown[]): void;
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  trace(...args: unknown[]): void;
  fatal(...args: unknown[]): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

export interface LoggerConfiguration {
  level?: LogLevel;
  destination?: DestinationStream;
}

export type LogLevel = Level | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

const BASE_BINDINGS = { service: 'request-canon' } as const;

// Normalizers run on hot paths; the library stays quiet unless a caller opts in.
let activeLogger: LoggerLike = pino({ level: 'silent', base: BASE_BINDINGS });

export function configureLogger(config: LoggerConfiguration = {}): void {
  const options: LoggerOptions = {
    level: config.level ?? 'silent',
    base: BASE_BINDINGS,
  };

  activeLogger = config.destination ? pino(options, config.destination) : pino(options);
}

export function setLoggerInstance(logger: LoggerLike): void {
  activeLogger = logger;
}

/**
 * Returns the active logger, scoped to a pipeline component when one is named.
 * Resolved on every call so a later configureLogger() reaches existing callers.
 */
export function getLogger(component?: string): LoggerLike {
  return component ? activeLogger.child({ component }) : activeLogger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
