import pino, { type DestinationStream, type LoggerOptions } from 'pino';

/** The subset of pino's logger the crawler calls, so tests can install a recorder. */
export interface LoggerLike {
  info(...args: unknown[]): void;
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  trace(...args: unknown[]): void;
  fatal(...args: unknown[]): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfiguration {
  level?: LogLevel;
  base?: LoggerOptions['base'];
  destination?: DestinationStream;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger({
  level = 'silent',
  base = { service: 'polite-crawler' },
  destination,
}: LoggerConfiguration = {}): LoggerLike {
  const options: LoggerOptions = { level, base };
  return destination ? pino(options, destination) : pino(options);
}

let activeLogger: LoggerLike = createLogger();

/** Replaces the shared logger; with no argument, restores the silent default. */
export function configureLogger(config: LoggerConfiguration = {}): void {
  activeLogger = createLogger(config);
}

export function setLoggerInstance(logger: LoggerLike): void {
  activeLogger = logger;
}

export function getLogger(): LoggerLike {
  return activeLogger;
}

/** Child of the active logger tagged with the crawler component emitting the record. */
export function getComponentLogger(component: string): LoggerLike {
  return activeLogger.child({ component });
}
