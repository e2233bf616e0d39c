export type ErrorKind =
  | 'config'
  | 'host'
  | 'fetch'
  | 'robots'
  | 'decode'
  | 'parse'
  | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

/** Severity a kind carries unless the caller says otherwise. */
export const DEFAULT_SEVERITY: Readonly<Record<ErrorKind, ErrorSeverity>> = {
  config: 'fatal',
  host: 'recoverable',
  fetch: 'recoverable',
  robots: 'recoverable',
  decode: 'recoverable',
  parse: 'recoverable',
  internal: 'fatal',
};

const ERROR_NAMES: Readonly<Record<ErrorKind, string>> = {
  config: 'ConfigError',
  host: 'HostError',
  fetch: 'FetchError',
  robots: 'RobotsError',
  decode: 'DecodeError',
  parse: 'ParseError',
  internal: 'InternalError',
};

export interface CrawlerErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export interface ErrorFactoryOptions {
  severity?: ErrorSeverity;
  cause?: unknown;
}

export class CrawlerError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity = DEFAULT_SEVERITY[kind], details, cause }: CrawlerErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = ERROR_NAMES[kind];
    this.kind = kind;
    this.severity = severity;
    this.details = details;
  }

  get fatal(): boolean {
    return this.severity === 'fatal';
  }
}

export function isCrawlerError(value: unknown): value is CrawlerError {
  return value instanceof CrawlerError;
}

/**
 * Returns `error` unchanged when it is already a CrawlerError, otherwise wraps it.
 * Wrapped errors are fatal unless the fallback names a severity.
 */
export function ensureCrawlerError(
  error: unknown,
  fallback: Partial<CrawlerErrorProps> & Pick<CrawlerErrorProps, 'kind'> = { kind: 'internal' },
): CrawlerError {
  if (isCrawlerError(error)) {
    return error;
  }

  return new CrawlerError({
    message: error instanceof Error ? error.message : String(error),
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

function factoryFor(kind: ErrorKind) {
  return (message: string, details: Record<string, unknown> = {}, options: ErrorFactoryOptions = {}): CrawlerError =>
    new CrawlerError({ message, kind, severity: options.severity, details, cause: options.cause });
}

/** Invalid seed URL or settings. Always fatal. */
export function createConfigurationError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): CrawlerError {
  return new CrawlerError({ message, kind: 'config', severity: 'fatal', details, cause: options.cause });
}

export const createHostError = factoryFor('host');
export const createFetchError = factoryFor('fetch');
export const createRobotsError = factoryFor('robots');
export const createDecodeError = factoryFor('decode');
export const createParseError = factoryFor('parse');
export const createInternalError = factoryFor('internal');
