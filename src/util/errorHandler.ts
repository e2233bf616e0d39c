import { CrawlerError, ensureCrawlerError, type ErrorKind, type ErrorSeverity } from '../errors.js';
import { getLogger } from '../logger.js';

export interface ErrorContext extends Record<string, unknown> {
  stage?: string;
  url?: string;
  depth?: number;
}

export interface ErrorHandlingOptions {
  defaultKind?: ErrorKind;
  defaultSeverity?: ErrorSeverity;
  throwOnFatal?: boolean;
}

/**
 * Normalises `error` into a CrawlerError and logs it: recoverable errors at `warn`,
 * fatal ones at `error`. Fatal errors are rethrown unless `throwOnFatal` is false.
 */
export function reportCrawlerError(
  error: unknown,
  context: ErrorContext = {},
  { defaultKind = 'internal', defaultSeverity, throwOnFatal = true }: ErrorHandlingOptions = {},
): CrawlerError {
  const crawlerError = ensureCrawlerError(error, {
    kind: defaultKind,
    severity: defaultSeverity,
    details: context,
  });

  const details: Record<string, unknown> = { ...crawlerError.details, ...context };
  const fields = { kind: crawlerError.kind, ...details };
  const message = buildLogMessage(crawlerError, details);
  const logger = getLogger();

  if (!crawlerError.fatal) {
    logger.warn(fields, message);
    return crawlerError;
  }

  logger.error(fields, message);
  if (throwOnFatal) {
    throw crawlerError;
  }

  return crawlerError;
}

/** `[kind/severity] message (key=value ...)` with keys sorted and undefined values left out. */
export function buildLogMessage(error: CrawlerError, details: Record<string, unknown>): string {
  const header = `[${error.kind}/${error.severity}] ${error.message}`;
  const pairs = Object.keys(details)
    .filter((key) => details[key] !== undefined)
    .sort()
    .map((key) => `${key}=${JSON.stringify(details[key])}`);

  return pairs.length > 0 ? `${header} (${pairs.join(' ')})` : header;
}
