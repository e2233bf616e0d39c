import { createFetchError, createHostError, isCrawlerError, type CrawlerError } from '../../errors.js';
import type { FetchedResource, Fetcher } from '../../types.js';

export interface HttpFetcherOptions {
  userAgent: string;
  timeoutMs: number;
}

const HOST_RESOLUTION_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_NONAME']);

/**
 * Builds the crawler's HTTP client: a fetch bound to the configured user agent and
 * request timeout. Any response, whatever its status, resolves; transport failures
 * reject with a `fetch` error, or a `host` error when the name did not resolve.
 */
export function createHttpFetcher(options: HttpFetcherOptions): Fetcher {
  const headers = {
    'user-agent': options.userAgent,
    accept: 'text/html,application/xhtml+xml,*/*;q=0.9',
    'accept-encoding': 'gzip, deflate, br',
  };

  return async (url: string): Promise<FetchedResource> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      const response = await fetch(url, {
        redirect: 'follow',
        signal: controller.signal,
        headers,
      });
      const body = new Uint8Array(await response.arrayBuffer());

      return {
        url: response.url || url,
        status: response.status,
        headers: response.headers,
        body,
      };
    } catch (error) {
      throw toTransportError(error, url, options.timeoutMs, controller.signal.aborted);
    } finally {
      clearTimeout(timeoutId);
    }
  };
}

function toTransportError(
  error: unknown,
  url: string,
  timeoutMs: number,
  aborted: boolean,
): CrawlerError {
  const err = error instanceof Error ? error : new Error(String(error));
  const timedOut = aborted && err.name === 'AbortError';
  const code = extractErrorCode(err);
  const details = {
    url,
    timeoutMs,
    ...(typeof code === 'string' ? { code } : {}),
  };

  if (code && HOST_RESOLUTION_CODES.has(code)) {
    return createHostError(`Unable to resolve host for ${url}`, details, { cause: err });
  }

  const message = timedOut ? `Request timed out after ${timeoutMs}ms` : err.message || 'Request failed';
  return createFetchError(message, details, { cause: err });
}

export function extractErrorCode(error: Error | CrawlerError): string | undefined {
  if (isCrawlerError(error)) {
    const detailsCode = error.details?.code;
    if (typeof detailsCode === 'string') {
      return detailsCode;
    }
  }

  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  const { cause } = error;
  if (cause instanceof Error) {
    return extractErrorCode(cause);
  }

  return undefined;
}
