import type { CrawlCollaborators, CrawlConfig } from '../types.js';
import { createHttpFetcher } from './network/fetchPage.js';
import { isAllowedByRobots } from './network/robots.js';
import { sniffMime } from './parsing/content.js';
import { parseLinks } from './parsing/parseLinks.js';
import { resolveLink } from './url/normalizeUrl.js';

// Longest wait a single timer accepts; Node fires anything longer after 1ms.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Sleeps for `ms`, chaining timers for waits beyond what one timer can hold. */
export async function delay(ms: number): Promise<void> {
  let remaining = ms;
  do {
    const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
    await new Promise<void>((resolve) => {
      setTimeout(resolve, step);
    });
    remaining -= step;
  } while (remaining > 0);
}

export function createDefaultCollaborators(
  config: CrawlConfig,
  overrides: Partial<CrawlCollaborators> = {},
): CrawlCollaborators {
  return {
    fetch: overrides.fetch ?? createHttpFetcher({ userAgent: config.userAgent, timeoutMs: config.timeoutMs }),
    extractLinks: overrides.extractLinks ?? parseLinks,
    isAllowed: overrides.isAllowed ?? isAllowedByRobots,
    sniffMime: overrides.sniffMime ?? sniffMime,
    resolve: overrides.resolve ?? resolveLink,
    sleep: overrides.sleep ?? delay,
  };
}
