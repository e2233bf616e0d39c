import { createRequire } from 'node:module';

import { createRobotsError, ensureCrawlerError } from '../../errors.js';
import { getComponentLogger } from '../../logger.js';
import type { Fetcher, RobotsEntry, RobotsScope } from '../../types.js';
import { reportCrawlerError } from '../../util/errorHandler.js';
import { robotsCacheKey, robotsTxtUrl } from '../url/robotsKey.js';

interface ParsedRobots {
  isAllowed(url: string, ua?: string): boolean | undefined;
}

// robots-parser is a CommonJS module whose typings declare an ES default export.
const require = createRequire(import.meta.url);
const robotsParser: (url: string, contents: string) => ParsedRobots = require('robots-parser');

const CRAWL_DELAY_TOKEN = 'Crawl-delay';
const UNSIGNED_INTEGER = /^\d+$/;

/**
 * Reads the crawl delay, in seconds, from the first line mentioning `Crawl-delay`.
 * Falls back when no line mentions it or its value is not an unsigned safe integer.
 */
export function parseCrawlDelay(robotsText: string, fallbackSeconds: number): number {
  const line = robotsText.split(/\r?\n/).find((candidate) => candidate.includes(CRAWL_DELAY_TOKEN));
  if (line === undefined) {
    return fallbackSeconds;
  }

  const value = (line.split(':').pop() ?? '').trim();
  if (!UNSIGNED_INTEGER.test(value)) {
    return fallbackSeconds;
  }

  const seconds = Number.parseInt(value, 10);
  return Number.isSafeInteger(seconds) ? seconds : fallbackSeconds;
}

/** Evaluates `url` against a robots.txt body. Undecidable matches are allowed. */
export function isAllowedByRobots(robotsText: string, userAgent: string, url: string): boolean {
  const robots = robotsParser(robotsTxtUrl(url), robotsText);
  return robots.isAllowed(url, userAgent) !== false;
}

export interface RobotsPolicyCacheOptions {
  fetch: Fetcher;
  scope: RobotsScope;
  defaultDelaySeconds: number;
}

/**
 * Per-run cache of robots.txt records. A miss fetches robots.txt from the URL's origin;
 * concurrent misses for one key may each fetch, and the last one stored wins.
 */
export class RobotsPolicyCache {
  private readonly entries = new Map<string, RobotsEntry>();
  private readonly logger = getComponentLogger('robots');
  private fetchCount = 0;

  constructor(private readonly options: RobotsPolicyCacheOptions) {}

  async getPolicy(url: string): Promise<RobotsEntry> {
    const domain = robotsCacheKey(url, this.options.scope);
    const cached = this.entries.get(domain);
    if (cached) {
      this.logger.debug({ domain }, 'robots.txt cache hit');
      return cached;
    }

    const entry = await this.fetchEntry(domain, robotsTxtUrl(url));
    this.entries.set(domain, entry);
    return entry;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Number of robots.txt requests issued, including failed ones. */
  get fetches(): number {
    return this.fetchCount;
  }

  private async fetchEntry(domain: string, robotsUrl: string): Promise<RobotsEntry> {
    const { defaultDelaySeconds } = this.options;
    this.fetchCount += 1;

    try {
      const response = await this.options.fetch(robotsUrl);
      if (response.status < 200 || response.status >= 300) {
        throw createRobotsError(`robots.txt responded with HTTP ${response.status}`, {
          robotsUrl,
          status: response.status,
        });
      }

      const robotsText = new TextDecoder().decode(response.body);
      const crawlDelaySeconds = parseCrawlDelay(robotsText, defaultDelaySeconds);
      this.logger.debug({ domain, robotsUrl, crawlDelaySeconds }, 'robots.txt fetched');

      return { domain, robotsText, crawlDelaySeconds };
    } catch (error) {
      const cause = ensureCrawlerError(error, { kind: 'robots', severity: 'recoverable' });
      const robotsError =
        cause.kind === 'robots'
          ? cause
          : createRobotsError(`robots.txt unavailable: ${cause.message}`, { robotsUrl }, { cause });
      reportCrawlerError(robotsError, { stage: 'robots', url: robotsUrl }, { throwOnFatal: false });

      return { domain, robotsText: null, crawlDelaySeconds: defaultDelaySeconds };
    }
  }
}
