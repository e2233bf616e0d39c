import { crawl } from './crawler/crawl.js';
import { createDefaultCollaborators } from './crawler/collaborators.js';
import { normalizeUrl } from './crawler/url/normalizeUrl.js';
import { resolveConfig } from './config.js';
import { createConfigurationError } from './errors.js';
import { configureLogger } from './logger.js';
import type {
  ContentMap,
  CrawlCollaborators,
  CrawlConfig,
  CrawlConfigOverrides,
  CrawlerOptions,
  CrawlHandlers,
  CrawlSummary,
} from './types.js';

/**
 * Entry point for crawling. Holds one validated configuration and its collaborators;
 * every call to `start` runs with fresh caches, visited set and content map.
 */
export class Crawler {
  readonly config: CrawlConfig;
  private readonly collaborators: CrawlCollaborators;
  private readonly handlers: CrawlHandlers;
  private summary: CrawlSummary | undefined;

  constructor(config: CrawlConfig, options: CrawlerOptions = {}) {
    this.config = config;
    this.collaborators = createDefaultCollaborators(config, options.collaborators);
    this.handlers = options.handlers ?? {};
  }

  /** Crawls from `seedUrl` and resolves to the stored pages keyed by normalized URL. */
  async start(seedUrl: string): Promise<ContentMap> {
    const seed = validateSeedUrl(seedUrl);
    const { content, summary } = await crawl({
      seedUrl: seed,
      config: this.config,
      collaborators: this.collaborators,
      handlers: this.handlers,
    });

    this.summary = summary;
    return content;
  }

  /** Summary of the most recent completed run. */
  get lastSummary(): CrawlSummary | undefined {
    return this.summary;
  }
}

/**
 * Resolves `overrides` (an existing `CrawlConfig` is accepted as well) into a crawler.
 * An explicit `logLevel` reconfigures the shared logger.
 */
export function createCrawler(overrides: CrawlConfigOverrides = {}, options: CrawlerOptions = {}): Crawler {
  const config = resolveConfig(overrides);
  if (overrides.logLevel !== undefined) {
    configureLogger({ level: config.logLevel });
  }
  return new Crawler(config, options);
}

export async function crawlSite(
  seedUrl: string,
  overrides: CrawlConfigOverrides = {},
  options: CrawlerOptions = {},
): Promise<ContentMap> {
  return createCrawler(overrides, options).start(seedUrl);
}

function validateSeedUrl(seedUrl: string): string {
  let url: URL;

  try {
    url = new URL(seedUrl);
  } catch {
    throw createConfigurationError(`Invalid URL: ${seedUrl}`, { seedUrl });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw createConfigurationError('Seed URL must use http or https protocol.', {
      protocol: url.protocol,
      seedUrl,
    });
  }

  const normalized = normalizeUrl(url.href);
  if (!normalized) {
    throw createConfigurationError('Unable to normalize the seed URL.', { seedUrl });
  }

  return normalized;
}

export {
  defaultConfig,
  resolveConfig,
  withAllowedMimes,
  withMaxConcurrentRequests,
  withMaxDepth,
  withMaxPages,
  withRateLimitWaitSeconds,
  withRobots,
  withUserAgent,
} from './config.js';
export { CrawlerError, isCrawlerError } from './errors.js';
export { parseCrawlDelay } from './crawler/network/robots.js';
export type {
  ContentMap,
  CrawlCollaborators,
  CrawlConfig,
  CrawlConfigOverrides,
  CrawlerOptions,
  CrawlHandlers,
  CrawlSummary,
  FetchedResource,
  Fetcher,
  RobotsEntry,
  RobotsScope,
  StoredPage,
} from './types.js';
