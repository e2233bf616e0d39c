import { getComponentLogger } from '../logger.js';
import type {
  ContentMap,
  CrawlCollaborators,
  CrawlConfig,
  CrawlHandlers,
  CrawlSummary,
  StoredPage,
} from '../types.js';
import { reportCrawlerError } from '../util/errorHandler.js';
import { RobotsPolicyCache } from './network/robots.js';
import { decodeText, normalizeMime } from './parsing/content.js';
import { buildCrawlSummary } from './reporting/summary.js';
import { ContentStore } from './state/content.js';
import { ConcurrencyLimiter } from './state/limiter.js';
import {
  initializeStats,
  recordBranchFailure,
  recordResponse,
  recordSkip,
  recordStoredPage,
  type CrawlStats,
} from './state/stats.js';
import { VisitedRegistry } from './state/visited.js';

export const MITIGATION_HEADER = 'cf-mitigated';
const MITIGATION_CHALLENGE = 'challenge';

export interface CrawlRuntimeOptions {
  seedUrl: string;
  config: CrawlConfig;
  collaborators: CrawlCollaborators;
  handlers?: CrawlHandlers;
}

export interface CrawlResult {
  content: ContentMap;
  summary: CrawlSummary;
}

/**
 * One crawl run. Each (url, depth) branch is admitted, fetched under a limiter permit,
 * stored, and then fans out to its links, awaiting every child before it settles.
 * Branch failures are reported and absorbed where they happen.
 */
class TraversalEngine {
  private readonly registry: VisitedRegistry;
  private readonly store = new ContentStore();
  private readonly limiter: ConcurrencyLimiter;
  private readonly robots: RobotsPolicyCache;
  private readonly stats: CrawlStats = initializeStats();
  private readonly logger = getComponentLogger('traversal');
  private readonly startTime = Date.now();

  constructor(
    private readonly config: CrawlConfig,
    private readonly collaborators: CrawlCollaborators,
    private readonly handlers: CrawlHandlers,
  ) {
    this.registry = new VisitedRegistry({ maxDepth: config.maxDepth, maxPages: config.maxPages });
    this.limiter = new ConcurrencyLimiter(config.maxConcurrentRequests);
    this.robots = new RobotsPolicyCache({
      fetch: collaborators.fetch,
      scope: config.robotsScope,
      defaultDelaySeconds: config.rateLimitWaitSeconds,
    });
  }

  async run(seedUrl: string): Promise<CrawlResult> {
    await this.visit(seedUrl, 0);

    return {
      content: this.store.snapshot(),
      summary: buildCrawlSummary({
        stats: this.stats,
        registry: this.registry,
        robots: this.robots,
        limiter: this.limiter,
        startTime: this.startTime,
      }),
    };
  }

  private async visit(url: string, depth: number): Promise<void> {
    if (!this.registry.tryClaim(url, depth)) {
      this.logger.trace({ url, depth, visited: this.registry.size }, 'Branch not admitted');
      return;
    }

    try {
      const page = await this.limiter.run(() => this.fetchAndStore(url, depth));
      if (!page) {
        return;
      }

      if (this.registry.isFull()) {
        this.logger.debug({ url, visited: this.registry.size }, 'Page limit reached');
        return;
      }

      const children = this.resolveChildren(page);
      this.logger.debug({ url, depth, links: children.length }, 'Following links');
      await Promise.all(children.map((child) => this.visit(child, depth + 1)));
      this.logger.debug({ url, depth }, 'Finished crawling URL');
    } catch (error) {
      this.handleBranchFailure(error, url, depth);
    }
  }

  /** Runs while holding a permit; the permit is returned as soon as this settles. */
  private async fetchAndStore(url: string, depth: number): Promise<StoredPage | undefined> {
    // Branches queue on the limiter after admission, so the budget may be spent by now.
    if (!this.registry.tryClaim(url, depth)) {
      return undefined;
    }

    if (!(await this.applyPoliteness(url))) {
      recordSkip(this.stats, 'robots');
      this.logger.debug({ url }, 'Disallowed by robots.txt');
      return undefined;
    }

    const response = await this.collaborators.fetch(url);
    recordResponse(this.stats, response.status);

    if (response.headers.get(MITIGATION_HEADER) === MITIGATION_CHALLENGE) {
      recordSkip(this.stats, 'challenge');
      this.logger.debug({ url }, 'Challenge mitigation found, skipping URL');
      return undefined;
    }

    if (!(await this.acceptsMime(response.body))) {
      this.registry.markVisited(url);
      recordSkip(this.stats, 'mime');
      this.logger.debug({ url }, 'Media type not allowed');
      return undefined;
    }

    const content = decodeText(response.body, url);
    if (!this.registry.markVisited(url)) {
      recordSkip(this.stats, 'duplicate');
      return undefined;
    }

    this.store.store(url, content);
    const page: StoredPage = { url, depth, status: response.status, content };
    recordStoredPage(this.stats, page);
    this.handlers.onPage?.(page);

    return page;
  }

  private async applyPoliteness(url: string): Promise<boolean> {
    const { respectRobots, rateLimitWaitSeconds, userAgent } = this.config;

    if (!respectRobots) {
      await this.pause(rateLimitWaitSeconds, url);
      return true;
    }

    const policy = await this.robots.getPolicy(url);
    await this.pause(policy.crawlDelaySeconds, url);

    if (policy.robotsText === null) {
      return true;
    }

    return this.collaborators.isAllowed(policy.robotsText, userAgent, url);
  }

  private async pause(seconds: number, url: string): Promise<void> {
    if (seconds > 0) {
      this.logger.debug({ url, seconds }, 'Waiting before fetch');
    }
    await this.collaborators.sleep(seconds * 1_000);
  }

  private async acceptsMime(body: Uint8Array): Promise<boolean> {
    const { allowedMimes } = this.config;
    if (allowedMimes.size === 0) {
      return true;
    }

    const sniffed = await this.collaborators.sniffMime(body);
    if (sniffed === undefined) {
      return true;
    }

    return allowedMimes.has(normalizeMime(sniffed));
  }

  private resolveChildren(page: StoredPage): string[] {
    const hrefs = this.collaborators.extractLinks(page.content);
    this.stats.linksDiscovered += hrefs.length;

    const children: string[] = [];
    for (const href of hrefs) {
      const resolved = this.collaborators.resolve(page.url, href);
      if (resolved !== null) {
        children.push(resolved);
      }
    }

    return children;
  }

  private handleBranchFailure(error: unknown, url: string, depth: number): void {
    const crawlerError = reportCrawlerError(error, { stage: 'crawl', url, depth }, { throwOnFatal: false });
    recordBranchFailure(this.stats, crawlerError);
    this.handlers.onError?.(crawlerError, { url, depth });
  }
}

export async function crawl({ seedUrl, config, collaborators, handlers = {} }: CrawlRuntimeOptions): Promise<CrawlResult> {
  const engine = new TraversalEngine(config, collaborators, handlers);
  const result = await engine.run(seedUrl);
  handlers.onComplete?.(result.summary);
  return result;
}
