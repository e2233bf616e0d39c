import type { CrawlSummary, SkipReason } from '../../types.js';
import type { RobotsPolicyCache } from '../network/robots.js';
import type { ConcurrencyLimiter } from '../state/limiter.js';
import type { CrawlStats } from '../state/stats.js';
import type { VisitedRegistry } from '../state/visited.js';

export function buildCrawlSummary(options: {
  stats: CrawlStats;
  registry: VisitedRegistry;
  robots: RobotsPolicyCache;
  limiter: ConcurrencyLimiter;
  startTime: number;
  now?: number;
}): CrawlSummary {
  const { stats, registry, robots, limiter, startTime, now = Date.now() } = options;
  const skipped = (reason: SkipReason): number => stats.skipped.get(reason) ?? 0;

  return {
    pagesStored: stats.pagesStored,
    pagesVisited: registry.size,
    fetchesAttempted: stats.fetchesAttempted,
    robotsFetches: robots.fetches,
    maxDepthReached: stats.maxDepthReached,
    linksDiscovered: stats.linksDiscovered,
    statusCounts: Object.fromEntries(
      [...stats.statusCounts.entries()].map(([status, count]) => [String(status), count]),
    ),
    skipped: {
      robots: skipped('robots'),
      challenge: skipped('challenge'),
      mime: skipped('mime'),
      duplicate: skipped('duplicate'),
    },
    failures: Object.fromEntries(stats.failures.entries()),
    actualMaxConcurrency: limiter.peakActive,
    durationMs: now - startTime,
  };
}
