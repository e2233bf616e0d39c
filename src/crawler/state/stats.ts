import type { CrawlerError } from '../../errors.js';
import type { SkipReason, StoredPage } from '../../types.js';

export interface CrawlStats {
  pagesStored: number;
  fetchesAttempted: number;
  maxDepthReached: number;
  linksDiscovered: number;
  statusCounts: Map<number, number>;
  skipped: Map<SkipReason, number>;
  failures: Map<string, number>;
}

export function initializeStats(): CrawlStats {
  return {
    pagesStored: 0,
    fetchesAttempted: 0,
    maxDepthReached: 0,
    linksDiscovered: 0,
    statusCounts: new Map<number, number>(),
    skipped: new Map<SkipReason, number>(),
    failures: new Map<string, number>(),
  };
}

export function recordResponse(stats: CrawlStats, status: number): void {
  stats.fetchesAttempted += 1;
  increment(stats.statusCounts, status);
}

export function recordStoredPage(stats: CrawlStats, page: StoredPage): void {
  stats.pagesStored += 1;
  stats.maxDepthReached = Math.max(stats.maxDepthReached, page.depth);
}

export function recordSkip(stats: CrawlStats, reason: SkipReason): void {
  increment(stats.skipped, reason);
}

export function recordBranchFailure(stats: CrawlStats, error: CrawlerError): void {
  if (error.kind === 'fetch' || error.kind === 'host') {
    stats.fetchesAttempted += 1;
  }
  increment(stats.failures, error.kind);
}

function increment<K>(counts: Map<K, number>, key: K): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}
