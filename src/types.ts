import type { CrawlerError } from './errors.js';
import type { LogLevel } from './logger.js';

export type OutputFormat = 'text' | 'json';

/** How robots.txt records are shared between hosts. */
export type RobotsScope = 'domain' | 'host';

export interface CrawlConfig {
  readonly userAgent: string;
  readonly maxDepth: number;
  readonly maxPages: number;
  readonly maxConcurrentRequests: number;
  /** Delay applied before every fetch when robots.txt gives none (or is ignored). */
  readonly rateLimitWaitSeconds: number;
  readonly respectRobots: boolean;
  /** Media types a page may sniff as. Empty means no filtering. */
  readonly allowedMimes: ReadonlySet<string>;
  readonly timeoutMs: number;
  readonly robotsScope: RobotsScope;
  readonly logLevel: LogLevel;
}

export interface CrawlConfigOverrides {
  userAgent?: string;
  maxDepth?: number;
  maxPages?: number;
  maxConcurrentRequests?: number;
  rateLimitWaitSeconds?: number;
  respectRobots?: boolean;
  allowedMimes?: Iterable<string>;
  timeoutMs?: number;
  robotsScope?: RobotsScope;
  logLevel?: LogLevel;
}

export interface FetchedResource {
  /** Final URL reported by the transport (after any redirects it followed). */
  url: string;
  status: number;
  headers: Headers;
  body: Uint8Array;
}

export type Fetcher = (url: string) => Promise<FetchedResource>;

export interface CrawlCollaborators {
  fetch: Fetcher;
  extractLinks(html: string): string[];
  isAllowed(robotsText: string, userAgent: string, url: string): boolean;
  sniffMime(body: Uint8Array): Promise<string | undefined>;
  resolve(base: string, relative: string): string | null;
  sleep(ms: number): Promise<void>;
}

export interface RobotsEntry {
  domain: string;
  /** `null` when robots.txt could not be fetched; no restriction is known. */
  robotsText: string | null;
  crawlDelaySeconds: number;
}

export interface StoredPage {
  url: string;
  depth: number;
  status: number;
  content: string;
}

export type SkipReason = 'robots' | 'challenge' | 'mime' | 'duplicate';

export interface CrawlSummary {
  pagesStored: number;
  pagesVisited: number;
  fetchesAttempted: number;
  robotsFetches: number;
  maxDepthReached: number;
  linksDiscovered: number;
  statusCounts: Record<string, number>;
  skipped: Record<SkipReason, number>;
  failures: Record<string, number>;
  actualMaxConcurrency: number;
  durationMs: number;
}

export interface BranchContext {
  url: string;
  depth: number;
}

export interface CrawlHandlers {
  onPage?(page: StoredPage): void;
  onError?(error: CrawlerError, context: BranchContext): void;
  onComplete?(summary: CrawlSummary): void;
}

export interface CrawlerOptions {
  collaborators?: Partial<CrawlCollaborators>;
  handlers?: CrawlHandlers;
}

export type ContentMap = Map<string, string>;
