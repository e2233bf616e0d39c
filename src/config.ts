import { createConfigurationError } from './errors.js';
import { isLogLevel } from './logger.js';
import { normalizeMime } from './crawler/parsing/content.js';
import type { CrawlConfig, CrawlConfigOverrides, RobotsScope } from './types.js';

export const DEFAULT_USER_AGENT = 'polite-crawler/1.0';

const DEFAULT_CONFIG: CrawlConfig = Object.freeze<CrawlConfig>({
  userAgent: DEFAULT_USER_AGENT,
  maxDepth: 5,
  maxPages: 15,
  maxConcurrentRequests: 1_000,
  rateLimitWaitSeconds: 1,
  respectRobots: true,
  allowedMimes: new Set<string>(),
  timeoutMs: 10_000,
  robotsScope: 'domain',
  logLevel: 'silent',
});

const VALID_SCOPES: RobotsScope[] = ['domain', 'host'];

export function defaultConfig(): CrawlConfig {
  return DEFAULT_CONFIG;
}

/** Validates `overrides` on top of `base` (the defaults unless given) into a frozen config. */
export function resolveConfig(overrides: CrawlConfigOverrides = {}, base: CrawlConfig = DEFAULT_CONFIG): CrawlConfig {
  const userAgent = (overrides.userAgent ?? base.userAgent).trim();
  if (userAgent.length === 0) {
    throw createConfigurationError('user-agent must not be empty.', { field: 'userAgent' });
  }

  const robotsScope = overrides.robotsScope ?? base.robotsScope;
  if (!VALID_SCOPES.includes(robotsScope)) {
    throw createConfigurationError(`Unsupported robots scope: ${robotsScope}`, { robotsScope });
  }

  const logLevel = overrides.logLevel ?? base.logLevel;
  if (!isLogLevel(logLevel)) {
    throw createConfigurationError(`Unsupported log level: ${logLevel}`, { logLevel });
  }

  const allowedMimes = overrides.allowedMimes
    ? new Set([...overrides.allowedMimes].map(normalizeMime).filter((mime) => mime.length > 0))
    : new Set(base.allowedMimes);

  return Object.freeze<CrawlConfig>({
    userAgent,
    maxDepth: coerceNonNegativeInteger(overrides.maxDepth ?? base.maxDepth, 'max-depth'),
    maxPages: coerceNonNegativeInteger(overrides.maxPages ?? base.maxPages, 'max-pages'),
    maxConcurrentRequests: coercePositiveInteger(
      overrides.maxConcurrentRequests ?? base.maxConcurrentRequests,
      'max-concurrent-requests',
    ),
    rateLimitWaitSeconds: coerceNonNegativeInteger(
      overrides.rateLimitWaitSeconds ?? base.rateLimitWaitSeconds,
      'rate-limit-wait-seconds',
    ),
    respectRobots: overrides.respectRobots ?? base.respectRobots,
    allowedMimes,
    timeoutMs: coercePositiveInteger(overrides.timeoutMs ?? base.timeoutMs, 'timeout-ms'),
    robotsScope,
    logLevel,
  });
}

export function withMaxDepth(config: CrawlConfig, maxDepth: number): CrawlConfig {
  return resolveConfig({ maxDepth }, config);
}

export function withMaxPages(config: CrawlConfig, maxPages: number): CrawlConfig {
  return resolveConfig({ maxPages }, config);
}

export function withMaxConcurrentRequests(config: CrawlConfig, maxConcurrentRequests: number): CrawlConfig {
  return resolveConfig({ maxConcurrentRequests }, config);
}

export function withRateLimitWaitSeconds(config: CrawlConfig, rateLimitWaitSeconds: number): CrawlConfig {
  return resolveConfig({ rateLimitWaitSeconds }, config);
}

export function withUserAgent(config: CrawlConfig, userAgent: string): CrawlConfig {
  return resolveConfig({ userAgent }, config);
}

export function withRobots(config: CrawlConfig, respectRobots: boolean): CrawlConfig {
  return resolveConfig({ respectRobots }, config);
}

export function withAllowedMimes(config: CrawlConfig, allowedMimes: Iterable<string>): CrawlConfig {
  return resolveConfig({ allowedMimes }, config);
}

function coercePositiveInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 1) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

function coerceNonNegativeInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw createConfigurationError(`${field} must be zero or a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}
