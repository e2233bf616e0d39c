#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command } from 'commander';

import { createCrawler } from './index.js';
import { createConfigurationError } from './errors.js';
import { isLogLevel } from './logger.js';
import type { CrawlConfigOverrides, CrawlHandlers, OutputFormat, RobotsScope } from './types.js';
import { reportCrawlerError } from './util/errorHandler.js';
import { logError, writePage, writeResult } from './util/output.js';

const require = createRequire(import.meta.url);
const pkg: { version?: string } = require('../package.json');

interface CliSettings {
  overrides: CrawlConfigOverrides;
  format: OutputFormat;
  quiet: boolean;
}

const program = new Command();

program
  .name('polite-crawler')
  .description('Crawl from a seed URL while honouring robots.txt and crawl delays.')
  .version(pkg.version ?? '0.0.0');

program
  .command('crawl')
  .description('Start crawling from the provided URL.')
  .argument('<seedUrl>', 'Absolute http(s) URL to start from.')
  .option('--max-depth <number>', 'Maximum link depth from the seed. (default: 5)')
  .option('--max-pages <number>', 'Maximum number of pages to visit. (default: 15)')
  .option('--concurrency <number>', 'Maximum number of simultaneous requests. (default: 1000)')
  .option('--rate-limit <seconds>', 'Delay before each request when robots.txt sets none. (default: 1)')
  .option('--user-agent <agent>', 'User agent sent with requests and matched against robots.txt.')
  .option('--no-robots', 'Ignore robots.txt and always wait the default delay.')
  .option('--robots-scope <scope>', 'Share robots.txt per registrable domain or per host. (default: domain)')
  .option('--allow-mime <mime...>', 'Only keep pages whose sniffed media type is listed.')
  .option('--timeout-ms <number>', 'Timeout per request in milliseconds. (default: 10000)')
  .option('--format <format>', 'Output format to emit (text or json). Defaults to text.')
  .option('--quiet', 'Suppress per-page and per-error lines; print only the final report.')
  .option('--log-level <level>', 'Set log verbosity (pino levels: trace|debug|info|warn|error|fatal).')
  .action(async (seedUrl: string, options: Record<string, unknown>) => {
    try {
      await runCrawl(seedUrl, buildSettings(options));
    } catch (error) {
      reportCliError(error);
    }
  });

await program.parseAsync(process.argv);

async function runCrawl(seedUrl: string, settings: CliSettings): Promise<void> {
  const printLines = !settings.quiet && settings.format === 'text';
  const handlers: CrawlHandlers = printLines
    ? {
        onPage: writePage,
        onError: (error, context) => logError(`[${error.kind}] ${context.url}: ${error.message}`),
      }
    : {};

  const crawler = createCrawler(settings.overrides, { handlers });
  const content = await crawler.start(seedUrl);
  const summary = crawler.lastSummary;

  if (summary) {
    writeResult(content, summary, settings.format);
  }
}

function buildSettings(rawOptions: Record<string, unknown>): CliSettings {
  const overrides: CrawlConfigOverrides = {};

  if (rawOptions.maxDepth !== undefined) {
    overrides.maxDepth = asNumber(rawOptions.maxDepth, 'max-depth');
  }

  if (rawOptions.maxPages !== undefined) {
    overrides.maxPages = asNumber(rawOptions.maxPages, 'max-pages');
  }

  if (rawOptions.concurrency !== undefined) {
    overrides.maxConcurrentRequests = asNumber(rawOptions.concurrency, 'concurrency');
  }

  if (rawOptions.rateLimit !== undefined) {
    overrides.rateLimitWaitSeconds = asNumber(rawOptions.rateLimit, 'rate-limit');
  }

  if (rawOptions.timeoutMs !== undefined) {
    overrides.timeoutMs = asNumber(rawOptions.timeoutMs, 'timeout-ms');
  }

  if (typeof rawOptions.userAgent === 'string') {
    overrides.userAgent = rawOptions.userAgent;
  }

  if (rawOptions.robots === false) {
    overrides.respectRobots = false;
  }

  if (rawOptions.robotsScope !== undefined) {
    const scope = String(rawOptions.robotsScope).toLowerCase();
    if (!isRobotsScope(scope)) {
      throw createConfigurationError(`Unsupported robots scope: ${scope}`, { value: scope });
    }
    overrides.robotsScope = scope;
  }

  if (Array.isArray(rawOptions.allowMime)) {
    overrides.allowedMimes = rawOptions.allowMime.map(String);
  }

  if (rawOptions.logLevel !== undefined) {
    const level = String(rawOptions.logLevel).toLowerCase();
    if (!isLogLevel(level)) {
      throw createConfigurationError(`Unsupported log level: ${level}`, { value: level });
    }
    overrides.logLevel = level;
  }

  let format: OutputFormat = 'text';
  if (rawOptions.format !== undefined) {
    const requested = String(rawOptions.format).toLowerCase();
    if (!isOutputFormat(requested)) {
      throw createConfigurationError(`Unsupported format: ${requested}`, { value: requested });
    }
    format = requested;
  }

  return { overrides, format, quiet: rawOptions.quiet === true };
}

function asNumber(value: unknown, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${label} must be a finite number.`, { value });
  }

  return parsed;
}

function reportCliError(error: unknown): void {
  const crawlerError = reportCrawlerError(error, { stage: 'cli' }, {
    defaultKind: 'config',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  console.error(`Error: ${crawlerError.message}`);
  process.exitCode = 1;
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'json';
}

function isRobotsScope(value: string): value is RobotsScope {
  return value === 'domain' || value === 'host';
}
