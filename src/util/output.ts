import type { ContentMap, CrawlSummary, OutputFormat, StoredPage } from '../types.js';

const encoder = new TextEncoder();

export function writePage(page: StoredPage): void {
  process.stdout.write(renderPageLine(page.url, page.content));
}

export function writeResult(content: ContentMap, summary: CrawlSummary, format: OutputFormat): void {
  if (format === 'json') {
    process.stdout.write(`${renderJson(content, summary)}\n`);
    return;
  }

  process.stdout.write(renderTextSummary(summary));
}

export function logError(message: string): void {
  const payload = message.endsWith('\n') ? message : `${message}\n`;
  process.stderr.write(payload);
}

export function renderPageLine(url: string, content: string): string {
  return `STORED: ${url} (${byteLength(content)} bytes)\n`;
}

export function renderJson(content: ContentMap, summary: CrawlSummary): string {
  const pages = [...content.entries()].map(([url, body]) => ({ url, bytes: byteLength(body) }));
  return JSON.stringify({ pages, summary }, null, 2);
}

export function renderTextSummary(summary: CrawlSummary): string {
  const lines: string[] = [
    '',
    '--- Crawl Summary ---',
    `Pages stored: ${summary.pagesStored}`,
    `URLs visited: ${summary.pagesVisited}`,
    `Fetches attempted: ${summary.fetchesAttempted}`,
    `robots.txt fetches: ${summary.robotsFetches}`,
    `Links discovered: ${summary.linksDiscovered}`,
    `Max depth reached: ${summary.maxDepthReached}`,
    `Actual max concurrency: ${summary.actualMaxConcurrency}`,
    `Duration: ${formatDuration(summary.durationMs)} (${Math.round(summary.durationMs)} ms)`,
  ];

  const statusEntries = Object.entries(summary.statusCounts).sort(
    ([statusA], [statusB]) => Number(statusA) - Number(statusB),
  );

  if (statusEntries.length > 0) {
    lines.push('Status codes:');
    for (const [status, count] of statusEntries) {
      lines.push(`  ${status}: ${count}`);
    }
  }

  const skippedEntries = Object.entries(summary.skipped).filter(([, count]) => count > 0);
  if (skippedEntries.length > 0) {
    lines.push('Skipped:');
    for (const [reason, count] of skippedEntries) {
      lines.push(`  ${reason}: ${count}`);
    }
  }

  const failureEntries = Object.entries(summary.failures).sort(([, countA], [, countB]) =>
    countB - countA,
  );

  if (failureEntries.length > 0) {
    lines.push('Failures:');
    for (const [kind, count] of failureEntries) {
      lines.push(`  ${kind}: ${count}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

function byteLength(content: string): number {
  return encoder.encode(content).byteLength;
}

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return '0ms';
  }

  if (durationMs < 1_000) {
    return `${Math.round(durationMs)}ms`;
  }

  const seconds = durationMs / 1_000;
  if (seconds < 60) {
    const precision = seconds >= 10 ? 1 : 2;
    return `${seconds.toFixed(precision)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  const secondsPart =
    remainingSeconds >= 10 ? remainingSeconds.toFixed(0) : remainingSeconds.toFixed(1);
  return `${minutes}m ${secondsPart}s`;
}
