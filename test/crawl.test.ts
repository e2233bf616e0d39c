import { describe, expect, it, vi } from 'vitest';

import { crawlSite, createCrawler } from '../src/index.js';
import type { CrawlerError } from '../src/errors.js';
import type { CrawlConfigOverrides, CrawlCollaborators, CrawlSummary } from '../src/types.js';
import { createFakeWeb, createSleepRecorder, page, type FakeSite } from './support/fakeWeb.js';

const SEED = 'http://a.test/';

function setup(
  site: FakeSite,
  overrides: CrawlConfigOverrides = {},
  collaborators: Partial<CrawlCollaborators> = {},
  latencyMs = 0,
) {
  const web = createFakeWeb(site, { latencyMs });
  const sleeper = createSleepRecorder();
  const errors: Array<{ error: CrawlerError; url: string; depth: number }> = [];
  const crawler = createCrawler(
    { respectRobots: false, rateLimitWaitSeconds: 0, ...overrides },
    {
      collaborators: { fetch: web.fetch, sleep: sleeper.sleep, ...collaborators },
      handlers: {
        onError: (error, context) => errors.push({ error, ...context }),
      },
    },
  );

  return { crawler, web, sleeper, errors };
}

function pageRequests(requests: string[]): string[] {
  return requests.filter((url) => !url.endsWith('/robots.txt'));
}

describe('traversal limits', () => {
  it('stores the seed and its two children at depth one', async () => {
    const site: FakeSite = {
      'http://a.test/': page('/b', '/c'),
      'http://a.test/b': page(),
      'http://a.test/c': page(),
    };
    const { crawler } = setup(site, { maxDepth: 1, maxPages: 10 });

    const content = await crawler.start(SEED);

    expect([...content.keys()].sort()).toEqual(['http://a.test/', 'http://a.test/b', 'http://a.test/c']);
    expect(content.get('http://a.test/b')).toBe(page());
  });

  it('does not follow links past the depth limit', async () => {
    const site: FakeSite = {
      'http://a.test/': page('/b'),
      'http://a.test/b': page('/c'),
      'http://a.test/c': page(),
    };
    const { crawler, web } = setup(site, { maxDepth: 1 });

    const content = await crawler.start(SEED);

    expect([...content.keys()].sort()).toEqual(['http://a.test/', 'http://a.test/b']);
    expect(web.requests).not.toContain('http://a.test/c');
  });

  it('returns only the seed when maxDepth is 0', async () => {
    const { crawler, web } = setup({ 'http://a.test/': page('/b'), 'http://a.test/b': page() }, { maxDepth: 0 });

    const content = await crawler.start(SEED);

    expect([...content.keys()]).toEqual(['http://a.test/']);
    expect(web.requests).toEqual(['http://a.test/']);
  });

  it('does not recurse when maxPages is 1', async () => {
    const { crawler, web } = setup({ 'http://a.test/': page('/b', '/c') }, { maxPages: 1 });

    const content = await crawler.start(SEED);

    expect([...content.keys()]).toEqual(['http://a.test/']);
    expect(web.requests).toEqual(['http://a.test/']);
  });

  it('fetches nothing when maxPages is 0', async () => {
    const { crawler, web, sleeper } = setup({ 'http://a.test/': page('/b') }, { maxPages: 0, respectRobots: true });

    const content = await crawler.start(SEED);

    expect(content.size).toBe(0);
    expect(web.requests).toEqual([]);
    expect(sleeper.calls).toEqual([]);
    expect(crawler.lastSummary).toMatchObject({ pagesStored: 0, pagesVisited: 0, fetchesAttempted: 0 });
  });

  it('holds the page limit exactly with a single permit', async () => {
    const links = ['/p1', '/p2', '/p3', '/p4', '/p5'];
    const site: FakeSite = { 'http://a.test/': page(...links) };
    for (const link of links) {
      site[`http://a.test${link}`] = page();
    }
    const { crawler, web } = setup(site, { maxPages: 3, maxConcurrentRequests: 1 });

    const content = await crawler.start(SEED);

    expect(content.size).toBe(3);
    expect(web.requests).toEqual(['http://a.test/', 'http://a.test/p1', 'http://a.test/p2']);
  });

  it('overshoots the page limit by less than the permit count', async () => {
    const site: FakeSite = {};
    const links = Array.from({ length: 10 }, (_, index) => `/p${index}`);
    site['http://a.test/'] = page(...links);
    for (const link of links) {
      site[`http://a.test${link}`] = page();
    }
    const { crawler } = setup(site, { maxPages: 3, maxConcurrentRequests: 4 });

    const content = await crawler.start(SEED);

    expect(content.size).toBeGreaterThanOrEqual(3);
    expect(content.size).toBeLessThanOrEqual(3 + 4 - 1);
  });

  it('never runs more fetches at once than the configured permits', async () => {
    const links = Array.from({ length: 6 }, (_, index) => `/p${index}`);
    const site: FakeSite = { 'http://a.test/': page(...links) };
    for (const link of links) {
      site[`http://a.test${link}`] = page();
    }
    const { crawler, web } = setup(site, { maxPages: 10, maxConcurrentRequests: 2 }, {}, 5);

    const content = await crawler.start(SEED);

    expect(content.size).toBe(7);
    expect(web.peakInFlight).toBe(2);
    expect(crawler.lastSummary?.actualMaxConcurrency).toBe(2);
  });

  it('fetches a link repeated on one page only once', async () => {
    const site: FakeSite = {
      'http://a.test/': page('/b', '/b', '/b/', '/b#top'),
      'http://a.test/b': page('/'),
    };
    const { crawler, web } = setup(site, { maxConcurrentRequests: 1 });

    const content = await crawler.start(SEED);

    expect([...content.keys()]).toEqual(['http://a.test/', 'http://a.test/b']);
    expect(web.requests.filter((url) => url === 'http://a.test/b')).toHaveLength(1);
  });

  it('waits the default delay before every fetch when robots.txt is ignored', async () => {
    const { crawler, sleeper, web } = setup(
      { 'http://a.test/': page('/b'), 'http://a.test/b': page() },
      { rateLimitWaitSeconds: 2 },
    );

    await crawler.start(SEED);

    expect(sleeper.calls).toEqual([2_000, 2_000]);
    expect(web.requests).not.toContain('http://a.test/robots.txt');
  });
});

describe('response handling', () => {
  it('skips challenged responses without marking them visited', async () => {
    const site: FakeSite = {
      'http://a.test/': page('/guarded', '/open'),
      'http://a.test/guarded': { headers: { 'cf-mitigated': 'challenge' }, body: page() },
      'http://a.test/open': page(),
    };
    const { crawler } = setup(site, { maxConcurrentRequests: 1 });

    const content = await crawler.start(SEED);

    expect([...content.keys()]).toEqual(['http://a.test/', 'http://a.test/open']);
    expect(crawler.lastSummary?.skipped.challenge).toBe(1);
    expect(crawler.lastSummary?.pagesVisited).toBe(2);
  });

  it('discards pages whose sniffed type is not allowed but marks them visited', async () => {
    const site: FakeSite = {
      'http://a.test/': page('/logo.gif', '/about'),
      'http://a.test/logo.gif': 'GIF89a-not-really-an-image',
      'http://a.test/about': page(),
    };
    const sniffMime = async (body: Uint8Array): Promise<string | undefined> =>
      new TextDecoder().decode(body).startsWith('GIF8') ? 'image/gif' : undefined;
    const { crawler } = setup(site, { allowedMimes: ['text/html'], maxConcurrentRequests: 1 }, { sniffMime });

    const content = await crawler.start(SEED);

    expect([...content.keys()]).toEqual(['http://a.test/', 'http://a.test/about']);
    expect(crawler.lastSummary?.skipped.mime).toBe(1);
    expect(crawler.lastSummary?.pagesVisited).toBe(3);
  });

  it('stores nothing when the seed sniffs as a type outside the allowed set', async () => {
    const sniffMime = vi.fn(async () => 'text/html');
    const { crawler } = setup({ 'http://a.test/': page('/b') }, { allowedMimes: ['image/png'] }, { sniffMime });

    const content = await crawler.start(SEED);

    expect(content.size).toBe(0);
    expect(sniffMime).toHaveBeenCalledTimes(1);
  });

  it('does not sniff when no media types are configured', async () => {
    const sniffMime = vi.fn(async () => 'image/gif');
    const { crawler } = setup({ 'http://a.test/': page() }, {}, { sniffMime });

    const content = await crawler.start(SEED);

    expect(content.size).toBe(1);
    expect(sniffMime).not.toHaveBeenCalled();
  });

  it('stores bodies of non-2xx responses as served', async () => {
    const site: FakeSite = {
      'http://a.test/': page('/gone'),
      'http://a.test/gone': { status: 404, body: 'gone' },
    };
    const { crawler } = setup(site);

    const content = await crawler.start(SEED);

    expect(content.get('http://a.test/gone')).toBe('gone');
    expect(crawler.lastSummary?.statusCounts).toEqual({ '200': 1, '404': 1 });
  });
});

describe('fault isolation', () => {
  it('absorbs a transport failure in one branch', async () => {
    const site: FakeSite = {
      'http://a.test/': page('/missing', '/ok'),
      'http://a.test/ok': page(),
    };
    const { crawler, errors } = setup(site);

    const content = await crawler.start(SEED);

    expect([...content.keys()].sort()).toEqual(['http://a.test/', 'http://a.test/ok']);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ url: 'http://a.test/missing', depth: 1 });
    expect(errors[0]?.error.kind).toBe('fetch');
    expect(crawler.lastSummary?.failures).toEqual({ fetch: 1 });
  });

  it('drops undecodable bodies without marking them visited', async () => {
    const site: FakeSite = {
      'http://a.test/': page('/binary', '/ok'),
      'http://a.test/binary': { body: new Uint8Array([0xff, 0xfe, 0xfd]) },
      'http://a.test/ok': page(),
    };
    const { crawler, errors } = setup(site);

    const content = await crawler.start(SEED);

    expect([...content.keys()].sort()).toEqual(['http://a.test/', 'http://a.test/ok']);
    expect(errors.map((entry) => entry.error.kind)).toEqual(['decode']);
    expect(crawler.lastSummary?.pagesVisited).toBe(2);
  });

  it('ignores links that do not resolve to http(s) URLs', async () => {
    const site: FakeSite = {
      'http://a.test/': page('mailto:team@a.test', 'javascript:void(0)', 'http://[bad', '/ok'),
      'http://a.test/ok': page(),
    };
    const { crawler, errors } = setup(site);

    const content = await crawler.start(SEED);

    expect([...content.keys()].sort()).toEqual(['http://a.test/', 'http://a.test/ok']);
    expect(errors).toEqual([]);
  });
});

describe('robots.txt politeness', () => {
  const robotsSite = (robots: string): FakeSite => ({
    'http://a.test/robots.txt': robots,
    'http://a.test/': page('/private', '/public'),
    'http://a.test/private': page(),
    'http://a.test/public': page(),
  });

  it('never stores disallowed paths and waits the crawl delay', async () => {
    const { crawler, sleeper, web } = setup(
      robotsSite('User-agent: *\nDisallow: /private\nCrawl-delay: 2'),
      { respectRobots: true, maxConcurrentRequests: 1 },
    );

    const content = await crawler.start(SEED);

    expect([...content.keys()].sort()).toEqual(['http://a.test/', 'http://a.test/public']);
    expect(pageRequests(web.requests)).not.toContain('http://a.test/private');
    expect(sleeper.calls).toEqual([2_000, 2_000, 2_000]);
    expect(web.requests.filter((url) => url === 'http://a.test/robots.txt')).toHaveLength(1);
    expect(crawler.lastSummary?.skipped.robots).toBe(1);
    expect(crawler.lastSummary?.pagesVisited).toBe(2);
  });

  it('falls back to the default delay when robots.txt sets none', async () => {
    const { crawler, sleeper } = setup(robotsSite('User-agent: *\nDisallow:'), {
      respectRobots: true,
      rateLimitWaitSeconds: 3,
    });

    const content = await crawler.start(SEED);

    expect(content.size).toBe(3);
    expect(new Set(sleeper.calls)).toEqual(new Set([3_000]));
  });

  it('fails open and fetches robots.txt once when it is unavailable', async () => {
    const site: FakeSite = {
      'http://a.test/': page('/private'),
      'http://a.test/private': page(),
    };
    const { crawler, sleeper, web } = setup(site, {
      respectRobots: true,
      rateLimitWaitSeconds: 1,
      maxConcurrentRequests: 1,
    });

    const content = await crawler.start(SEED);

    expect([...content.keys()]).toEqual(['http://a.test/', 'http://a.test/private']);
    expect(sleeper.calls).toEqual([1_000, 1_000]);
    expect(web.requests.filter((url) => url.endsWith('/robots.txt'))).toEqual(['http://a.test/robots.txt']);
  });

  it('shares one robots.txt record across subdomains by default', async () => {
    const site: FakeSite = {
      'http://example.com/robots.txt': 'User-agent: *\nDisallow: /post',
      'http://example.com/': page('http://blog.example.com/post'),
      'http://blog.example.com/post': page(),
    };
    const { crawler, web } = setup(site, { respectRobots: true, maxConcurrentRequests: 1 });

    const content = await crawler.start('http://example.com/');

    expect([...content.keys()]).toEqual(['http://example.com/']);
    expect(web.requests).not.toContain('http://blog.example.com/robots.txt');
  });

  it('keeps a record per host when scoped by host', async () => {
    const site: FakeSite = {
      'http://example.com/robots.txt': 'User-agent: *\nDisallow: /post',
      'http://example.com/': page('http://blog.example.com/post'),
      'http://blog.example.com/post': page(),
    };
    const { crawler, web } = setup(site, { respectRobots: true, robotsScope: 'host', maxConcurrentRequests: 1 });

    const content = await crawler.start('http://example.com/');

    expect([...content.keys()]).toEqual(['http://example.com/', 'http://blog.example.com/post']);
    expect(web.requests).toContain('http://blog.example.com/robots.txt');
  });

  it('settles when two branches race for an uncached robots.txt', async () => {
    const site: FakeSite = {
      'http://a.test/': page('http://b.test/one', 'http://b.test/two'),
      'http://b.test/robots.txt': 'User-agent: *\nAllow: /',
      'http://b.test/one': page(),
      'http://b.test/two': page(),
    };
    const { crawler, web } = setup(site, { respectRobots: true, maxConcurrentRequests: 2 }, {}, 5);

    const content = await crawler.start(SEED);

    expect([...content.keys()].sort()).toEqual(['http://a.test/', 'http://b.test/one', 'http://b.test/two']);
    const robotsFetches = web.requests.filter((url) => url === 'http://b.test/robots.txt').length;
    expect(robotsFetches).toBeGreaterThanOrEqual(1);
    expect(robotsFetches).toBeLessThanOrEqual(2);
  });
});

describe('Crawler facade', () => {
  it('rejects a malformed seed URL with a configuration error', async () => {
    const { crawler, web } = setup({});

    await expect(crawler.start('not a url')).rejects.toMatchObject({ kind: 'config', severity: 'fatal' });
    await expect(crawler.start('ftp://a.test/file')).rejects.toMatchObject({ kind: 'config' });
    expect(web.requests).toEqual([]);
  });

  it('normalizes the seed before crawling', async () => {
    const { crawler, web } = setup({ 'http://a.test/docs': page() });

    const content = await crawler.start('HTTP://A.TEST:80/docs/#intro');

    expect([...content.keys()]).toEqual(['http://a.test/docs']);
    expect(web.requests).toEqual(['http://a.test/docs']);
  });

  it('starts every run with fresh state and reports each summary', async () => {
    const summaries: CrawlSummary[] = [];
    const web = createFakeWeb({ 'http://a.test/': page('/b'), 'http://a.test/b': page() });
    const sleeper = createSleepRecorder();
    const crawler = createCrawler(
      { respectRobots: false, rateLimitWaitSeconds: 0 },
      {
        collaborators: { fetch: web.fetch, sleep: sleeper.sleep },
        handlers: { onComplete: (summary) => summaries.push(summary) },
      },
    );

    const first = await crawler.start(SEED);
    const second = await crawler.start(SEED);

    expect(first.size).toBe(2);
    expect(second.size).toBe(2);
    expect(summaries).toHaveLength(2);
    expect(summaries[1]).toMatchObject({ pagesStored: 2, pagesVisited: 2, fetchesAttempted: 2, linksDiscovered: 1 });
    expect(crawler.lastSummary).toBe(summaries[1]);
  });

  it('reports each stored page to onPage', async () => {
    const stored: string[] = [];
    const web = createFakeWeb({ 'http://a.test/': page('/b'), 'http://a.test/b': page() });
    const crawler = createCrawler(
      { respectRobots: false, rateLimitWaitSeconds: 0, maxConcurrentRequests: 1 },
      {
        collaborators: { fetch: web.fetch, sleep: createSleepRecorder().sleep },
        handlers: { onPage: (storedPage) => stored.push(`${storedPage.depth}:${storedPage.url}`) },
      },
    );

    await crawler.start(SEED);

    expect(stored).toEqual(['0:http://a.test/', '1:http://a.test/b']);
  });

  it('runs a one-shot crawl through crawlSite', async () => {
    const web = createFakeWeb({ 'http://a.test/': page('/b'), 'http://a.test/b': page() });

    const content = await crawlSite(
      SEED,
      { respectRobots: false, rateLimitWaitSeconds: 0 },
      { collaborators: { fetch: web.fetch, sleep: createSleepRecorder().sleep } },
    );

    expect([...content.keys()].sort()).toEqual(['http://a.test/', 'http://a.test/b']);
  });
});
