import { describe, it } from 'node:test';
import assert from 'assert';
import { FetchWorkerPool, type FetchStartedEvent } from '../domain/FetchWorkerPool.js';
import { ContentProcessor } from '../domain/ContentProcessor.js';
import { Frontier } from '../domain/Frontier.js';
import { RobotsPolicy } from '../domain/RobotsPolicy.js';
import { StorageManager } from '../domain/StorageManager.js';
import { InMemoryVectorRepository } from '../../../shared/infrastructure/repositories/InMemoryVectorRepository.js';
import { emptyCounters, type CrawlSettings } from '../../../shared/domain/models/CrawlJob.js';
import { ConfigError, RendererUnavailableError } from '../../../shared/domain/errors.js';
import {
  FakeEmbedder,
  FakeRenderer,
  FakeRobotsFetcher,
  silentLogger,
  type FakePage
} from '../../../shared/test/fakes.js';

const logger = silentLogger();
const SEED = 'http://site.test/';
const COLLECTION = 'kb_site_test';

const SITE: Record<string, FakePage> = {
  'http://site.test/': {
    links: ['http://site.test/a', 'http://site.test/b', 'http://other.test/x', 'http://site.test/a#section']
  },
  'http://site.test/a': { links: ['http://site.test/c', 'http://site.test/'] },
  'http://site.test/b': { status: 500 },
  'http://site.test/c': {}
};

interface PoolSetup {
  pages?: Record<string, FakePage>;
  settings?: Partial<CrawlSettings>;
  robots?: string | null;
  latencyMs?: number;
  embedder?: FakeEmbedder;
}

function createPool(setup: PoolSetup = {}) {
  const renderer = new FakeRenderer(setup.pages ?? SITE, setup.latencyMs ?? 0);
  const repo = new InMemoryVectorRepository(logger);
  const counters = emptyCounters();
  const settings: CrawlSettings = {
    userAgent: 'test-agent',
    maxPages: 50,
    concurrency: 3,
    crawlDelay: 0,
    robotsOverride: false,
    failureThreshold: 3,
    ...setup.settings
  };
  const pool = new FetchWorkerPool(
    {
      frontier: new Frontier(SEED, logger),
      robots: new RobotsPolicy(new FakeRobotsFetcher(setup.robots ?? null), settings.userAgent, logger),
      renderer,
      contentProcessor: new ContentProcessor({ chunkSize: 1000, chunkOverlap: 100 }, logger),
      storageManager: new StorageManager(setup.embedder ?? new FakeEmbedder(), repo, {
        collectionPrefix: 'kb',
        vectorSize: 4,
        distanceMetric: 'cosine'
      }, logger)
    },
    { domain: 'site.test', settings, counters },
    logger
  );
  return { pool, renderer, repo, counters };
}

describe('FetchWorkerPool', () => {
  it('crawls every reachable same-host page once', async () => {
    const { pool, renderer, repo, counters } = createPool();

    assert.deepStrictEqual(await pool.run(SEED), { outcome: 'completed' });
    assert.deepStrictEqual([...renderer.requests].sort(), [
      'http://site.test/',
      'http://site.test/a',
      'http://site.test/b',
      'http://site.test/c'
    ]);
    assert.deepStrictEqual(counters, { pagesFetched: 3, pagesSkipped: 0, errors: 1 });
    assert.strictEqual(repo.count(COLLECTION), 3);
    assert.ok(renderer.userAgents.every(agent => agent === 'test-agent'));
  });

  it('stops fetching at the page budget', async () => {
    const { pool, renderer } = createPool({ settings: { maxPages: 2, concurrency: 1 } });

    assert.deepStrictEqual(await pool.run(SEED), { outcome: 'completed' });
    assert.deepStrictEqual(renderer.requests, ['http://site.test/', 'http://site.test/a']);
    assert.strictEqual(pool.getAttempts(), 2);
  });

  it('never fetches more pages than the budget with many workers', async () => {
    const pages: Record<string, FakePage> = {
      'http://site.test/': { links: Array.from({ length: 20 }, (_, i) => `http://site.test/p${i}`) }
    };
    for (let i = 0; i < 20; i++) {
      pages[`http://site.test/p${i}`] = {};
    }
    const { pool, renderer } = createPool({ pages, settings: { maxPages: 5, concurrency: 8 }, latencyMs: 5 });

    await pool.run(SEED);
    assert.strictEqual(renderer.requests.length, 5);
  });

  it('keeps at most the configured number of fetches in flight', async () => {
    const pages: Record<string, FakePage> = {
      'http://site.test/': { links: Array.from({ length: 6 }, (_, i) => `http://site.test/p${i}`) }
    };
    for (let i = 0; i < 6; i++) {
      pages[`http://site.test/p${i}`] = {};
    }
    const { pool, renderer } = createPool({ pages, settings: { concurrency: 2 }, latencyMs: 15 });

    await pool.run(SEED);
    assert.strictEqual(renderer.requests.length, 7);
    assert.strictEqual(renderer.maxActive, 2);
  });

  it('skips pages disallowed by robots.txt', async () => {
    const { pool, renderer, counters } = createPool({ robots: 'User-agent: *\nDisallow: /a\n' });

    await pool.run(SEED);
    assert.deepStrictEqual([...renderer.requests].sort(), ['http://site.test/', 'http://site.test/b']);
    assert.strictEqual(counters.pagesSkipped, 1);
  });

  it('fetches disallowed pages when robots rules are overridden', async () => {
    const { pool, renderer, counters } = createPool({
      robots: 'User-agent: *\nDisallow: /a\n',
      settings: { robotsOverride: true }
    });

    await pool.run(SEED);
    assert.strictEqual(renderer.requests.length, 4);
    assert.strictEqual(counters.pagesSkipped, 0);
  });

  it('spaces fetch starts by the configured crawl delay', async () => {
    const { pool } = createPool({ settings: { crawlDelay: 0.04 } });
    const starts: number[] = [];
    pool.on('fetch-started', (event: FetchStartedEvent) => starts.push(event.at));

    await pool.run(SEED);
    assert.strictEqual(starts.length, 4);
    for (let i = 1; i < starts.length; i++) {
      assert.ok(starts[i] - starts[i - 1] >= 40, `gap ${starts[i] - starts[i - 1]}ms`);
    }
  });

  it('honours a longer crawl delay from robots.txt', async () => {
    const { pool } = createPool({ settings: { crawlDelay: 0 }, robots: 'User-agent: *\nCrawl-delay: 0.05\n' });
    const starts: number[] = [];
    pool.on('fetch-started', (event: FetchStartedEvent) => starts.push(event.at));

    await pool.run(SEED);
    for (let i = 1; i < starts.length; i++) {
      assert.ok(starts[i] - starts[i - 1] >= 50, `gap ${starts[i] - starts[i - 1]}ms`);
    }
  });

  it('stores nothing and fetches nothing new after cancellation', async () => {
    const { pool, renderer, repo } = createPool({ latencyMs: 30 });
    pool.once('fetch-started', () => pool.cancel());

    assert.deepStrictEqual(await pool.run(SEED), { outcome: 'stopped' });
    assert.deepStrictEqual(renderer.requests, ['http://site.test/']);
    assert.strictEqual(repo.count(COLLECTION), 0);
  });

  it('fails the run after repeated renderer outages', async () => {
    const outage = new RendererUnavailableError(SEED, new Error('connect ECONNREFUSED'));
    const { pool, counters } = createPool({
      pages: { 'http://site.test/': { error: outage } },
      settings: { failureThreshold: 1 }
    });

    const result = await pool.run(SEED);
    assert.strictEqual(result.outcome, 'failed');
    assert.strictEqual(result.outcome === 'failed' ? result.error : null, outage);
    assert.strictEqual(counters.errors, 1);
  });

  it('fails the run when every attempt hits an outage, even below the threshold', async () => {
    const outage = new RendererUnavailableError(SEED, new Error('connect ECONNREFUSED'));
    const { pool, counters } = createPool({
      pages: { 'http://site.test/': { error: outage } },
      settings: { failureThreshold: 5 }
    });

    const result = await pool.run(SEED);
    assert.strictEqual(result.outcome, 'failed');
    assert.strictEqual(result.outcome === 'failed' ? result.error : null, outage);
    assert.strictEqual(counters.pagesFetched, 0);
  });

  it('does not count outages separated by page errors as consecutive', async () => {
    const outage = new RendererUnavailableError(SEED, new Error('connect ECONNREFUSED'));
    const pages: Record<string, FakePage> = {
      'http://site.test/': {
        links: ['http://site.test/o1', 'http://site.test/n1', 'http://site.test/o2', 'http://site.test/n2', 'http://site.test/o3']
      },
      'http://site.test/o1': { error: outage },
      'http://site.test/n1': { status: 404 },
      'http://site.test/o2': { error: outage },
      'http://site.test/n2': { status: 404 },
      'http://site.test/o3': { error: outage }
    };
    const { pool, renderer, counters } = createPool({ pages, settings: { concurrency: 1, failureThreshold: 2 } });

    assert.deepStrictEqual(await pool.run(SEED), { outcome: 'completed' });
    assert.strictEqual(renderer.requests.length, 6);
    assert.deepStrictEqual(counters, { pagesFetched: 1, pagesSkipped: 0, errors: 5 });
  });

  it('fails the run on a configuration error', async () => {
    const { pool } = createPool({ embedder: new FakeEmbedder(3) });

    const result = await pool.run(SEED);
    assert.strictEqual(result.outcome, 'failed');
    assert.ok(result.outcome === 'failed' && result.error instanceof ConfigError);
  });
});
