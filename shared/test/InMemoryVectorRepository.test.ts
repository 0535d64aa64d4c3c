import { describe, it } from 'node:test';
import assert from 'assert';
import { InMemoryVectorRepository, score } from '../infrastructure/repositories/InMemoryVectorRepository.js';
import type { ChunkPayload } from '../domain/models/Page.js';
import { ConfigError } from '../domain/errors.js';
import type { DistanceMetric } from '../infrastructure/config.js';
import { silentLogger } from './fakes.js';

const logger = silentLogger();

function payload(url: string, text: string, chunkIndex = 0): ChunkPayload {
  return {
    domain: 'site.test',
    url,
    title: 'Title',
    text,
    chunkIndex,
    contentHash: 'hash',
    lastModified: null,
    scrapedAt: '2025-01-01T00:00:00.000Z'
  };
}

describe('score', () => {
  it('computes cosine similarity', () => {
    assert.strictEqual(score([1, 0], [2, 0], 'cosine'), 1);
    assert.strictEqual(score([1, 0], [0, 1], 'cosine'), 0);
    assert.strictEqual(score([0, 0], [1, 1], 'cosine'), 0);
  });

  it('computes euclidean distance and dot product', () => {
    assert.strictEqual(score([0, 0], [3, 4], 'euclidean'), 5);
    assert.strictEqual(score([1, 2], [3, 4], 'dot'), 11);
  });
});

describe('InMemoryVectorRepository', () => {
  async function seeded(metric: DistanceMetric = 'cosine'): Promise<InMemoryVectorRepository> {
    const repo = new InMemoryVectorRepository(logger);
    await repo.ensureCollection('kb_site_test', 2, metric);
    await repo.upsert('kb_site_test', 'a', [1, 0], payload('http://site.test/a', 'about a'));
    await repo.upsert('kb_site_test', 'b', [1, 1], payload('http://site.test/b', 'about b'));
    await repo.upsert('kb_site_test', 'c', [0, 1], payload('http://site.test/c', 'about c'));
    return repo;
  }

  it('returns the closest points first, limited to k', async () => {
    const repo = await seeded();
    const matches = await repo.query('kb_site_test', [1, 0], 2, 'cosine');
    assert.deepStrictEqual(matches.map(match => match.id), ['a', 'b']);
    assert.strictEqual(matches[0].score, 1);
    assert.strictEqual(matches[0].payload.url, 'http://site.test/a');
  });

  it('drops matches under the score threshold', async () => {
    const repo = await seeded();
    const matches = await repo.query('kb_site_test', [1, 0], 5, 'cosine', 0.5);
    assert.deepStrictEqual(matches.map(match => match.id), ['a', 'b']);
  });

  it('orders euclidean results by ascending distance', async () => {
    const repo = await seeded('euclidean');
    const matches = await repo.query('kb_site_test', [0, 1], 3, 'euclidean', 1.2);
    assert.deepStrictEqual(matches.map(match => match.id), ['c', 'b']);
  });

  it('overwrites a point stored under the same key', async () => {
    const repo = await seeded();
    await repo.upsert('kb_site_test', 'a', [1, 0], payload('http://site.test/a', 'rewritten'));
    assert.strictEqual(repo.count('kb_site_test'), 3);
    const [match] = await repo.query('kb_site_test', [1, 0], 1, 'cosine');
    assert.strictEqual(match.payload.text, 'rewritten');
  });

  it('returns nothing for a collection that does not exist', async () => {
    const repo = new InMemoryVectorRepository(logger);
    assert.deepStrictEqual(await repo.query('kb_missing', [1, 0], 3, 'cosine'), []);
  });

  it('rejects writes to a missing collection or of the wrong size', async () => {
    const repo = await seeded();
    await assert.rejects(repo.upsert('kb_missing', 'x', [1, 0], payload('u', 't')), ConfigError);
    await assert.rejects(repo.upsert('kb_site_test', 'x', [1, 0, 0], payload('u', 't')), ConfigError);
  });

  it('rejects a collection that exists with another size or metric', async () => {
    const repo = await seeded();
    await repo.ensureCollection('kb_site_test', 2, 'cosine');
    await assert.rejects(
      repo.ensureCollection('kb_site_test', 3, 'cosine'),
      (error: unknown) =>
        error instanceof ConfigError &&
        error.message === "Configuration error: Collection 'kb_site_test' holds 2-dimensional cosine vectors, configured 3-dimensional cosine"
    );
    await assert.rejects(repo.ensureCollection('kb_site_test', 2, 'dot'), ConfigError);
  });

  it('rejects a query under a metric the collection was not built with', async () => {
    const repo = await seeded();
    await assert.rejects(repo.query('kb_site_test', [1, 0], 3, 'euclidean'), ConfigError);
    await assert.rejects(repo.query('kb_site_test', [1, 0, 0], 3, 'cosine'), ConfigError);
  });
});
