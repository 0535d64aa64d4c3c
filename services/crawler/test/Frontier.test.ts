import { describe, it } from 'node:test';
import assert from 'assert';
import { Frontier } from '../domain/Frontier.js';
import { silentLogger } from '../../../shared/test/fakes.js';

const logger = silentLogger();
const SEED = 'http://site.test/';

describe('Frontier', () => {
  it('hands out entries in discovery order', async () => {
    const frontier = new Frontier(SEED, logger);
    frontier.offer(SEED, 0);
    frontier.offer('/b', 1, SEED);
    frontier.offer('/a', 1, SEED);

    const taken = [await frontier.take(), await frontier.take(), await frontier.take()];
    assert.deepStrictEqual(taken.map(entry => entry?.url), [
      'http://site.test/',
      'http://site.test/b',
      'http://site.test/a'
    ]);
    assert.deepStrictEqual(taken.map(entry => entry?.depth), [0, 1, 1]);
  });

  it('accepts each normalized URL once, whether pending, in flight or visited', async () => {
    const frontier = new Frontier(SEED, logger);
    assert.strictEqual(frontier.offer('http://site.test/a', 1), true);
    assert.strictEqual(frontier.offer('http://site.test/a/#part', 1), false);

    const entry = await frontier.take();
    assert.strictEqual(entry?.url, 'http://site.test/a');
    assert.strictEqual(frontier.offer('http://site.test/a', 2), false);

    frontier.markVisited('http://site.test/a');
    assert.strictEqual(frontier.offer('http://site.test/a', 2), false);
    assert.deepStrictEqual(frontier.getStats(), { pending: 0, inFlight: 0, visited: 1, rejected: 3 });
  });

  it('rejects URLs on other hosts', () => {
    const frontier = new Frontier(SEED, logger);
    assert.strictEqual(frontier.offer('http://other.test/', 1), false);
    assert.strictEqual(frontier.getStats().pending, 0);
  });

  it('returns null when nothing is pending or in flight', async () => {
    const frontier = new Frontier(SEED, logger);
    assert.strictEqual(await frontier.take(), null);
  });

  it('wakes a waiting worker when another worker discovers a link', async () => {
    const frontier = new Frontier(SEED, logger);
    frontier.offer(SEED, 0);
    await frontier.take();

    const waiting = frontier.take();
    frontier.offer('/found', 1, SEED);

    const entry = await waiting;
    assert.strictEqual(entry?.url, 'http://site.test/found');
    assert.strictEqual(entry?.depth, 1);
    assert.strictEqual(frontier.getStats().inFlight, 2);
  });

  it('releases waiting workers once the last in-flight URL is visited', async () => {
    const frontier = new Frontier(SEED, logger);
    frontier.offer(SEED, 0);
    await frontier.take();

    const waiting = frontier.take();
    frontier.markVisited(SEED);
    assert.strictEqual(await waiting, null);
  });

  it('discards pending URLs and drops offers once closed', async () => {
    const frontier = new Frontier(SEED, logger);
    frontier.offer(SEED, 0);
    frontier.offer('/a', 1, SEED);
    frontier.offer('/b', 1, SEED);
    await frontier.take();
    assert.strictEqual(frontier.getStats().pending, 2);

    frontier.close();
    assert.strictEqual(frontier.isClosed(), true);
    assert.strictEqual(frontier.offer('/c', 1, SEED), false);
    assert.strictEqual(await frontier.take(), null);
    assert.strictEqual(frontier.getStats().pending, 0);
  });

  it('releases waiting workers when closed', async () => {
    const frontier = new Frontier(SEED, logger);
    frontier.offer(SEED, 0);
    await frontier.take();

    const waiting = frontier.take();
    frontier.close();
    assert.strictEqual(await waiting, null);
  });
});
