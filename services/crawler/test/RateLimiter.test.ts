import { describe, it } from 'node:test';
import assert from 'assert';
import { RateLimiter } from '../domain/RateLimiter.js';

describe('RateLimiter', () => {
  it('grants the first slot immediately', async () => {
    const limiter = new RateLimiter(1000);
    const before = Date.now();
    const at = await limiter.waitForNextSlot();
    assert.ok(at !== null && at - before < 100);
  });

  it('spaces concurrent claims by at least the delay', async () => {
    const limiter = new RateLimiter(40);
    const slots = await Promise.all([
      limiter.waitForNextSlot(),
      limiter.waitForNextSlot(),
      limiter.waitForNextSlot()
    ]);
    const times = slots.filter((at): at is number => at !== null);
    assert.strictEqual(times.length, 3);
    assert.ok(times[1] - times[0] >= 40, `gap ${times[1] - times[0]}ms`);
    assert.ok(times[2] - times[1] >= 40, `gap ${times[2] - times[1]}ms`);
  });

  it('returns null for a cancelled claim', async () => {
    const limiter = new RateLimiter(0);
    assert.strictEqual(await limiter.waitForNextSlot(() => true), null);
  });

  it('gives up a waiting claim once cancelled', async () => {
    const limiter = new RateLimiter(5000);
    await limiter.waitForNextSlot();

    let cancelled = false;
    const waiting = limiter.waitForNextSlot(() => cancelled);
    setTimeout(() => {
      cancelled = true;
    }, 30);
    assert.strictEqual(await waiting, null);
  });

  it('uses the injected sleep while waiting', async () => {
    const sleeps: number[] = [];
    let now = 1_000_000;
    const realNow = Date.now;
    Date.now = () => now;
    try {
      const limiter = new RateLimiter(500, async ms => {
        sleeps.push(ms);
        now += ms;
      });
      await limiter.waitForNextSlot();
      const second = await limiter.waitForNextSlot();
      assert.strictEqual(second, 1_000_500);
      assert.deepStrictEqual(sleeps, [200, 200, 100]);
    } finally {
      Date.now = realNow;
    }
  });

  it('applies a changed delay to later claims', () => {
    const limiter = new RateLimiter(100);
    limiter.setDelay(250);
    assert.strictEqual(limiter.getDelay(), 250);
  });
});
