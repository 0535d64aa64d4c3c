/**
 * Crawl-delay gate shared by every worker of one job.
 *
 * Acquisitions are serialized through a promise chain, so reading and
 * advancing the last start time never interleave between workers.
 */

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/** Longest single sleep, so cancellation is noticed while waiting */
const MAX_SLEEP_MS = 200;

export class RateLimiter {
  private lastStart = Number.NEGATIVE_INFINITY;
  private delay: number;
  private chain: Promise<unknown> = Promise.resolve();
  private sleep: Sleep;

  /**
   * @param delay Minimum spacing between fetch starts in milliseconds
   */
  constructor(delay: number, sleep: Sleep = defaultSleep) {
    this.delay = delay;
    this.sleep = sleep;
  }

  setDelay(delay: number): void {
    this.delay = delay;
  }

  getDelay(): number {
    return this.delay;
  }

  /**
   * Wait for the next fetch slot and claim it.
   * @param isCancelled Checked before and while waiting
   * @returns The claimed start time (ms since epoch), or null when cancelled
   */
  waitForNextSlot(isCancelled: () => boolean = () => false): Promise<number | null> {
    const turn = this.chain.then(() => this.claim(isCancelled));
    this.chain = turn.catch(() => undefined);
    return turn;
  }

  private async claim(isCancelled: () => boolean): Promise<number | null> {
    for (;;) {
      if (isCancelled()) {
        return null;
      }
      const wait = this.lastStart + this.delay - Date.now();
      if (wait <= 0) {
        break;
      }
      await this.sleep(Math.min(wait, MAX_SLEEP_MS));
    }

    this.lastStart = Date.now();
    return this.lastStart;
  }
}
