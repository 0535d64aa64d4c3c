/**
 * FetchWorkerPool drives one run of a crawl job
 *
 * N workers drain the frontier. Every fetch passes the robots check, the
 * page budget and the shared crawl-delay gate, in that order. Page level
 * failures are counted and skipped; repeated capability failures or a
 * configuration error end the run as failed.
 */

import EventEmitter from 'events';
import type { Renderer, RenderResult } from '../../../shared/domain/capabilities/Renderer.js';
import type { CrawlCounters, CrawlSettings, FrontierEntry } from '../../../shared/domain/models/CrawlJob.js';
import {
  CapabilityUnavailableError,
  ConfigError,
  FetchHttpError,
  toError
} from '../../../shared/domain/errors.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';
import type { ContentProcessor } from './ContentProcessor.js';
import type { Frontier } from './Frontier.js';
import { RateLimiter } from './RateLimiter.js';
import type { RobotsPolicy } from './RobotsPolicy.js';
import type { StorageManager } from './StorageManager.js';

export interface FetchWorkerPoolDeps {
  frontier: Frontier;
  robots: RobotsPolicy;
  renderer: Renderer;
  contentProcessor: ContentProcessor;
  storageManager: StorageManager;
}

export interface FetchWorkerPoolOptions {
  domain: string;
  settings: CrawlSettings;
  /** Updated in place as the run progresses */
  counters: CrawlCounters;
}

export type RunOutcome =
  | { outcome: 'completed' }
  | { outcome: 'stopped' }
  | { outcome: 'failed'; error: Error };

export interface FetchStartedEvent {
  url: string;
  /** Time the crawl-delay gate released the fetch, ms since epoch */
  at: number;
}

export interface PageStoredEvent {
  url: string;
  chunks: number;
}

export interface PageFailedEvent {
  url: string;
  error: Error;
}

export class FetchWorkerPool extends EventEmitter {
  private readonly deps: FetchWorkerPoolDeps;
  private readonly domain: string;
  private readonly settings: CrawlSettings;
  private readonly counters: CrawlCounters;
  private logger: Logger;

  /** Fetches claimed against the page budget */
  private attempts = 0;
  private consecutiveFailures = 0;
  /** Attempts that ended in a capability outage */
  private capabilityFailures = 0;
  private lastCapabilityError: CapabilityUnavailableError | null = null;
  private cancelled = false;
  private fatalError: Error | null = null;
  private rateLimiter: RateLimiter | null = null;

  constructor(deps: FetchWorkerPoolDeps, options: FetchWorkerPoolOptions, loggerInstance?: Logger) {
    super();
    this.deps = deps;
    this.domain = options.domain;
    this.settings = options.settings;
    this.counters = options.counters;
    this.logger = loggerInstance || getLogger();
  }

  /**
   * Run workers until the frontier drains, the page budget is spent,
   * the pool is cancelled, or a fatal error occurs.
   */
  async run(seedUrl: string): Promise<RunOutcome> {
    const configuredDelay = this.settings.crawlDelay * 1000;
    const robotsDelay = await this.deps.robots.crawlDelayMs(seedUrl);
    const delay = Math.max(configuredDelay, robotsDelay);
    this.rateLimiter = new RateLimiter(delay);

    this.logger.info(
      `Crawling ${this.domain} with ${this.settings.concurrency} workers, delay ${delay}ms, max ${this.settings.maxPages} pages`,
      'FetchWorkerPool'
    );

    this.deps.frontier.offer(seedUrl, 0);

    const workers = Array.from({ length: this.settings.concurrency }, (_, id) => this.worker(id));
    await Promise.all(workers);

    if (this.fatalError) {
      return { outcome: 'failed', error: this.fatalError };
    }
    if (this.cancelled) {
      return { outcome: 'stopped' };
    }
    // Every attempt hit an outage: nothing was reachable
    if (this.lastCapabilityError && this.capabilityFailures === this.attempts) {
      this.logger.error(
        `Crawl of ${this.domain} failed: all ${this.attempts} attempts hit a capability outage`,
        'FetchWorkerPool',
        this.lastCapabilityError
      );
      return { outcome: 'failed', error: this.lastCapabilityError };
    }
    return { outcome: 'completed' };
  }

  /**
   * Stop taking work. In-flight fetches finish; nothing new is fetched or stored.
   */
  cancel(): void {
    this.cancelled = true;
    this.deps.frontier.close();
  }

  getAttempts(): number {
    return this.attempts;
  }

  private halted(): boolean {
    return this.cancelled || this.fatalError !== null;
  }

  private async worker(id: number): Promise<void> {
    for (;;) {
      if (this.halted()) {
        return;
      }
      const entry = await this.deps.frontier.take();
      if (!entry) {
        this.logger.debug(`Worker ${id} finished`, 'FetchWorkerPool');
        return;
      }

      try {
        await this.processEntry(entry);
      } catch (error: unknown) {
        this.recordFailure(entry, toError(error));
      } finally {
        this.deps.frontier.markVisited(entry.url);
      }
    }
  }

  private async processEntry(entry: FrontierEntry): Promise<void> {
    if (this.halted()) {
      return;
    }

    if (!(await this.deps.robots.allowed(entry.url, this.settings.robotsOverride))) {
      this.counters.pagesSkipped++;
      this.logger.debug(`Skipping ${entry.url}: disallowed by robots.txt`, 'FetchWorkerPool');
      return;
    }

    // Claim a slot in the page budget; the check and increment do not yield
    if (this.attempts >= this.settings.maxPages) {
      this.deps.frontier.close();
      return;
    }
    this.attempts++;
    if (this.attempts >= this.settings.maxPages) {
      // Links found from here on are dropped
      this.deps.frontier.close();
    }

    const at = this.rateLimiter ? await this.rateLimiter.waitForNextSlot(() => this.halted()) : Date.now();
    if (at === null) {
      return;
    }

    const event: FetchStartedEvent = { url: entry.url, at };
    this.emit('fetch-started', event);

    const result: RenderResult = await this.deps.renderer.render(entry.url, this.settings.userAgent);
    if (result.status < 200 || result.status >= 300) {
      throw new FetchHttpError(entry.url, result.status);
    }
    this.counters.pagesFetched++;

    for (const link of result.links) {
      this.deps.frontier.offer(link, entry.depth + 1, result.url);
    }

    const page = this.deps.contentProcessor.toPageRecord(result);
    if (page) {
      const chunks = await this.deps.storageManager.storeChunks(
        this.domain,
        this.deps.contentProcessor.process(page),
        () => !this.halted()
      );
      const stored: PageStoredEvent = { url: page.url, chunks };
      this.emit('page-stored', stored);
    }

    this.consecutiveFailures = 0;
  }

  private recordFailure(entry: FrontierEntry, error: Error): void {
    this.counters.errors++;
    const failed: PageFailedEvent = { url: entry.url, error };
    this.emit('page-failed', failed);

    if (error instanceof ConfigError) {
      this.fail(error);
      return;
    }

    if (error instanceof CapabilityUnavailableError) {
      this.consecutiveFailures++;
      this.capabilityFailures++;
      this.lastCapabilityError = error;
      this.logger.error(
        `${error.capability} failure on ${entry.url} (${this.consecutiveFailures}/${this.settings.failureThreshold})`,
        'FetchWorkerPool',
        error
      );
      if (this.consecutiveFailures >= this.settings.failureThreshold) {
        this.fail(error);
      }
      return;
    }

    // Page level failure: counted, not retried; ends an outage streak
    this.consecutiveFailures = 0;
    this.logger.warn(`Failed to process ${entry.url}: ${error.message}`, 'FetchWorkerPool');
  }

  private fail(error: Error): void {
    if (this.fatalError) {
      return;
    }
    this.fatalError = error;
    this.logger.error(`Crawl of ${this.domain} failed: ${error.message}`, 'FetchWorkerPool', error);
    this.deps.frontier.close();
  }
}
