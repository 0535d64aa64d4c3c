/**
 * Frontier for one crawl job
 *
 * Breadth-first queue of discovered URLs with pending, in-flight and visited
 * sets. A URL lives in at most one of the three. Workers suspend in take()
 * while the queue is empty but other workers may still discover links.
 */

import type { FrontierEntry } from '../../../shared/domain/models/CrawlJob.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';
import { UrlProcessor, extractDomain } from './UrlProcessor.js';

export interface FrontierStats {
  pending: number;
  inFlight: number;
  visited: number;
  /** URLs rejected by scope or already known */
  rejected: number;
}

type Waiter = (entry: FrontierEntry | null) => void;

export class Frontier {
  /** URLs queued for processing, in discovery order */
  private queue: FrontierEntry[] = [];
  private pending = new Set<string>();
  private inFlight = new Set<string>();
  private visited = new Set<string>();
  /** Workers suspended in take() */
  private waiters: Waiter[] = [];
  private closed = false;
  private rejected = 0;

  private readonly startHost: string;
  private urlProcessor: UrlProcessor;
  private logger: Logger;

  constructor(startUrl: string, loggerInstance?: Logger) {
    this.startHost = extractDomain(startUrl);
    this.logger = loggerInstance || getLogger();
    this.urlProcessor = new UrlProcessor(this.logger);
  }

  /**
   * Add a URL unless it is out of scope, already known, or the frontier is closed.
   * Safe to call from any worker; each call completes without yielding.
   * @param parentUrl Page the link was found on
   * @returns Whether the URL was newly added
   */
  offer(url: string, depth: number, parentUrl?: string): boolean {
    if (this.closed) {
      return false;
    }

    const processed = this.urlProcessor.processUrl(url, this.startHost, parentUrl);
    if (!processed.accepted) {
      this.rejected++;
      this.logger.debug(`Rejected ${processed.url}: ${processed.rejectionReason}`, 'Frontier.offer');
      return false;
    }

    const normalized = processed.url;
    if (this.pending.has(normalized) || this.inFlight.has(normalized) || this.visited.has(normalized)) {
      this.rejected++;
      return false;
    }

    const entry: FrontierEntry = { url: normalized, depth, discoveredAt: new Date() };
    const waiter = this.waiters.shift();
    if (waiter) {
      // Hand the entry straight to a suspended worker
      this.inFlight.add(normalized);
      waiter(entry);
    } else {
      this.queue.push(entry);
      this.pending.add(normalized);
    }
    return true;
  }

  /**
   * Take the oldest pending entry.
   * Suspends while the queue is empty and URLs are still in flight; resolves
   * null once the frontier is drained or closed.
   */
  take(): Promise<FrontierEntry | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }

    const entry = this.queue.shift();
    if (entry) {
      this.pending.delete(entry.url);
      this.inFlight.add(entry.url);
      return Promise.resolve(entry);
    }

    if (this.inFlight.size === 0) {
      return Promise.resolve(null);
    }

    return new Promise(resolve => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Move a taken URL from in-flight to visited.
   */
  markVisited(url: string): void {
    this.inFlight.delete(url);
    this.visited.add(url);

    if (this.queue.length === 0 && this.inFlight.size === 0) {
      this.releaseWaiters();
    }
  }

  /**
   * Stop handing out work. Pending URLs are discarded and later offers are dropped.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const discarded = this.queue.length;
    this.queue = [];
    this.pending.clear();
    this.releaseWaiters();
    if (discarded > 0) {
      this.logger.debug(`Frontier closed, discarded ${discarded} pending URLs`, 'Frontier.close');
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  getStartHost(): string {
    return this.startHost;
  }

  getStats(): FrontierStats {
    return {
      pending: this.queue.length,
      inFlight: this.inFlight.size,
      visited: this.visited.size,
      rejected: this.rejected
    };
  }

  private releaseWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(null);
    }
  }
}
