/**
 * Crawl job domain model
 */

/**
 * Lifecycle states of a crawl job.
 * idle -> running -> (completed | stopped | failed), with completed -> scheduled -> running
 * when a reschedule interval is set.
 */
export type CrawlJobState = 'idle' | 'running' | 'scheduled' | 'completed' | 'stopped' | 'failed';

export const TERMINAL_STATES: ReadonlySet<CrawlJobState> = new Set<CrawlJobState>(['completed', 'stopped', 'failed']);

/**
 * Configuration snapshot taken when a job starts
 */
export interface CrawlSettings {
  userAgent: string;

  /** Hard cap on fetch attempts per run */
  maxPages: number;

  /** Number of fetch workers */
  concurrency: number;

  /** Minimum spacing between fetch starts on the domain, in seconds */
  crawlDelay: number;

  /** Ignore robots disallow rules (crawl delay and page cap still apply) */
  robotsOverride: boolean;

  /** Consecutive capability failures tolerated before the job fails */
  failureThreshold: number;
}

export interface CrawlCounters {
  pagesFetched: number;
  pagesSkipped: number;
  errors: number;
}

export function emptyCounters(): CrawlCounters {
  return { pagesFetched: 0, pagesSkipped: 0, errors: 0 };
}

/**
 * A URL waiting in, or taken from, a job's frontier
 */
export interface FrontierEntry {
  /** Normalized URL */
  url: string;

  /** Link distance from the seed URL */
  depth: number;

  discoveredAt: Date;
}

/**
 * Externally visible snapshot of a crawl job
 */
export interface CrawlJobStatus extends CrawlCounters {
  jobId: string;
  domain: string;
  startUrl: string;
  state: CrawlJobState;
  startedAt: string | null;
  endedAt: string | null;
  nextRunAt: string | null;
  rescheduleIntervalHours: number | null;
  /** Completed or attempted runs, including the current one */
  runs: number;
  pendingUrls: number;
  visitedUrls: number;
  lastError: string | null;
}
