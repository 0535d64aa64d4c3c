/**
 * JobManager for managing crawl jobs
 *
 * Owns the mapping from domain to crawl job. Each job runs a
 * FetchWorkerPool over a fresh Frontier; completed jobs with a reschedule
 * interval are re-armed on a cancellable timer.
 */

import { v4 as uuidv4 } from 'uuid';
import EventEmitter from 'events';
import type { Renderer, RobotsFetcher } from '../../../shared/domain/capabilities/Renderer.js';
import {
  TERMINAL_STATES,
  emptyCounters,
  type CrawlCounters,
  type CrawlJobState,
  type CrawlJobStatus,
  type CrawlSettings
} from '../../../shared/domain/models/CrawlJob.js';
import {
  JobAlreadyRunningError,
  JobNotFoundError,
  ValidationError,
  toError
} from '../../../shared/domain/errors.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';
import type { ContentProcessor } from './ContentProcessor.js';
import { FetchWorkerPool, type RunOutcome } from './FetchWorkerPool.js';
import { Frontier } from './Frontier.js';
import { RobotsPolicy } from './RobotsPolicy.js';
import type { StorageManager } from './StorageManager.js';
import { extractDomain } from './UrlProcessor.js';

export type ConflictPolicy = 'reject' | 'supersede';

export interface JobManagerDeps {
  renderer: Renderer;
  robotsFetcher: RobotsFetcher;
  contentProcessor: ContentProcessor;
  storageManager: StorageManager;
}

export interface JobManagerOptions {
  /** Settings used where a start request does not override them */
  defaults: CrawlSettings;
  conflictPolicy?: ConflictPolicy;
}

export interface StartOptions {
  /** Re-crawl this many hours after each completed run */
  rescheduleIntervalHours?: number;

  /** Reschedule interval in milliseconds; takes precedence over hours */
  rescheduleIntervalMs?: number;

  settings?: Partial<CrawlSettings>;
}

/**
 * Event payload for job events
 */
export interface JobEvent {
  type: 'started' | 'completed' | 'stopped' | 'failed' | 'scheduled';
  timestamp: Date;
  status: CrawlJobStatus;
}

/**
 * Job information
 */
interface CrawlJob {
  jobId: string;
  domain: string;
  startUrl: string;
  settings: CrawlSettings;
  state: CrawlJobState;
  rescheduleIntervalMs: number | null;
  counters: CrawlCounters;
  startedAt: Date | null;
  endedAt: Date | null;
  nextRunAt: Date | null;
  runs: number;
  lastError: string | null;
  frontier: Frontier | null;
  pool: FetchWorkerPool | null;
  timer: NodeJS.Timeout | null;
  runPromise: Promise<void> | null;
}

const HOUR_MS = 60 * 60 * 1000;

function validateStartUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ValidationError(`Invalid URL: ${url}`, { url });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError(`Only http and https URLs can be crawled: ${url}`, { url });
  }
  return parsed.href;
}

function validateInterval(value: number | undefined, name: string): void {
  if (value !== undefined && (!Number.isFinite(value) || value <= 0)) {
    throw new ValidationError(`${name} must be a positive number`, { [name]: value });
  }
}

/**
 * Manager for crawl jobs, at most one per domain
 */
export class JobManager {
  /** Map of domain to job */
  private jobs = new Map<string, CrawlJob>();

  /** Event emitter for job events */
  private eventEmitter = new EventEmitter();

  private monitor: NodeJS.Timeout | null = null;
  private readonly conflictPolicy: ConflictPolicy;
  private logger: Logger;

  constructor(
    private readonly deps: JobManagerDeps,
    private readonly options: JobManagerOptions,
    loggerInstance?: Logger
  ) {
    this.conflictPolicy = options.conflictPolicy ?? 'reject';
    this.logger = loggerInstance || getLogger();
    this.logger.debug(`JobManager initialized (conflict policy: ${this.conflictPolicy})`, 'JobManager');
  }

  /**
   * Start crawling the domain of url.
   * @returns The new job's id
   * @throws ValidationError for a non-http(s) URL or a non-positive interval
   * @throws JobAlreadyRunningError when the domain's job is running or scheduled and the policy is reject
   */
  start(url: string, options: StartOptions = {}): string {
    const startUrl = validateStartUrl(url);
    validateInterval(options.rescheduleIntervalHours, 'rescheduleIntervalHours');
    validateInterval(options.rescheduleIntervalMs, 'rescheduleIntervalMs');

    const domain = extractDomain(startUrl);
    const existing = this.jobs.get(domain);

    if (existing && !TERMINAL_STATES.has(existing.state) && existing.state !== 'idle') {
      if (this.conflictPolicy === 'reject') {
        this.logger.warn(`Rejected start for ${domain}: job is ${existing.state}`, 'JobManager');
        throw new JobAlreadyRunningError(domain, existing.state);
      }
      this.logger.info(`Superseding ${existing.state} job ${existing.jobId} for ${domain}`, 'JobManager');
      this.halt(existing);
    }

    const intervalMs = options.rescheduleIntervalMs
      ?? (options.rescheduleIntervalHours !== undefined ? options.rescheduleIntervalHours * HOUR_MS : null);

    const job: CrawlJob = {
      jobId: uuidv4(),
      domain,
      startUrl,
      settings: { ...this.options.defaults, ...options.settings },
      state: 'idle',
      rescheduleIntervalMs: intervalMs,
      counters: emptyCounters(),
      startedAt: null,
      endedAt: null,
      nextRunAt: null,
      runs: 0,
      lastError: null,
      frontier: null,
      pool: null,
      timer: null,
      runPromise: null
    };
    this.jobs.set(domain, job);
    this.launch(job);

    return job.jobId;
  }

  /**
   * Stop a domain's job. In-flight fetches finish; nothing new is fetched or
   * stored, and any scheduled re-run is cancelled.
   * @throws JobNotFoundError for an unknown domain
   */
  stop(domain: string): CrawlJobStatus {
    const job = this.getJob(domain);
    if (!TERMINAL_STATES.has(job.state)) {
      this.halt(job);
    } else {
      this.logger.debug(`Job for ${job.domain} is already ${job.state}`, 'JobManager');
    }
    return this.toStatus(job);
  }

  /**
   * @throws JobNotFoundError for an unknown domain
   */
  status(domain: string): CrawlJobStatus {
    return this.toStatus(this.getJob(domain));
  }

  listStatuses(): CrawlJobStatus[] {
    return Array.from(this.jobs.values()).map(job => this.toStatus(job));
  }

  /**
   * Resolve once the domain's current run has settled.
   * @throws JobNotFoundError for an unknown domain
   */
  async waitForRun(domain: string): Promise<CrawlJobStatus> {
    const job = this.getJob(domain);
    if (job.runPromise) {
      await job.runPromise;
    }
    return this.toStatus(job);
  }

  /**
   * Log every job's status on a fixed interval until shutdown.
   */
  startProgressMonitor(intervalMs = 30000): void {
    if (this.monitor) {
      return;
    }
    this.monitor = setInterval(() => {
      for (const status of this.listStatuses()) {
        this.logger.info(
          `Progress for ${status.domain}: ${status.state}, fetched ${status.pagesFetched}, skipped ${status.pagesSkipped}, errors ${status.errors}, pending ${status.pendingUrls}`,
          'JobManager.progress'
        );
      }
    }, intervalMs);
    this.monitor.unref();
  }

  /**
   * Stop every job, cancel every timer and wait for in-flight runs to settle.
   */
  async shutdown(): Promise<void> {
    if (this.monitor) {
      clearInterval(this.monitor);
      this.monitor = null;
    }
    const pending: Promise<void>[] = [];
    for (const job of this.jobs.values()) {
      if (!TERMINAL_STATES.has(job.state)) {
        this.halt(job);
      }
      if (job.runPromise) {
        pending.push(job.runPromise);
      }
    }
    await Promise.all(pending);
    this.logger.info('JobManager shut down', 'JobManager');
  }

  /**
   * Get the event emitter for job events
   */
  getEventEmitter(): EventEmitter {
    return this.eventEmitter;
  }

  private getJob(domain: string): CrawlJob {
    const job = this.jobs.get(extractDomain(domain));
    if (!job) {
      throw new JobNotFoundError(domain);
    }
    return job;
  }

  private launch(job: CrawlJob): void {
    const counters = emptyCounters();
    const frontier = new Frontier(job.startUrl, this.logger);
    const pool = new FetchWorkerPool(
      {
        frontier,
        robots: new RobotsPolicy(this.deps.robotsFetcher, job.settings.userAgent, this.logger),
        renderer: this.deps.renderer,
        contentProcessor: this.deps.contentProcessor,
        storageManager: this.deps.storageManager
      },
      { domain: job.domain, settings: job.settings, counters },
      this.logger
    );

    job.state = 'running';
    job.runs++;
    job.startedAt = new Date();
    job.endedAt = null;
    job.nextRunAt = null;
    job.lastError = null;
    job.frontier = frontier;
    job.pool = pool;
    job.counters = counters;

    this.logger.info(`Started job ${job.jobId} for ${job.domain} (run ${job.runs})`, 'JobManager');
    this.emitJobEvent(job, 'started');

    job.runPromise = pool.run(job.startUrl).then(
      outcome => this.finishRun(job, pool, outcome),
      (error: unknown) => this.finishRun(job, pool, { outcome: 'failed', error: toError(error) })
    );
  }

  private finishRun(job: CrawlJob, pool: FetchWorkerPool, outcome: RunOutcome): void {
    if (job.pool !== pool) {
      return;
    }
    job.pool = null;
    job.endedAt = new Date();

    // A stop request already moved the job to stopped
    if (job.state === 'stopped') {
      this.logger.info(`Job ${job.jobId} for ${job.domain} stopped`, 'JobManager');
      return;
    }

    switch (outcome.outcome) {
      case 'failed':
        job.state = 'failed';
        job.lastError = outcome.error.message;
        this.logger.error(`Job ${job.jobId} for ${job.domain} failed`, 'JobManager', outcome.error);
        this.emitJobEvent(job, 'failed');
        return;
      case 'stopped':
        job.state = 'stopped';
        this.emitJobEvent(job, 'stopped');
        return;
      case 'completed':
        job.state = 'completed';
        this.logger.info(
          `Job ${job.jobId} for ${job.domain} completed: ${job.counters.pagesFetched} pages fetched`,
          'JobManager'
        );
        this.emitJobEvent(job, 'completed');
        if (job.rescheduleIntervalMs !== null) {
          this.schedule(job, job.rescheduleIntervalMs);
        }
        return;
    }
  }

  private schedule(job: CrawlJob, intervalMs: number): void {
    job.state = 'scheduled';
    job.nextRunAt = new Date(Date.now() + intervalMs);
    job.timer = setTimeout(() => {
      job.timer = null;
      // Stop or supersede may have happened since the timer was armed
      if (job.state !== 'scheduled' || this.jobs.get(job.domain) !== job) {
        return;
      }
      this.launch(job);
    }, intervalMs);
    job.timer.unref();

    this.logger.info(`Job ${job.jobId} for ${job.domain} rescheduled for ${job.nextRunAt.toISOString()}`, 'JobManager');
    this.emitJobEvent(job, 'scheduled');
  }

  private halt(job: CrawlJob): void {
    if (job.timer) {
      clearTimeout(job.timer);
      job.timer = null;
    }
    job.pool?.cancel();
    if (!job.pool) {
      job.endedAt = new Date();
    }
    job.state = 'stopped';
    job.nextRunAt = null;

    this.logger.info(`Stop requested for job ${job.jobId} (${job.domain})`, 'JobManager');
    this.emitJobEvent(job, 'stopped');
  }

  private toStatus(job: CrawlJob): CrawlJobStatus {
    const frontierStats = job.frontier?.getStats();
    return {
      jobId: job.jobId,
      domain: job.domain,
      startUrl: job.startUrl,
      state: job.state,
      pagesFetched: job.counters.pagesFetched,
      pagesSkipped: job.counters.pagesSkipped,
      errors: job.counters.errors,
      startedAt: job.startedAt?.toISOString() ?? null,
      endedAt: job.endedAt?.toISOString() ?? null,
      nextRunAt: job.nextRunAt?.toISOString() ?? null,
      rescheduleIntervalHours: job.rescheduleIntervalMs === null ? null : job.rescheduleIntervalMs / HOUR_MS,
      runs: job.runs,
      pendingUrls: frontierStats?.pending ?? 0,
      visitedUrls: frontierStats?.visited ?? 0,
      lastError: job.lastError
    };
  }

  private emitJobEvent(job: CrawlJob, type: JobEvent['type']): void {
    const event: JobEvent = {
      type,
      timestamp: new Date(),
      status: this.toStatus(job)
    };

    this.eventEmitter.emit(`job-${type}`, event);
    this.eventEmitter.emit('job-event', event);
  }
}
