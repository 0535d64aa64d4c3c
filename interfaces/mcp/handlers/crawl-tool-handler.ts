/**
 * Handler for the crawl-start, crawl-stop and crawl-status tools
 */
import { z } from 'zod';
import { BaseToolHandler, type ToolDefinition } from './base-tool-handler.js';
import type { McpToolResponse } from '../tool-types.js';
import type { JobManager } from '../../../services/crawler/domain/JobManager.js';
import { extractDomain } from '../../../services/crawler/domain/UrlProcessor.js';
import { ValidationError } from '../../../shared/domain/errors.js';
import type { Logger } from '../../../shared/infrastructure/logging.js';

const crawlStartSchema = z.object({
  url: z.string().url(),
  scheduleIntervalHours: z.number().positive().optional()
});

const crawlStopSchema = z.object({
  domain: z.string().min(1)
});

const crawlStatusSchema = z.object({
  domain: z.string().min(1).optional()
});

/**
 * Whether host is covered by the allowed hosts list. An entry matches the
 * host itself and its subdomains; '*' matches everything.
 */
export function isHostAllowed(host: string, allowedHosts: string[]): boolean {
  return allowedHosts.some(allowed => {
    const entry = allowed.toLowerCase();
    return entry === '*' || host === entry || host.endsWith(`.${entry}`);
  });
}

export class CrawlToolHandler extends BaseToolHandler {
  constructor(
    private readonly jobManager: JobManager,
    private readonly allowedHosts: string[],
    loggerInstance?: Logger
  ) {
    super(loggerInstance);
  }

  getToolDefinitions(): ToolDefinition[] {
    return [
      {
        name: 'crawl-start',
        description: 'Start crawling a website into its per-domain knowledge base. Only pages on the same host as the URL are crawled. Optionally re-crawl on a fixed interval after each completed run.',
        inputSchema: {
          type: 'object',
          properties: {
            url: { type: 'string', description: 'Start URL (http or https).' },
            scheduleIntervalHours: { type: 'number', description: 'Re-crawl this many hours after each completed run.' }
          },
          required: ['url']
        }
      },
      {
        name: 'crawl-stop',
        description: 'Stop the crawl job for a domain and cancel any scheduled re-crawl.',
        inputSchema: {
          type: 'object',
          properties: {
            domain: { type: 'string', description: 'Domain (or any URL on it) whose job should stop.' }
          },
          required: ['domain']
        }
      },
      {
        name: 'crawl-status',
        description: 'Report the state and counters of the crawl job for a domain, or of every job when no domain is given.',
        inputSchema: {
          type: 'object',
          properties: {
            domain: { type: 'string', description: 'Domain to report on.' }
          }
        }
      }
    ];
  }

  async handleToolCall(name: string, args: unknown): Promise<McpToolResponse> {
    try {
      switch (name) {
        case 'crawl-start':
          return this.start(args);
        case 'crawl-stop':
          return this.stop(args);
        case 'crawl-status':
          return this.status(args);
        default:
          return this.createErrorResponse(`Unknown tool: ${name}`);
      }
    } catch (error: unknown) {
      this.logger.warn(`Tool ${name} failed`, 'CrawlToolHandler', error);
      return this.createStructuredErrorResponse(error);
    }
  }

  private start(args: unknown): McpToolResponse {
    const { url, scheduleIntervalHours } = this.parseArgs(crawlStartSchema, args);

    const domain = extractDomain(url);
    if (!isHostAllowed(domain, this.allowedHosts)) {
      throw new ValidationError(`Host '${domain}' is not in the allowed hosts list`, { domain });
    }

    const jobId = this.jobManager.start(url, { rescheduleIntervalHours: scheduleIntervalHours });
    this.logger.info(`Crawl accepted for ${domain} (job ${jobId})`, 'CrawlToolHandler');

    return this.createJsonResponse({
      status: 'accepted',
      jobId,
      domain,
      scheduleIntervalHours: scheduleIntervalHours ?? null
    });
  }

  private stop(args: unknown): McpToolResponse {
    const { domain } = this.parseArgs(crawlStopSchema, args);
    const status = this.jobManager.stop(domain);
    return this.createJsonResponse({ status: 'stopped', job: status });
  }

  private status(args: unknown): McpToolResponse {
    const { domain } = this.parseArgs(crawlStatusSchema, args);
    if (domain === undefined) {
      return this.createJsonResponse({ jobs: this.jobManager.listStatuses() });
    }
    return this.createJsonResponse(this.jobManager.status(domain));
  }
}
