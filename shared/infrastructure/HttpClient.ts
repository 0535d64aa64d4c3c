import axios, { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import type { Renderer, RenderResult, RobotsFetcher } from '../domain/capabilities/Renderer.js';
import {
  FetchNetworkError,
  FetchTimeoutError,
  RendererUnavailableError,
  toError
} from '../domain/errors.js';
import { Logger, getLogger } from './logging.js';

/**
 * Options for the HTTP client
 */
export interface HttpClientOptions {
  /** Request timeout in milliseconds */
  timeout?: number;

  /** Timeout for robots.txt requests in milliseconds */
  robotsTimeout?: number;

  /** Maximum redirects to follow */
  maxRedirects?: number;
}

/** Error codes meaning the host itself cannot be reached */
const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH', 'ENETUNREACH']);
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

function headerValue(value: unknown): string | null {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === 'string') {
    return value[0];
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * URL after redirects; the node adapter exposes it on the underlying request.
 */
function responseUrlOf(request: unknown, fallback: string): string {
  if (isRecord(request) && isRecord(request.res) && typeof request.res.responseUrl === 'string') {
    return request.res.responseUrl;
  }
  return fallback;
}

/**
 * Extract absolute http(s) links from a document, in order, without duplicates.
 * Fragments are kept; the frontier normalizes them away.
 */
export function extractLinks(html: string, baseUrl: string): string[] {
  const $ = cheerio.load(html);
  const links: string[] = [];
  const seen = new Set<string>();

  $('a[href]').each((_, element) => {
    const href = $(element).attr('href');
    if (!href) {
      return;
    }
    let resolved: URL;
    try {
      resolved = new URL(href, baseUrl);
    } catch {
      return; // Malformed href
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      return;
    }
    if (!seen.has(resolved.href)) {
      seen.add(resolved.href);
      links.push(resolved.href);
    }
  });

  return links;
}

/**
 * Plain HTTP renderer: fetches HTML with axios and reads links with cheerio.
 * Also serves robots.txt for the robots policy.
 */
export class HttpClient implements Renderer, RobotsFetcher {
  private axiosInstance: AxiosInstance;
  private options: Required<HttpClientOptions>;
  private logger: Logger;

  constructor(options: HttpClientOptions = {}, loggerInstance?: Logger) {
    this.options = {
      timeout: 30000,
      robotsTimeout: 5000,
      maxRedirects: 10,
      ...options
    };
    this.logger = loggerInstance || getLogger();

    this.axiosInstance = axios.create({
      timeout: this.options.timeout,
      maxRedirects: this.options.maxRedirects,
      responseType: 'text',
      validateStatus: () => true // Status is part of the result
    });
  }

  async render(url: string, userAgent: string): Promise<RenderResult> {
    this.logger.debug(`GET ${url}`, 'HttpClient.render');

    try {
      const response = await this.axiosInstance.get<string>(url, {
        headers: {
          'User-Agent': userAgent,
          Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8'
        }
      });

      const finalUrl = responseUrlOf(response.request, url);
      const html = typeof response.data === 'string' ? response.data : String(response.data ?? '');
      const contentType = headerValue(response.headers['content-type']);
      const isHtml = contentType === null || contentType.includes('html');

      return {
        url: finalUrl,
        status: response.status,
        html,
        links: isHtml && response.status >= 200 && response.status < 300 ? extractLinks(html, finalUrl) : [],
        contentType,
        lastModified: headerValue(response.headers['last-modified'])
      };
    } catch (error: unknown) {
      throw this.classifyError(url, error);
    }
  }

  async fetchRobots(origin: string, userAgent: string): Promise<string | null> {
    const robotsUrl = new URL('/robots.txt', origin).href;

    try {
      const response = await this.axiosInstance.get<string>(robotsUrl, {
        headers: { 'User-Agent': userAgent },
        timeout: this.options.robotsTimeout
      });

      if (response.status !== 200) {
        this.logger.debug(`No robots.txt at ${robotsUrl} (status ${response.status})`, 'HttpClient.fetchRobots');
        return null;
      }
      return typeof response.data === 'string' ? response.data : String(response.data ?? '');
    } catch (error: unknown) {
      // If robots.txt cannot be fetched, crawling is allowed
      this.logger.debug(`Failed to fetch ${robotsUrl}`, 'HttpClient.fetchRobots', toError(error));
      return null;
    }
  }

  private classifyError(url: string, error: unknown): Error {
    const code = axios.isAxiosError(error) ? error.code : undefined;
    const cause = toError(error);

    if (code && UNREACHABLE_CODES.has(code)) {
      return new RendererUnavailableError(url, cause);
    }
    if ((code && TIMEOUT_CODES.has(code)) || /timeout/i.test(cause.message)) {
      return new FetchTimeoutError(url, this.options.timeout);
    }
    return new FetchNetworkError(url, cause);
  }
}
