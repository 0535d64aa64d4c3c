/**
 * UrlProcessor for processing URLs during crawling
 *
 * Handles URL normalization, scope filtering and domain extraction.
 */

import { ValidationError } from '../../../shared/domain/errors.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';

/**
 * URL processing result
 */
export interface ProcessedUrl {
  /** Normalized URL */
  url: string;

  /** Whether the URL was accepted */
  accepted: boolean;

  /** Reason for rejection if not accepted */
  rejectionReason?: string;
}

// File extensions that are typically not HTML content
const NON_HTML_EXTENSIONS = [
  '.jpg', '.jpeg', '.png', '.gif', '.svg', '.ico', '.webp', '.css', '.js',
  '.pdf', '.zip', '.tar', '.gz', '.rar', '.exe', '.dmg', '.iso',
  '.mp3', '.mp4', '.avi', '.mov', '.wav', '.ogg', '.webm', '.woff', '.woff2'
];

/**
 * Reduce a URL, or a bare host name, to its lowercase host name.
 * @throws ValidationError when nothing host-like remains
 */
export function extractDomain(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new ValidationError('Domain must not be empty');
  }

  const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  let hostname: string;
  try {
    hostname = new URL(candidate).hostname;
  } catch {
    throw new ValidationError(`Invalid domain or URL: ${input}`, { input });
  }
  if (!hostname) {
    throw new ValidationError(`Invalid domain or URL: ${input}`, { input });
  }
  return hostname.toLowerCase();
}

/**
 * Normalize a URL for deduplication: scheme, host and path with the
 * query parameters sorted and the fragment stripped.
 * @param baseUrl Base URL for resolving relative URLs
 * @returns Normalized URL or null if invalid or not http(s)
 */
export function normalizeUrl(url: string, baseUrl?: string): string | null {
  let parsed: URL;
  try {
    parsed = baseUrl === undefined ? new URL(url) : new URL(url, baseUrl);
  } catch {
    return null;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return null;
  }

  // Fragments don't change the page content
  parsed.hash = '';
  parsed.username = '';
  parsed.password = '';
  parsed.searchParams.sort();

  // Remove trailing slash, except for the root path
  if (parsed.pathname.length > 1 && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.replace(/\/+$/, '');
  }

  return parsed.href;
}

/**
 * Processor for URLs discovered during a crawl
 */
export class UrlProcessor {
  private logger: Logger;

  constructor(loggerInstance?: Logger) {
    this.logger = loggerInstance || getLogger();
  }

  /**
   * Decide whether a discovered URL belongs in the crawl
   * @param startHost Host of the job's start URL; only same-host URLs are accepted
   * @param parentUrl Page the URL was found on, for resolving relative links
   */
  processUrl(url: string, startHost: string, parentUrl?: string): ProcessedUrl {
    const normalizedUrl = normalizeUrl(url, parentUrl);
    if (!normalizedUrl) {
      return { url, accepted: false, rejectionReason: 'Invalid URL' };
    }

    const parsed = new URL(normalizedUrl);
    if (parsed.hostname !== startHost) {
      return { url: normalizedUrl, accepted: false, rejectionReason: 'Different hostname' };
    }

    const path = parsed.pathname.toLowerCase();
    if (NON_HTML_EXTENSIONS.some(ext => path.endsWith(ext))) {
      return { url: normalizedUrl, accepted: false, rejectionReason: 'Non-HTML file extension' };
    }

    this.logger.debug(`URL accepted: ${normalizedUrl}`, 'UrlProcessor');
    return { url: normalizedUrl, accepted: true };
  }
}
