/**
 * ContentProcessor for processing crawled content
 *
 * Turns rendered HTML into a PageRecord of visible text and splits that
 * text into chunks for the embedding sink.
 */

import * as cheerio from 'cheerio';
import { createHash } from 'crypto';
import type { RenderResult } from '../../../shared/domain/capabilities/Renderer.js';
import type { Chunk, PageRecord } from '../../../shared/domain/models/Page.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';
import { TextSplitter } from './TextSplitter.js';

export interface ContentProcessorOptions {
  chunkSize: number;
  chunkOverlap: number;

  /** Pages with less visible text are discarded */
  minTextLength?: number;

  /** Minimum visible text / HTML length ratio; 0 disables the check */
  minTextDensity?: number;
}

export interface ExtractedText {
  title: string;
  /** One block of visible text per line */
  text: string;
}

/** Never visible */
const REMOVED_SELECTORS = 'script, style, noscript, template, svg, iframe';

/** Main content containers, in order of preference */
const MAIN_SELECTORS = ['main', '[role="main"]', 'article'];

/** Page chrome dropped when no main container exists */
const BOILERPLATE_SELECTORS = 'nav, header, footer, aside, .sidebar, .menu, .navigation, .nav, [role="navigation"]';

const BLOCK_SELECTORS = [
  'p', 'div', 'section', 'article', 'main', 'header', 'footer', 'aside', 'nav',
  'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'ul', 'ol', 'li', 'dl', 'dt', 'dd',
  'table', 'tr', 'td', 'th', 'pre', 'blockquote', 'figure', 'figcaption', 'br', 'hr'
].join(', ');

/**
 * Extract the title and visible text of a document.
 */
export function extractText(html: string): ExtractedText {
  const $ = cheerio.load(html);

  $(REMOVED_SELECTORS).remove();

  const title = $('title').first().text().trim() || $('h1').first().text().trim();

  const mainSelector = MAIN_SELECTORS.find(selector => $(selector).length > 0);
  if (!mainSelector) {
    $('body').find(BOILERPLATE_SELECTORS).remove();
  }
  const root = $(mainSelector ?? 'body').first();

  // Keep block boundaries as line breaks
  root.find(BLOCK_SELECTORS).each((_, element) => {
    $(element).prepend('\n').append('\n');
  });

  const source = root.length > 0 ? root.text() : $.root().text();
  const text = source
    .split('\n')
    .map(line => line.replace(/\s+/g, ' ').trim())
    .filter(line => line.length > 0)
    .join('\n');

  return { title, text };
}

export function contentHash(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Processor for crawled content
 */
export class ContentProcessor {
  private splitter: TextSplitter;
  private minTextLength: number;
  private minTextDensity: number;
  private logger: Logger;

  constructor(options: ContentProcessorOptions, loggerInstance?: Logger) {
    this.splitter = new TextSplitter({ chunkSize: options.chunkSize, chunkOverlap: options.chunkOverlap });
    this.minTextLength = options.minTextLength ?? 50;
    this.minTextDensity = options.minTextDensity ?? 0;
    this.logger = loggerInstance || getLogger();
  }

  /**
   * Build a PageRecord from a successful render.
   * @returns null for non-HTML responses and pages with too little text to be worth storing
   */
  toPageRecord(result: RenderResult, fetchedAt: Date = new Date()): PageRecord | null {
    if (result.contentType !== null && !result.contentType.toLowerCase().includes('html')) {
      this.logger.debug(`Discarding ${result.url}: content type ${result.contentType}`, 'ContentProcessor');
      return null;
    }

    const { title, text } = extractText(result.html);

    if (text.length < this.minTextLength) {
      this.logger.debug(`Discarding ${result.url}: ${text.length} chars of text`, 'ContentProcessor');
      return null;
    }
    if (this.minTextDensity > 0 && result.html.length > 0 && text.length / result.html.length < this.minTextDensity) {
      this.logger.debug(`Discarding ${result.url}: text density below ${this.minTextDensity}`, 'ContentProcessor');
      return null;
    }

    return {
      url: result.url,
      status: result.status,
      title,
      text,
      links: result.links,
      fetchedAt,
      contentHash: contentHash(text),
      lastModified: result.lastModified
    };
  }

  /**
   * Lazily split a page into chunks, in order. The same page always yields the same chunks.
   */
  *process(page: PageRecord): Generator<Chunk> {
    let index = 0;
    for (const text of this.splitter.split(page.text)) {
      yield {
        url: page.url,
        index: index++,
        text,
        title: page.title,
        contentHash: page.contentHash,
        lastModified: page.lastModified
      };
    }
  }
}
