/**
 * Page and chunk models produced by content processing
 */

/**
 * The transient result of one successful fetch
 */
export interface PageRecord {
  url: string;
  status: number;
  title: string;
  /** Visible text, one block per line */
  text: string;
  links: string[];
  fetchedAt: Date;
  /** SHA-256 of the extracted text */
  contentHash: string;
  lastModified: string | null;
}

/**
 * A bounded span of page text; the unit of embedding and retrieval
 */
export interface Chunk {
  url: string;
  /** Position of the chunk within its page, from 0 */
  index: number;
  text: string;
  title: string;
  contentHash: string;
  lastModified: string | null;
}

/**
 * Payload stored with each vector
 */
export type ChunkPayload = {
  domain: string;
  url: string;
  title: string;
  text: string;
  chunkIndex: number;
  contentHash: string;
  lastModified: string | null;
  scrapedAt: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Read a stored payload back, or null when it does not have the expected shape.
 */
export function parseChunkPayload(raw: unknown): ChunkPayload | null {
  if (!isRecord(raw)) {
    return null;
  }
  const { domain, url, title, text, chunkIndex, contentHash, lastModified, scrapedAt } = raw;
  if (typeof url !== 'string' || typeof text !== 'string') {
    return null;
  }
  return {
    domain: typeof domain === 'string' ? domain : '',
    url,
    title: typeof title === 'string' ? title : '',
    text,
    chunkIndex: typeof chunkIndex === 'number' ? chunkIndex : 0,
    contentHash: typeof contentHash === 'string' ? contentHash : '',
    lastModified: typeof lastModified === 'string' ? lastModified : null,
    scrapedAt: typeof scrapedAt === 'string' ? scrapedAt : ''
  };
}
