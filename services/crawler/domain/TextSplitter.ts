import { ConfigError } from '../../../shared/domain/errors.js';

export interface TextSplitterOptions {
  /** Maximum chunk length in characters */
  chunkSize: number;

  /** Characters repeated from the end of one chunk at the start of the next */
  chunkOverlap: number;
}

/**
 * Splits text into windows of at most chunkSize characters with a fixed
 * overlap. Window ends move back to the last line break, or failing that
 * the last space, within the second half of the window; the next window
 * starts at a word boundary inside the overlap.
 */
export class TextSplitter {
  private chunkSize: number;
  private chunkOverlap: number;

  constructor(options: TextSplitterOptions) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new ConfigError(`chunkSize must be a positive integer, got ${options.chunkSize}`);
    }
    if (!Number.isInteger(options.chunkOverlap) || options.chunkOverlap < 0 || options.chunkOverlap >= options.chunkSize / 2) {
      throw new ConfigError(`chunkOverlap must be a non-negative integer below half of chunkSize, got ${options.chunkOverlap}`);
    }
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
  }

  *split(text: string): Generator<string> {
    const length = text.length;
    let start = 0;

    while (start < length) {
      let end = Math.min(start + this.chunkSize, length);

      if (end < length) {
        const floor = start + Math.floor(this.chunkSize / 2);
        const lineBreak = text.lastIndexOf('\n', end);
        const space = text.lastIndexOf(' ', end);
        if (lineBreak > floor) {
          end = lineBreak;
        } else if (space > floor) {
          end = space;
        }
      }

      const piece = text.slice(start, end).trim();
      if (piece) {
        yield piece;
      }
      if (end >= length) {
        return;
      }

      let next = end - this.chunkOverlap;
      if (next > 0 && !/\s/.test(text[next - 1])) {
        // Skip the partial word at the start of the overlap
        const boundary = text.slice(next, end).search(/\s/);
        if (boundary !== -1) {
          next += boundary + 1;
        }
      }
      start = next > start ? next : end;
    }
  }
}
