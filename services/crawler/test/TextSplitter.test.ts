import { describe, it } from 'node:test';
import assert from 'assert';
import { TextSplitter } from '../domain/TextSplitter.js';
import { ConfigError } from '../../../shared/domain/errors.js';

function split(text: string, chunkSize: number, chunkOverlap: number): string[] {
  return Array.from(new TextSplitter({ chunkSize, chunkOverlap }).split(text));
}

describe('TextSplitter', () => {
  it('rejects invalid sizes', () => {
    assert.throws(() => new TextSplitter({ chunkSize: 0, chunkOverlap: 0 }), ConfigError);
    assert.throws(() => new TextSplitter({ chunkSize: 10.5, chunkOverlap: 0 }), ConfigError);
    assert.throws(() => new TextSplitter({ chunkSize: 10, chunkOverlap: 5 }), ConfigError);
    assert.throws(() => new TextSplitter({ chunkSize: 10, chunkOverlap: -1 }), ConfigError);
  });

  it('returns short text as a single chunk', () => {
    assert.deepStrictEqual(split('hello world', 100, 10), ['hello world']);
  });

  it('returns nothing for empty or blank text', () => {
    assert.deepStrictEqual(split('', 100, 10), []);
    assert.deepStrictEqual(split('   ', 100, 10), []);
  });

  it('ends chunks at the last space in the second half of the window', () => {
    assert.deepStrictEqual(split('aaaa bbbb cccc dddd', 10, 0), ['aaaa bbbb', 'cccc dddd']);
  });

  it('prefers a line break over a later space', () => {
    assert.deepStrictEqual(split('abcd efg\nhij klm nop', 14, 0), ['abcd efg', 'hij klm nop']);
  });

  it('repeats whole words from the end of the previous chunk', () => {
    assert.deepStrictEqual(split('one two three four five six', 12, 5), [
      'one two',
      'two three',
      'three four',
      'four five',
      'five six'
    ]);
  });

  it('cuts text without whitespace at the chunk size', () => {
    const chunks = split('x'.repeat(25), 10, 2);
    assert.deepStrictEqual(chunks.map(chunk => chunk.length), [10, 10, 9]);
  });

  it('never yields a chunk longer than the chunk size', () => {
    const words = Array.from({ length: 400 }, (_, i) => `word${i % 37}${i % 3 === 0 ? '\n' : ' '}`).join('');
    const chunks = split(words, 120, 30);
    assert.ok(chunks.length > 1);
    for (const chunk of chunks) {
      assert.ok(chunk.length <= 120, `chunk of ${chunk.length} chars`);
      assert.strictEqual(chunk, chunk.trim());
    }
  });

  it('yields the same chunks for the same text', () => {
    const text = 'alpha beta gamma delta '.repeat(20);
    assert.deepStrictEqual(split(text, 50, 10), split(text, 50, 10));
  });
});
