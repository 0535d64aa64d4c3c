import { describe, it } from 'node:test';
import assert from 'assert';
import { checkVectorParams } from '../infrastructure/repositories/QdrantVectorRepository.js';
import { ConfigError } from '../domain/errors.js';

describe('checkVectorParams', () => {
  it('accepts a collection built with the configured size and distance', () => {
    assert.doesNotThrow(() => checkVectorParams('kb_site_test', { size: 384, distance: 'Cosine' }, 384, 'cosine'));
    assert.doesNotThrow(() => checkVectorParams('kb_site_test', { size: 8, distance: 'Euclid' }, 8, 'euclidean'));
  });

  it('rejects a size mismatch', () => {
    assert.throws(
      () => checkVectorParams('kb_site_test', { size: 768, distance: 'Cosine' }, 384, 'cosine'),
      (error: unknown) =>
        error instanceof ConfigError &&
        error.message === "Configuration error: Collection 'kb_site_test' holds 768-dimensional Cosine vectors, configured 384-dimensional Cosine"
    );
  });

  it('rejects a distance mismatch', () => {
    assert.throws(() => checkVectorParams('kb_site_test', { size: 384, distance: 'Dot' }, 384, 'cosine'), ConfigError);
  });

  it('rejects named or missing vector parameters', () => {
    assert.throws(
      () => checkVectorParams('kb_site_test', { text: { size: 384, distance: 'Cosine' } }, 384, 'cosine'),
      ConfigError
    );
    assert.throws(() => checkVectorParams('kb_site_test', undefined, 384, 'cosine'), ConfigError);
  });
});
