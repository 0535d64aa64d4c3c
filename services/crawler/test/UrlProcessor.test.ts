import { describe, it } from 'node:test';
import assert from 'assert';
import { UrlProcessor, extractDomain, normalizeUrl } from '../domain/UrlProcessor.js';
import { ValidationError } from '../../../shared/domain/errors.js';
import { silentLogger } from '../../../shared/test/fakes.js';

describe('extractDomain', () => {
  it('reduces URLs and bare hosts to a lowercase host name', () => {
    assert.strictEqual(extractDomain('https://Docs.Example.com/path?q=1'), 'docs.example.com');
    assert.strictEqual(extractDomain('example.com'), 'example.com');
    assert.strictEqual(extractDomain('  example.com/guide  '), 'example.com');
  });

  it('rejects empty input', () => {
    assert.throws(() => extractDomain(''), ValidationError);
    assert.throws(() => extractDomain('   '), ValidationError);
  });
});

describe('normalizeUrl', () => {
  it('strips fragments, credentials and trailing slashes', () => {
    assert.strictEqual(normalizeUrl('http://site.test/a/#top'), 'http://site.test/a');
    assert.strictEqual(normalizeUrl('http://user:pw@site.test/x'), 'http://site.test/x');
    assert.strictEqual(normalizeUrl('http://SITE.test'), 'http://site.test/');
  });

  it('sorts query parameters', () => {
    assert.strictEqual(normalizeUrl('http://site.test/?b=2&a=1'), 'http://site.test/?a=1&b=2');
  });

  it('resolves relative URLs against a base', () => {
    assert.strictEqual(normalizeUrl('../c', 'http://site.test/a/b/'), 'http://site.test/a/c');
  });

  it('returns null for other schemes and malformed input', () => {
    assert.strictEqual(normalizeUrl('mailto:team@site.test'), null);
    assert.strictEqual(normalizeUrl('not a url'), null);
  });
});

describe('UrlProcessor', () => {
  const processor = new UrlProcessor(silentLogger());

  it('accepts same-host pages', () => {
    assert.deepStrictEqual(processor.processUrl('/guide/', 'site.test', 'http://site.test/index'), {
      url: 'http://site.test/guide',
      accepted: true
    });
  });

  it('rejects other hosts, including subdomains', () => {
    assert.strictEqual(processor.processUrl('http://other.test/', 'site.test').rejectionReason, 'Different hostname');
    assert.strictEqual(processor.processUrl('http://docs.site.test/', 'site.test').rejectionReason, 'Different hostname');
  });

  it('rejects links to non-html files', () => {
    assert.strictEqual(processor.processUrl('http://site.test/logo.PNG', 'site.test').rejectionReason, 'Non-HTML file extension');
    assert.strictEqual(processor.processUrl('http://site.test/guide.pdf', 'site.test').rejectionReason, 'Non-HTML file extension');
  });

  it('rejects unparseable URLs', () => {
    assert.deepStrictEqual(processor.processUrl('not a url', 'site.test'), {
      url: 'not a url',
      accepted: false,
      rejectionReason: 'Invalid URL'
    });
  });
});
