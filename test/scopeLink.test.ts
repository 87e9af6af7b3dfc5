import { describe, expect, it } from 'vitest';

import { isJunkPath, scopeLink } from '../src/harvester/url/scopeLink.js';
import { normalizeTarget } from '../src/harvester/url/normalizeTarget.js';
import type { Target } from '../src/types.js';

function target(url: string): Target {
  const normalized = normalizeTarget(url);
  if (!normalized) {
    throw new Error(`fixture target is blank: ${url}`);
  }
  return normalized;
}

const example = target('http://example.com');
const defaults = { jsOnly: false };
const jsOnly = { jsOnly: true };

describe('scopeLink', () => {
  it('resolves relative paths against the target', () => {
    expect(scopeLink('/x', example, defaults)).toEqual({ retained: true, url: 'http://example.com/x' });
    expect(scopeLink('docs/guide', target('https://example.com/blog/post'), defaults)).toEqual({
      retained: true,
      url: 'https://example.com/blog/docs/guide',
    });
  });

  it('resolves protocol-relative references with the target scheme', () => {
    expect(scopeLink('//cdn.example.com/lib', target('https://example.com/'), defaults)).toEqual({
      retained: true,
      url: 'https://cdn.example.com/lib',
    });
  });

  it('keeps query strings and fragments from the reference', () => {
    expect(scopeLink('?page=2#results', target('http://example.com/search'), defaults)).toEqual({
      retained: true,
      url: 'http://example.com/search?page=2#results',
    });
  });

  it('rejects references that cannot be parsed', () => {
    expect(scopeLink('http://[broken', example, defaults)).toEqual({
      retained: false,
      reason: 'unparseable',
    });
  });

  it('rejects mailto and tel links', () => {
    expect(scopeLink('mailto:a@b.com', example, defaults)).toEqual({ retained: false, reason: 'scheme' });
    expect(scopeLink('tel:+15550100', example, defaults)).toEqual({ retained: false, reason: 'scheme' });
  });

  it('applies the equal-or-subdomain scope rule', () => {
    expect(scopeLink('http://foo.example.com/a', example, defaults)).toEqual({
      retained: true,
      url: 'http://foo.example.com/a',
    });
    expect(scopeLink('http://example.com/a', example, defaults)).toEqual({
      retained: true,
      url: 'http://example.com/a',
    });
    expect(scopeLink('http://example.com.evil.com/a', example, defaults)).toEqual({
      retained: false,
      reason: 'out-of-scope',
    });
    expect(scopeLink('http://other.com/a', example, defaults)).toEqual({
      retained: false,
      reason: 'out-of-scope',
    });
  });

  it('does not widen scope to the parent of a subdomain target', () => {
    expect(scopeLink('https://example.com/a', target('https://www.example.com'), defaults)).toEqual({
      retained: false,
      reason: 'out-of-scope',
    });
  });

  it('rejects junk extensions regardless of case', () => {
    expect(scopeLink('/IMAGE.PNG', example, defaults)).toEqual({ retained: false, reason: 'junk-extension' });
    expect(scopeLink('/image.png', example, defaults)).toEqual({ retained: false, reason: 'junk-extension' });
    expect(scopeLink('/site.css', example, jsOnly)).toEqual({ retained: false, reason: 'junk-extension' });
  });

  it('checks the extension on the path, not the query string', () => {
    expect(scopeLink('/download?file=report.pdf', example, defaults)).toEqual({
      retained: true,
      url: 'http://example.com/download?file=report.pdf',
    });
  });

  it('treats js-only and default modes as complements', () => {
    const paths = ['/app.js', '/page', '/bundle.min.js', '/api/data.json', '/'];

    for (const path of paths) {
      const inDefault = scopeLink(path, example, defaults).retained;
      const inJsOnly = scopeLink(path, example, jsOnly).retained;
      expect(inDefault).not.toBe(inJsOnly);
    }
  });

  it('keeps scripts only in js-only mode', () => {
    expect(scopeLink('https://static.example.com/a.js', example, defaults)).toEqual({
      retained: false,
      reason: 'js-filter',
    });
    expect(scopeLink('https://static.example.com/a.js', example, jsOnly)).toEqual({
      retained: true,
      url: 'https://static.example.com/a.js',
    });
    expect(scopeLink('/about', example, jsOnly)).toEqual({ retained: false, reason: 'js-filter' });
  });

  it('suppresses links that resolve to the target URL verbatim', () => {
    const withSlash = target('http://example.com/');
    expect(scopeLink('/', withSlash, defaults)).toEqual({ retained: false, reason: 'self-reference' });
    expect(scopeLink('', withSlash, defaults)).toEqual({ retained: false, reason: 'self-reference' });
    expect(scopeLink('http://example.com/', withSlash, defaults)).toEqual({
      retained: false,
      reason: 'self-reference',
    });
  });

  it('suppresses an absolute self link to a bare-host target', () => {
    const bare = target('example.com');
    expect(bare.url).toBe('http://example.com');
    expect(scopeLink('http://example.com', bare, defaults)).toEqual({
      retained: false,
      reason: 'self-reference',
    });
    expect(scopeLink('/', bare, defaults)).toEqual({ retained: true, url: 'http://example.com/' });
  });

  it('keeps absolute links exactly as written', () => {
    expect(scopeLink('HTTP://EXAMPLE.com:80/A', example, defaults)).toEqual({
      retained: true,
      url: 'HTTP://EXAMPLE.com:80/A',
    });
    expect(scopeLink('https://sub.example.com', example, defaults)).toEqual({
      retained: true,
      url: 'https://sub.example.com',
    });
  });
});

describe('isJunkPath', () => {
  it('matches every listed extension case-insensitively', () => {
    expect(isJunkPath('/fonts/Inter.WOFF2')).toBe(true);
    expect(isJunkPath('/archive.7z')).toBe(true);
    expect(isJunkPath('/sitemap.xml')).toBe(true);
    expect(isJunkPath('/scripts/app.js')).toBe(false);
    expect(isJunkPath('/css/')).toBe(false);
  });
});
