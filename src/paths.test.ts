import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { cleanPath, isInternal, normalizePageUrl, pageNameFromUrl, relativeLink } from './paths.js';

describe('cleanPath', () => {
  it('drops query and fragment and appends .html', () => {
    expect(cleanPath('https://example.com/blog/post-1?utm=x#top')).toBe('blog/post-1.html');
  });

  it('maps the root to index.html', () => {
    expect(cleanPath('https://example.com/')).toBe('index.html');
    expect(cleanPath('https://example.com')).toBe('index.html');
    expect(cleanPath('https://example.com/?page=2')).toBe('index.html');
  });

  it('replaces other extensions and keeps nesting', () => {
    expect(cleanPath('https://example.com/docs/guide/intro.php')).toBe('docs/guide/intro.html');
    expect(cleanPath('https://example.com/page.html')).toBe('page.html');
    expect(cleanPath('https://example.com/about/')).toBe('about.html');
  });

  it('is deterministic modulo query and fragment', () => {
    const a = cleanPath('https://example.com/a/b?x=1');
    const b = cleanPath('https://example.com/a/b#section');
    expect(a).toBe(b);
    expect(a).toBe('a/b.html');
  });

  it('falls back to index.html for unparseable input', () => {
    expect(cleanPath('not a url')).toBe('index.html');
  });
});

describe('relativeLink', () => {
  it('climbs out of a directory to reach the root page', () => {
    expect(relativeLink('blog/post-1.html', 'index.html')).toBe('../index.html');
  });

  it('yields a bare filename within one directory', () => {
    expect(relativeLink('blog/a.html', 'blog/b.html')).toBe('b.html');
    expect(relativeLink('index.html', 'about.html')).toBe('about.html');
  });

  it('handles sibling and multi-level ancestor directories', () => {
    expect(relativeLink('blog/a.html', 'docs/b.html')).toBe('../docs/b.html');
    expect(relativeLink('a/b/c/page.html', 'a/x.html')).toBe('../../x.html');
    expect(relativeLink('index.html', 'a/b/c.html')).toBe('a/b/c.html');
  });

  it('resolves back to the target from the source directory', () => {
    const pairs: [string, string][] = [
      ['index.html', 'index.html'],
      ['blog/post-1.html', 'index.html'],
      ['blog/a.html', 'blog/b.html'],
      ['blog/a.html', 'docs/b.html'],
      ['a/b/c/page.html', 'a/x.html'],
      ['a/b/page.html', 'a/b/c/d/deep.html'],
      ['x/y.html', 'x/y.html']
    ];
    for (const [from, to] of pairs) {
      const rel = relativeLink(from, to);
      expect(path.posix.normalize(path.posix.join(path.posix.dirname(from), rel))).toBe(to);
    }
  });
});

describe('isInternal', () => {
  const page = 'https://example.com/blog/post';

  it('rejects mail, phone, script and fragment links', () => {
    expect(isInternal('mailto:hi@example.com', page)).toBe(false);
    expect(isInternal('tel:+100', page)).toBe(false);
    expect(isInternal('javascript:void(0)', page)).toBe(false);
    expect(isInternal('#top', page)).toBe(false);
    expect(isInternal('', page)).toBe(false);
  });

  it('compares hosts for absolute links', () => {
    expect(isInternal('https://example.com/about', page)).toBe(true);
    expect(isInternal('http://example.com/about', page)).toBe(true);
    expect(isInternal('https://other.test/about', page)).toBe(false);
  });

  it('treats denylisted domains as external even on a host match', () => {
    expect(isInternal('https://www.google.com/b', 'https://www.google.com/a')).toBe(false);
    expect(isInternal('/b', 'https://maps.google.com/a')).toBe(false);
  });

  it('defaults relative and protocol-relative links to internal', () => {
    expect(isInternal('/about', page)).toBe(true);
    expect(isInternal('next', page)).toBe(true);
    expect(isInternal('//cdn.example.net/x', page)).toBe(true);
    expect(isInternal('//facebook.com/share', page)).toBe(false);
  });

  it('rejects non-http schemes', () => {
    expect(isInternal('data:text/plain,hi', page)).toBe(false);
  });
});

describe('page naming', () => {
  it('names the root Home and title-cases the last segment', () => {
    expect(pageNameFromUrl('https://example.com/')).toBe('Home');
    expect(pageNameFromUrl('https://example.com/blog/about-us_team')).toBe('About Us Team');
  });

  it('normalizes visited keys', () => {
    expect(normalizePageUrl('https://example.com/a?x=1#h')).toBe('https://example.com/a');
  });
});
