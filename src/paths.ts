import path from 'node:path';

// Social and search hosts are never mirrored, even when linked from the site's own host.
const EXTERNAL_DOMAINS = [
  'facebook.com',
  'twitter.com',
  'instagram.com',
  'linkedin.com',
  'youtube.com',
  'google.com',
  'maps.google.com'
];

export function outputRoot(): string {
  return path.resolve(process.env.OUTPUT_ROOT || 'mirrors');
}

/**
 * Local file path for a page URL, relative to the output root.
 * `https://example.com/blog/post-1?utm=x#top` -> `blog/post-1.html`
 */
export function cleanPath(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return 'index.html';
  }

  const segments = pathname.split('/').filter(Boolean);
  const last = segments.pop();
  if (!last) return 'index.html';

  let file = last;
  if (!file.endsWith('.html')) {
    file = file.includes('.') ? `${file.split('.')[0]}.html` : `${file}.html`;
  }
  return [...segments, file].join('/');
}

/**
 * Href that leads from the page stored at `from` to the page stored at `to`.
 * Both are clean paths relative to the same root.
 */
export function relativeLink(from: string, to: string): string {
  const fromDirs = from.split('/').slice(0, -1);
  const toParts = to.split('/');
  const toFile = toParts.pop() ?? '';
  const toDirs = toParts;

  let common = 0;
  while (common < fromDirs.length && common < toDirs.length && fromDirs[common] === toDirs[common]) {
    common++;
  }

  const parts: string[] = [];
  for (let i = common; i < fromDirs.length; i++) parts.push('..');
  parts.push(...toDirs.slice(common), toFile);
  return parts.join('/');
}

export function isSkippableHref(href: string): boolean {
  const trimmed = href.trim();
  return (
    !trimmed ||
    trimmed.startsWith('#') ||
    /^(mailto|tel|javascript):/i.test(trimmed)
  );
}

function isDeniedHost(host: string): boolean {
  return EXTERNAL_DOMAINS.some((d) => host === d || host.endsWith(`.${d}`));
}

export function isInternal(link: string, currentUrl: string): boolean {
  if (isSkippableHref(link)) return false;
  const trimmed = link.trim();

  let current: URL;
  let target: URL;
  try {
    current = new URL(currentUrl);
    target = new URL(trimmed, current);
  } catch {
    return false;
  }

  if (isDeniedHost(target.hostname)) return false;
  if (/^https?:\/\//i.test(trimmed)) return target.host === current.host;
  // relative and protocol-relative links default to internal
  return target.protocol === 'http:' || target.protocol === 'https:';
}

/** Key used for the visited set: absolute URL without query or fragment. */
export function normalizePageUrl(url: string): string {
  const u = new URL(url);
  u.hash = '';
  u.search = '';
  return u.toString();
}

export function pageNameFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return 'Page';
  }
  const segments = pathname.split('/').filter(Boolean);
  const last = segments.pop();
  if (!last) return 'Home';
  return last
    .replace(/[-_]/g, ' ')
    .toLowerCase()
    .replace(/\b\w/g, (c) => c.toUpperCase());
}

