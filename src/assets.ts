import path from 'node:path';
import { rewriteCssUrls, shouldSkipReference } from './css.js';
import type { Fetcher } from './http.js';
import { relativeLink } from './paths.js';
import { writeFileOverwrite } from './storage.js';
import type { AssetRecord } from './types.js';
import { errorMessage, sanitizeFilename, shortHash } from './utils.js';

const EXTENSION_BY_CONTENT_TYPE: Record<string, string> = {
  'text/css': '.css',
  'application/javascript': '.js',
  'text/javascript': '.js',
  'application/x-javascript': '.js',
  'image/png': '.png',
  'image/jpeg': '.jpg',
  'image/jpg': '.jpg',
  'image/gif': '.gif',
  'image/svg+xml': '.svg',
  'image/webp': '.webp',
  'image/avif': '.avif',
  'image/x-icon': '.ico',
  'font/woff': '.woff',
  'font/woff2': '.woff2',
  'font/ttf': '.ttf',
  'font/otf': '.otf',
  'application/font-woff': '.woff',
  'application/font-woff2': '.woff2',
  'application/x-font-ttf': '.ttf',
  'application/x-font-otf': '.otf'
};

function baseContentType(contentType?: string): string {
  return (contentType ?? '').split(';')[0].trim().toLowerCase();
}

/**
 * Where an asset lives under the output root. Same-origin assets keep their
 * URL path; anything else is filed under its host.
 */
export function assetLocalPath(assetUrl: string, pageUrl: string, contentType?: string): string {
  const u = new URL(assetUrl);
  const sameOrigin = u.host === new URL(pageUrl).host;

  const segments = u.pathname
    .split('/')
    .filter(Boolean)
    .map((s) => {
      let decoded = s;
      try {
        decoded = decodeURIComponent(s);
      } catch {
        // keep the raw segment
      }
      return sanitizeFilename(decoded.replace(/\//g, '_'));
    })
    .filter((s) => s !== '.' && s !== '..');
  if (u.pathname.endsWith('/') || segments.length === 0) segments.push('index');
  if (!sameOrigin) segments.unshift(sanitizeFilename(u.host.replace(/:/g, '_')));

  let file = segments.pop() ?? 'index';
  let ext = path.posix.extname(file);
  let stem = ext ? file.slice(0, -ext.length) : file;
  if (!ext) ext = EXTENSION_BY_CONTENT_TYPE[baseContentType(contentType)] ?? '';
  if (u.search) stem = `${stem}_${shortHash(u.search)}`;
  file = `${stem}${ext}`;

  return [...segments, file].join('/');
}

export type LocalAsset = {
  localPath: string; // relative to the output root
  fragment: string; // `#...` of the reference, never sent to the server
};

// The fragment and an empty `?` do not change which resource is fetched.
function assetKey(url: URL): string {
  const key = new URL(url);
  key.hash = '';
  if (!key.search) key.search = '';
  return key.toString();
}

function isStylesheet(localPath: string, contentType?: string): boolean {
  return baseContentType(contentType) === 'text/css' || localPath.toLowerCase().endsWith('.css');
}

/**
 * Downloads page assets into the output root, once per absolute URL.
 * One instance per crawl job; the cache holds in-flight promises so every
 * reference to a URL shares a single download.
 */
export class AssetFetcher {
  private cache = new Map<string, Promise<string | null>>();
  private stored = new Map<string, AssetRecord>();
  // stylesheets whose url() references are being resolved; breaks @import cycles
  private cssInProgress = new Set<string>();

  constructor(
    private fetcher: Fetcher,
    private outputRoot: string
  ) {}

  /**
   * Local path (relative to the output root) for `url` as referenced from
   * `baseUrl`. On any failure returns `url` unchanged.
   */
  async fetchAsset(url: string, baseUrl: string): Promise<string> {
    const local = await this.localize(url, baseUrl);
    return local ? local.localPath : url;
  }

  /** Like fetchAsset, but null when the reference stays remote; keeps the reference's fragment apart. */
  async localize(url: string, baseUrl: string): Promise<LocalAsset | null> {
    if (shouldSkipReference(url)) return null;
    let target: URL;
    try {
      target = new URL(url.trim(), baseUrl);
    } catch {
      return null;
    }
    const fragment = target.hash;
    const localPath = await this.download(assetKey(target), baseUrl);
    return localPath ? { localPath, fragment } : null;
  }

  records(): AssetRecord[] {
    return Array.from(this.stored.values());
  }

  private download(absoluteUrl: string, pageUrl: string): Promise<string | null> {
    let pending = this.cache.get(absoluteUrl);
    if (!pending) {
      pending = this.fetchAndStore(absoluteUrl, pageUrl);
      this.cache.set(absoluteUrl, pending);
    }
    return pending;
  }

  private async fetchAndStore(absoluteUrl: string, pageUrl: string): Promise<string | null> {
    try {
      const res = await this.fetcher.asset(absoluteUrl);
      const localPath = assetLocalPath(absoluteUrl, pageUrl, res.contentType);

      let body: string | Buffer = res.body;
      if (isStylesheet(localPath, res.contentType)) {
        body = await this.rewriteStylesheet(res.body.toString('utf-8'), absoluteUrl, localPath, pageUrl);
      }

      await writeFileOverwrite(path.join(this.outputRoot, localPath), body);
      this.stored.set(absoluteUrl, { sourceUrl: absoluteUrl, localPath });
      return localPath;
    } catch (err) {
      console.warn(`[asset] fail ${absoluteUrl}: ${errorMessage(err)}`);
      return null;
    }
  }

  private async rewriteStylesheet(css: string, cssUrl: string, cssPath: string, pageUrl: string): Promise<string> {
    this.cssInProgress.add(cssUrl);
    try {
      return await rewriteCssUrls(css, cssUrl, async (absolute) => {
        if (this.cssInProgress.has(assetKey(new URL(absolute)))) return null;
        const local = await this.localize(absolute, pageUrl);
        return local ? encodeURI(relativeLink(cssPath, local.localPath)) + local.fragment : null;
      });
    } finally {
      this.cssInProgress.delete(cssUrl);
    }
  }
}
