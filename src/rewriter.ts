import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { AssetFetcher } from './assets.js';
import { rewriteCssUrls } from './css.js';
import { cleanPath, isInternal, isSkippableHref, normalizePageUrl, pageNameFromUrl, relativeLink } from './paths.js';
import type { PlatformStripper } from './platforms/index.js';
import { ensureAbsoluteUrl, textClean } from './utils.js';

export type RewriteContext = {
  pageUrl: string; // URL the page was requested under; decides its clean path
  baseUrl?: string; // final URL after redirects; relative references resolve against it
  assets: AssetFetcher;
  stripper: PlatformStripper;
};

export type RewrittenPage = {
  html: string;
  title: string;
  links: string[]; // internal page URLs in document order, normalized
};

// Attributes holding a single asset URL.
const ASSET_ATTRIBUTES: [selector: string, attr: string][] = [
  ['link[rel~="stylesheet"][href]', 'href'],
  ['link[rel~="icon"][href]', 'href'],
  ['script[src]', 'src'],
  ['img[src]', 'src'],
  ['source[src]', 'src'],
  ['video[src]', 'src'],
  ['video[poster]', 'poster'],
  ['audio[src]', 'src']
];

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Best-effort textual pass: turns literal `https://host/...`, `http://host/...`
 * and `//host/...` strings for the page's own host into root-relative `/...`.
 * The DOM pass that follows is the one that decides the final hrefs.
 */
export function normalizeAbsoluteUrls(html: string, pageUrl: string): string {
  let host: string;
  try {
    host = new URL(pageUrl).host;
  } catch {
    return html;
  }
  const pattern = new RegExp(`(?:https?:)?//${escapeRegExp(host)}(?![\\w.:@-])/?`, 'gi');
  return html.replace(pattern, '/');
}

export function loadHtml(html: string): CheerioAPI {
  const isDocument = /<(html|head|body)[\s>]/i.test(html);
  return cheerio.load(html, undefined, isDocument);
}

export function pageTitle($: CheerioAPI, url: string): string {
  return textClean($('title').first().text()) || pageNameFromUrl(url);
}

/** Same-host page links in document order, without query or fragment, each listed once. */
export function extractLinks($: CheerioAPI, baseUrl: string): string[] {
  const host = new URL(baseUrl).host;
  const links: string[] = [];
  const seen = new Set<string>();
  $('a[href]').each((_, el) => {
    const href = $(el).attr('href') ?? '';
    if (!isInternal(href, baseUrl)) return;
    const abs = ensureAbsoluteUrl(baseUrl, href);
    if (!abs || new URL(abs).host !== host) return;
    const normalized = normalizePageUrl(abs);
    if (seen.has(normalized)) return;
    seen.add(normalized);
    links.push(normalized);
  });
  return links;
}

function rewriteHyperlinks($: CheerioAPI, baseUrl: string, currentPath: string) {
  const host = new URL(baseUrl).host;
  $('a[href]').each((_, el) => {
    const href = $(el).attr('href') ?? '';
    if (isSkippableHref(href) || !isInternal(href, baseUrl)) return;
    const abs = ensureAbsoluteUrl(baseUrl, href);
    if (!abs) return;
    const target = new URL(abs);
    if (target.host !== host) return;
    $(el).attr('href', relativeLink(currentPath, cleanPath(abs)) + target.hash);
  });
}

async function rewriteAssets($: CheerioAPI, ctx: RewriteContext, currentPath: string) {
  const baseUrl = ctx.baseUrl ?? ctx.pageUrl;

  // Local path of the asset as seen from this page, or null when it stays remote.
  const localHref = async (value: string): Promise<string | null> => {
    const local = await ctx.assets.localize(value, baseUrl);
    return local ? encodeURI(relativeLink(currentPath, local.localPath)) + local.fragment : null;
  };

  const tasks: Promise<void>[] = [];

  for (const [selector, attr] of ASSET_ATTRIBUTES) {
    $(selector).each((_, el) => {
      const value = $(el).attr(attr);
      if (!value) return;
      tasks.push(
        localHref(value).then((next) => {
          if (next) $(el).attr(attr, next);
        })
      );
    });
  }

  $('img[srcset], source[srcset]').each((_, el) => {
    const srcset = $(el).attr('srcset');
    if (!srcset) return;
    // candidates are separated by a comma plus whitespace; a bare comma belongs to the URL
    const candidates = srcset
      .split(/,\s+/)
      .map((part) => part.trim())
      .filter(Boolean);
    tasks.push(
      Promise.all(
        candidates.map(async (candidate) => {
          const [url, ...descriptor] = candidate.split(/\s+/);
          const next = await localHref(url);
          return next ? [next, ...descriptor].join(' ') : null;
        })
      ).then((parts) => {
        if (parts.every((p) => p === null)) return;
        $(el).attr('srcset', parts.map((p, i) => p ?? candidates[i]).join(', '));
      })
    );
  });

  const resolveCss = async (absolute: string) => localHref(absolute);

  $('style').each((_, el) => {
    const css = $(el).text();
    if (!css.includes('url(') && !css.includes('@import')) return;
    tasks.push(
      rewriteCssUrls(css, baseUrl, resolveCss).then((next) => {
        if (next !== css) $(el).text(next);
      })
    );
  });

  $('[style*="url("]').each((_, el) => {
    const inline = $(el).attr('style') ?? '';
    tasks.push(
      rewriteCssUrls(inline, baseUrl, resolveCss).then((next) => {
        if (next !== inline) $(el).attr('style', next);
      })
    );
  });

  await Promise.all(tasks);
}

/**
 * Turns a fetched page into its offline form: internal links point at the
 * other mirrored pages, assets are downloaded and referenced locally, and
 * the platform's badges are stripped last.
 */
export async function rewritePage(html: string, ctx: RewriteContext): Promise<RewrittenPage> {
  const baseUrl = ctx.baseUrl ?? ctx.pageUrl;
  const currentPath = cleanPath(ctx.pageUrl);

  const normalized = normalizeAbsoluteUrls(html, baseUrl);
  const $ = loadHtml(normalized);
  const title = pageTitle($, ctx.pageUrl);
  const links = extractLinks($, baseUrl);

  rewriteHyperlinks($, baseUrl, currentPath);
  await rewriteAssets($, ctx, currentPath);
  ctx.stripper.stripBadge($);

  return { html: $.html(), title, links };
}
