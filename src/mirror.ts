import { Crawler, MAX_SELECTED_PAGES } from './crawler.js';
import { ConfigurationError } from './errors.js';
import type { Fetcher } from './http.js';
import { isPlatform } from './platforms/index.js';
import type { CrawlJob, CrawlMode, CrawlOptions, CrawlResult, DiscoverResult } from './types.js';
import { errorMessage } from './utils.js';

export type CrawlRequest = {
  startUrl: string;
  mode?: string;
  selectedPages?: string[];
  outputRoot: string;
  platform?: string;
};

function validateStartUrl(value: string): string {
  let u: URL;
  try {
    u = new URL(value);
  } catch {
    throw new ConfigurationError(`Invalid start URL: ${value}`);
  }
  if (u.protocol !== 'http:' && u.protocol !== 'https:') {
    throw new ConfigurationError(`Start URL must use http or https: ${value}`);
  }
  return u.toString();
}

function validateMode(value: string | undefined): CrawlMode {
  const mode = value ?? 'multi_page';
  if (mode !== 'single_page' && mode !== 'multi_page') {
    throw new ConfigurationError(`Unsupported scrape mode: ${mode}`);
  }
  return mode;
}

/**
 * Checks a request and turns it into a job. Everything here runs before any
 * network or filesystem access.
 */
export function validateJob(req: CrawlRequest, maxSelectedPages = MAX_SELECTED_PAGES): CrawlJob {
  const platform = req.platform ?? 'general';
  if (!isPlatform(platform)) throw new ConfigurationError(`Unsupported site type: ${platform}`);
  if (!req.outputRoot) throw new ConfigurationError('An output directory is required');

  const startUrl = validateStartUrl(req.startUrl);
  const mode = validateMode(req.mode);

  const job: CrawlJob = { startUrl, mode, outputRoot: req.outputRoot, platform };
  if (mode === 'multi_page' && req.selectedPages?.length) {
    if (req.selectedPages.length > maxSelectedPages) {
      throw new ConfigurationError(`Maximum ${maxSelectedPages} pages allowed for multi-page scraping`);
    }
    job.selectedPages = req.selectedPages.map(validateStartUrl);
  }
  return job;
}

function failedCrawl(req: CrawlRequest, message: string): CrawlResult {
  return {
    success: false,
    message,
    pageCount: 0,
    outputRoot: req.outputRoot,
    pages: [],
    pageMap: {},
    assetCount: 0,
    failedPages: []
  };
}

/**
 * Mirrors a site into `req.outputRoot`. Per-page and per-asset failures are
 * absorbed and show up in the page count; an invalid request comes back as
 * `success: false` without any fetch.
 */
export async function crawl(req: CrawlRequest, options: CrawlOptions = {}, fetcher?: Fetcher): Promise<CrawlResult> {
  let job: CrawlJob;
  try {
    job = validateJob(req, options.maxSelectedPages);
  } catch (err) {
    if (err instanceof ConfigurationError) return failedCrawl(req, err.message);
    throw err;
  }

  try {
    return await new Crawler(options, fetcher).mirror(job);
  } catch (err) {
    console.error(`[crawl] failed ${job.startUrl}:`, err);
    return failedCrawl(req, `Scraping failed: ${errorMessage(err)}`);
  }
}

/** Lists the pages reachable from `startUrl` without writing anything. */
export async function discover(
  startUrl: string,
  platform: string,
  options: CrawlOptions = {},
  fetcher?: Fetcher
): Promise<DiscoverResult> {
  let url: string;
  try {
    if (!isPlatform(platform)) throw new ConfigurationError(`Unsupported site type: ${platform}`);
    url = validateStartUrl(startUrl);
  } catch (err) {
    if (err instanceof ConfigurationError) return { success: false, message: err.message, pages: [] };
    throw err;
  }

  try {
    const pages = await new Crawler(options, fetcher).discover(url);
    return { success: true, message: `Found ${pages.length} pages`, pages };
  } catch (err) {
    console.error(`[discover] failed ${url}:`, err);
    return { success: false, message: `Page discovery failed: ${errorMessage(err)}`, pages: [] };
  }
}

export { Crawler } from './crawler.js';
export { ConfigurationError, TransportError } from './errors.js';
export { HttpClient } from './http.js';
export type { Fetcher, FetchedAsset, FetchedPage } from './http.js';
export { cleanPath, isInternal, relativeLink } from './paths.js';
export { PLATFORMS, createStripper, isPlatform } from './platforms/index.js';
export type { Platform, PlatformStripper } from './platforms/index.js';
export type * from './types.js';
