import path from 'node:path';
import { AssetFetcher } from './assets.js';
import { HttpClient, DEFAULT_USER_AGENT } from './http.js';
import type { Fetcher, FetchedPage } from './http.js';
import { cleanPath, normalizePageUrl } from './paths.js';
import { createStripper } from './platforms/index.js';
import type { PlatformStripper } from './platforms/index.js';
import { extractLinks, loadHtml, pageTitle, rewritePage } from './rewriter.js';
import { writeFileOverwrite } from './storage.js';
import type { CrawlJob, CrawlOptions, CrawlResult, DiscoveredPage, PageRecord, PageState } from './types.js';
import { errorMessage } from './utils.js';

export const MAX_PAGES = 150;
export const MAX_SELECTED_PAGES = 25;
export const DISCOVERY_MAX_DEPTH = 3;
export const DISCOVERY_FAN_OUT = 10;

type QueueEntry = {
  url: string; // URL to request
  key: string; // visited-set key
  depth: number;
};

type MirrorState = {
  job: CrawlJob;
  assets: AssetFetcher;
  stripper: PlatformStripper;
};

function isHtml(contentType?: string): boolean {
  if (!contentType) return true;
  const lower = contentType.toLowerCase();
  return lower.includes('text/html') || lower.includes('application/xhtml');
}

/**
 * Frontier plus cycle guard for one traversal. A URL is marked visited when
 * it is enqueued, so it is fetched at most once no matter how often it is linked.
 */
class Frontier {
  private queue: QueueEntry[] = [];
  private entries = new Map<string, { url: string; state: PageState }>();

  constructor(private capacity: number) {}

  get size(): number {
    return this.entries.size;
  }

  has(url: string): boolean {
    return this.entries.has(url);
  }

  /** Returns false when the URL was already seen or the ceiling is reached. */
  enqueue(url: string, depth = 0): boolean {
    let key: string;
    try {
      key = normalizePageUrl(url);
    } catch {
      return false;
    }
    if (this.entries.has(key)) return false;
    if (this.entries.size >= this.capacity) return false;
    this.entries.set(key, { url, state: 'queued' });
    this.queue.push({ url, key, depth });
    return true;
  }

  next(): QueueEntry | undefined {
    return this.queue.shift();
  }

  mark(key: string, state: PageState) {
    const entry = this.entries.get(key);
    if (entry) entry.state = state;
  }

  /** URLs currently in `state`, in enqueue order. */
  urlsIn(state: PageState): string[] {
    const urls: string[] = [];
    for (const entry of this.entries.values()) {
      if (entry.state === state) urls.push(entry.url);
    }
    return urls;
  }
}

export class Crawler {
  private cfg: Required<CrawlOptions>;
  private fetcher: Fetcher;

  constructor(opts: CrawlOptions = {}, fetcher?: Fetcher) {
    this.cfg = {
      maxPages: opts.maxPages ?? MAX_PAGES,
      maxSelectedPages: opts.maxSelectedPages ?? MAX_SELECTED_PAGES,
      discoveryMaxDepth: opts.discoveryMaxDepth ?? DISCOVERY_MAX_DEPTH,
      discoveryFanOut: opts.discoveryFanOut ?? DISCOVERY_FAN_OUT,
      assetConcurrency: opts.assetConcurrency ?? 4,
      timeoutMs: opts.timeoutMs ?? 30000,
      userAgent: opts.userAgent ?? DEFAULT_USER_AGENT
    };
    this.fetcher =
      fetcher ??
      new HttpClient({
        userAgent: this.cfg.userAgent,
        timeoutMs: this.cfg.timeoutMs,
        concurrency: this.cfg.assetConcurrency
      });
  }

  /** Enumerates pages without writing anything. */
  async discover(startUrl: string): Promise<DiscoveredPage[]> {
    const frontier = new Frontier(Number.POSITIVE_INFINITY);
    const pages: DiscoveredPage[] = [];
    frontier.enqueue(startUrl);

    for (let entry = frontier.next(); entry; entry = frontier.next()) {
      frontier.mark(entry.key, 'fetching');
      const fetched = await this.fetchPage(entry.url, '[discover]');
      if (!fetched) {
        frontier.mark(entry.key, 'skipped_error');
        continue;
      }

      const $ = loadHtml(fetched.body);
      pages.push({ url: entry.url, title: pageTitle($, entry.url), path: cleanPath(entry.url) });
      frontier.mark(entry.key, 'written');
      console.log(`[discover] found ${entry.url} (depth ${entry.depth})`);

      if (entry.depth >= this.cfg.discoveryMaxDepth) continue;
      const fresh = extractLinks($, fetched.url).filter((l) => !frontier.has(l));
      for (const link of fresh.slice(0, this.cfg.discoveryFanOut)) {
        frontier.enqueue(link, entry.depth + 1);
      }
    }

    console.log(`[discover] pages: ${pages.length}, skipped: ${frontier.urlsIn('skipped_error').length}`);
    return pages;
  }

  /** Writes a browsable copy of the job's pages under `job.outputRoot`. */
  async mirror(job: CrawlJob): Promise<CrawlResult> {
    const selection = job.mode === 'multi_page' && job.selectedPages?.length ? job.selectedPages : null;
    const follow = job.mode === 'multi_page' && !selection;
    const capacity = follow ? this.cfg.maxPages : selection ? this.cfg.maxSelectedPages : 1;

    const state: MirrorState = {
      job,
      assets: new AssetFetcher(this.fetcher, job.outputRoot),
      stripper: createStripper(job.platform)
    };
    const frontier = new Frontier(capacity);
    const pages: PageRecord[] = [];
    const pageMap: Record<string, string> = {};

    for (const url of selection ?? [job.startUrl]) {
      if (!frontier.enqueue(url)) console.warn(`[crawl] skip duplicate ${url}`);
    }

    for (let entry = frontier.next(); entry; entry = frontier.next()) {
      frontier.mark(entry.key, 'fetching');
      const out = await this.mirrorPage(entry.url, state);
      if (!out) {
        frontier.mark(entry.key, 'skipped_error');
        continue;
      }

      frontier.mark(entry.key, 'written');
      pages.push(out.record);
      pageMap[entry.url] = out.record.localPath;
      console.log(`[crawl] saved ${out.record.localPath} (${pages.length}/${capacity}, ${state.stripper.label})`);

      if (!follow) continue;
      for (const link of out.links) frontier.enqueue(link);
    }

    if (follow && frontier.size >= capacity) {
      console.warn(`[crawl] reached page limit (${capacity}), stopping`);
    }

    const failedPages = frontier.urlsIn('skipped_error');
    const assetCount = state.assets.records().length;
    console.log(`[crawl] pages: ${pages.length}, assets: ${assetCount}, failed: ${failedPages.length}`);
    return {
      success: true,
      message: `Mirrored ${pages.length} page(s) from ${job.startUrl}`,
      pageCount: pages.length,
      outputRoot: job.outputRoot,
      pages,
      pageMap,
      assetCount,
      failedPages
    };
  }

  private async mirrorPage(url: string, state: MirrorState): Promise<{ record: PageRecord; links: string[] } | null> {
    const fetched = await this.fetchPage(url, '[crawl]');
    if (!fetched) return null;

    const localPath = cleanPath(url);
    const page = await rewritePage(fetched.body, {
      pageUrl: url,
      baseUrl: fetched.url,
      assets: state.assets,
      stripper: state.stripper
    });

    try {
      await writeFileOverwrite(path.join(state.job.outputRoot, localPath), page.html);
    } catch (err) {
      console.warn(`[crawl] write failed ${localPath}: ${errorMessage(err)}`);
      return null;
    }
    return { record: { url, localPath, title: page.title }, links: page.links };
  }

  private async fetchPage(url: string, tag: string): Promise<FetchedPage | null> {
    let fetched: FetchedPage;
    try {
      fetched = await this.fetcher.page(url);
    } catch (err) {
      console.warn(`${tag} skip ${url}: ${errorMessage(err)}`);
      return null;
    }
    if (!isHtml(fetched.contentType)) {
      console.warn(`${tag} skip ${url}: not html (${fetched.contentType})`);
      return null;
    }
    return fetched;
  }
}
