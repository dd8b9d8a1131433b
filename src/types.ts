import type { Platform } from './platforms/index.js';

export type CrawlMode = 'single_page' | 'multi_page';

export type CrawlJob = {
  startUrl: string;
  mode: CrawlMode;
  selectedPages?: string[]; // when set (multi_page), exactly the pages to mirror
  outputRoot: string;
  platform: Platform;
};

export type CrawlOptions = {
  maxPages?: number; // ceiling for unrestricted multi_page mirroring
  maxSelectedPages?: number; // ceiling for an explicit page selection
  discoveryMaxDepth?: number;
  discoveryFanOut?: number; // links followed per page while discovering
  assetConcurrency?: number;
  timeoutMs?: number;
  userAgent?: string;
};

export type PageRecord = {
  url: string;
  localPath: string; // clean path, relative to outputRoot
  title: string;
};

export type DiscoveredPage = {
  url: string;
  title: string;
  path: string; // clean path
};

export type AssetRecord = {
  sourceUrl: string;
  localPath: string; // relative to outputRoot
};

// A duplicate link never re-enters the queue, so it has no state of its own.
export type PageState = 'queued' | 'fetching' | 'written' | 'skipped_error';

export type CrawlResult = {
  success: boolean;
  message: string;
  pageCount: number;
  outputRoot: string;
  pages: PageRecord[];
  pageMap: Record<string, string>; // page URL -> clean path
  assetCount: number;
  failedPages: string[];
};

export type DiscoverResult = {
  success: boolean;
  message: string;
  pages: DiscoveredPage[];
};
