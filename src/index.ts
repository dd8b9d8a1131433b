#!/usr/bin/env node
import 'dotenv/config';
import path from 'node:path';
import { crawl, discover } from './mirror.js';
import { outputRoot } from './paths.js';
import { PLATFORMS } from './platforms/index.js';
import { readJson, writeJson } from './storage.js';
import type { CrawlOptions } from './types.js';

type Command = 'crawl' | 'discover' | 'help';

function parseCommand(value: string | undefined): Command {
  return value === 'crawl' || value === 'discover' ? value : 'help';
}

function getFlag(name: string, short?: string): string | undefined {
  const argv = process.argv.slice(3);
  for (const flag of short ? [`--${name}`, `-${short}`] : [`--${name}`]) {
    const idx = argv.indexOf(flag);
    if (idx >= 0 && argv[idx + 1]) return argv[idx + 1];
    const inline = argv.find((a) => a.startsWith(`${flag}=`));
    if (inline) return inline.slice(flag.length + 1);
  }
  return undefined;
}

function envInt(name: string, fallback: number): number {
  const n = parseInt(process.env[name] || String(fallback), 10);
  return Number.isFinite(n) ? n : fallback;
}

function crawlOptions(): CrawlOptions {
  return {
    maxPages: envInt('MAX_PAGES', 150),
    assetConcurrency: envInt('ASSET_CONCURRENCY', 4),
    timeoutMs: envInt('TIMEOUT_MS', 30000),
    userAgent: process.env.USER_AGENT || undefined
  };
}

function hostDir(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return 'site';
  }
}

function selectedPages(): string[] | undefined {
  const inline = getFlag('pages');
  if (inline) {
    return inline
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
  const file = getFlag('pages-file');
  if (!file) return undefined;
  // accepts a plain URL list or the page list `discover` saves
  const listed = readJson<unknown>(path.resolve(file), []);
  if (!Array.isArray(listed)) return [];
  const urls: string[] = [];
  for (const entry of listed) {
    if (typeof entry === 'string') urls.push(entry);
    else if (entry && typeof entry === 'object' && 'url' in entry && typeof entry.url === 'string') urls.push(entry.url);
  }
  return urls;
}

async function main() {
  switch (parseCommand(process.argv[2])) {
    case 'crawl':
      await runCrawl();
      break;
    case 'discover':
      await runDiscover();
      break;
    case 'help':
    default:
      printHelp();
  }
}

async function runCrawl() {
  const url = getFlag('url', 'u') || process.env.START_URL;
  if (!url) {
    printHelp();
    process.exitCode = 1;
    return;
  }
  const platform = getFlag('platform', 'p') || process.env.PLATFORM || 'general';
  const out = path.resolve(getFlag('out', 'o') || path.join(outputRoot(), hostDir(url)));

  console.log(`[crawl] start: ${url} (${platform}) -> ${out}`);
  const res = await crawl(
    {
      startUrl: url,
      mode: getFlag('mode', 'm') || process.env.SCRAPE_MODE,
      selectedPages: selectedPages(),
      outputRoot: out,
      platform
    },
    crawlOptions()
  );

  if (!res.success) {
    console.error(`[crawl] ${res.message}`);
    process.exitCode = 1;
    return;
  }
  console.log(`[crawl] ${res.message}`);
  console.log(`[crawl] pages: ${res.pageCount}, assets: ${res.assetCount}, failed: ${res.failedPages.length}`);
  console.log(`[crawl] output: ${res.outputRoot}`);
}

async function runDiscover() {
  const url = getFlag('url', 'u') || process.env.START_URL;
  if (!url) {
    printHelp();
    process.exitCode = 1;
    return;
  }
  const platform = getFlag('platform', 'p') || process.env.PLATFORM || 'general';

  console.log(`[discover] start: ${url} (${platform})`);
  const res = await discover(url, platform, crawlOptions());
  if (!res.success) {
    console.error(`[discover] ${res.message}`);
    process.exitCode = 1;
    return;
  }

  const file = path.join(outputRoot(), `pages-${hostDir(url)}.json`);
  writeJson(file, res.pages);
  for (const p of res.pages) console.log(`  ${p.path}  ${p.title}`);
  console.log(`[discover] ${res.message}; saved: ${file}`);
  console.log(`[discover] mirror a selection with: crawl --url ${url} --pages-file ${path.relative(process.cwd(), file)}`);
}

function printHelp() {
  console.log('Usage:');
  console.log('  site-mirror discover --url <url> [--platform <p>]');
  console.log('  site-mirror crawl --url <url> [--platform <p>] [--mode single_page|multi_page]');
  console.log('                    [--pages <url,url>] [--pages-file <json>] [--out <dir>]');
  console.log(`Platforms: ${PLATFORMS.join(', ')}`);
  console.log('Env:');
  console.log('  START_URL=... SCRAPE_MODE=multi_page PLATFORM=general');
  console.log('  OUTPUT_ROOT=./mirrors MAX_PAGES=150');
  console.log('  ASSET_CONCURRENCY=4 TIMEOUT_MS=30000 USER_AGENT=...');
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
