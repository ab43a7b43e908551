/**
 * Scrape workflow: listing discovery, detail enrichment and persistence
 * for one source or for every registered source.
 */

import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import path from 'path';
import { getAdapter, listAdapterNames } from '../adapters';
import { loadEnvironmentConfig } from '../config/environment';
import {
  DiscoveryRecord,
  FullRecord,
  HtmlSourceAdapter,
  JsonSourceAdapter,
  SourceAdapter
} from '../types/adapter';
import { errorMessage, TransportError } from '../types/errors';
import { logger } from '../utils/logger';
import { dedupeBySlug } from './deduplicator';
import { DetailFetchOrchestrator } from './detail-orchestrator';
import { MediaCache } from './media-cache';
import { Sleep } from './rate-limiter';
import { Clock, normalizeHtmlCard, normalizeJsonLeaf } from './record-normalizer';
import { getPath, loadHtml, parseJsonScripts } from './tools/document';
import { Fetcher, HttpFetcher } from './tools/fetcher';
import { loadScrapeArtifact, saveScrapeArtifact } from './tools/persistence';
import { createDiscriminantRules, extractLeaves } from './tree-extractor';

export interface ScrapeOptions {
  maxStories?: number;
  fetcher?: Fetcher;
  dataDir?: string;
  delayMs?: number;
  concurrency?: number;
  /** Skip writing the artifact (dry runs and tests). */
  persist?: boolean;
  now?: Clock;
  sleep?: Sleep;
}

export interface ScrapeResult {
  source: string;
  name: string;
  discovered: number;
  stories: FullRecord[];
  failed: number;
  outputPath: string | null;
  duration: number;
}

export function discoverJsonStories(
  $: CheerioAPI,
  adapter: JsonSourceAdapter,
  now?: Clock
): DiscoveryRecord[] {
  const rules = createDiscriminantRules(adapter.rules);
  const records: DiscoveryRecord[] = [];

  for (const payload of parseJsonScripts($, adapter.listingUrl)) {
    const tree = getPath(payload, adapter.listingPath);
    if (tree === undefined) continue;

    for (const leaf of extractLeaves(tree, rules)) {
      const record = normalizeJsonLeaf(leaf, adapter, now);
      if (record) records.push(record);
    }
  }

  return records;
}

export function discoverHtmlStories(
  $: CheerioAPI,
  adapter: HtmlSourceAdapter,
  now?: Clock
): DiscoveryRecord[] {
  const records: DiscoveryRecord[] = [];

  $<Element, string>(adapter.listing.card).each((_, card) => {
    const record = normalizeHtmlCard($(card), adapter, now);
    if (record) records.push(record);
  });

  return records;
}

/** Parse a listing page into unique discovery records, first occurrence first. */
export function discoverStories(html: string, adapter: SourceAdapter, now?: Clock): DiscoveryRecord[] {
  const $ = loadHtml(html);
  const records = adapter.kind === 'json'
    ? discoverJsonStories($, adapter, now)
    : discoverHtmlStories($, adapter, now);

  const unique = dedupeBySlug(records);
  if (unique.length < records.length) {
    logger.debug(`[${adapter.key}] Removed ${records.length - unique.length} duplicate stories`);
  }
  return unique;
}

/** Save and read back the artifact; a failed write is logged and yields null. */
async function persistStories(
  adapter: SourceAdapter,
  stories: FullRecord[],
  dataDir: string,
  now?: Clock
): Promise<string | null> {
  let outputPath: string;
  try {
    outputPath = await saveScrapeArtifact(stories, { source: adapter.name, directory: dataDir, now });
  } catch (error) {
    logger.error(`[${adapter.key}] Failed to save stories to ${dataDir}: ${errorMessage(error)}`, error);
    return null;
  }

  const reloaded = await loadScrapeArtifact(outputPath);
  if (reloaded) {
    logger.info(`[${adapter.key}] Verified ${reloaded.story_count} saved stories in ${path.basename(outputPath)}`);
  } else {
    logger.warn(`[${adapter.key}] Saved artifact could not be read back: ${outputPath}`);
  }
  return outputPath;
}

export async function scrapeSource(adapter: SourceAdapter, options: ScrapeOptions = {}): Promise<ScrapeResult> {
  const startTime = Date.now();
  const config = loadEnvironmentConfig();
  const fetcher = options.fetcher ?? new HttpFetcher({
    timeoutMs: config.fetch.timeoutMs,
    retries: config.fetch.retries,
    headers: {
      'User-Agent': config.fetch.userAgent,
      'Accept-Language': config.fetch.acceptLanguage
    }
  });
  const dataDir = options.dataDir ?? config.scraper.dataDir;

  const result: ScrapeResult = {
    source: adapter.key,
    name: adapter.name,
    discovered: 0,
    stories: [],
    failed: 0,
    outputPath: null,
    duration: 0
  };

  logger.info(`[${adapter.key}] Scraping ${adapter.name}...`);

  let listingHtml: string;
  try {
    listingHtml = await fetcher.fetchText(adapter.listingUrl);
  } catch (error) {
    if (!(error instanceof TransportError)) throw error;
    logger.error(`[${adapter.key}] Failed to fetch listing page: ${error.message}`);
    result.duration = Date.now() - startTime;
    return result;
  }

  const discovered = discoverStories(listingHtml, adapter, options.now);
  result.discovered = discovered.length;

  if (discovered.length === 0) {
    logger.warn(`[${adapter.key}] No stories found. The site structure may have changed.`);
    result.duration = Date.now() - startTime;
    return result;
  }
  logger.info(`[${adapter.key}] Found ${discovered.length} stories`);

  const orchestrator = new DetailFetchOrchestrator(adapter, {
    fetcher,
    mediaCache: new MediaCache(dataDir, fetcher),
    delayMs: options.delayMs ?? config.scraper.requestDelayMs,
    concurrency: options.concurrency ?? config.scraper.concurrencyLimit,
    sleep: options.sleep
  });

  const { stories, failed } = await orchestrator.fetchAllDetailed(discovered, options.maxStories);
  result.stories = stories;
  result.failed = failed;

  if (stories.length > 0 && options.persist !== false) {
    result.outputPath = await persistStories(adapter, stories, dataDir, options.now);
  } else if (stories.length === 0) {
    logger.warn(`[${adapter.key}] No detailed stories found.`);
  }

  result.duration = Date.now() - startTime;
  logger.info(`[${adapter.key}] Scraped ${stories.length} stories (${failed} failed) in ${result.duration}ms`);
  return result;
}

/**
 * @throws ConfigurationError for an unknown source name
 */
export async function runScrape(sourceName: string, options: ScrapeOptions = {}): Promise<ScrapeResult> {
  return scrapeSource(getAdapter(sourceName), options);
}

/** Scrape every registered source; one failing source does not stop the rest. */
export async function runScrapeAll(options: ScrapeOptions = {}): Promise<ScrapeResult[]> {
  const results: ScrapeResult[] = [];

  for (const name of listAdapterNames()) {
    const adapter = getAdapter(name);
    try {
      results.push(await scrapeSource(adapter, options));
    } catch (error) {
      logger.error(`[${name}] Error scraping source: ${errorMessage(error)}`, error);
      results.push({
        source: adapter.key,
        name: adapter.name,
        discovered: 0,
        stories: [],
        failed: 0,
        outputPath: null,
        duration: 0
      });
    }
  }

  return results;
}
