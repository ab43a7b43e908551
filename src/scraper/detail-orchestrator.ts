/**
 * Detail fetch orchestrator
 *
 * For each discovered story: fetch the detail page, extract body text and
 * image URLs, cache the images and the hero image locally, and merge the
 * detail fields over the discovery record. A failing story is logged and
 * skipped; the run carries on with the next one.
 */

import pLimit from 'p-limit';
import { DetailRecord, DiscoveryRecord, FullRecord, SourceAdapter } from '../types/adapter';
import { errorMessage, StructuralMismatchError, TransportError } from '../types/errors';
import { logger } from '../utils/logger';
import { extractDetail } from './detail-extractor';
import { MediaCache } from './media-cache';
import { createRateLimiter, createSequentialPacer, RateLimiter, Sleep } from './rate-limiter';
import { loadHtml } from './tools/document';
import { Fetcher } from './tools/fetcher';

export interface DetailFetchOptions {
  fetcher: Fetcher;
  mediaCache: MediaCache;
  /**
   * Pause between detail requests. Sequential runs wait this long after each
   * record; pools space request starts by it across all workers.
   */
  delayMs?: number;
  /** Detail pages fetched in parallel. Defaults to 1 (strictly sequential). */
  concurrency?: number;
  sleep?: Sleep;
}

export interface DetailFetchResult {
  stories: FullRecord[];
  failed: number;
}

/**
 * Detail values win over discovery values, except where the detail page
 * gave nothing for headline or publish time.
 */
export function mergeRecords(discovery: DiscoveryRecord, detail: DetailRecord): FullRecord {
  return {
    ...discovery,
    headline: detail.headline.trim() ? detail.headline : discovery.headline,
    last_published_at: detail.last_published_at?.trim() ? detail.last_published_at : discovery.last_published_at,
    description: detail.description,
    image_urls: detail.image_urls,
    local_images: detail.local_images,
    hero_image_local: detail.hero_image_local
  };
}

export class DetailFetchOrchestrator {
  private readonly fetcher: Fetcher;
  private readonly mediaCache: MediaCache;
  private readonly delayMs: number;
  private readonly concurrency: number;
  private readonly sleep?: Sleep;

  constructor(private readonly adapter: SourceAdapter, options: DetailFetchOptions) {
    this.fetcher = options.fetcher;
    this.mediaCache = options.mediaCache;
    this.delayMs = options.delayMs ?? 0;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.sleep = options.sleep;
  }

  async fetchAll(records: DiscoveryRecord[], limit?: number): Promise<FullRecord[]> {
    const { stories } = await this.fetchAllDetailed(records, limit);
    return stories;
  }

  async fetchAllDetailed(records: DiscoveryRecord[], limit?: number): Promise<DetailFetchResult> {
    const selected = limit !== undefined ? records.slice(0, Math.max(0, limit)) : records;
    const limiter = this.concurrency === 1
      ? createSequentialPacer(this.delayMs, this.sleep)
      : createRateLimiter(this.delayMs, this.sleep);
    const pool = pLimit(this.concurrency);

    const results = await Promise.all(
      selected.map((record, index) =>
        pool(() => this.processRecord(record, index, selected.length, limiter))
      )
    );

    const stories = results.filter((story): story is FullRecord => story !== null);
    return { stories, failed: selected.length - stories.length };
  }

  /**
   * Fetch, extract and cache media for one story.
   * @throws TransportError or StructuralMismatchError
   */
  async fetchOne(record: DiscoveryRecord): Promise<FullRecord> {
    const html = await this.fetcher.fetchText(record.url);
    const extracted = extractDetail(loadHtml(html), this.adapter, record);

    const subdir = this.adapter.imageSubdir;
    const localImages = await this.mediaCache.ensureAll(extracted.image_urls, record.slug, subdir);

    let heroImageLocal: string | null = null;
    if (record.hero_image_url) {
      heroImageLocal = await this.mediaCache.ensure(record.hero_image_url, record.slug, 'hero', subdir);
      if (heroImageLocal) {
        localImages.push(heroImageLocal);
      }
    }

    return mergeRecords(record, {
      ...extracted,
      local_images: localImages,
      hero_image_local: heroImageLocal
    });
  }

  private async processRecord(
    record: DiscoveryRecord,
    index: number,
    total: number,
    limiter: RateLimiter
  ): Promise<FullRecord | null> {
    await limiter.acquire();
    logger.info(`[${this.adapter.key}] Scraping story ${index + 1}/${total}: ${record.headline}`);

    try {
      return await this.fetchOne(record);
    } catch (error) {
      if (error instanceof TransportError || error instanceof StructuralMismatchError) {
        logger.warn(`[${this.adapter.key}] Failed to scrape details for "${record.headline}": ${error.message}`);
      } else {
        logger.error(`[${this.adapter.key}] Unexpected error scraping "${record.headline}": ${errorMessage(error)}`, error);
      }
      return null;
    }
  }
}
