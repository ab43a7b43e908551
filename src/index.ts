export * from './types/adapter';
export * from './types/errors';
export { getAdapter, listAdapterNames, registerAdapter, dailyStar, prothomAlo } from './adapters';
export { createDiscriminantRules, extractLeaves } from './scraper/tree-extractor';
export { buildDiscoveryRecord, normalizeHtmlCard, normalizeJsonLeaf } from './scraper/record-normalizer';
export { dedupeBySlug } from './scraper/deduplicator';
export { MediaCache, resolveExtension } from './scraper/media-cache';
export { DetailFetchOrchestrator, mergeRecords } from './scraper/detail-orchestrator';
export type { DetailFetchOptions, DetailFetchResult } from './scraper/detail-orchestrator';
export { createRateLimiter } from './scraper/rate-limiter';
export { discoverStories, runScrape, runScrapeAll, scrapeSource } from './scraper/runScrape';
export type { ScrapeOptions, ScrapeResult } from './scraper/runScrape';
export { HttpFetcher } from './scraper/tools/fetcher';
export type { Fetcher, HttpFetcherOptions } from './scraper/tools/fetcher';
export { loadScrapeArtifact, saveScrapeArtifact } from './scraper/tools/persistence';
export type { ScrapeArtifact } from './scraper/tools/persistence';
