/**
 * Record normalizer: turns a raw leaf (JSON mapping or HTML card) into a
 * DiscoveryRecord. Candidates without a headline, slug or url yield null.
 */

import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { DiscoveryRecord, HtmlSourceAdapter, JsonSourceAdapter, RawMap } from '../types/adapter';
import { MissingFieldError } from '../types/errors';
import { logger } from '../utils/logger';
import { readString } from './tools/document';
import { createSlugFromUrl, joinUrl, resolveUrl } from './tools/url';

export type Clock = () => Date;

export interface LeafFields {
  headline?: string | null;
  slug?: string | null;
  url?: string | null;
  lastPublishedAt?: string | null;
  heroImageUrl?: string | null;
}

function nonBlank(value: string | null | undefined): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

/**
 * @throws MissingFieldError when headline, slug or url is absent or blank
 */
export function buildDiscoveryRecord(fields: LeafFields, now: Clock = () => new Date()): DiscoveryRecord {
  const headline = nonBlank(fields.headline);
  if (!headline) throw new MissingFieldError('headline');
  const slug = nonBlank(fields.slug);
  if (!slug) throw new MissingFieldError('slug');
  const url = nonBlank(fields.url);
  if (!url) throw new MissingFieldError('url');

  return {
    slug,
    headline,
    url,
    last_published_at: nonBlank(fields.lastPublishedAt),
    hero_image_url: nonBlank(fields.heroImageUrl),
    scraped_at: now().toISOString()
  };
}

function tryBuild(fields: LeafFields, now: Clock, source: string): DiscoveryRecord | null {
  try {
    return buildDiscoveryRecord(fields, now);
  } catch (error) {
    if (error instanceof MissingFieldError) {
      logger.debug(`[${source}] Dropping candidate: ${error.message}`);
      return null;
    }
    throw error;
  }
}

export function jsonLeafFields(leaf: RawMap, adapter: JsonSourceAdapter): LeafFields {
  const slug = nonBlank(readString(leaf, adapter.fields.slug));
  const heroKey = nonBlank(readString(leaf, adapter.fields.heroImageKey));

  return {
    headline: readString(leaf, adapter.fields.headline),
    slug,
    url: slug ? joinUrl(adapter.storyBaseUrl, slug) : null,
    lastPublishedAt: readString(leaf, adapter.fields.publishedAt),
    heroImageUrl: heroKey ? joinUrl(adapter.mediaBaseUrl, heroKey) : null
  };
}

export function normalizeJsonLeaf(
  leaf: RawMap,
  adapter: JsonSourceAdapter,
  now: Clock = () => new Date()
): DiscoveryRecord | null {
  return tryBuild(jsonLeafFields(leaf, adapter), now, adapter.key);
}

export function htmlCardFields(card: Cheerio<Element>, adapter: HtmlSourceAdapter): LeafFields {
  const { listing } = adapter;
  const link = card.find(listing.headlineLink).first();
  const href = link.attr('href');
  const url = href ? resolveUrl(href, adapter.baseUrl) : null;
  const heroImage = card.find(listing.heroImage).first().attr(listing.heroImageAttr);

  return {
    headline: link.text().replace(/\s+/g, ' '),
    slug: url ? createSlugFromUrl(url) : null,
    url,
    lastPublishedAt: card.find(listing.time).first().attr(listing.timeAttr) ?? null,
    heroImageUrl: heroImage ? resolveUrl(heroImage, adapter.baseUrl) : null
  };
}

export function normalizeHtmlCard(
  card: Cheerio<Element>,
  adapter: HtmlSourceAdapter,
  now: Clock = () => new Date()
): DiscoveryRecord | null {
  return tryBuild(htmlCardFields(card, adapter), now, adapter.key);
}
