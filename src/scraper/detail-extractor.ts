/**
 * Detail page extraction for both adapter kinds.
 *
 * JSON sources: the story node is taken from the embedded payload at the
 * adapter's detail path, falling back to a tree search with the listing's
 * discriminant rules for the leaf carrying the record's slug. Body text and
 * images come from the story's content cards; only elements whose subtype is
 * explicitly null count.
 *
 * HTML sources: a fixed selector chain under the article container.
 */

import type { CheerioAPI } from 'cheerio';
import {
  DiscoveryRecord,
  HtmlSourceAdapter,
  JsonContentRules,
  JsonSourceAdapter,
  RawMap,
  RawNode,
  SourceAdapter
} from '../types/adapter';
import { StructuralMismatchError } from '../types/errors';
import { getPath, isRawMap, parseJsonScripts, readString, stripTags } from './tools/document';
import { joinUrl, resolveUrl } from './tools/url';
import { createDiscriminantRules, extractLeaves } from './tree-extractor';

export interface ExtractedDetail {
  headline: string;
  last_published_at: string | null;
  description: string;
  image_urls: string[];
}

export const PARAGRAPH_SEPARATOR = '\n\n';

export function joinFragments(fragments: string[]): string {
  return fragments
    .map(fragment => fragment.trim())
    .filter(Boolean)
    .join(PARAGRAPH_SEPARATOR)
    .trim();
}

function asList(node: RawNode | undefined): RawNode[] {
  return Array.isArray(node) ? node : [];
}

export function extractContentFromCards(
  cards: RawNode | undefined,
  rules: JsonContentRules,
  mediaBaseUrl: string
): { description: string; imageUrls: string[] } {
  const fragments: string[] = [];
  const imageUrls: string[] = [];

  for (const card of asList(cards)) {
    if (!isRawMap(card)) continue;

    for (const element of asList(card[rules.elementsKey])) {
      // Missing subtype is not the plain sentinel; only an explicit null is
      if (!isRawMap(element) || element[rules.subtypeKey] !== null) continue;

      const type = readString(element, rules.typeKey) ?? '';
      if (rules.textTypes.includes(type)) {
        const text = readString(element, rules.textKey);
        if (text) fragments.push(stripTags(text));
      } else if (type === rules.imageType) {
        const key = readString(element, rules.imageKey);
        if (key) imageUrls.push(joinUrl(mediaBaseUrl, key));
      }
    }
  }

  return { description: joinFragments(fragments), imageUrls };
}

export function locateStoryNode(
  payloads: RawNode[],
  adapter: JsonSourceAdapter,
  slug?: string
): RawMap | null {
  for (const payload of payloads) {
    const node = getPath(payload, adapter.detailPath);
    if (isRawMap(node)) return node;
  }

  // Detail payloads embed related stories too; only this record's own leaf counts
  if (!slug) return null;
  const rules = createDiscriminantRules(adapter.rules);
  for (const payload of payloads) {
    const match = extractLeaves(payload, rules).find(leaf => readString(leaf, adapter.fields.slug) === slug);
    if (match) return match;
  }
  return null;
}

export function extractJsonDetail(
  $: CheerioAPI,
  adapter: JsonSourceAdapter,
  record: DiscoveryRecord
): ExtractedDetail {
  const payloads = parseJsonScripts($, record.url);
  const story = locateStoryNode(payloads, adapter, record.slug);
  if (!story) {
    throw new StructuralMismatchError(record.url, 'embedded story payload');
  }

  const { description, imageUrls } = extractContentFromCards(
    story[adapter.content.cardsKey],
    adapter.content,
    adapter.mediaBaseUrl
  );

  return {
    headline: (readString(story, adapter.fields.headline) ?? '').trim(),
    last_published_at: readString(story, adapter.fields.publishedAt),
    description,
    image_urls: imageUrls
  };
}

export function extractHtmlDetail(
  $: CheerioAPI,
  adapter: HtmlSourceAdapter,
  record: DiscoveryRecord
): ExtractedDetail {
  const selectors = adapter.detail;
  const article = $(selectors.article).first();
  if (article.length === 0) {
    throw new StructuralMismatchError(record.url, `"${selectors.article}"`);
  }

  const imageUrls: string[] = [];
  article
    .find(selectors.media)
    .first()
    .find(selectors.mediaImage)
    .each((_, element) => {
      const src = $(element).attr(selectors.mediaImageAttr);
      const url = src ? resolveUrl(src, adapter.baseUrl) : null;
      if (url) imageUrls.push(url);
    });

  const paragraphs = article
    .find(selectors.body)
    .first()
    .find(selectors.paragraph)
    .map((_, element) => $(element).text())
    .get();

  return {
    headline: article.find(selectors.headline).first().text().replace(/\s+/g, ' ').trim(),
    last_published_at: article.find(selectors.time).first().attr(selectors.timeAttr) ?? null,
    description: joinFragments(paragraphs),
    image_urls: imageUrls
  };
}

export function extractDetail(
  $: CheerioAPI,
  adapter: SourceAdapter,
  record: DiscoveryRecord
): ExtractedDetail {
  return adapter.kind === 'json'
    ? extractJsonDetail($, adapter, record)
    : extractHtmlDetail($, adapter, record);
}
