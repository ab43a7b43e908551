// Record and adapter shapes shared by the pipeline and the site adapters.
// Persisted record keys stay snake_case so saved artifacts match across versions.

export type RawScalar = string | number | boolean | null;
export type RawNode = RawScalar | RawNode[] | RawMap;
export interface RawMap {
  [key: string]: RawNode;
}

export interface DiscoveryRecord {
  slug: string;                       // Dedup key; also the media directory name
  headline: string;
  url: string;                        // Absolute link to the story detail page
  last_published_at: string | null;   // ISO 8601 or the site's own timestamp string
  hero_image_url: string | null;
  scraped_at: string;                 // ISO 8601, set when the record is created
}

export interface DetailRecord {
  headline: string;
  last_published_at: string | null;
  description: string;
  image_urls: string[];
  local_images: string[];
  hero_image_local: string | null;
}

export type FullRecord = DiscoveryRecord & Omit<DetailRecord, 'headline' | 'last_published_at'>;

/**
 * Classifies tree nodes for the extractor. Built from a
 * DiscriminantConfig by createDiscriminantRules.
 */
export interface DiscriminantRules {
  isCollection(node: RawMap): boolean;
  isLeaf(node: RawMap): boolean;
  /** Collection members to descend into; only called when isCollection holds. */
  items(node: RawMap): RawNode;
  /** The leaf payload, one wrapper level removed when present. */
  unwrap(node: RawMap): RawMap;
}

export interface DiscriminantConfig {
  discriminantKey: string;
  collectionMarker: string;
  itemsKey: string;
  leafMarker: string;
  wrapperKey?: string;
}

interface SourceAdapterBase {
  /** Registry key, e.g. `prothom_alo`. */
  key: string;
  /** Human readable name written into saved artifacts. */
  name: string;
  baseUrl: string;
  listingUrl: string;
  /** Optional directory under images/ for this source's media. */
  imageSubdir?: string;
}

export interface JsonFieldMap {
  headline: string;
  slug: string;
  publishedAt: string;
  heroImageKey: string;
}

export interface JsonContentRules {
  cardsKey: string;
  elementsKey: string;
  typeKey: string;
  subtypeKey: string;
  textKey: string;
  textTypes: string[];
  imageType: string;
  imageKey: string;
}

export interface JsonSourceAdapter extends SourceAdapterBase {
  kind: 'json';
  storyBaseUrl: string;
  mediaBaseUrl: string;
  rules: DiscriminantConfig;
  fields: JsonFieldMap;
  /** Key path from a decoded script payload to the listing tree. */
  listingPath: string[];
  /** Key path from a decoded detail payload to the story node. */
  detailPath: string[];
  content: JsonContentRules;
}

export interface HtmlListingSelectors {
  card: string;
  headlineLink: string;
  heroImage: string;
  heroImageAttr: string;
  time: string;
  timeAttr: string;
}

export interface HtmlDetailSelectors {
  article: string;
  headline: string;
  time: string;
  timeAttr: string;
  media: string;
  mediaImage: string;
  mediaImageAttr: string;
  body: string;
  paragraph: string;
}

export interface HtmlSourceAdapter extends SourceAdapterBase {
  kind: 'html';
  listing: HtmlListingSelectors;
  detail: HtmlDetailSelectors;
}

export type SourceAdapter = JsonSourceAdapter | HtmlSourceAdapter;
