import { JsonSourceAdapter } from '../types/adapter';

const BASE_URL = 'https://www.prothomalo.com';

// Quintype-style site: stories live in the page's embedded `qt` payload,
// nested inside collections of arbitrary depth.
export const prothomAlo: JsonSourceAdapter = {
  kind: 'json',
  key: 'prothom_alo',
  name: 'Prothom Alo Education',
  baseUrl: BASE_URL,
  listingUrl: `${BASE_URL}/education`,
  storyBaseUrl: BASE_URL,
  mediaBaseUrl: 'https://media.prothomalo.com/',
  rules: {
    discriminantKey: 'type',
    collectionMarker: 'collection',
    itemsKey: 'items',
    leafMarker: 'story',
    wrapperKey: 'story'
  },
  fields: {
    headline: 'headline',
    slug: 'slug',
    publishedAt: 'last-published-at',
    heroImageKey: 'hero-image-s3-key'
  },
  listingPath: ['qt', 'data'],
  detailPath: ['qt', 'data', 'story'],
  content: {
    cardsKey: 'cards',
    elementsKey: 'story-elements',
    typeKey: 'type',
    subtypeKey: 'subtype',
    textKey: 'text',
    textTypes: ['text', 'title'],
    imageType: 'image',
    imageKey: 'image-s3-key'
  }
};
