import { HtmlSourceAdapter } from '../types/adapter';

const BASE_URL = 'https://www.thedailystar.net';

export const dailyStar: HtmlSourceAdapter = {
  kind: 'html',
  key: 'daily_star',
  name: 'The Daily Star - Education',
  baseUrl: BASE_URL,
  listingUrl: `${BASE_URL}/tags/education`,
  imageSubdir: 'daily_star',
  listing: {
    card: 'div.card',
    headlineLink: 'h3.title a',
    heroImage: 'div.card-image a picture img',
    heroImageAttr: 'data-srcset',
    time: 'time',
    timeAttr: 'datetime'
  },
  detail: {
    article: 'article.article-section',
    headline: 'h1.article-title',
    time: 'time',
    timeAttr: 'datetime',
    media: 'div.section-media',
    mediaImage: 'span.lg-gallery picture img',
    mediaImageAttr: 'data-srcset',
    body: 'div.clearfix',
    // Classed paragraphs are captions, bylines and promos
    paragraph: 'p:not([class])'
  }
};
