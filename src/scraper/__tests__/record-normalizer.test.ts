import { dailyStar } from '../../adapters/daily-star';
import { prothomAlo } from '../../adapters/prothom-alo';
import { RawMap } from '../../types/adapter';
import { MissingFieldError } from '../../types/errors';
import { buildDiscoveryRecord, normalizeHtmlCard, normalizeJsonLeaf } from '../record-normalizer';
import { loadHtml } from '../tools/document';

const now = () => new Date('2024-06-10T08:00:00.000Z');

describe('normalizeJsonLeaf', () => {
  it('maps hyphenated keys and builds absolute urls', () => {
    const leaf: RawMap = {
      headline: 'Exam results published',
      slug: 'education/exam-results',
      'last-published-at': 1718000000000,
      'hero-image-s3-key': 'prothomalo/2024-06/hero.jpg'
    };

    expect(normalizeJsonLeaf(leaf, prothomAlo, now)).toEqual({
      slug: 'education/exam-results',
      headline: 'Exam results published',
      url: 'https://www.prothomalo.com/education/exam-results',
      last_published_at: '1718000000000',
      hero_image_url: 'https://media.prothomalo.com/prothomalo/2024-06/hero.jpg',
      scraped_at: '2024-06-10T08:00:00.000Z'
    });
  });

  it('leaves hero_image_url null when the hero key is absent', () => {
    const record = normalizeJsonLeaf({ headline: 'No image', slug: 'no-image' }, prothomAlo, now);

    expect(record?.hero_image_url).toBeNull();
    expect(record?.last_published_at).toBeNull();
  });

  it.each<[string, RawMap]>([
    ['missing headline', { slug: 's1', 'hero-image-s3-key': 'a.jpg' }],
    ['missing slug', { headline: 'H1', 'last-published-at': 1 }],
    ['empty headline', { headline: '', slug: 's1' }],
    ['blank slug', { headline: 'H1', slug: '   ' }],
    ['null headline', { headline: null, slug: 's1' }],
    ['object slug', { headline: 'H1', slug: { value: 's1' } }]
  ])('returns null for %s', (_label, leaf) => {
    expect(normalizeJsonLeaf(leaf, prothomAlo, now)).toBeNull();
  });
});

describe('buildDiscoveryRecord', () => {
  it('throws MissingFieldError naming the field', () => {
    expect(() => buildDiscoveryRecord({ headline: 'H1', slug: 's1', url: '' })).toThrow(MissingFieldError);

    let captured: unknown = null;
    try {
      buildDiscoveryRecord({ slug: 's1', url: 'https://example.com/s1' });
    } catch (error) {
      captured = error;
    }
    expect(captured).toBeInstanceOf(MissingFieldError);
    expect(captured).toMatchObject({ field: 'headline' });
  });

  it('trims values', () => {
    const record = buildDiscoveryRecord(
      { headline: '  Spaced  ', slug: ' s1 ', url: 'https://example.com/s1', lastPublishedAt: '  ' },
      now
    );

    expect(record.headline).toBe('Spaced');
    expect(record.slug).toBe('s1');
    expect(record.last_published_at).toBeNull();
  });
});

describe('normalizeHtmlCard', () => {
  const listingHtml = `
    <div class="card">
      <div class="card-image">
        <a href="/news/bangladesh/education/hsc-results-3601234">
          <picture><img data-srcset="https://images.thedailystar.net/hsc.jpg" alt=""></picture>
        </a>
      </div>
      <h3 class="title"><a href="/news/bangladesh/education/hsc-results-3601234">  HSC results
        out today </a></h3>
      <time datetime="2024-06-10T10:00:00+06:00">1h ago</time>
    </div>
    <div class="card">
      <h3 class="title">No link here</h3>
    </div>
  `;

  it('reads headline, link, image and time from a card', () => {
    const $ = loadHtml(listingHtml);

    expect(normalizeHtmlCard($('div.card').first(), dailyStar, now)).toEqual({
      slug: 'hsc-results-3601234',
      headline: 'HSC results out today',
      url: 'https://www.thedailystar.net/news/bangladesh/education/hsc-results-3601234',
      last_published_at: '2024-06-10T10:00:00+06:00',
      hero_image_url: 'https://images.thedailystar.net/hsc.jpg',
      scraped_at: '2024-06-10T08:00:00.000Z'
    });
  });

  it('drops a card without a headline link', () => {
    const $ = loadHtml(listingHtml);

    expect(normalizeHtmlCard($('div.card').last(), dailyStar, now)).toBeNull();
  });
});
