import { createSlugFromUrl, joinUrl, resolveUrl, urlPath } from '../url';

describe('url helpers', () => {
  it('joins with exactly one slash', () => {
    expect(joinUrl('https://media.prothomalo.com/', '/a/b.jpg')).toBe('https://media.prothomalo.com/a/b.jpg');
    expect(joinUrl('https://www.prothomalo.com', 'education/s1')).toBe('https://www.prothomalo.com/education/s1');
  });

  it('resolves relative links against the base', () => {
    expect(resolveUrl('/news/s1', 'https://www.thedailystar.net')).toBe('https://www.thedailystar.net/news/s1');
    expect(resolveUrl('https://cdn.example.com/x.jpg', 'https://www.thedailystar.net')).toBe('https://cdn.example.com/x.jpg');
    expect(resolveUrl('/relative', 'not a base')).toBeNull();
  });

  it('drops query strings and fragments from paths', () => {
    expect(urlPath('https://x.example/a/b.jpg?w=100#top')).toBe('/a/b.jpg');
    expect(urlPath('a/b.png?w=1')).toBe('a/b.png');
  });

  it('takes the last non-empty segment as the slug', () => {
    expect(createSlugFromUrl('https://www.thedailystar.net/news/education/hsc-results-3601234')).toBe('hsc-results-3601234');
    expect(createSlugFromUrl('https://www.thedailystar.net/news/campus/')).toBe('campus');
    expect(createSlugFromUrl('https://www.thedailystar.net/')).toBe('');
  });
});
