/**
 * URL helpers shared by normalizers and the media cache
 */

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export function resolveUrl(href: string, base: string): string | null {
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
}

/** Path component of a URL, without query string or fragment. */
export function urlPath(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url.split(/[?#]/)[0];
  }
}

/** Last non-empty path segment, used as the slug for HTML-sourced stories. */
export function createSlugFromUrl(url: string): string {
  const segments = urlPath(url).split('/').filter(Boolean);
  return segments.length > 0 ? segments[segments.length - 1] : '';
}
