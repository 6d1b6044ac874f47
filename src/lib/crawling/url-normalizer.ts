/**
 * URL Utilities
 * Resolution and scoping helpers for crawled links
 */

/**
 * Resolve a possibly relative href against the page it was found on.
 * Returns null when the result is not an absolute http(s) URL.
 */
export function resolveHttpUrl(href: string, baseUrl: string): string | null {
  try {
    const urlObj = new URL(href, baseUrl);
    if (urlObj.protocol !== 'http:' && urlObj.protocol !== 'https:') {
      return null;
    }
    return urlObj.href;
  } catch {
    return null;
  }
}

/**
 * A link is in scope when the seed URL is a string prefix of it
 */
export function isWithinScope(url: string, seedUrl: string): boolean {
  return url.startsWith(seedUrl);
}

/**
 * Last "/"-separated segment of a URL ("" for a trailing slash)
 */
export function lastPathSegment(url: string): string {
  const segments = url.split('/');
  return segments[segments.length - 1];
}
