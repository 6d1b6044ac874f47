/**
 * HTTP Scraper
 * One GET per URL through native fetch, bounded by an AbortController timeout
 */

import { env } from '../../../config/env';
import { classifyError, getBrowserHeaders, HttpStatusError } from '../../../lib/scraping';
import type { FetchOptions } from '../scraper.types';

/**
 * Fetch a page and return its markup. Rejects with HttpStatusError on a
 * non-2xx response and with the transport error otherwise.
 */
export async function fetchPageOrThrow(url: string, options: FetchOptions = {}): Promise<string> {
  const timeout = options.timeout ?? env.HTTP_TIMEOUT;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: getBrowserHeaders({
        userAgent: options.userAgent,
        acceptLanguage: options.acceptLanguage,
      }),
      redirect: 'follow',
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new HttpStatusError(url, response.status, response.statusText);
    }

    return await response.text();
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Fetch a page, or log the failure and return null
 */
export async function fetchPage(url: string, options: FetchOptions = {}): Promise<string | null> {
  try {
    return await fetchPageOrThrow(url, options);
  } catch (error: unknown) {
    const classified = classifyError(error);
    const detail = error instanceof Error ? error.message : String(error);
    console.error(`Error fetching ${url}: [${classified.type}] ${detail}`);
    return null;
  }
}
