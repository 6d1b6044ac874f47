/**
 * Scraper Module Types
 */

import type { PageRecord } from '../../lib/crawling';

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Fetches one URL. Resolves to null on any failure, never rejects.
 */
export type PageFetcher = (url: string) => Promise<string | null>;

/**
 * Turns markup into a page record without its composite id
 */
export type PageExtractor = (html: string, sourceUrl: string) => Omit<PageRecord, 'id'>;

export type Sleeper = (ms: number) => Promise<void>;

// ============================================================================
// Options
// ============================================================================

export interface FetchOptions {
  timeout?: number;
  userAgent?: string;
  acceptLanguage?: string;
}

export interface CrawlOptions {
  maxPages?: number;
  delayBetweenRequests?: number;
  dedupePending?: boolean;
}

export interface CrawlResult {
  siteId: string;
  seedUrl: string;
  pages: PageRecord[];
  visitedUrls: string[];
}
