/**
 * Crawling Types
 * Type definitions for the bounded breadth-first site crawler
 */

export type HeaderLevel = 'h1' | 'h2' | 'h3';

export const HEADER_LEVELS: readonly HeaderLevel[] = ['h1', 'h2', 'h3'];

/**
 * Header texts by level. A level with no matching elements is omitted,
 * a single match is still a one-element list.
 */
export type PageHeaders = Partial<Record<HeaderLevel, string[]>>;

/**
 * One fetched page
 */
export interface PageRecord {
  /**
   * Composite id "<siteId>-<sequence>"
   */
  id: string;
  url: string;
  title?: string;
  headers: PageHeaders;

  /**
   * Plain-text body with scripts and styles removed
   */
  data: string;

  /**
   * Absolute http(s) links in order of appearance
   */
  links: string[];

  /**
   * ISO-8601 UTC capture time
   */
  scrapedAt: string;
}

/**
 * Seed descriptor from the seeds file
 */
export interface SeedSite {
  id: string;
  url: string;
}

/**
 * Crawling configuration interface
 */
export interface CrawlingConfig {
  /**
   * Maximum distinct URLs to visit (failed fetches included)
   */
  maxPages: number;

  /**
   * Delay in milliseconds after every fetch attempt
   */
  delayBetweenRequests: number;

  /**
   * Reject URLs that are already waiting in the frontier
   */
  dedupePending: boolean;
}

/**
 * Crawling statistics interface
 */
export interface CrawlingStatistics {
  pagesVisited: number;
  pagesFailed: number;

  /**
   * Frontier entries dropped because the URL was already visited
   */
  duplicatesSkipped: number;
  linksDiscovered: number;
  linksEnqueued: number;

  /**
   * Total crawling time in milliseconds
   */
  totalTime: number;
}
