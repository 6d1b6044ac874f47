/**
 * Scraping utilities
 */

export * from './errors';
export * from './headers';
