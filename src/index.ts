/**
 * Library entry point
 */

export * from './lib/crawling';
export * from './lib/validation';
export { readJsonArray, writeJson, InputMissingError, InvalidInputError } from './lib/storage';
export { ScrapingErrorType, classifyError, HttpStatusError } from './lib/scraping';
export type { ScrapingError } from './lib/scraping';
export { fetchPage, fetchPageOrThrow } from './modules/scraper/scrapers/http.scraper';
export { extractPage } from './modules/scraper/page.extractor';
export { CrawlerService, crawlerService } from './modules/scraper/crawler.service';
export type { CrawlOptions, CrawlResult, PageFetcher, PageExtractor } from './modules/scraper/scraper.types';
export * from './modules/aggregator';
export * from './modules/directory';
export * from './jobs';
