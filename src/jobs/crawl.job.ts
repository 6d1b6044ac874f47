/**
 * Crawl Job
 * Seeds file -> crawl every site -> flat page batch
 */

import { env } from '../config/env';
import type { PageRecord, SeedSite } from '../lib/crawling';
import { InputMissingError, readJsonArray, writeJson } from '../lib/storage';
import { isPlainObject } from '../lib/validation';
import { CrawlerService, crawlerService } from '../modules/scraper/crawler.service';
import type { CrawlOptions } from '../modules/scraper/scraper.types';

export interface CrawlJobOptions extends CrawlOptions {
  seedsFile?: string;
  outputFile?: string;
  crawler?: CrawlerService;
}

/**
 * Seeds missing a string id or url are logged and dropped
 */
export function parseSeeds(entries: readonly unknown[]): SeedSite[] {
  const seeds: SeedSite[] = [];

  for (const entry of entries) {
    const id = isPlainObject(entry) ? entry.id : undefined;
    const url = isPlainObject(entry) ? entry.url : undefined;

    if (typeof id === 'string' && id && typeof url === 'string' && url) {
      seeds.push({ id, url });
    } else {
      console.warn(`⚠️  Skipping invalid site entry: ${JSON.stringify(entry)}`);
    }
  }

  return seeds;
}

/**
 * Returns the pages written, or null when the seeds file is missing
 */
export async function runCrawlJob(options: CrawlJobOptions = {}): Promise<PageRecord[] | null> {
  const seedsFile = options.seedsFile ?? env.SEEDS_FILE;
  const outputFile = options.outputFile ?? env.SCRAPED_OUTPUT_FILE;
  const crawler = options.crawler ?? crawlerService;

  let entries: unknown[];
  try {
    entries = await readJsonArray(seedsFile);
  } catch (error: unknown) {
    if (error instanceof InputMissingError) {
      console.error(`❌ Error: ${error.message}`);
      return null;
    }
    throw error;
  }

  const seeds = parseSeeds(entries);
  const pages = await crawler.crawlSeeds(seeds, {
    maxPages: options.maxPages,
    delayBetweenRequests: options.delayBetweenRequests,
    dedupePending: options.dedupePending,
  });

  await writeJson(outputFile, pages);
  console.log(`✅ Done! Scraped ${pages.length} page(s) written to ${outputFile}`);
  return pages;
}
