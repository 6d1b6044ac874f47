/**
 * Crawler Service
 * Bounded breadth-first crawl of one seed site
 */

import { env } from '../../config/env';
import {
  CrawlingQueue,
  CrawlingStatisticsTracker,
  DuplicateDetector,
  LinkDiscoverer,
  resolveHttpUrl,
} from '../../lib/crawling';
import type { CrawlingConfig, PageRecord, SeedSite } from '../../lib/crawling';
import { fetchPage } from './scrapers/http.scraper';
import { extractPage } from './page.extractor';
import { sleep } from './utils/retry';
import type { CrawlOptions, CrawlResult, PageExtractor, PageFetcher, Sleeper } from './scraper.types';

export interface CrawlerDependencies {
  fetcher?: PageFetcher;
  extractor?: PageExtractor;
  sleeper?: Sleeper;
}

export class CrawlerService {
  private readonly fetcher: PageFetcher;
  private readonly extractor: PageExtractor;
  private readonly sleeper: Sleeper;
  private readonly linkDiscoverer = new LinkDiscoverer();

  constructor(deps: CrawlerDependencies = {}) {
    this.fetcher = deps.fetcher ?? ((url) => fetchPage(url));
    this.extractor = deps.extractor ?? ((html, sourceUrl) => extractPage(html, sourceUrl));
    this.sleeper = deps.sleeper ?? sleep;
  }

  private resolveConfig(options: CrawlOptions): CrawlingConfig {
    return {
      maxPages: options.maxPages ?? env.CRAWL_MAX_PAGES,
      delayBetweenRequests: options.delayBetweenRequests ?? env.REQUEST_DELAY_MS,
      dedupePending: options.dedupePending ?? env.CRAWL_DEDUPE_PENDING,
    };
  }

  /**
   * Crawl one site. Pages are numbered "<siteId>-<n>" where n is the size of
   * the visited set right after the page joined it, so failed fetches use up
   * a number too. The seed is put in the same form as discovered links
   * ("https://host" becomes "https://host/") so a link back to it counts as
   * visited.
   */
  async crawlSite(siteId: string, seedUrl: string, options: CrawlOptions = {}): Promise<CrawlResult> {
    const config = this.resolveConfig(options);
    const frontier = new CrawlingQueue(config.dedupePending);
    const visited = new DuplicateDetector();
    const stats = new CrawlingStatisticsTracker();
    const pages: PageRecord[] = [];
    const startUrl = resolveHttpUrl(seedUrl, seedUrl) ?? seedUrl;

    frontier.enqueue(startUrl);

    while (!frontier.isEmpty() && visited.size() < config.maxPages) {
      const currentUrl = frontier.dequeue();
      if (currentUrl === null) break;

      if (visited.addUrl(currentUrl)) {
        stats.recordDuplicate();
        continue;
      }

      const sequence = visited.size();
      const html = await this.fetcher(currentUrl);
      if (config.delayBetweenRequests > 0) {
        await this.sleeper(config.delayBetweenRequests);
      }

      if (html === null) {
        stats.recordFailed();
        continue;
      }

      const page: PageRecord = {
        id: `${siteId}-${sequence}`,
        ...this.extractor(html, currentUrl),
      };
      pages.push(page);
      stats.recordPageVisit();

      const inScope = this.linkDiscoverer.filterLinks(page.links, startUrl, visited);
      let enqueued = 0;
      for (const link of inScope) {
        if (frontier.enqueue(link)) enqueued++;
      }
      stats.recordLinks(page.links.length, enqueued);
    }

    const summary = stats.getStatistics();
    console.log(
      `✅ Site ${siteId}: ${summary.pagesVisited} page(s) scraped, ${summary.pagesFailed} failed, ` +
        `${summary.duplicatesSkipped} duplicate(s) skipped, ${summary.linksEnqueued}/${summary.linksDiscovered} ` +
        `link(s) enqueued in ${summary.totalTime}ms`
    );

    return {
      siteId,
      seedUrl,
      pages,
      visitedUrls: visited.getVisitedUrls(),
    };
  }

  /**
   * Crawl every seed in order and return one flat batch of pages
   */
  async crawlSeeds(seeds: SeedSite[], options: CrawlOptions = {}): Promise<PageRecord[]> {
    const allPages: PageRecord[] = [];

    for (const seed of seeds) {
      console.log(`🕷️  Starting crawl for site ID ${seed.id} - ${seed.url}`);
      const result = await this.crawlSite(seed.id, seed.url, options);
      allPages.push(...result.pages);
    }

    return allPages;
  }
}

export const crawlerService = new CrawlerService();
