/**
 * Crawling Statistics Tracker
 * Per-site counters, logged when a site crawl finishes
 */

import { CrawlingStatistics } from './crawling.types';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private pagesVisited: number = 0;
  private pagesFailed: number = 0;
  private duplicatesSkipped: number = 0;
  private linksDiscovered: number = 0;
  private linksEnqueued: number = 0;

  constructor() {
    this.startTime = Date.now();
  }

  recordPageVisit(): void {
    this.pagesVisited++;
  }

  recordFailed(): void {
    this.pagesFailed++;
  }

  recordDuplicate(): void {
    this.duplicatesSkipped++;
  }

  /**
   * Record links found on a page and how many of them joined the frontier
   */
  recordLinks(discovered: number, enqueued: number): void {
    this.linksDiscovered += discovered;
    this.linksEnqueued += enqueued;
  }

  getStatistics(): CrawlingStatistics {
    return {
      pagesVisited: this.pagesVisited,
      pagesFailed: this.pagesFailed,
      duplicatesSkipped: this.duplicatesSkipped,
      linksDiscovered: this.linksDiscovered,
      linksEnqueued: this.linksEnqueued,
      totalTime: Date.now() - this.startTime,
    };
  }
}
