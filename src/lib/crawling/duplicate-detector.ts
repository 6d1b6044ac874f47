/**
 * Duplicate Detector
 * Visited-set for one crawl. URLs are compared as exact strings, the same
 * way the frontier scope check compares them.
 */

export class DuplicateDetector {
  private readonly visitedUrls: Set<string> = new Set();

  /**
   * Add a URL and return true if it was already visited
   */
  addUrl(url: string): boolean {
    if (this.visitedUrls.has(url)) {
      return true;
    }

    this.visitedUrls.add(url);
    return false;
  }

  hasUrl(url: string): boolean {
    return this.visitedUrls.has(url);
  }

  /**
   * Visited URLs in visit order
   */
  getVisitedUrls(): string[] {
    return Array.from(this.visitedUrls);
  }

  size(): number {
    return this.visitedUrls.size;
  }
}
