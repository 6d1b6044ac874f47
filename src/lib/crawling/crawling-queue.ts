/**
 * Crawling Queue
 * FIFO frontier for breadth-first crawling
 */

export class CrawlingQueue {
  private readonly queue: string[] = [];
  private readonly pending: Set<string> = new Set();

  /**
   * @param dedupePending reject URLs already waiting in the queue
   */
  constructor(private readonly dedupePending: boolean = false) {}

  /**
   * Add URL to the tail. Returns false when the URL was rejected.
   */
  enqueue(url: string): boolean {
    if (this.dedupePending && this.pending.has(url)) {
      return false;
    }

    this.queue.push(url);
    this.pending.add(url);
    return true;
  }

  /**
   * Take the head of the queue
   */
  dequeue(): string | null {
    const url = this.queue.shift();
    if (url === undefined) {
      return null;
    }

    if (!this.queue.includes(url)) {
      this.pending.delete(url);
    }
    return url;
  }

  isEmpty(): boolean {
    return this.queue.length === 0;
  }

  size(): number {
    return this.queue.length;
  }
}
