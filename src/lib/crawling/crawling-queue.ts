/**
 * Crawling Queue
 * FIFO frontier with the visited set that guards against re-fetching
 */

import { FrontierEntry } from './crawling.types';

export class CrawlingQueue {
  private queue: FrontierEntry[] = [];
  private pendingUrls: Set<string> = new Set();
  private visited: Set<string> = new Set();

  /**
   * Add a URL to the back of the queue (BFS order).
   * Returns false when the URL is already visited or already pending.
   */
  enqueue(url: string, depth: number = 0, parentUrl?: string): boolean {
    if (this.visited.has(url) || this.pendingUrls.has(url)) {
      return false;
    }

    this.queue.push({ url, depth, parentUrl, discoveredAt: new Date() });
    this.pendingUrls.add(url);
    return true;
  }

  /**
   * Take the next entry (FIFO). The entry may have been visited in the
   * meantime; callers test-and-set with markVisited.
   */
  dequeue(): FrontierEntry | null {
    const entry = this.queue.shift();
    if (!entry) {
      return null;
    }

    this.pendingUrls.delete(entry.url);
    return entry;
  }

  /**
   * Mark a URL as visited. Returns false if it already was.
   */
  markVisited(url: string): boolean {
    if (this.visited.has(url)) {
      return false;
    }

    this.visited.add(url);
    return true;
  }

  hasVisited(url: string): boolean {
    return this.visited.has(url);
  }

  isEmpty(): boolean {
    return this.queue.length === 0;
  }

  size(): number {
    return this.queue.length;
  }

  visitedCount(): number {
    return this.visited.size;
  }

  getVisitedUrls(): string[] {
    return Array.from(this.visited);
  }

  getQueuedUrls(): string[] {
    return this.queue.map((entry) => entry.url);
  }

  peek(): FrontierEntry | null {
    return this.queue.length > 0 ? this.queue[0] : null;
  }
}
