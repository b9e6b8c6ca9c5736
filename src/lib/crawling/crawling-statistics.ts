/**
 * Crawling Statistics Tracker
 * Counters and timings for one crawl session
 */

import { CrawlingStatistics } from './crawling.types';

export class CrawlingStatisticsTracker {
  private readonly startedAt: number;
  private stoppedAt: number | null = null;
  private visited: number = 0;
  private skipped: number = 0;
  private failed: number = 0;
  private links: number = 0;
  private deepest: number = 0;
  private fetchTimeTotal: number = 0;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = this.now();
  }

  /**
   * A page fetched with status 200
   */
  recordPageVisit(depth: number, elapsedMs: number): void {
    this.visited++;
    this.recordAttempt(depth, elapsedMs);
  }

  /**
   * A page whose fetch failed. Failed pages still count toward depth and timing.
   */
  recordFailed(depth: number, elapsedMs: number): void {
    this.failed++;
    this.recordAttempt(depth, elapsedMs);
  }

  // Dequeued URL that had already been visited
  recordSkipped(): void {
    this.skipped++;
  }

  recordLinkDiscovery(count: number): void {
    this.links += count;
  }

  stop(): void {
    if (this.stoppedAt === null) {
      this.stoppedAt = this.now();
    }
  }

  getStatistics(): CrawlingStatistics {
    const attempts = this.visited + this.failed;

    return {
      pagesVisited: this.visited,
      pagesFailed: this.failed,
      pagesSkipped: this.skipped,
      linksDiscovered: this.links,
      depthReached: this.deepest,
      totalTime: (this.stoppedAt ?? this.now()) - this.startedAt,
      averagePageTime: attempts > 0 ? this.fetchTimeTotal / attempts : 0,
      successRate: attempts > 0 ? this.visited / attempts : 0,
    };
  }

  private recordAttempt(depth: number, elapsedMs: number): void {
    this.deepest = Math.max(this.deepest, depth);
    this.fetchTimeTotal += elapsedMs;
  }
}
