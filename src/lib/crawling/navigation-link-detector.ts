/**
 * Navigation Link Detector
 * Flags links that appear on most crawled pages as site-wide navigation.
 *
 * Occurrences are collected while the crawl runs; classify() freezes them
 * into a GlobalLinkSet. Anything that needs the classification takes that
 * handle, so it cannot be read before the crawl has finished.
 */

import { ClassificationStateError } from '../scraping/errors';
import { GlobalLinkStats } from './crawling.types';

export const DEFAULT_NAV_THRESHOLD = 0.8;

/**
 * Receives the links found on each crawled page
 */
export interface OccurrenceCollector {
  recordPageLinks(pageUrl: string, links: readonly string[]): void;
}

/**
 * Smallest page count that satisfies `count >= totalPages * threshold`.
 * The product is used as computed, float error included:
 * 100 * 0.07 is 7.000000000000001, so 8 pages are needed.
 */
export function computeThresholdCount(totalPages: number, threshold: number): number {
  return Math.max(0, Math.ceil(totalPages * threshold));
}

/**
 * Frozen result of classification
 */
export class GlobalLinkSet {
  private readonly links: ReadonlySet<string>;

  constructor(
    links: Iterable<string>,
    private readonly details: {
      totalPages: number;
      threshold: number;
      thresholdCount: number;
      occurrences: ReadonlyMap<string, number>;
    }
  ) {
    this.links = new Set(links);
  }

  has(url: string): boolean {
    return this.links.has(url);
  }

  get size(): number {
    return this.links.size;
  }

  toArray(): string[] {
    return Array.from(this.links);
  }

  /**
   * Drop global links, preserving order
   */
  filter(links: readonly string[]): string[] {
    return links.filter((link) => !this.links.has(link));
  }

  stats(): GlobalLinkStats {
    const globalLinkOccurrences: Record<string, number> = {};
    for (const link of this.links) {
      globalLinkOccurrences[link] = this.details.occurrences.get(link) ?? 0;
    }

    return {
      totalPagesAnalyzed: this.details.totalPages,
      threshold: this.details.threshold,
      detectionThreshold: `${Math.round(this.details.threshold * 100)}%`,
      thresholdCount: this.details.thresholdCount,
      globalLinksDetected: this.links.size,
      globalLinks: this.toArray(),
      globalLinkOccurrences,
    };
  }
}

export class NavigationLinkDetector implements OccurrenceCollector {
  readonly threshold: number;
  private linkOccurrences: Map<string, Set<string>> = new Map();
  private totalPages: number = 0;
  private globalLinks: GlobalLinkSet | null = null;

  constructor(threshold: number = DEFAULT_NAV_THRESHOLD) {
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new RangeError(`Navigation threshold must be between 0.0 and 1.0, got ${threshold}`);
    }
    this.threshold = threshold;
  }

  /**
   * Register the links found on a page. Each call counts as one page;
   * a link repeated on the same page counts once.
   */
  recordPageLinks(pageUrl: string, links: readonly string[]): void {
    if (this.globalLinks) {
      throw new ClassificationStateError('Cannot record page links after classification');
    }

    this.totalPages++;

    for (const link of links) {
      let pages = this.linkOccurrences.get(link);
      if (!pages) {
        pages = new Set();
        this.linkOccurrences.set(link, pages);
      }
      pages.add(pageUrl);
    }
  }

  /**
   * Classify links against the final page count. Runs once.
   */
  classify(): GlobalLinkSet {
    if (this.globalLinks) {
      throw new ClassificationStateError('Global links have already been classified');
    }

    const required = this.totalPages * this.threshold;
    const thresholdCount = computeThresholdCount(this.totalPages, this.threshold);
    const occurrences = new Map<string, number>();
    const detected: string[] = [];

    if (this.totalPages > 0) {
      for (const [link, pages] of this.linkOccurrences) {
        occurrences.set(link, pages.size);
        if (pages.size >= required) {
          detected.push(link);
        }
      }
    }

    this.globalLinks = new GlobalLinkSet(detected, {
      totalPages: this.totalPages,
      threshold: this.threshold,
      thresholdCount,
      occurrences,
    });

    return this.globalLinks;
  }

  isGlobalLink(url: string): boolean {
    return this.globalLinks?.has(url) ?? false;
  }

  /**
   * Drop global links; returns a copy of the input before classification
   */
  filter(links: readonly string[]): string[] {
    return this.globalLinks ? this.globalLinks.filter(links) : [...links];
  }

  getTotalPages(): number {
    return this.totalPages;
  }

  getOccurrenceCount(link: string): number {
    return this.linkOccurrences.get(link)?.size ?? 0;
  }

  stats(): GlobalLinkStats {
    if (this.globalLinks) {
      return this.globalLinks.stats();
    }

    return {
      totalPagesAnalyzed: this.totalPages,
      threshold: this.threshold,
      detectionThreshold: `${Math.round(this.threshold * 100)}%`,
      thresholdCount: computeThresholdCount(this.totalPages, this.threshold),
      globalLinksDetected: 0,
      globalLinks: [],
      globalLinkOccurrences: {},
    };
  }
}
