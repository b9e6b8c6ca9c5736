/**
 * Crawling Types
 * Type definitions for the domain crawl, link graph and navigation classifier
 */

import type { ScrapingErrorType } from '../scraping/errors';
import type { PageContent } from '../processing/content.extractor';
import type { PageMetadata } from '../processing/metadata.extractor';

/**
 * Scheme and host of the crawl root
 */
export interface DomainDescriptor {
  scheme: string;

  /**
   * Host as given, including port and any "www." prefix
   */
  host: string;

  /**
   * Host without a leading "www.", used for all same-domain comparisons
   */
  normalizedHost: string;

  /**
   * scheme://host, used to locate /sitemap.xml
   */
  rootUrl: string;
}

export enum CrawlPhase {
  INIT = 'init',
  SEEDING = 'seeding',
  CRAWLING = 'crawling',
  CLASSIFYING = 'classifying',
  DONE = 'done',
}

/**
 * Crawling configuration interface
 */
export interface CrawlingConfig {
  /**
   * Entry point of the crawl (homepage, or the site root in sitemap-only mode)
   */
  startUrl: string;

  /**
   * Maximum pages to visit
   */
  maxPages: number;

  /**
   * Delay in milliseconds after each processed URL and nested sitemap fetch
   */
  delayMs: number;

  /**
   * Fraction of crawled pages a link must appear on to count as navigation (0.0-1.0)
   */
  navThreshold: number;

  /**
   * Look for /sitemap.xml before falling back to the homepage
   */
  useSitemap: boolean;

  /**
   * Crawl only the URLs of this sitemap, without following links
   */
  sitemapUrl?: string;

  /**
   * How many levels of nested sitemap indexes to follow
   */
  sitemapMaxDepth: number;
}

/**
 * Pending frontier entry
 */
export interface FrontierEntry {
  url: string;

  /**
   * Crawl depth (0 = seed)
   */
  depth: number;

  /**
   * Page the link was discovered on
   */
  parentUrl?: string;

  discoveredAt: Date;
}

/**
 * Crawling statistics interface
 */
export interface CrawlingStatistics {
  pagesVisited: number;
  pagesFailed: number;

  /**
   * Dequeued entries skipped because their URL was already visited
   */
  pagesSkipped: number;

  linksDiscovered: number;
  depthReached: number;

  /**
   * Total crawling time in milliseconds
   */
  totalTime: number;

  /**
   * Average fetch time per page in milliseconds
   */
  averagePageTime: number;

  /**
   * Success rate (0-1)
   */
  successRate: number;
}

export interface CrawledPage {
  status: 'crawled';
  url: string;
  depth: number;
  statusCode: number;
  title: string | null;
  metadata: PageMetadata;
  content: PageContent;

  /**
   * Same-domain links in document order, duplicates kept
   */
  internalLinks: string[];
  internalLinksCount: number;
  backlinksCount: number;
  fromSitemap: boolean;

  // Filled in once links have been classified
  filteredInternalLinks?: string[];
  filteredInternalLinksCount?: number;
  filteredBacklinksCount?: number;
  navLinks?: string[];
  navLinksCount?: number;
}

export interface FailedPage {
  status: 'failed';
  url: string;
  depth: number;

  /**
   * null when no response was received
   */
  statusCode: number | null;
  errorType: ScrapingErrorType;
  error: string;
  fromSitemap: boolean;
}

export type PageRecord = CrawledPage | FailedPage;

export interface RankedPage {
  url: string;
  count: number;
}

export interface LinkStats {
  totalLinksMapped: number;
  pagesWithOutgoingLinks: number;
  pagesWithBacklinks: number;
  mostLinkedPages: RankedPage[];
  mostLinkingPages: RankedPage[];
}

export interface FilteredLinkStats {
  pagesWithFilteredOutgoingLinks: number;
  pagesWithFilteredBacklinks: number;
  mostLinkedPagesFiltered: RankedPage[];
  mostLinkingPagesFiltered: RankedPage[];
}

export interface GlobalLinkStats {
  totalPagesAnalyzed: number;
  threshold: number;

  /**
   * Threshold as a percentage label, e.g. "80%"
   */
  detectionThreshold: string;

  /**
   * Minimum number of pages a link must appear on to be global
   */
  thresholdCount: number;
  globalLinksDetected: number;
  globalLinks: string[];
  globalLinkOccurrences: Record<string, number>;
}

export interface LinkGraphSummary {
  linkStats: LinkStats;
  filteredLinkStats?: FilteredLinkStats;
}

/**
 * Graph-level export
 */
export interface LinkStructure {
  outgoingLinks: Record<string, string[]>;
  backlinks: Record<string, string[]>;
  linkStats: LinkStats;
  globalLinks?: GlobalLinkStats;
  filteredOutgoingLinks?: Record<string, string[]>;
  filteredBacklinks?: Record<string, string[]>;
  filteredLinkStats?: FilteredLinkStats;
}

export interface CrawlResult {
  startUrl: string;
  baseDomain: string;
  sitemapUsed: boolean;
  sitemapOnly: boolean;
  sitemapUrl?: string;
  pagesCrawled: number;
  maxPages: number;
  navThreshold: number;
  navLinksDetected: number;
  pages: PageRecord[];
  linkStructure: LinkStructure;
  statistics: CrawlingStatistics;
  error?: string;
}

export type CrawlProgressEvent =
  | { type: 'seeded'; source: 'sitemap' | 'homepage'; queued: number }
  | { type: 'page'; index: number; total: number; url: string; status: PageRecord['status'] }
  | { type: 'classified'; globalLinks: number };

export type CrawlProgressListener = (event: CrawlProgressEvent) => void;
