/**
 * Output Types
 */

import type { CrawlResult, LinkStructure } from '../crawling/crawling.types';

/**
 * Link-structure-only output (--links-only)
 */
export interface LinksOnlyOutput {
  startUrl: string;
  baseDomain: string;
  pagesCrawled: number;
  navThreshold: number;
  navLinksDetected: number;
  linkStructure?: LinkStructure;
  sitemapUrl?: string;
  sitemapOnly?: boolean;
}

export type FullOutput = Omit<CrawlResult, 'linkStructure'> & {
  linkStructure?: LinkStructure;
};

export type CrawlOutput = FullOutput | LinksOnlyOutput;

export interface OutputOptions {
  linksOnly: boolean;
  includeLinkStructure: boolean;
}

/**
 * Anything the formatter can summarize; missing fields fall back to empty values
 */
export type FormattableResult = Pick<
  CrawlResult,
  'startUrl' | 'baseDomain' | 'pagesCrawled' | 'navThreshold' | 'navLinksDetected'
> &
  Partial<Pick<CrawlResult, 'sitemapUsed' | 'maxPages' | 'pages' | 'sitemapUrl' | 'sitemapOnly'>>;

export interface FormattedCrawledPage {
  url: string;
  statusCode: number;
  crawledSuccessfully: true;
  title: string;
  titleLength: number;
  metaDescription: string;
  metaDescriptionLength: number;
  canonical: string;
  h1: string;
  h1Count: number;
  ogTags: Record<string, string>;
  twitterTags: Record<string, string>;
  robots: string;
  content: string;
  contentLength: number;
  wordCount: number;
  internalLinksOut: string[];
  internalLinksCount: number;
  backlinksCount: number;
  hreflang?: { href: string; hreflang: string }[];
  navLinks?: string[];
  navLinksCount?: number;
  filteredInternalLinks?: string[];
  filteredInternalLinksCount?: number;
  filteredBacklinksCount?: number;
}

export interface FormattedFailedPage {
  url: string;
  statusCode: number;
  error: string;
  crawledSuccessfully: false;
}

export type FormattedPage = FormattedCrawledPage | FormattedFailedPage;

export interface CrawlMetadata {
  startUrl: string;
  baseDomain: string;
  sitemapUsed: boolean;
  pagesCrawled: number;
  maxPages: number;
  crawlerVersion: string;
  crawlDate: string;
  navThreshold: number;
  navLinksDetected: number;
  sitemapUrl?: string;
  sitemapOnly?: boolean;
}

export interface FormattedCrawlResult {
  metadata: CrawlMetadata;
  pages: FormattedPage[];
}
