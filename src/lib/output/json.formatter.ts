/**
 * JSON Formatter
 * Flattens crawl results into a compact per-page shape for downstream analysis
 */

import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import type { PageRecord } from '../crawling/crawling.types';
import {
  CrawlMetadata,
  FormattableResult,
  FormattedCrawledPage,
  FormattedCrawlResult,
  FormattedPage,
} from './output.types';

export const CRAWLER_VERSION = '1.0';

const MAX_FILENAME_LENGTH = 200;

export interface JsonFormatterConfig {
  includeFilteredLinks?: boolean;
  now?: () => Date;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time as "YYYY-MM-DD HH:MM:SS"
 */
export function formatCrawlDate(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * File-system safe name derived from a page URL
 */
export function pageFileName(url: string): string {
  return url
    .replace(/:\/\//g, '_')
    .replace(/[/?&]/g, '_')
    .slice(0, MAX_FILENAME_LENGTH);
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<string> {
  await writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
  return filePath;
}

export class JsonFormatter {
  private readonly includeFilteredLinks: boolean;
  private readonly now: () => Date;

  constructor(config: JsonFormatterConfig = {}) {
    this.includeFilteredLinks = config.includeFilteredLinks ?? true;
    this.now = config.now ?? (() => new Date());
  }

  formatPage(page: PageRecord): FormattedPage {
    if (page.status === 'failed') {
      return {
        url: page.url,
        statusCode: page.statusCode ?? 0,
        error: page.error,
        crawledSuccessfully: false,
      };
    }

    const { metadata, content } = page;
    const formatted: FormattedCrawledPage = {
      url: page.url,
      statusCode: page.statusCode,
      crawledSuccessfully: true,
      title: metadata.title.content ?? '',
      titleLength: metadata.title.length,
      metaDescription: metadata.metaDescription.content ?? '',
      metaDescriptionLength: metadata.metaDescription.length,
      canonical: metadata.canonical ?? '',
      h1: metadata.h1.content ?? '',
      h1Count: metadata.h1.count,
      ogTags: metadata.openGraph,
      twitterTags: metadata.twitterCard,
      robots: metadata.robots ?? '',
      content: content.content,
      contentLength: content.contentLength,
      wordCount: content.wordCount,
      internalLinksOut: page.internalLinks,
      internalLinksCount: page.internalLinksCount,
      backlinksCount: page.backlinksCount,
    };

    if (metadata.hreflang) {
      formatted.hreflang = metadata.hreflang;
    }

    if (this.includeFilteredLinks) {
      if (page.navLinks) {
        formatted.navLinks = page.navLinks;
        formatted.navLinksCount = page.navLinksCount ?? page.navLinks.length;
      }
      if (page.filteredInternalLinks) {
        formatted.filteredInternalLinks = page.filteredInternalLinks;
        formatted.filteredInternalLinksCount =
          page.filteredInternalLinksCount ?? page.filteredInternalLinks.length;
      }
      if (page.filteredBacklinksCount !== undefined) {
        formatted.filteredBacklinksCount = page.filteredBacklinksCount;
      }
    }

    return formatted;
  }

  formatCrawlResult(result: FormattableResult): FormattedCrawlResult {
    return {
      metadata: this.buildMetadata(result),
      pages: (result.pages ?? []).map((page) => this.formatPage(page)),
    };
  }

  async saveConsolidated(result: FormattableResult, outputFile: string): Promise<string> {
    return writeJsonFile(outputFile, this.formatCrawlResult(result));
  }

  /**
   * One file per successfully crawled page plus _metadata.json.
   * Returns the number of page files written.
   */
  async saveIndividualFiles(result: FormattableResult, outputDir: string): Promise<number> {
    await mkdir(outputDir, { recursive: true });

    let fileCount = 0;
    for (const page of result.pages ?? []) {
      const formatted = this.formatPage(page);
      if (!formatted.crawledSuccessfully) continue;

      await writeJsonFile(path.join(outputDir, `${pageFileName(formatted.url)}.json`), formatted);
      fileCount++;
    }

    await writeJsonFile(path.join(outputDir, '_metadata.json'), {
      ...this.buildMetadata(result),
      filesCreated: fileCount,
    });

    return fileCount;
  }

  private buildMetadata(result: FormattableResult): CrawlMetadata {
    const metadata: CrawlMetadata = {
      startUrl: result.startUrl,
      baseDomain: result.baseDomain,
      sitemapUsed: result.sitemapUsed ?? false,
      pagesCrawled: result.pagesCrawled,
      maxPages: result.maxPages ?? 0,
      crawlerVersion: CRAWLER_VERSION,
      crawlDate: formatCrawlDate(this.now()),
      navThreshold: result.navThreshold,
      navLinksDetected: result.navLinksDetected,
    };

    if (result.sitemapUrl !== undefined) {
      metadata.sitemapUrl = result.sitemapUrl;
      metadata.sitemapOnly = result.sitemapOnly ?? false;
    }

    return metadata;
  }
}
