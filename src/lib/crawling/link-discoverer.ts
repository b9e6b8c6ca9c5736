/**
 * Link Discoverer
 * Internal link discovery from HTML content
 */

import * as cheerio from 'cheerio';
import { DomainDescriptor } from './crawling.types';
import { canonicalize, isCrawlableLink, isHttpUrl, isSameDomain } from './url-normalizer';

export interface LinkExtractor {
  extractLinks(html: string, baseUrl: string, domain: DomainDescriptor): string[];
}

export class LinkDiscoverer implements LinkExtractor {
  /**
   * Discover all same-domain links in document order. Duplicates are kept;
   * the link graph and the occurrence collector dedupe on their own.
   */
  extractLinks(html: string, baseUrl: string, domain: DomainDescriptor): string[] {
    if (!html) {
      return [];
    }

    const $ = cheerio.load(html);
    const links: string[] = [];

    $('a[href]').each((_, el) => {
      const href = $(el).attr('href');
      if (!href || !isCrawlableLink(href)) return;

      const absoluteUrl = canonicalize(href.trim(), baseUrl);

      // Skip external links and anything that is not http(s)
      if (!isHttpUrl(absoluteUrl) || !isSameDomain(absoluteUrl, domain)) {
        return;
      }

      links.push(absoluteUrl);
    });

    return links;
  }
}
