/**
 * Interactive target selection when no URL is given on the command line
 */

import { createInterface } from 'readline';
import { createDomainDescriptor } from '../lib/crawling/url-normalizer';

export type AskFn = (question: string) => Promise<string>;

export interface CrawlTarget {
  startUrl: string;
  sitemapUrl?: string;
}

export const askUser: AskFn = (question) => {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
};

/**
 * Crawl target from a sitemap location: the crawl is anchored at the
 * sitemap's own scheme and host
 */
export function sitemapTarget(sitemapUrl: string, startUrl?: string): CrawlTarget {
  return {
    startUrl: startUrl ?? createDomainDescriptor(sitemapUrl).rootUrl,
    sitemapUrl,
  };
}

/**
 * Ask for a crawl mode and URL. Returns null when nothing was entered.
 */
export async function promptForTarget(ask: AskFn = askUser): Promise<CrawlTarget | null> {
  console.log('\nLink Cluster Crawler - Choose crawling mode:');
  console.log('1. Website crawl (starts from homepage, looks for sitemap.xml)');
  console.log('2. Sitemap-only crawl (crawls URLs from a specific sitemap without following links)');

  const mode = await ask('\nSelect mode (1 or 2): ');

  if (mode === '2') {
    const sitemapUrl = await ask('\nEnter sitemap URL (e.g., https://example.com/sitemap.xml): ');
    if (!sitemapUrl) {
      console.error('Error: No sitemap URL provided.');
      return null;
    }
    return sitemapTarget(sitemapUrl);
  }

  const startUrl = await ask('\nEnter website URL to crawl (e.g., https://example.com): ');
  if (!startUrl) {
    console.error('Error: No URL provided.');
    return null;
  }
  return { startUrl };
}
