/**
 * Sitemap Resolver
 * Finds a site's sitemap and expands nested indexes into a same-domain URL list
 */

import { DomainDescriptor } from '../crawling/crawling.types';
import { isSameDomain } from '../crawling/url-normalizer';
import { sleep as defaultSleep, SleepFn } from '../scraping/delay';
import { PageFetcher } from '../scraping/fetcher';
import { parseSitemapDocument } from './sitemap.parser';
import { SitemapNode, SitemapParseError, SitemapResolverOptions } from './sitemap.types';

export class SitemapResolver {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly domain: DomainDescriptor,
    private readonly options: SitemapResolverOptions,
    private readonly sleep: SleepFn = defaultSleep
  ) {}

  /**
   * Resolve <root>/sitemap.xml. Returns null when there is no usable sitemap,
   * in which case the crawl starts from the homepage.
   */
  async resolveSitemap(rootUrl: string = this.domain.rootUrl): Promise<string[] | null> {
    const sitemapUrl = `${rootUrl.replace(/\/+$/, '')}/sitemap.xml`;
    console.log(`Checking for sitemap at: ${sitemapUrl}`);

    const urls = await this.resolveSitemapUrl(sitemapUrl);
    if (!urls) {
      console.log('No usable sitemap.xml found, falling back to recursive crawling');
    }
    return urls;
  }

  /**
   * Resolve an explicit sitemap location
   */
  async resolveSitemapUrl(sitemapUrl: string): Promise<string[] | null> {
    const root = await this.load(sitemapUrl);
    if (!root) {
      return null;
    }

    const visited = new Set<string>([sitemapUrl]);
    const urls = await this.expand(root, 0, visited);

    if (urls.length === 0) {
      console.log(`Sitemap ${sitemapUrl} contains no valid URLs`);
      return null;
    }

    console.log(`Found ${urls.length} URLs in ${sitemapUrl}`);
    return urls;
  }

  /**
   * Depth-first expansion in document order. Sitemaps already expanded
   * and indexes nested beyond maxDepth are not followed.
   */
  private async expand(node: SitemapNode, depth: number, visited: Set<string>): Promise<string[]> {
    if (node.kind === 'urlset') {
      return node.urls.filter((url) => isSameDomain(url, this.domain));
    }

    console.log(`Found a sitemap index with ${node.sitemaps.length} sitemaps`);
    const urls: string[] = [];

    for (const nestedUrl of node.sitemaps) {
      if (visited.has(nestedUrl)) {
        console.warn(`Skipping sitemap already processed: ${nestedUrl}`);
        continue;
      }

      if (depth + 1 > this.options.maxDepth) {
        console.warn(`Skipping nested sitemap beyond depth ${this.options.maxDepth}: ${nestedUrl}`);
        continue;
      }

      visited.add(nestedUrl);
      console.log(`Processing nested sitemap: ${nestedUrl}`);

      const nested = await this.load(nestedUrl);
      await this.sleep(this.options.delayMs);

      if (nested) {
        urls.push(...(await this.expand(nested, depth + 1, visited)));
      }
    }

    return urls;
  }

  private async load(sitemapUrl: string): Promise<SitemapNode | null> {
    const response = await this.fetcher.fetch(sitemapUrl);

    if (!response.ok) {
      console.log(
        `Could not fetch sitemap ${sitemapUrl} (Status code: ${response.statusCode ?? 'none'})`
      );
      return null;
    }

    try {
      return parseSitemapDocument(response.body);
    } catch (error) {
      if (error instanceof SitemapParseError) {
        console.log(`Error parsing sitemap ${sitemapUrl}: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}
