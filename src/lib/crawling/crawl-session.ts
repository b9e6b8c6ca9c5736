/**
 * Crawl Session
 * One crawl of one domain: seed the frontier, run the fetch/extract/record
 * loop, then classify navigation links and filter the graph.
 *
 *   INIT → SEEDING → CRAWLING → CLASSIFYING → DONE
 *
 * A session owns all of its state and is used once.
 */

import { env } from '../../config/env';
import { ContentExtractor, PageContent } from '../processing/content.extractor';
import { MetadataExtractor, metadataExtractor, PageMetadata } from '../processing/metadata.extractor';
import { classifyError, CrawlStateError } from '../scraping/errors';
import { sleep as defaultSleep, SleepFn } from '../scraping/delay';
import { HttpFetcher, PageFetcher } from '../scraping/fetcher';
import { SitemapResolver } from '../sitemap/sitemap-resolver';
import { CrawlingQueue } from './crawling-queue';
import { CrawlingStatisticsTracker } from './crawling-statistics';
import {
  CrawledPage,
  CrawlingConfig,
  CrawlPhase,
  CrawlProgressListener,
  CrawlResult,
  DomainDescriptor,
  FrontierEntry,
  PageRecord,
} from './crawling.types';
import { LinkGraph } from './link-graph';
import { LinkDiscoverer, LinkExtractor } from './link-discoverer';
import { NavigationLinkDetector } from './navigation-link-detector';
import { createDomainDescriptor, isSameDomain } from './url-normalizer';

export interface CrawlSessionDependencies {
  fetcher?: PageFetcher;
  linkExtractor?: LinkExtractor;
  metadataExtractor?: MetadataExtractor;
  contentExtractor?: ContentExtractor;
  sleep?: SleepFn;
  onProgress?: CrawlProgressListener;
}

export type CrawlSessionOptions = Partial<Omit<CrawlingConfig, 'startUrl'>> & {
  startUrl: string;
  contentLimit?: number;
};

export interface SeedOutcome {
  source: 'sitemap' | 'homepage';
  queued: number;
}

/**
 * Fill in defaults from the environment
 */
export function resolveCrawlingConfig(options: CrawlSessionOptions): CrawlingConfig {
  return {
    startUrl: options.startUrl,
    maxPages: options.maxPages ?? env.CRAWL_MAX_PAGES,
    delayMs: options.delayMs ?? env.CRAWL_DELAY_MS,
    navThreshold: options.navThreshold ?? env.NAV_THRESHOLD,
    useSitemap: options.useSitemap ?? true,
    sitemapUrl: options.sitemapUrl,
    sitemapMaxDepth: options.sitemapMaxDepth ?? env.SITEMAP_MAX_DEPTH,
  };
}

export class CrawlSession {
  readonly config: CrawlingConfig;
  readonly domain: DomainDescriptor;

  private currentPhase: CrawlPhase = CrawlPhase.INIT;
  private readonly frontier = new CrawlingQueue();
  private readonly detector: NavigationLinkDetector;
  private readonly graph: LinkGraph;
  private readonly statistics = new CrawlingStatisticsTracker();
  private readonly pages: PageRecord[] = [];

  private readonly fetcher: PageFetcher;
  private readonly linkExtractor: LinkExtractor;
  private readonly metadataExtractor: MetadataExtractor;
  private readonly contentExtractor: ContentExtractor;
  private readonly sleep: SleepFn;
  private readonly onProgress?: CrawlProgressListener;

  private sitemapUsed = false;
  private seedError?: string;
  private result: CrawlResult | null = null;

  /**
   * Throws InvalidEntryPointError for a start URL without scheme or host
   */
  constructor(options: CrawlSessionOptions, dependencies: CrawlSessionDependencies = {}) {
    this.config = resolveCrawlingConfig(options);

    if (!Number.isInteger(this.config.maxPages) || this.config.maxPages < 1) {
      throw new RangeError(`maxPages must be a positive integer, got ${this.config.maxPages}`);
    }

    const entryPoint = this.config.sitemapUrl ?? this.config.startUrl;
    this.domain = createDomainDescriptor(entryPoint);

    this.detector = new NavigationLinkDetector(this.config.navThreshold);
    this.graph = new LinkGraph(this.detector);

    this.fetcher = dependencies.fetcher ?? new HttpFetcher();
    this.linkExtractor = dependencies.linkExtractor ?? new LinkDiscoverer();
    this.metadataExtractor = dependencies.metadataExtractor ?? metadataExtractor;
    this.contentExtractor =
      dependencies.contentExtractor ??
      new ContentExtractor({ contentLimit: options.contentLimit ?? env.CONTENT_LIMIT });
    this.sleep = dependencies.sleep ?? defaultSleep;
    this.onProgress = dependencies.onProgress;
  }

  get phase(): CrawlPhase {
    return this.currentPhase;
  }

  isSitemapOnly(): boolean {
    return this.config.sitemapUrl !== undefined;
  }

  /**
   * Seed the frontier from a sitemap, or from the homepage when there is none
   */
  async seed(): Promise<SeedOutcome> {
    this.transition(CrawlPhase.INIT, CrawlPhase.SEEDING);
    const resolver = new SitemapResolver(
      this.fetcher,
      this.domain,
      { delayMs: this.config.delayMs, maxDepth: this.config.sitemapMaxDepth },
      this.sleep
    );

    let outcome: SeedOutcome;

    if (this.config.sitemapUrl !== undefined) {
      console.log(`Fetching sitemap from: ${this.config.sitemapUrl}`);
      const urls = await resolver.resolveSitemapUrl(this.config.sitemapUrl);
      this.sitemapUsed = true;

      if (urls) {
        if (urls.length > this.config.maxPages) {
          console.log(`Limiting to ${this.config.maxPages} pages`);
        }
        urls.slice(0, this.config.maxPages).forEach((url) => this.frontier.enqueue(url));
      } else {
        this.seedError = `Could not load any URLs from sitemap ${this.config.sitemapUrl}`;
        console.error(`Error: ${this.seedError}`);
      }
      outcome = { source: 'sitemap', queued: this.frontier.size() };
    } else {
      const urls = this.config.useSitemap ? await resolver.resolveSitemap() : null;
      if (!this.config.useSitemap) {
        console.log('Skipping sitemap.xml check as requested');
      }

      if (urls) {
        this.sitemapUsed = true;
        urls.forEach((url) => this.frontier.enqueue(url));
        outcome = { source: 'sitemap', queued: this.frontier.size() };
      } else {
        this.frontier.enqueue(this.config.startUrl);
        outcome = { source: 'homepage', queued: 1 };
      }
    }

    this.onProgress?.({ type: 'seeded', ...outcome });
    return outcome;
  }

  /**
   * Drain the frontier until it is empty or maxPages URLs have been visited.
   * Fetch and extraction failures are recorded, never thrown.
   */
  async run(): Promise<void> {
    this.transition(CrawlPhase.SEEDING, CrawlPhase.CRAWLING);
    const total = this.isSitemapOnly() ? this.frontier.size() : this.config.maxPages;

    while (!this.frontier.isEmpty() && this.frontier.visitedCount() < this.config.maxPages) {
      const entry = this.frontier.dequeue();
      if (!entry) break;

      if (!this.frontier.markVisited(entry.url)) {
        this.statistics.recordSkipped();
        continue;
      }

      const index = this.frontier.visitedCount();
      console.log(`Crawling ${index}/${total}: ${entry.url}`);

      const record = await this.processEntry(entry);
      this.pages.push(record);
      this.onProgress?.({ type: 'page', index, total, url: entry.url, status: record.status });

      await this.sleep(this.config.delayMs);
    }

    this.statistics.stop();
  }

  /**
   * Classify navigation links, filter the graph and build the result
   */
  finalize(): CrawlResult {
    this.transition(CrawlPhase.CRAWLING, CrawlPhase.CLASSIFYING);

    console.log('Analyzing link structure and detecting navigation links...');
    const globalLinks = this.detector.classify();
    console.log(`Detected ${globalLinks.size} global/navigation links`);
    this.graph.applyGlobalFiltering(globalLinks);
    this.onProgress?.({ type: 'classified', globalLinks: globalLinks.size });

    for (const page of this.pages) {
      if (page.status !== 'crawled') continue;

      page.backlinksCount = this.graph.backlinkCountOf(page.url);
      page.filteredInternalLinks = this.graph.outgoingOf(page.url, true);
      page.filteredInternalLinksCount = page.filteredInternalLinks.length;
      page.filteredBacklinksCount = this.graph.backlinkCountOf(page.url, true);
      page.navLinks = page.internalLinks.filter((link) => globalLinks.has(link));
      page.navLinksCount = page.navLinks.length;
    }

    const result: CrawlResult = {
      startUrl: this.config.startUrl,
      baseDomain: this.domain.host,
      sitemapUsed: this.sitemapUsed,
      sitemapOnly: this.isSitemapOnly(),
      pagesCrawled: this.pages.length,
      maxPages: this.config.maxPages,
      navThreshold: this.config.navThreshold,
      navLinksDetected: globalLinks.size,
      pages: this.pages,
      linkStructure: this.graph.toLinkStructure(),
      statistics: this.statistics.getStatistics(),
    };

    if (this.config.sitemapUrl !== undefined) {
      result.sitemapUrl = this.config.sitemapUrl;
    }
    if (this.seedError) {
      result.error = this.seedError;
    }

    this.result = result;
    this.currentPhase = CrawlPhase.DONE;
    return result;
  }

  /**
   * seed → run → finalize
   */
  async crawl(): Promise<CrawlResult> {
    await this.seed();
    await this.run();
    return this.finalize();
  }

  getResult(): CrawlResult | null {
    return this.result;
  }

  private async processEntry(entry: FrontierEntry): Promise<PageRecord> {
    const fromSitemap = this.sitemapUsed && entry.depth === 0;
    const startedAt = Date.now();
    const response = await this.fetcher.fetch(entry.url);
    const elapsed = Date.now() - startedAt;

    if (!response.ok) {
      this.statistics.recordFailed(entry.depth, elapsed);
      return {
        status: 'failed',
        url: entry.url,
        depth: entry.depth,
        statusCode: response.statusCode,
        errorType: response.error.type,
        error:
          response.statusCode !== null
            ? `Failed to fetch content (Status code: ${response.statusCode})`
            : `Failed to fetch content (${response.error.message})`,
        fromSitemap,
      };
    }

    let metadata: PageMetadata;
    let content: PageContent;
    let internalLinks: string[];
    try {
      metadata = this.metadataExtractor.extract(response.body, entry.url);
      content = this.contentExtractor.extract(response.body, entry.url);
      internalLinks = this.linkExtractor
        .extractLinks(response.body, entry.url, this.domain)
        .filter((link) => isSameDomain(link, this.domain));
    } catch (error) {
      // Nothing reaches the graph for a page that could not be processed
      const classified = classifyError(error);
      console.error(`Failed to process ${entry.url}: ${classified.message}`);
      this.statistics.recordFailed(entry.depth, elapsed);
      return {
        status: 'failed',
        url: entry.url,
        depth: entry.depth,
        statusCode: response.statusCode,
        errorType: classified.type,
        error: `Failed to process content (${classified.message})`,
        fromSitemap,
      };
    }

    this.graph.addPageLinks(entry.url, internalLinks);
    this.statistics.recordPageVisit(entry.depth, elapsed);
    this.statistics.recordLinkDiscovery(internalLinks.length);

    // Sitemap-only crawls keep a fixed frontier
    if (!this.isSitemapOnly()) {
      for (const link of internalLinks) {
        this.frontier.enqueue(link, entry.depth + 1, entry.url);
      }
    }

    const page: CrawledPage = {
      status: 'crawled',
      url: entry.url,
      depth: entry.depth,
      statusCode: response.statusCode,
      title: metadata.title.content,
      metadata,
      content,
      internalLinks,
      internalLinksCount: internalLinks.length,
      backlinksCount: this.graph.backlinkCountOf(entry.url),
      fromSitemap,
    };

    return page;
  }

  private transition(expected: CrawlPhase, next: CrawlPhase): void {
    if (this.currentPhase !== expected) {
      throw new CrawlStateError(
        `Cannot enter ${next} phase from ${this.currentPhase}; expected ${expected}`
      );
    }
    this.currentPhase = next;
  }
}

export type CrawlSessionFactory = (
  options: CrawlSessionOptions,
  dependencies?: CrawlSessionDependencies
) => CrawlSession;

export const createCrawlSession: CrawlSessionFactory = (options, dependencies) =>
  new CrawlSession(options, dependencies);
