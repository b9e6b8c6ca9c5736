/**
 * Crawl Session Tests
 * End-to-end crawls against an in-process fake site
 */

import { sitePage, urlSet } from '../../../__tests__/helpers/fixtures';
import { FakeFetcher, noSleep } from '../../../__tests__/helpers/mocks';
import { CrawlStateError, InvalidEntryPointError, ScrapingErrorType } from '../../scraping/errors';
import { CrawlSession, CrawlSessionDependencies, CrawlSessionOptions } from '../crawl-session';
import { CrawledPage, CrawlPhase, PageRecord } from '../crawling.types';
import { LinkDiscoverer, LinkExtractor } from '../link-discoverer';

const url = (path: string) => `https://example.com${path}`;
const NAV = ['/', '/about', '/blog'];

/**
 * Five pages sharing a three-link navigation block
 */
function blogSite(): FakeFetcher {
  return new FakeFetcher({
    [url('/')]: sitePage({ title: 'Home', navLinks: NAV, bodyLinks: ['/blog/post-1'] }),
    [url('/about')]: sitePage({ title: 'About', navLinks: NAV }),
    [url('/blog')]: sitePage({
      title: 'Blog',
      navLinks: NAV,
      bodyLinks: ['/blog/post-1', '/blog/post-2'],
    }),
    [url('/blog/post-1')]: sitePage({ title: 'Post 1', navLinks: NAV, bodyLinks: ['/blog/post-2'] }),
    [url('/blog/post-2')]: sitePage({ title: 'Post 2', navLinks: NAV, bodyLinks: ['/about'] }),
  });
}

function session(
  options: Partial<CrawlSessionOptions>,
  fetcher: FakeFetcher,
  dependencies: CrawlSessionDependencies = {}
): CrawlSession {
  return new CrawlSession(
    { startUrl: url('/'), maxPages: 100, delayMs: 0, navThreshold: 0.8, ...options },
    { fetcher, sleep: noSleep, ...dependencies }
  );
}

function crawledPage(pages: PageRecord[], pageUrl: string): CrawledPage {
  const page = pages.find((p) => p.url === pageUrl);
  if (!page || page.status !== 'crawled') {
    throw new Error(`No crawled page for ${pageUrl}`);
  }
  return page;
}

const pageFetches = (fetcher: FakeFetcher) =>
  fetcher.requested.filter((requested) => !requested.endsWith('.xml'));

describe('CrawlSession', () => {
  describe('seeding', () => {
    it('should fall back to the raw start URL when there is no sitemap', async () => {
      const fetcher = new FakeFetcher({
        'https://example.com': sitePage({ bodyLinks: ['/about'] }),
        [url('/about')]: sitePage(),
      });
      const crawl = session({ startUrl: 'https://example.com' }, fetcher);

      await expect(crawl.seed()).resolves.toEqual({ source: 'homepage', queued: 1 });
      expect(fetcher.requested).toEqual([url('/sitemap.xml')]);

      await crawl.run();
      const result = crawl.finalize();

      expect(result.sitemapUsed).toBe(false);
      expect(fetcher.requested).toEqual([url('/sitemap.xml'), 'https://example.com', url('/about')]);
      expect(result.pages.map((p) => p.url)).toEqual(['https://example.com', url('/about')]);
    });

    it('should skip the sitemap check when asked to', async () => {
      const fetcher = blogSite();
      await session({ useSitemap: false, maxPages: 1 }, fetcher).crawl();

      expect(fetcher.requested).toEqual([url('/')]);
    });

    it('should seed from the sitemap and still follow links', async () => {
      const fetcher = new FakeFetcher({
        [url('/sitemap.xml')]: urlSet([url('/'), url('/about')]),
        [url('/')]: sitePage({ bodyLinks: ['/blog'] }),
        [url('/about')]: sitePage(),
        [url('/blog')]: sitePage(),
      });

      const result = await session({}, fetcher).crawl();

      expect(result.sitemapUsed).toBe(true);
      expect(result.pages.map((p) => [p.url, p.fromSitemap])).toEqual([
        [url('/'), true],
        [url('/about'), true],
        [url('/blog'), false],
      ]);
    });
  });

  describe('graph-following crawl', () => {
    it('should visit pages breadth-first', async () => {
      const result = await session({ useSitemap: false }, blogSite()).crawl();

      expect(result.pages.map((p) => [p.url, p.depth])).toEqual([
        [url('/'), 0],
        [url('/about'), 1],
        [url('/blog'), 1],
        [url('/blog/post-1'), 1],
        [url('/blog/post-2'), 2],
      ]);
      expect(result.pagesCrawled).toBe(5);
      expect(result.statistics.depthReached).toBe(2);
      expect(result.statistics.linksDiscovered).toBe(20);
    });

    it('should classify the shared navigation as global links', async () => {
      const result = await session({ useSitemap: false }, blogSite()).crawl();

      expect(result.navLinksDetected).toBe(3);
      expect(result.linkStructure.globalLinks?.globalLinks).toEqual([url('/'), url('/about'), url('/blog')]);
      expect(result.linkStructure.globalLinks?.thresholdCount).toBe(4);
      expect(result.linkStructure.linkStats.totalLinksMapped).toBe(19);

      const home = crawledPage(result.pages, url('/'));
      expect(home.title).toBe('Home');
      expect(home.internalLinks).toEqual([url('/'), url('/about'), url('/blog'), url('/blog/post-1')]);
      expect(home.filteredInternalLinks).toEqual([url('/blog/post-1')]);
      expect(home.filteredInternalLinksCount).toBe(1);
      expect(home.navLinks).toEqual([url('/'), url('/about'), url('/blog')]);
      expect(home.navLinksCount).toBe(3);
    });

    it('should recompute backlink counts once the crawl is finished', async () => {
      const result = await session({ useSitemap: false }, blogSite()).crawl();

      const about = crawledPage(result.pages, url('/about'));
      expect(about.backlinksCount).toBe(5);

      // Linked from /blog (global) and /blog/post-1
      const post2 = crawledPage(result.pages, url('/blog/post-2'));
      expect(post2.backlinksCount).toBe(2);
      expect(post2.filteredBacklinksCount).toBe(1);

      // Linked only from global pages
      const post1 = crawledPage(result.pages, url('/blog/post-1'));
      expect(post1.backlinksCount).toBe(2);
      expect(post1.filteredBacklinksCount).toBe(0);
    });

    it('should stop at maxPages', async () => {
      const fetcher = blogSite();
      const result = await session({ useSitemap: false, maxPages: 3 }, fetcher).crawl();

      expect(result.pagesCrawled).toBe(3);
      expect(pageFetches(fetcher)).toEqual([url('/'), url('/about'), url('/blog')]);
    });

    it('should fetch a page once however its fragments differ', async () => {
      const fetcher = new FakeFetcher({
        [url('/')]: sitePage({ bodyLinks: ['/page#one', '/page#two', '/page'] }),
        [url('/page')]: sitePage({ bodyLinks: ['/#top'] }),
      });

      const result = await session({ useSitemap: false }, fetcher).crawl();

      expect(pageFetches(fetcher)).toEqual([url('/'), url('/page')]);
      expect(result.linkStructure.outgoingLinks[url('/')]).toEqual([url('/page')]);
    });

    it('should wait the configured delay after every page', async () => {
      const sleep = jest.fn(async () => undefined);
      await session({ useSitemap: false, delayMs: 300 }, blogSite(), { sleep }).crawl();

      expect(sleep).toHaveBeenCalledTimes(5);
      expect(sleep).toHaveBeenCalledWith(300);
    });

    it('should apply the content limit', async () => {
      const fetcher = new FakeFetcher({ [url('/')]: sitePage({ body: 'abcdefghij' }) });
      const result = await session({ useSitemap: false, contentLimit: 4 }, fetcher).crawl();

      const home = crawledPage(result.pages, url('/'));
      expect(home.content.content).toBe('abcd');
      expect(home.content.truncated).toBe(true);
    });
  });

  describe('failures', () => {
    it('should record a 500 as a failed page that counts toward the cap', async () => {
      const fetcher = new FakeFetcher({
        [url('/')]: sitePage({ bodyLinks: ['/broken', '/about'] }),
        [url('/broken')]: { status: 500, body: 'oops' },
        [url('/about')]: sitePage(),
      });

      const result = await session({ useSitemap: false, maxPages: 2 }, fetcher).crawl();

      expect(result.pages[1]).toEqual({
        status: 'failed',
        url: url('/broken'),
        depth: 1,
        statusCode: 500,
        errorType: ScrapingErrorType.SERVER_ERROR,
        error: 'Failed to fetch content (Status code: 500)',
        fromSitemap: false,
      });
      expect(pageFetches(fetcher)).toEqual([url('/'), url('/broken')]);
      expect(Object.keys(result.linkStructure.outgoingLinks)).toEqual([url('/')]);
      expect(result.statistics.pagesFailed).toBe(1);
      expect(result.statistics.successRate).toBe(0.5);
    });

    it('should record a page that cannot be processed and keep crawling', async () => {
      const fetcher = new FakeFetcher({
        [url('/')]: sitePage({ bodyLinks: ['/a', '/b'] }),
        [url('/a')]: sitePage({ bodyLinks: ['/c'] }),
        [url('/b')]: sitePage(),
      });
      const discoverer = new LinkDiscoverer();
      const linkExtractor: LinkExtractor = {
        extractLinks: (html, baseUrl, domain) => {
          if (baseUrl === url('/a')) {
            throw new Error('boom');
          }
          return discoverer.extractLinks(html, baseUrl, domain);
        },
      };
      const delays: number[] = [];
      const sleep = async (ms: number) => {
        delays.push(ms);
      };

      const crawl = session({ useSitemap: false, delayMs: 5 }, fetcher, { linkExtractor, sleep });
      const result = await crawl.crawl();

      expect(crawl.phase).toBe(CrawlPhase.DONE);
      expect(result.pages.map((p) => p.url)).toEqual([url('/'), url('/a'), url('/b')]);
      expect(result.pages[1]).toEqual({
        status: 'failed',
        url: url('/a'),
        depth: 1,
        statusCode: 200,
        errorType: ScrapingErrorType.UNKNOWN,
        error: 'Failed to process content (boom)',
        fromSitemap: false,
      });
      expect(pageFetches(fetcher)).toEqual([url('/'), url('/a'), url('/b')]);
      expect(Object.keys(result.linkStructure.outgoingLinks)).toEqual([url('/')]);
      expect(result.statistics.pagesFailed).toBe(1);
      expect(delays).toEqual([5, 5, 5]);
    });

    it('should record a page without response with a null status code', async () => {
      const fetcher = new FakeFetcher({
        [url('/')]: { networkError: 'connect ECONNREFUSED' },
      });

      const result = await session({ useSitemap: false }, fetcher).crawl();

      expect(result.pages).toHaveLength(1);
      expect(result.pages[0]).toMatchObject({
        status: 'failed',
        statusCode: null,
        errorType: ScrapingErrorType.NETWORK_ERROR,
        error: 'Failed to fetch content (connect ECONNREFUSED)',
      });
      expect(result.navLinksDetected).toBe(0);
    });
  });

  describe('sitemap-only mode', () => {
    const SITEMAP = url('/sitemap-pages.xml');

    it('should crawl the listed URLs without following links', async () => {
      const fetcher = new FakeFetcher({
        [SITEMAP]: urlSet([url('/'), url('/about'), url('/contact')]),
        [url('/')]: sitePage({ bodyLinks: ['/blog'] }),
        [url('/about')]: sitePage(),
        [url('/contact')]: sitePage(),
        [url('/blog')]: sitePage(),
      });

      const result = await session(
        { startUrl: 'https://example.com', sitemapUrl: SITEMAP, maxPages: 2 },
        fetcher
      ).crawl();

      expect(fetcher.requested).toEqual([SITEMAP, url('/'), url('/about')]);
      expect(result.sitemapOnly).toBe(true);
      expect(result.sitemapUrl).toBe(SITEMAP);
      expect(result.linkStructure.outgoingLinks[url('/')]).toEqual([url('/blog')]);
    });

    it('should report a sitemap that cannot be loaded', async () => {
      const result = await session({ sitemapUrl: url('/missing.xml') }, new FakeFetcher()).crawl();

      expect(result.pages).toEqual([]);
      expect(result.error).toBe('Could not load any URLs from sitemap https://example.com/missing.xml');
    });
  });

  describe('lifecycle', () => {
    it('should move through the phases in order', async () => {
      const crawl = session({ useSitemap: false }, blogSite());
      expect(crawl.phase).toBe(CrawlPhase.INIT);

      await crawl.seed();
      expect(crawl.phase).toBe(CrawlPhase.SEEDING);

      await crawl.run();
      expect(crawl.phase).toBe(CrawlPhase.CRAWLING);

      const result = crawl.finalize();
      expect(crawl.phase).toBe(CrawlPhase.DONE);
      expect(crawl.getResult()).toBe(result);
    });

    it('should refuse to finalize before running', async () => {
      const crawl = session({ useSitemap: false }, blogSite());
      await crawl.seed();

      expect(() => crawl.finalize()).toThrow(CrawlStateError);
    });

    it('should refuse to run before seeding', async () => {
      await expect(session({}, blogSite()).run()).rejects.toThrow(CrawlStateError);
    });

    it('should not be reusable', async () => {
      const crawl = session({ useSitemap: false }, blogSite());
      await crawl.crawl();

      await expect(crawl.crawl()).rejects.toThrow(CrawlStateError);
      expect(() => crawl.finalize()).toThrow(CrawlStateError);
    });

    it('should report progress', async () => {
      const onProgress = jest.fn();
      await session({ useSitemap: false, maxPages: 2 }, blogSite(), { onProgress }).crawl();

      expect(onProgress.mock.calls.map(([event]) => event)).toEqual([
        { type: 'seeded', source: 'homepage', queued: 1 },
        { type: 'page', index: 1, total: 2, url: url('/'), status: 'crawled' },
        { type: 'page', index: 2, total: 2, url: url('/about'), status: 'crawled' },
        { type: 'classified', globalLinks: 3 },
      ]);
    });
  });

  describe('configuration', () => {
    it('should reject an invalid entry point at construction', () => {
      expect(() => session({ startUrl: 'example.com' }, new FakeFetcher())).toThrow(
        InvalidEntryPointError
      );
    });

    it('should reject a non-positive page cap', () => {
      expect(() => session({ maxPages: 0 }, new FakeFetcher())).toThrow(RangeError);
    });
  });
});
