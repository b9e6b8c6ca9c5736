/**
 * Crawler Service
 * Crawl job orchestration: validate the request, persist the job and run
 * the crawl in the background
 */

import { env } from '../../config/env';
import {
  createCrawlSession,
  createDomainDescriptor,
  CrawlSessionDependencies,
  CrawlSessionFactory,
} from '../../lib/crawling';
import { InvalidEntryPointError } from '../../lib/scraping/errors';
import { ApiError } from '../../middleware/error-handler';
import { crawlJobRepository } from './crawler.repository';
import {
  CrawlJobOptions,
  CrawlJobRecord,
  CrawlJobStatus,
  CrawlJobStore,
  CreateCrawlJobRequest,
} from './crawler.types';

const MAX_RECENT_JOBS = 100;

function validateEntryPoint(value: unknown, field: string): string {
  if (typeof value !== 'string' || !value.trim()) {
    throw new ApiError(400, `${field} is required`);
  }
  try {
    createDomainDescriptor(value);
  } catch (error) {
    if (error instanceof InvalidEntryPointError) {
      throw new ApiError(400, error.message);
    }
    throw error;
  }
  return value.trim();
}

function optionalNumber(
  value: unknown,
  field: string,
  check: (n: number) => boolean,
  requirement: string
): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || !check(value)) {
    throw new ApiError(400, `${field} must be ${requirement}`);
  }
  return value;
}

/**
 * Turn a request body into validated job options
 */
export function parseCrawlJobRequest(body: CreateCrawlJobRequest): CrawlJobOptions {
  const startUrl = validateEntryPoint(body.url, 'URL');
  const sitemapUrl =
    body.sitemapUrl === undefined || body.sitemapUrl === null
      ? undefined
      : validateEntryPoint(body.sitemapUrl, 'sitemapUrl');

  const maxPages = optionalNumber(
    body.maxPages,
    'maxPages',
    (n) => Number.isInteger(n) && n >= 1,
    'a positive integer'
  );
  const delayMs = optionalNumber(body.delayMs, 'delayMs', (n) => n >= 0, 'a non-negative number');
  const navThreshold = optionalNumber(
    body.navThreshold,
    'navThreshold',
    (n) => n >= 0 && n <= 1,
    'between 0.0 and 1.0'
  );
  const contentLimit = optionalNumber(
    body.contentLimit,
    'contentLimit',
    (n) => Number.isInteger(n) && n >= 1,
    'a positive integer'
  );

  const useSitemap = body.useSitemap ?? true;
  if (typeof useSitemap !== 'boolean') {
    throw new ApiError(400, 'useSitemap must be a boolean');
  }

  const options: CrawlJobOptions = {
    startUrl,
    maxPages: maxPages ?? env.CRAWL_MAX_PAGES,
    delayMs: delayMs ?? env.CRAWL_DELAY_MS,
    navThreshold: navThreshold ?? env.NAV_THRESHOLD,
    useSitemap,
  };
  if (sitemapUrl !== undefined) options.sitemapUrl = sitemapUrl;
  if (contentLimit !== undefined) options.contentLimit = contentLimit;

  return options;
}

export class CrawlerService {
  // Background crawls by job id
  private readonly running = new Map<string, Promise<void>>();

  constructor(
    private readonly store: CrawlJobStore = crawlJobRepository,
    private readonly sessionFactory: CrawlSessionFactory = createCrawlSession,
    private readonly sessionDependencies: CrawlSessionDependencies = {}
  ) {}

  /**
   * Create a job and start crawling in the background
   */
  async createJob(request: CreateCrawlJobRequest): Promise<CrawlJobRecord> {
    const options = parseCrawlJobRequest(request);
    const job = await this.store.create(options.startUrl, options);
    console.log(`Job ${job.id}: Queued crawl of ${options.startUrl}`);

    const execution = this.executeJob(job)
      .catch((error) => {
        console.error(`Error executing job ${job.id}:`, error);
      })
      .finally(() => {
        this.running.delete(job.id);
      });
    this.running.set(job.id, execution);

    return job;
  }

  private async executeJob(job: CrawlJobRecord): Promise<void> {
    await this.store.updateStatus(job.id, CrawlJobStatus.RUNNING);
    console.log(`Job ${job.id}: Crawl started`);

    try {
      const session = this.sessionFactory(job.options, this.sessionDependencies);
      const result = await session.crawl();

      await this.store.updateStatus(job.id, CrawlJobStatus.COMPLETED, { result });
      console.log(
        `Job ${job.id}: ✓ Crawled ${result.pagesCrawled} pages, ${result.navLinksDetected} navigation links detected`
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Crawl job ${job.id} failed:`, message);
      await this.store.updateStatus(job.id, CrawlJobStatus.FAILED, { error: message });
    }
  }

  async getJob(id: string): Promise<CrawlJobRecord | null> {
    return this.store.findById(id);
  }

  async getRecentJobs(limit: number = 20): Promise<CrawlJobRecord[]> {
    return this.store.getRecent(Math.min(Math.max(1, limit), MAX_RECENT_JOBS));
  }

  /**
   * Delete a job. Running jobs cannot be deleted.
   */
  async deleteJob(id: string): Promise<boolean> {
    if (this.running.has(id)) {
      throw new ApiError(409, 'Cannot delete a job while it is running');
    }
    return this.store.delete(id);
  }

  isRunning(id: string): boolean {
    return this.running.has(id);
  }

  /**
   * Resolves once the job's background crawl has settled
   */
  async waitForJob(id: string): Promise<void> {
    await this.running.get(id);
  }

  /**
   * Wait for every running crawl (used on shutdown)
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.running.values()));
  }
}

export const crawlerService = new CrawlerService();
