/**
 * Crawler API Integration Tests
 * Drives the Express app over a loopback port with the job store and the
 * page fetcher replaced by in-process fakes
 */

import { createServer, Server } from 'http';
import { createApp } from '../../app';
import { CrawlerController } from '../../modules/crawler/crawler.controller';
import { CrawlerService } from '../../modules/crawler/crawler.service';
import { sitePage } from '../helpers/fixtures';
import { FakeFetcher, InMemoryCrawlJobStore, noSleep } from '../helpers/mocks';

describe('Crawler API', () => {
  let server: Server;
  let baseUrl: string;
  let service: CrawlerService;

  beforeEach(async () => {
    const fetcher = new FakeFetcher({
      'https://example.com/': sitePage({ title: 'Home', navLinks: ['/', '/about'] }),
      'https://example.com/about': sitePage({ title: 'About', navLinks: ['/', '/about'] }),
    });
    service = new CrawlerService(new InMemoryCrawlJobStore(), undefined, {
      fetcher,
      sleep: noSleep,
    });

    server = createServer(createApp({ crawlerController: new CrawlerController(service) }));
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Test server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await service.drain();
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
  });

  const post = (path: string, body: string) =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });

  it('should report health', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.success).toBe(true);
    expect(body.message).toBe('Link Cluster Crawler API is running');
  });

  it('should create, fetch, list and delete a crawl job', async () => {
    const created = await post('/api/crawls', JSON.stringify({ url: 'https://example.com/', useSitemap: false }));
    expect(created.status).toBe(201);

    const { job } = await created.json();
    expect(job.status).toBe('queued');
    expect(job.options).toEqual({
      startUrl: 'https://example.com/',
      maxPages: 100,
      delayMs: 0,
      navThreshold: 0.8,
      useSitemap: false,
    });

    await service.waitForJob(job.id);

    const fetched = await fetch(`${baseUrl}/api/crawls/${job.id}`);
    const { job: finished } = await fetched.json();
    expect(finished.status).toBe('completed');
    expect(finished.result.pagesCrawled).toBe(2);
    expect(finished.result.navLinksDetected).toBe(2);

    const listed = await (await fetch(`${baseUrl}/api/crawls?limit=5`)).json();
    expect(listed).toMatchObject({ success: true, total: 1, limit: 5 });
    expect(listed.jobs[0].id).toBe(job.id);

    const deleted = await fetch(`${baseUrl}/api/crawls/${job.id}`, { method: 'DELETE' });
    expect(await deleted.json()).toEqual({ success: true, message: 'Job deleted successfully' });

    const missing = await fetch(`${baseUrl}/api/crawls/${job.id}`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ success: false, error: 'Crawl job not found' });
  });

  it('should reject an invalid request', async () => {
    const response = await post('/api/crawls', JSON.stringify({ url: 'https://example.com/', navThreshold: 2 }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      success: false,
      error: 'navThreshold must be between 0.0 and 1.0',
    });
  });

  it('should reject malformed JSON', async () => {
    const response = await post('/api/crawls', '{"url":');

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ success: false, error: 'Invalid JSON body' });
  });

  it('should answer unknown routes with 404', async () => {
    const response = await fetch(`${baseUrl}/api/unknown`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      success: false,
      error: 'Route not found',
      path: '/api/unknown',
    });
  });
});
