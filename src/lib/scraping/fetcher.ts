/**
 * Page Fetcher
 * Uses native fetch with an AbortController timeout.
 * Failures come back as values so a crawl loop never has to catch.
 */

import { env } from '../../config/env';
import { classifyError, classifyStatus, ScrapingError } from './errors';

export type FetchResult =
  | {
      ok: true;
      url: string;
      body: string;
      statusCode: number;
      contentType: string;
    }
  | {
      ok: false;
      url: string;
      statusCode: number | null;
      error: ScrapingError;
    };

export interface PageFetcher {
  fetch(url: string): Promise<FetchResult>;
}

export interface HttpFetcherOptions {
  timeout?: number;
  userAgent?: string;
}

/**
 * Only a plain 200 counts as a retrievable page
 */
export function isRetrievableStatus(statusCode: number): boolean {
  return statusCode === 200;
}

export class HttpFetcher implements PageFetcher {
  private readonly timeout: number;
  private readonly userAgent: string;

  constructor(options: HttpFetcherOptions = {}) {
    this.timeout = options.timeout ?? env.FETCH_TIMEOUT;
    this.userAgent = options.userAgent ?? env.USER_AGENT;
  }

  async fetch(url: string): Promise<FetchResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.userAgent,
          'Accept': 'text/html, application/xhtml+xml, application/xml;q=0.9, */*;q=0.8',
        },
        redirect: 'follow',
        signal: controller.signal,
      });
      const body = await response.text();

      if (!isRetrievableStatus(response.status)) {
        return {
          ok: false,
          url,
          statusCode: response.status,
          error: classifyStatus(response.status),
        };
      }

      return {
        ok: true,
        url,
        body,
        statusCode: response.status,
        contentType: response.headers.get('content-type') || 'text/html',
      };
    } catch (error) {
      const classified = classifyError(error);
      console.error(`Error fetching URL: ${url} (${classified.type}: ${classified.message})`);
      return {
        ok: false,
        url,
        statusCode: null,
        error: classified,
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
