/**
 * Crawler Module Types
 * Crawl jobs run through the HTTP API
 */

import type { CrawlResult } from '../../lib/crawling';

// ============================================================================
// Enums
// ============================================================================

export enum CrawlJobStatus {
  QUEUED = 'queued',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

// ============================================================================
// Core Interfaces
// ============================================================================

export interface CrawlJobOptions {
  startUrl: string;
  sitemapUrl?: string;
  maxPages: number;
  delayMs: number;
  navThreshold: number;
  useSitemap: boolean;
  contentLimit?: number;
}

/**
 * Stored shape of a crawl job
 */
export interface CrawlJobAttributes {
  url: string;
  status: CrawlJobStatus;
  options: CrawlJobOptions;
  result?: CrawlResult;
  error?: string;
  startedAt?: Date;
  completedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface CrawlJobRecord extends CrawlJobAttributes {
  id: string;
}

export type CrawlJobUpdate = Partial<Pick<CrawlJobAttributes, 'result' | 'error'>>;

/**
 * Persistence boundary for crawl jobs
 */
export interface CrawlJobStore {
  create(url: string, options: CrawlJobOptions): Promise<CrawlJobRecord>;
  findById(id: string): Promise<CrawlJobRecord | null>;
  updateStatus(id: string, status: CrawlJobStatus, update?: CrawlJobUpdate): Promise<CrawlJobRecord | null>;
  getRecent(limit: number): Promise<CrawlJobRecord[]>;
  delete(id: string): Promise<boolean>;
}

// ============================================================================
// API Request/Response Types
// ============================================================================

export interface CreateCrawlJobRequest {
  url?: unknown;
  sitemapUrl?: unknown;
  maxPages?: unknown;
  delayMs?: unknown;
  navThreshold?: unknown;
  useSitemap?: unknown;
  contentLimit?: unknown;
}

export interface CrawlJobResponse {
  success: boolean;
  job: CrawlJobRecord;
}

export interface CrawlJobListResponse {
  success: boolean;
  jobs: CrawlJobRecord[];
  total: number;
  limit: number;
}
