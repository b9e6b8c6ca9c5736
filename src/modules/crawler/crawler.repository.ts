/**
 * Crawler Repository
 * Data access layer for crawl jobs
 */

import { HydratedDocument, isValidObjectId, UpdateQuery } from 'mongoose';
import { CrawlJobModel } from './crawler.model';
import {
  CrawlJobAttributes,
  CrawlJobOptions,
  CrawlJobRecord,
  CrawlJobStatus,
  CrawlJobStore,
  CrawlJobUpdate,
} from './crawler.types';

function toRecord(doc: HydratedDocument<CrawlJobAttributes>): CrawlJobRecord {
  return {
    id: doc._id.toString(),
    url: doc.url,
    status: doc.status,
    options: doc.options,
    result: doc.result,
    error: doc.error,
    startedAt: doc.startedAt,
    completedAt: doc.completedAt,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class CrawlJobRepository implements CrawlJobStore {
  /**
   * Create a new crawl job
   */
  async create(url: string, options: CrawlJobOptions): Promise<CrawlJobRecord> {
    const job = new CrawlJobModel({ url, options, status: CrawlJobStatus.QUEUED });
    return toRecord(await job.save());
  }

  /**
   * Find job by ID
   */
  async findById(id: string): Promise<CrawlJobRecord | null> {
    if (!isValidObjectId(id)) {
      return null;
    }
    const job = await CrawlJobModel.findById(id);
    return job ? toRecord(job) : null;
  }

  /**
   * Update job status, stamping start and completion times
   */
  async updateStatus(
    id: string,
    status: CrawlJobStatus,
    fields: CrawlJobUpdate = {}
  ): Promise<CrawlJobRecord | null> {
    const update: UpdateQuery<CrawlJobAttributes> = { status, ...fields };

    if (status === CrawlJobStatus.RUNNING) {
      update.startedAt = new Date();
    } else if (status === CrawlJobStatus.COMPLETED || status === CrawlJobStatus.FAILED) {
      update.completedAt = new Date();
    }

    const job = await CrawlJobModel.findByIdAndUpdate(id, update, { new: true });
    return job ? toRecord(job) : null;
  }

  /**
   * Get recent jobs, without their (large) results
   */
  async getRecent(limit: number = 10): Promise<CrawlJobRecord[]> {
    const jobs = await CrawlJobModel.find()
      .select('-result')
      .sort({ createdAt: -1 })
      .limit(limit);
    return jobs.map(toRecord);
  }

  /**
   * Delete job
   */
  async delete(id: string): Promise<boolean> {
    if (!isValidObjectId(id)) {
      return false;
    }
    const result = await CrawlJobModel.findByIdAndDelete(id);
    return result !== null;
  }
}

export const crawlJobRepository = new CrawlJobRepository();
