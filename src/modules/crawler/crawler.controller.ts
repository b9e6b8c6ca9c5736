/**
 * Crawler Controller
 * HTTP request/response handling for crawl job endpoints
 */

import { Request, Response } from 'express';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { CrawlerService, crawlerService } from './crawler.service';
import { CrawlJobListResponse, CrawlJobResponse, CreateCrawlJobRequest } from './crawler.types';

export class CrawlerController {
  constructor(private readonly service: CrawlerService = crawlerService) {}

  /**
   * POST /api/crawls
   * Queue a new crawl job
   */
  createJob = asyncHandler(async (req: Request, res: Response) => {
    const body: CreateCrawlJobRequest =
      typeof req.body === 'object' && req.body !== null ? req.body : {};

    const job = await this.service.createJob(body);

    const response: CrawlJobResponse = {
      success: true,
      job,
    };

    res.status(201).json(response);
  });

  /**
   * GET /api/crawls/:id
   */
  getJob = asyncHandler(async (req: Request, res: Response) => {
    const job = await this.service.getJob(req.params.id);

    if (!job) {
      throw new ApiError(404, 'Crawl job not found');
    }

    const response: CrawlJobResponse = {
      success: true,
      job,
    };

    res.json(response);
  });

  /**
   * GET /api/crawls
   * Recent crawl jobs, newest first
   */
  getJobs = asyncHandler(async (req: Request, res: Response) => {
    const limit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) || 20 : 20;
    const jobs = await this.service.getRecentJobs(limit);

    const response: CrawlJobListResponse = {
      success: true,
      jobs,
      total: jobs.length,
      limit,
    };

    res.json(response);
  });

  /**
   * DELETE /api/crawls/:id
   */
  deleteJob = asyncHandler(async (req: Request, res: Response) => {
    const deleted = await this.service.deleteJob(req.params.id);

    if (!deleted) {
      throw new ApiError(404, 'Crawl job not found');
    }

    res.json({
      success: true,
      message: 'Job deleted successfully',
    });
  });
}

export const crawlerController = new CrawlerController();
