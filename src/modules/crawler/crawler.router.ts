/**
 * Crawler Router
 * Route definitions for crawl job endpoints
 */

import { Router } from 'express';
import { CrawlerController, crawlerController } from './crawler.controller';

export const createCrawlerRouter = (controller: CrawlerController = crawlerController): Router => {
  const router = Router();

  /**
   * @route   POST /api/crawls
   * @desc    Queue a crawl of a website or sitemap
   */
  router.post('/', controller.createJob);

  /**
   * @route   GET /api/crawls
   * @desc    List recent crawl jobs
   */
  router.get('/', controller.getJobs);

  /**
   * @route   GET /api/crawls/:id
   * @desc    Get a crawl job with its result
   */
  router.get('/:id', controller.getJob);

  /**
   * @route   DELETE /api/crawls/:id
   * @desc    Delete a crawl job
   */
  router.delete('/:id', controller.deleteJob);

  return router;
};
