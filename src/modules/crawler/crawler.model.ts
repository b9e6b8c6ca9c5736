/**
 * Crawler MongoDB Model
 * Mongoose schema for crawl jobs
 */

import mongoose, { Schema } from 'mongoose';
import { CrawlJobAttributes, CrawlJobStatus } from './crawler.types';

const CrawlJobOptionsSchema = new Schema(
  {
    startUrl: {
      type: String,
      required: true,
    },
    sitemapUrl: String,
    maxPages: {
      type: Number,
      required: true,
      min: 1,
    },
    delayMs: {
      type: Number,
      default: 0,
    },
    navThreshold: {
      type: Number,
      min: 0,
      max: 1,
    },
    useSitemap: {
      type: Boolean,
      default: true,
    },
    contentLimit: Number,
  },
  { _id: false }
);

const CrawlJobSchema = new Schema<CrawlJobAttributes>(
  {
    url: {
      type: String,
      required: true,
      trim: true,
    },
    status: {
      type: String,
      enum: Object.values(CrawlJobStatus),
      default: CrawlJobStatus.QUEUED,
      index: true,
    },
    options: {
      type: CrawlJobOptionsSchema,
      required: true,
    },
    // Crawl results are large, loosely structured documents
    result: Schema.Types.Mixed,
    error: String,
    startedAt: Date,
    completedAt: Date,
  },
  {
    timestamps: true,
    versionKey: false,
  }
);

CrawlJobSchema.index({ createdAt: -1 });
CrawlJobSchema.index({ status: 1, createdAt: -1 });

export const CrawlJobModel = mongoose.model<CrawlJobAttributes>('CrawlJob', CrawlJobSchema);
