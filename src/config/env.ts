import dotenv from 'dotenv';

dotenv.config();

const optionalInt = (value: string | undefined): number | undefined => {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
};

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Database
  MONGODB_URI: process.env.MONGODB_URI || 'mongodb://localhost:27017/link-cluster-crawler',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Fetching
  USER_AGENT: process.env.USER_AGENT || 'Mozilla/5.0 (compatible; LinkClusterCrawler/1.0)',
  FETCH_TIMEOUT: parseInt(process.env.FETCH_TIMEOUT || '30000', 10), // 30s per request

  // Crawling
  CRAWL_MAX_PAGES: parseInt(process.env.CRAWL_MAX_PAGES || '100', 10),
  CRAWL_DELAY_MS: parseInt(process.env.CRAWL_DELAY_MS || '500', 10),
  NAV_THRESHOLD: parseFloat(process.env.NAV_THRESHOLD || '0.8'), // 80% of pages
  SITEMAP_MAX_DEPTH: parseInt(process.env.SITEMAP_MAX_DEPTH || '5', 10),
  CONTENT_LIMIT: optionalInt(process.env.CONTENT_LIMIT), // Default: no limit

  // Output
  OUTPUT_FILE: process.env.OUTPUT_FILE || 'crawl-results.json',
} as const;

export default env;
