/**
 * Crawling System
 * Main export file for the domain crawl, link graph and navigation classifier
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './link-discoverer';
export * from './crawling-queue';
export * from './crawling-statistics';
export * from './link-graph';
export * from './navigation-link-detector';
export * from './crawl-session';
