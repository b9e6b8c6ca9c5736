/**
 * Sitemap System
 * Main export file for sitemap discovery and parsing
 */

export * from './sitemap.types';
export * from './sitemap.parser';
export * from './sitemap-resolver';
