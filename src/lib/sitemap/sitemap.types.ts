/**
 * Type definitions for sitemap processing
 */

export const SITEMAP_NAMESPACE = 'http://www.sitemaps.org/schemas/sitemap/0.9';

/**
 * Sitemap index: entries point at other sitemaps
 */
export interface SitemapIndexNode {
  kind: 'index';
  sitemaps: string[];
}

/**
 * Flat URL list
 */
export interface SitemapUrlSetNode {
  kind: 'urlset';
  urls: string[];
}

export type SitemapNode = SitemapIndexNode | SitemapUrlSetNode;

export interface SitemapResolverOptions {
  /**
   * Pause after each nested sitemap fetch, in milliseconds
   */
  delayMs: number;

  /**
   * Nested index levels to follow below the root sitemap
   */
  maxDepth: number;
}

export class SitemapParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SitemapParseError';
  }
}
