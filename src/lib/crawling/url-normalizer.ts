/**
 * URL Normalization Utilities
 * Domain matching, link filtering and the single canonicalization step
 */

import { InvalidEntryPointError } from '../scraping/errors';
import { DomainDescriptor } from './crawling.types';

const NON_CONTENT_SCHEMES = ['javascript:', 'mailto:', 'tel:'];
const CRAWLABLE_PROTOCOLS = ['http:', 'https:'];

/**
 * Strip a leading "www." from a host
 */
export function stripWww(host: string): string {
  return host.startsWith('www.') ? host.substring(4) : host;
}

function parseUrl(url: string, baseUrl?: string): URL | null {
  try {
    return baseUrl ? new URL(url, baseUrl) : new URL(url);
  } catch {
    return null;
  }
}

/**
 * Build the descriptor of the crawl root from the entry point URL
 */
export function createDomainDescriptor(startUrl: string): DomainDescriptor {
  const parsed = parseUrl(startUrl.trim());

  if (!parsed) {
    throw new InvalidEntryPointError(startUrl, 'not an absolute URL');
  }

  if (!CRAWLABLE_PROTOCOLS.includes(parsed.protocol)) {
    throw new InvalidEntryPointError(startUrl, `unsupported scheme "${parsed.protocol}"`);
  }

  if (!parsed.host) {
    throw new InvalidEntryPointError(startUrl, 'missing host');
  }

  const scheme = parsed.protocol.slice(0, -1);

  return {
    scheme,
    host: parsed.host,
    normalizedHost: stripWww(parsed.host),
    rootUrl: `${scheme}://${parsed.host}`,
  };
}

/**
 * Extract the host of a URL without its "www." prefix
 */
export function extractDomain(url: string): string {
  const parsed = parseUrl(url);
  return parsed ? stripWww(parsed.host) : '';
}

/**
 * Check if a URL belongs to the crawled domain, ignoring www vs non-www
 */
export function isSameDomain(url: string, domain: DomainDescriptor): boolean {
  const host = extractDomain(url);
  return host !== '' && host === domain.normalizedHost;
}

/**
 * Reject empty, fragment-only and non-retrievable hrefs
 */
export function isCrawlableLink(href: string): boolean {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#')) {
    return false;
  }

  const lower = trimmed.toLowerCase();
  return !NON_CONTENT_SCHEMES.some((scheme) => lower.startsWith(scheme));
}

/**
 * Check that a URL is absolute http(s)
 */
export function isHttpUrl(url: string): boolean {
  const parsed = parseUrl(url);
  return parsed !== null && CRAWLABLE_PROTOCOLS.includes(parsed.protocol);
}

// scheme://authority, authority as written
const AUTHORITY_PATTERN = /^[a-z][a-z0-9+.-]*:\/\/([^/?#]*)/i;

function stripFragment(url: string): string {
  const hashIdx = url.indexOf('#');
  return hashIdx === -1 ? url : url.slice(0, hashIdx);
}

/**
 * Resolve a reference against a base and drop its fragment.
 * Absolute references keep their text up to the fragment. Relative ones are
 * resolved against the base and keep the base's authority as written, so
 * default ports, bare origins, query order and trailing slashes all stay
 * as they appear and URLs differing only in those remain distinct.
 */
export function canonicalize(url: string, baseUrl?: string): string {
  if (!baseUrl || parseUrl(url)) {
    return stripFragment(url);
  }

  const resolved = parseUrl(url, baseUrl);
  if (!resolved) {
    return url;
  }
  resolved.hash = '';

  const base = parseUrl(baseUrl);
  const authority = AUTHORITY_PATTERN.exec(baseUrl)?.[1];
  if (base && authority && resolved.origin === base.origin) {
    return `${resolved.protocol}//${authority}${resolved.pathname}${resolved.search}`;
  }

  return resolved.href;
}
