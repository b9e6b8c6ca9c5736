/**
 * Sitemap XML Parser
 * Reads index and urlset documents under the standard sitemap namespace
 */

import * as xpath from 'xpath';
import { DOMParser } from '@xmldom/xmldom';
import { SITEMAP_NAMESPACE, SitemapNode, SitemapParseError } from './sitemap.types';

const select = xpath.useNamespaces({ sm: SITEMAP_NAMESPACE });

function parseXml(xml: string): Document {
  const parser = new DOMParser({
    errorHandler: (level: string, message: unknown) => {
      // xmldom reports recoverable oddities as warnings
      if (level === 'warning') return;
      throw new SitemapParseError(`XML parsing error: ${String(message)}`);
    },
  });

  try {
    return parser.parseFromString(xml, 'text/xml');
  } catch (error) {
    if (error instanceof SitemapParseError) {
      throw error;
    }
    throw new SitemapParseError('XML parsing error', { cause: error });
  }
}

function selectNodes(expression: string, doc: Document): Node[] {
  const result = select(expression, doc);
  return xpath.isArrayOfNodes(result) ? result : [];
}

function selectLocs(expression: string, doc: Document): string[] {
  return selectNodes(expression, doc)
    .map((node) => (node.textContent ?? '').trim())
    .filter((loc) => loc.length > 0);
}

/**
 * Parse a sitemap document. Any <sitemap> entry makes it an index.
 */
export function parseSitemapDocument(xml: string): SitemapNode {
  if (!xml.trim()) {
    throw new SitemapParseError('Empty sitemap document');
  }

  const doc = parseXml(xml);

  if (selectNodes('//sm:sitemap', doc).length > 0) {
    return {
      kind: 'index',
      sitemaps: selectLocs('//sm:sitemap/sm:loc', doc),
    };
  }

  return {
    kind: 'urlset',
    urls: selectLocs('//sm:url/sm:loc', doc),
  };
}
