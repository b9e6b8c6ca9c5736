/**
 * Sitemap Parser Tests
 */

import { sitemapIndex, urlSet } from '../../../__tests__/helpers/fixtures';
import { parseSitemapDocument } from '../sitemap.parser';
import { SitemapParseError } from '../sitemap.types';

describe('parseSitemapDocument', () => {
  it('should parse a urlset in document order', () => {
    const node = parseSitemapDocument(
      urlSet(['https://example.com/', '  https://example.com/about  ', 'https://example.com/blog'])
    );

    expect(node).toEqual({
      kind: 'urlset',
      urls: ['https://example.com/', 'https://example.com/about', 'https://example.com/blog'],
    });
  });

  it('should parse a sitemap index', () => {
    const node = parseSitemapDocument(
      sitemapIndex(['https://example.com/sitemap-pages.xml', 'https://example.com/sitemap-posts.xml'])
    );

    expect(node).toEqual({
      kind: 'index',
      sitemaps: ['https://example.com/sitemap-pages.xml', 'https://example.com/sitemap-posts.xml'],
    });
  });

  it('should skip empty loc elements', () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <url><loc></loc></url>
  <url><loc>https://example.com/kept</loc><lastmod>2024-01-01</lastmod></url>
</urlset>`;

    expect(parseSitemapDocument(xml)).toEqual({ kind: 'urlset', urls: ['https://example.com/kept'] });
  });

  it('should ignore elements outside the sitemap namespace', () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>
<urlset><url><loc>https://example.com/a</loc></url></urlset>`;

    expect(parseSitemapDocument(xml)).toEqual({ kind: 'urlset', urls: [] });
  });

  it('should reject an empty document', () => {
    expect(() => parseSitemapDocument('   ')).toThrow(SitemapParseError);
  });
});
