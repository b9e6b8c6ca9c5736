/**
 * Metadata Extractor
 * SEO-relevant page metadata: title, description, canonical, H1,
 * OpenGraph and Twitter Card tags, robots and hreflang alternates
 */

import * as cheerio from 'cheerio';

export interface TextField {
  content: string | null;
  length: number;
}

export interface HreflangLink {
  href: string;
  hreflang: string;
}

export interface PageMetadata {
  url: string;
  title: TextField;
  metaDescription: TextField;
  canonical: string | null;
  h1: {
    content: string | null;
    count: number;
  };
  openGraph: Record<string, string>;
  twitterCard: Record<string, string>;
  robots?: string;
  hreflang?: HreflangLink[];
}

function textField(value: string | undefined): TextField {
  const content = value?.trim();
  return content ? { content, length: content.length } : { content: null, length: 0 };
}

export class MetadataExtractor {
  extract(html: string, url: string): PageMetadata {
    const $ = cheerio.load(html || '');

    const metadata: PageMetadata = {
      url,
      title: textField($('title').first().text()),
      metaDescription: textField($('meta[name="description"]').attr('content')),
      canonical: $('link[rel~="canonical"]').attr('href')?.trim() || null,
      h1: {
        content: null,
        count: 0,
      },
      openGraph: {},
      twitterCard: {},
    };

    const h1Tags = $('h1');
    metadata.h1.count = h1Tags.length;
    if (h1Tags.length > 0) {
      metadata.h1.content = h1Tags.first().text().trim() || null;
    }

    $('meta[property^="og:"]').each((_, el) => {
      const property = $(el).attr('property');
      const content = $(el).attr('content');
      if (property && content) {
        metadata.openGraph[property.slice('og:'.length)] = content.trim();
      }
    });

    // name="twitter:*" first, then property="twitter:*"
    for (const attribute of ['name', 'property']) {
      $(`meta[${attribute}^="twitter:"]`).each((_, el) => {
        const property = $(el).attr(attribute);
        const content = $(el).attr('content');
        if (property && content) {
          metadata.twitterCard[property.slice('twitter:'.length)] = content.trim();
        }
      });
    }

    const robots = $('meta[name="robots"]').attr('content')?.trim();
    if (robots) {
      metadata.robots = robots;
    }

    const hreflang: HreflangLink[] = [];
    $('link[rel~="alternate"][hreflang]').each((_, el) => {
      const href = $(el).attr('href')?.trim();
      const lang = $(el).attr('hreflang')?.trim();
      if (href && lang) {
        hreflang.push({ href, hreflang: lang });
      }
    });
    if (hreflang.length > 0) {
      metadata.hreflang = hreflang;
    }

    return metadata;
  }
}

export const metadataExtractor = new MetadataExtractor();
