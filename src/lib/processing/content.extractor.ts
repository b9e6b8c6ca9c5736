/**
 * Content Extractor
 * Main text content of a page, with navigation and boilerplate stripped
 */

import * as cheerio from 'cheerio';

export interface ContentExtractorConfig {
  /**
   * Maximum characters of content to keep (undefined = no limit)
   */
  contentLimit?: number;
}

export interface PageContent {
  url: string;
  content: string;
  contentLength: number;
  wordCount: number;
  truncated: boolean;
}

// Private-use character marking block boundaries; never whitespace, never in real text
const BLOCK_BREAK = '\uE000';

const BLOCK_TAGS = new Set([
  'p', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'li', 'dt', 'dd', 'div', 'section',
  'article', 'main', 'blockquote', 'pre', 'table', 'tr', 'ul', 'ol', 'br', 'figcaption',
]);

export class ContentExtractor {
  private readonly contentLimit?: number;

  private readonly removedSelectors = 'script, style, noscript, svg, iframe';
  private readonly layoutSelectors = 'nav, header, footer, aside';

  // Class/id tokens that usually mark non-content blocks
  private readonly nonContentPatterns = [
    /(^|[\s_-])(nav|navigation|menu|header|footer|sidebar|comment|widget|ad|banner|cookie)/,
    /(^|[\s_-])(social|share|related|popular|tag|category|subscribe|newsletter)/,
  ];

  constructor(config: ContentExtractorConfig = {}) {
    this.contentLimit = config.contentLimit;
  }

  isNonContentAttribute(value: string | undefined): boolean {
    if (!value) {
      return false;
    }
    const lower = value.toLowerCase();
    return this.nonContentPatterns.some((pattern) => pattern.test(lower));
  }

  extract(html: string, url: string): PageContent {
    if (!html) {
      return { url, content: '', contentLength: 0, wordCount: 0, truncated: false };
    }

    const $ = cheerio.load(html);

    $(this.removedSelectors).remove();

    $('[class], [id]').each((_, el) => {
      if (el.tagName === 'html' || el.tagName === 'body') return;
      const $el = $(el);
      if (this.isNonContentAttribute($el.attr('class')) || this.isNonContentAttribute($el.attr('id'))) {
        $el.remove();
      }
    });

    $(this.layoutSelectors).remove();

    const body = $('body');
    let main = body.find('main, article').first();
    if (main.length === 0) {
      main = body.find('div#content').first();
    }
    if (main.length === 0) {
      main = body;
    }

    // Mark element boundaries so adjacent text does not run together
    main.find('*').each((_, el) => {
      $(el).append(BLOCK_TAGS.has(el.tagName) ? BLOCK_BREAK : ' ');
    });

    const blocks = main
      .text()
      .split(BLOCK_BREAK)
      .map((block) => block.replace(/\s+/g, ' ').trim())
      .filter((block) => block.length > 0);

    let content = blocks.join('\n\n');
    let truncated = false;

    if (this.contentLimit !== undefined && content.length > this.contentLimit) {
      content = content.slice(0, this.contentLimit);
      truncated = true;
    }

    const wordCount = content.split(/\s+/).filter((word) => word.length > 0).length;

    return {
      url,
      content,
      contentLength: content.length,
      wordCount,
      truncated,
    };
  }
}
