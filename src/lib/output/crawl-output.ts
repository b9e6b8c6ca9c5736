/**
 * Crawl Output
 * Selects the shape of the raw (unformatted) output file
 */

import type { CrawlResult } from '../crawling/crawling.types';
import { CrawlOutput, FullOutput, LinksOnlyOutput, OutputOptions } from './output.types';

export function buildOutput(result: CrawlResult, options: OutputOptions): CrawlOutput {
  if (options.linksOnly) {
    const output: LinksOnlyOutput = {
      startUrl: result.startUrl,
      baseDomain: result.baseDomain,
      pagesCrawled: result.pagesCrawled,
      navThreshold: result.navThreshold,
      navLinksDetected: result.navLinksDetected,
    };
    if (options.includeLinkStructure) {
      output.linkStructure = result.linkStructure;
    }
    if (result.sitemapUrl !== undefined) {
      output.sitemapUrl = result.sitemapUrl;
      output.sitemapOnly = result.sitemapOnly;
    }
    return output;
  }

  if (options.includeLinkStructure) {
    return result;
  }

  const output: FullOutput = { ...result };
  delete output.linkStructure;
  return output;
}
