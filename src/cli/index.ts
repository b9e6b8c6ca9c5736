#!/usr/bin/env node
/**
 * Link Cluster Crawler CLI
 */

import { CrawlResult, CrawlSession } from '../lib/crawling';
import { JsonFormatter, buildOutput, writeJsonFile } from '../lib/output';
import { InvalidEntryPointError } from '../lib/scraping/errors';
import { CliOptions, CliUsageError, individualOutputDir, parseCliArgs, USAGE } from './args';
import { AskFn, askUser, CrawlTarget, promptForTarget, sitemapTarget } from './prompt';

async function resolveTarget(options: CliOptions, ask: AskFn): Promise<CrawlTarget | null> {
  if (options.sitemapUrl) {
    return sitemapTarget(options.sitemapUrl, options.url);
  }
  if (options.url) {
    return { startUrl: options.url };
  }
  return promptForTarget(ask);
}

async function writeOutput(result: CrawlResult, options: CliOptions): Promise<void> {
  const output = buildOutput(result, {
    linksOnly: options.linksOnly,
    includeLinkStructure: !options.noLinkStructure,
  });

  if (!options.formatJson) {
    await writeJsonFile(options.output, output);
    console.log(`Results saved to: ${options.output}`);
    return;
  }

  const formatter = new JsonFormatter({ includeFilteredLinks: true });

  if (options.individualFiles) {
    const outputDir = individualOutputDir(options.output);
    const fileCount = await formatter.saveIndividualFiles(output, outputDir);
    console.log(`Created ${fileCount} individual JSON files in directory: ${outputDir}`);
  } else {
    await formatter.saveConsolidated(output, options.output);
    console.log(`Formatted JSON saved to: ${options.output}`);
  }
}

function printSummary(result: CrawlResult): void {
  console.log('\nCrawling complete!');

  if (result.sitemapOnly) {
    console.log(`Sitemap URL: ${result.sitemapUrl}`);
    console.log(`Pages crawled from sitemap: ${result.pagesCrawled}`);
  } else {
    console.log(`Starting URL: ${result.startUrl}`);
    console.log(`Sitemap used: ${result.sitemapUsed}`);
    console.log(`Pages crawled: ${result.pagesCrawled}`);
  }

  console.log(`Total links mapped: ${result.linkStructure.linkStats.totalLinksMapped}`);
  console.log(`Navigation links detected: ${result.navLinksDetected}`);
}

export async function main(argv: string[], ask: AskFn = askUser): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}\n`);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  try {
    const target = await resolveTarget(options, ask);
    if (!target) {
      return 1;
    }

    const session = new CrawlSession({
      startUrl: target.startUrl,
      sitemapUrl: target.sitemapUrl,
      maxPages: options.maxPages,
      delayMs: Math.round(options.delay * 1000),
      navThreshold: options.navThreshold,
      useSitemap: !options.noSitemap,
      contentLimit: options.contentLimit,
    });

    console.log(
      session.isSitemapOnly()
        ? `\nStarting sitemap-only crawl from: ${target.sitemapUrl}`
        : `\nStarting website crawl from: ${target.startUrl}`
    );

    const result = await session.crawl();
    await writeOutput(result, options);
    printSummary(result);

    if (result.error) {
      console.error(`Error: ${result.error}`);
      return 1;
    }
    return 0;
  } catch (error) {
    if (error instanceof InvalidEntryPointError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Crawl failed:', error);
      process.exitCode = 1;
    });
}
