/**
 * Command-line argument parsing
 *
 *   link-cluster-crawler [url] [--max-pages 100] [--delay 0.5] [--sitemap <url>] ...
 *
 * Supports --key value, --key=value and the short aliases below.
 */

import * as path from 'path';
import { env } from '../config/env';

export interface CliOptions {
  url?: string;
  maxPages: number;
  /**
   * Delay between requests, in seconds
   */
  delay: number;
  noSitemap: boolean;
  sitemapUrl?: string;
  contentLimit?: number;
  output: string;
  linksOnly: boolean;
  navThreshold: number;
  formatJson: boolean;
  individualFiles: boolean;
  noLinkStructure: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

type ValueOption = 'max-pages' | 'delay' | 'sitemap' | 'content-limit' | 'output' | 'nav-threshold';
type FlagOption =
  | 'no-sitemap'
  | 'links-only'
  | 'format-json'
  | 'individual-files'
  | 'no-link-structure'
  | 'help';

const VALUE_OPTIONS: ReadonlySet<string> = new Set<ValueOption>([
  'max-pages',
  'delay',
  'sitemap',
  'content-limit',
  'output',
  'nav-threshold',
]);

const FLAG_OPTIONS: ReadonlySet<string> = new Set<FlagOption>([
  'no-sitemap',
  'links-only',
  'format-json',
  'individual-files',
  'no-link-structure',
  'help',
]);

const SHORT_ALIASES: Readonly<Record<string, string>> = {
  m: 'max-pages',
  d: 'delay',
  c: 'content-limit',
  o: 'output',
  t: 'nav-threshold',
  f: 'format-json',
  i: 'individual-files',
  n: 'no-link-structure',
  h: 'help',
};

export const USAGE = `Usage: link-cluster-crawler [url] [options]

Crawl a website, map its internal links and separate navigation links
from contextual ones.

Options:
  -m, --max-pages <n>        Maximum number of pages to crawl (default: 100)
  -d, --delay <seconds>      Delay between requests in seconds (default: 0.5)
      --no-sitemap           Skip the sitemap.xml check and crawl from the homepage
      --sitemap <url>        Crawl only the URLs listed in this sitemap
  -c, --content-limit <n>    Limit extracted content to n characters (default: no limit)
  -o, --output <file>        Output JSON file (default: crawl-results.json)
      --links-only           Only output link structure data
  -t, --nav-threshold <x>    Navigation link threshold, 0.0-1.0 (default: 0.8)
  -f, --format-json          Write the flattened per-page JSON format
  -i, --individual-files     With --format-json, write one file per page
  -n, --no-link-structure    Leave the link structure out of the output
  -h, --help                 Show this help`;

function parseInteger(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new CliUsageError(`--${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new CliUsageError(`--${name} must be a number, got "${raw}"`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    maxPages: env.CRAWL_MAX_PAGES,
    delay: env.CRAWL_DELAY_MS / 1000,
    noSitemap: false,
    contentLimit: env.CONTENT_LIMIT,
    output: env.OUTPUT_FILE,
    linksOnly: false,
    navThreshold: env.NAV_THRESHOLD,
    formatJson: false,
    individualFiles: false,
    noLinkStructure: false,
    help: false,
  };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--') {
      positional.push(...argv.slice(i + 1));
      break;
    }

    let name: string;
    let inlineValue: string | undefined;

    if (arg.startsWith('--')) {
      const raw = arg.slice(2);
      const eqIdx = raw.indexOf('=');
      name = eqIdx === -1 ? raw : raw.slice(0, eqIdx);
      inlineValue = eqIdx === -1 ? undefined : raw.slice(eqIdx + 1);
    } else if (arg.startsWith('-') && arg.length > 1) {
      const alias = SHORT_ALIASES[arg.slice(1)];
      if (!alias) {
        throw new CliUsageError(`Unknown option: ${arg}`);
      }
      name = alias;
    } else {
      positional.push(arg);
      continue;
    }

    if (FLAG_OPTIONS.has(name)) {
      if (inlineValue !== undefined) {
        throw new CliUsageError(`Option --${name} does not take a value`);
      }
      applyFlag(options, name);
      continue;
    }

    if (!VALUE_OPTIONS.has(name)) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }

    let value = inlineValue;
    if (value === undefined) {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined) {
      throw new CliUsageError(`Option --${name} requires a value`);
    }
    applyValue(options, name, value);
  }

  if (positional.length > 1) {
    throw new CliUsageError(`Unexpected argument: ${positional[1]}`);
  }
  if (positional.length === 1) {
    options.url = positional[0];
  }

  return options;
}

function applyFlag(options: CliOptions, name: string): void {
  switch (name) {
    case 'no-sitemap':
      options.noSitemap = true;
      break;
    case 'links-only':
      options.linksOnly = true;
      break;
    case 'format-json':
      options.formatJson = true;
      break;
    case 'individual-files':
      options.individualFiles = true;
      break;
    case 'no-link-structure':
      options.noLinkStructure = true;
      break;
    case 'help':
      options.help = true;
      break;
  }
}

function applyValue(options: CliOptions, name: string, value: string): void {
  switch (name) {
    case 'max-pages':
      options.maxPages = parseInteger(name, value);
      break;
    case 'delay': {
      const delay = parseNumber(name, value);
      if (delay < 0) {
        throw new CliUsageError('--delay cannot be negative');
      }
      options.delay = delay;
      break;
    }
    case 'sitemap':
      options.sitemapUrl = value.trim();
      break;
    case 'content-limit':
      options.contentLimit = parseInteger(name, value);
      break;
    case 'output':
      options.output = value;
      break;
    case 'nav-threshold': {
      const threshold = parseNumber(name, value);
      if (threshold < 0 || threshold > 1) {
        throw new CliUsageError('Navigation threshold must be between 0.0 and 1.0');
      }
      options.navThreshold = threshold;
      break;
    }
  }
}

/**
 * Directory for --individual-files: the output file name without its
 * extension, suffixed with "_pages"
 */
export function individualOutputDir(outputFile: string): string {
  const ext = path.extname(outputFile);
  return `${outputFile.slice(0, outputFile.length - ext.length)}_pages`;
}
