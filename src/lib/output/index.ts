/**
 * Output System
 */

export * from './output.types';
export * from './json.formatter';
export * from './crawl-output';
