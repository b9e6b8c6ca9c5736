/**
 * Link Graph
 * Internal source→target link map with backlinks and filtered views
 */

import { ClassificationStateError } from '../scraping/errors';
import {
  FilteredLinkStats,
  LinkGraphSummary,
  LinkStats,
  LinkStructure,
  RankedPage,
} from './crawling.types';
import { GlobalLinkSet, OccurrenceCollector } from './navigation-link-detector';

const TOP_PAGES_LIMIT = 10;

type Adjacency = Map<string, string[]>;

/**
 * Rank keys by list length, highest first. Array.prototype.sort is stable,
 * so ties keep discovery order.
 */
function rankByDegree(map: Adjacency, limit: number = TOP_PAGES_LIMIT): RankedPage[] {
  return Array.from(map.entries())
    .map(([url, links]) => ({ url, count: links.length }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

function toRecord(map: Adjacency): Record<string, string[]> {
  const record: Record<string, string[]> = {};
  for (const [key, links] of map) {
    record[key] = [...links];
  }
  return record;
}

export class LinkGraph {
  private outgoing: Adjacency = new Map();
  private backlinks: Adjacency = new Map();
  private edgeKeys: Set<string> = new Set();
  private totalLinksMapped: number = 0;

  private filteredOutgoing: Adjacency = new Map();
  private filteredBacklinks: Adjacency = new Map();
  private globalLinks: GlobalLinkSet | null = null;

  constructor(private readonly collector?: OccurrenceCollector) {}

  /**
   * Add a link to both maps. Returns false if the edge already existed.
   */
  addEdge(source: string, target: string): boolean {
    // Source and target are full URLs, so a newline cannot occur inside either
    const key = `${source}\n${target}`;
    if (this.edgeKeys.has(key)) {
      return false;
    }

    this.edgeKeys.add(key);
    this.totalLinksMapped++;
    this.append(this.outgoing, source, target);
    this.append(this.backlinks, target, source);
    return true;
  }

  /**
   * Add all outgoing links of a page and report them to the occurrence collector
   */
  addPageLinks(source: string, targets: readonly string[]): void {
    for (const target of targets) {
      this.addEdge(source, target);
    }

    this.collector?.recordPageLinks(source, targets);
  }

  outgoingOf(url: string, filterGlobal: boolean = false): string[] {
    return this.project(this.outgoing.get(url) ?? [], filterGlobal);
  }

  /**
   * Pages linking to url. When filtered, source pages that are themselves
   * global links are left out.
   */
  backlinksOf(url: string, filterGlobal: boolean = false): string[] {
    return this.project(this.backlinks.get(url) ?? [], filterGlobal);
  }

  backlinkCountOf(url: string, filterGlobal: boolean = false): number {
    return this.backlinksOf(url, filterGlobal).length;
  }

  hasEdge(source: string, target: string): boolean {
    return this.edgeKeys.has(`${source}\n${target}`);
  }

  getTotalLinksMapped(): number {
    return this.totalLinksMapped;
  }

  /**
   * Build the filtered maps from a finished classification. Runs once.
   */
  applyGlobalFiltering(globalLinks: GlobalLinkSet): void {
    if (this.globalLinks) {
      throw new ClassificationStateError('Global link filtering has already been applied');
    }

    this.globalLinks = globalLinks;
    this.filteredOutgoing = this.filterAdjacency(this.outgoing, globalLinks);
    this.filteredBacklinks = this.filterAdjacency(this.backlinks, globalLinks);
  }

  isFiltered(): boolean {
    return this.globalLinks !== null;
  }

  summaryStatistics(): LinkGraphSummary {
    const linkStats: LinkStats = {
      totalLinksMapped: this.totalLinksMapped,
      pagesWithOutgoingLinks: this.outgoing.size,
      pagesWithBacklinks: this.backlinks.size,
      mostLinkedPages: rankByDegree(this.backlinks),
      mostLinkingPages: rankByDegree(this.outgoing),
    };

    if (!this.globalLinks || this.globalLinks.size === 0) {
      return { linkStats };
    }

    const filteredLinkStats: FilteredLinkStats = {
      pagesWithFilteredOutgoingLinks: this.filteredOutgoing.size,
      pagesWithFilteredBacklinks: this.filteredBacklinks.size,
      mostLinkedPagesFiltered: rankByDegree(this.filteredBacklinks),
      mostLinkingPagesFiltered: rankByDegree(this.filteredOutgoing),
    };

    return { linkStats, filteredLinkStats };
  }

  /**
   * Export the graph as plain objects
   */
  toLinkStructure(): LinkStructure {
    const { linkStats, filteredLinkStats } = this.summaryStatistics();
    const structure: LinkStructure = {
      outgoingLinks: toRecord(this.outgoing),
      backlinks: toRecord(this.backlinks),
      linkStats,
    };

    if (this.globalLinks && filteredLinkStats) {
      structure.globalLinks = this.globalLinks.stats();
      structure.filteredOutgoingLinks = toRecord(this.filteredOutgoing);
      structure.filteredBacklinks = toRecord(this.filteredBacklinks);
      structure.filteredLinkStats = filteredLinkStats;
    }

    return structure;
  }

  private append(map: Adjacency, key: string, value: string): void {
    const list = map.get(key);
    if (list) {
      list.push(value);
    } else {
      map.set(key, [value]);
    }
  }

  private project(links: string[], filterGlobal: boolean): string[] {
    if (filterGlobal && this.globalLinks) {
      return this.globalLinks.filter(links);
    }
    return [...links];
  }

  private filterAdjacency(map: Adjacency, globalLinks: GlobalLinkSet): Adjacency {
    const filtered: Adjacency = new Map();
    for (const [key, links] of map) {
      const kept = globalLinks.filter(links);
      if (kept.length > 0) {
        filtered.set(key, kept);
      }
    }
    return filtered;
  }
}
