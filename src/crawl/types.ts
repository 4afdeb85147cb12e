/**
 * Types for the crawl module
 */
import type { FetchFailureReason, HttpClient } from '../fetch/types.js';
import type { CrawlLogger } from '../logger.js';
import type { VisitedSet } from './url-frontier.js';

export interface PageResult {
  url: string;
  /** Matched keywords in configured order. */
  keywords: string[];
}

export interface BrokenLink {
  href: string;
  referrer: string;
}

/** Whether one visited set spans a single seed or the whole run. */
export type VisitedScope = 'seed' | 'run';

export type PageStatus = 'matched' | 'unmatched' | 'failed';

export interface PageEvent {
  type: 'page';
  seed: string;
  url: string;
  status: PageStatus;
  keywords: string[];
  finalUrl?: string;
  reason?: FetchFailureReason;
  statusCode?: number;
}

export interface BrokenLinkEvent {
  type: 'broken-link';
  seed: string;
  link: BrokenLink;
  reason: FetchFailureReason;
  statusCode?: number;
}

export interface CrawlSummary {
  type: 'summary';
  seed: string;
  pagesVisited: number;
  pagesMatched: number;
  pagesFailed: number;
  brokenLinks: number;
  durationMs: number;
  aborted: boolean;
}

export type CrawlEvent = PageEvent | BrokenLinkEvent | CrawlSummary;

export interface CrawlSiteOptions {
  client: HttpClient;
  logger?: CrawlLogger;
  /** Parallel page tasks (default: 1, strictly sequential). */
  concurrency?: number;
  /** Fetch each discovered link once on discovery to report broken links (default: true). */
  validateLinks?: boolean;
  /** Pass a set to share it between seeds; a fresh one is created otherwise. */
  visited?: VisitedSet;
  signal?: AbortSignal;
}

export interface RunCrawlOptions extends Omit<CrawlSiteOptions, 'visited'> {
  seeds: string[];
  keywords: string[];
  /** Default: 'run'. */
  visitedScope?: VisitedScope;
  onEvent?: (event: CrawlEvent) => void;
}

export interface CrawlReport {
  results: PageResult[];
  brokenLinks: BrokenLink[];
  summaries: CrawlSummary[];
  /** URLs dequeued and processed, summed over visited sets. */
  visitedCount: number;
  aborted: boolean;
}
