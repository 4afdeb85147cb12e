/**
 * Crawl module barrel exports
 */
export { checkLink, crawlSite, runCrawl } from './crawler.js';
export type { LinkCheckFailure } from './crawler.js';
export { extractLinks, isWithinOrigin, resolveHref } from './link-extractor.js';
export { matchKeywords, compileKeyword, createKeywordMatcher } from './keyword-matcher.js';
export { UrlFrontier, VisitedSet, normalizeSeed } from './url-frontier.js';
export type {
  BrokenLink,
  BrokenLinkEvent,
  CrawlEvent,
  CrawlReport,
  CrawlSiteOptions,
  CrawlSummary,
  PageEvent,
  PageResult,
  PageStatus,
  RunCrawlOptions,
  VisitedScope,
} from './types.js';
