/**
 * keyword-crawler - breadth-first, same-origin crawler that reports pages
 * containing any of a set of keywords.
 *
 * @module keyword-crawler
 */
export {
  crawlSite,
  runCrawl,
  extractLinks,
  isWithinOrigin,
  resolveHref,
  matchKeywords,
  compileKeyword,
  createKeywordMatcher,
  UrlFrontier,
  VisitedSet,
  normalizeSeed,
} from './crawl/index.js';
export { fetchPage, isFetchableUrl, createHttpClient, DEFAULT_USER_AGENT } from './fetch/index.js';
export { loadConfigFile, resolveCrawlConfig, parseKeywordList } from './config/config-source.js';
export { formatCsvReport, writeCsvReport, DEFAULT_REPORT_FILE } from './report/csv-report.js';
export { ConfigError, InputError, StartupError } from './errors.js';
export { logger, createLogger } from './logger.js';
export type {
  BrokenLink,
  CrawlEvent,
  CrawlReport,
  CrawlSiteOptions,
  CrawlSummary,
  PageEvent,
  PageResult,
  RunCrawlOptions,
  VisitedScope,
} from './crawl/index.js';
export type { FetchOutcome, FetchFailureReason, HttpClient, HttpResponse } from './fetch/index.js';
export type { CrawlConfig, ConfigInput } from './config/config-source.js';
export type { CrawlLogger } from './logger.js';
