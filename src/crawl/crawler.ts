/**
 * Crawl engine: per-seed AsyncGenerator of crawl events, plus a run-level
 * driver that collects results across seeds.
 */
import { fetchPage } from '../fetch/page-fetcher.js';
import type { FetchFailure, FetchPageOptions, HttpClient } from '../fetch/types.js';
import { logger as defaultLogger, type CrawlLogger } from '../logger.js';
import { createKeywordMatcher } from './keyword-matcher.js';
import { extractLinks, isWithinOrigin } from './link-extractor.js';
import { normalizeSeed, UrlFrontier, VisitedSet } from './url-frontier.js';
import type {
  BrokenLinkEvent,
  CrawlEvent,
  CrawlReport,
  CrawlSiteOptions,
  CrawlSummary,
  PageEvent,
  PageResult,
  RunCrawlOptions,
} from './types.js';

const DEFAULT_CONCURRENCY = 1;

/** What a failed link check keeps; a passing check keeps nothing. */
export type LinkCheckFailure = Pick<FetchFailure, 'reason' | 'statusCode'>;

interface PageTaskContext {
  seed: string;
  client: HttpClient;
  log: CrawlLogger;
  visited: VisitedSet;
  frontier: UrlFrontier;
  validateLinks: boolean;
  match: (text: string) => string[];
  validations: Map<string, Promise<LinkCheckFailure | null>>;
  signal?: AbortSignal;
}

/**
 * Fetch a link to check it is reachable. Resolves to null when it is, so the
 * page body is dropped as soon as the request settles.
 */
export async function checkLink(
  client: HttpClient,
  href: string,
  options: FetchPageOptions = {}
): Promise<LinkCheckFailure | null> {
  const outcome = await fetchPage(client, href, options);
  if (outcome.ok) return null;
  return outcome.statusCode !== undefined
    ? { reason: outcome.reason, statusCode: outcome.statusCode }
    : { reason: outcome.reason };
}

/** Memoized per seed crawl: a link found on many pages is checked only once. */
function validateLink(
  ctx: PageTaskContext,
  href: string,
  referrer: string
): Promise<LinkCheckFailure | null> {
  let pending = ctx.validations.get(href);
  if (!pending) {
    pending = checkLink(ctx.client, href, { referrer, signal: ctx.signal, logger: ctx.log });
    ctx.validations.set(href, pending);
  }
  return pending;
}

/**
 * Process one dequeued URL: fetch, match, then validate and enqueue its
 * in-origin links. Returns the events the page produced, in order.
 */
async function processPage(ctx: PageTaskContext, url: string): Promise<CrawlEvent[]> {
  const { seed, log } = ctx;
  log.info({ url }, `Crawling: ${url}`);

  const outcome = await fetchPage(ctx.client, url, { signal: ctx.signal, logger: log });
  if (!outcome.ok) {
    return [
      {
        type: 'page',
        seed,
        url,
        status: 'failed',
        keywords: [],
        reason: outcome.reason,
        ...(outcome.statusCode !== undefined ? { statusCode: outcome.statusCode } : {}),
      },
    ];
  }

  const keywords = ctx.match(outcome.body);
  const events: CrawlEvent[] = [
    {
      type: 'page',
      seed,
      url,
      status: keywords.length > 0 ? 'matched' : 'unmatched',
      keywords,
      finalUrl: outcome.finalUrl,
    },
  ];

  for (const href of extractLinks(outcome.body, seed)) {
    if (!isWithinOrigin(href, seed) || ctx.visited.has(href)) continue;
    if (ctx.signal?.aborted) break;

    if (ctx.validateLinks) {
      const check = await validateLink(ctx, href, url);
      if (check && check.reason !== 'aborted') {
        log.error({ href, referrer: url }, `Broken link found: ${href}. Referring page: ${url}`);
        const brokenLink: BrokenLinkEvent = {
          type: 'broken-link',
          seed,
          link: { href, referrer: url },
          reason: check.reason,
          ...(check.statusCode !== undefined ? { statusCode: check.statusCode } : {}),
        };
        events.push(brokenLink);
      }
    }

    ctx.frontier.push(href);
  }

  return events;
}

/**
 * Crawl one seed breadth-first within its origin.
 * Yields a `page` event per visited URL, a `broken-link` event per failed
 * validation, and a final `summary`.
 *
 * URLs are marked visited when dequeued, before their fetch completes, so a
 * failing URL is never retried. Up to `concurrency` pages are in flight; each
 * settled page immediately frees its slot for the next URL.
 */
export async function* crawlSite(
  seed: string,
  keywords: readonly string[],
  options: CrawlSiteOptions
): AsyncGenerator<CrawlEvent> {
  const root = normalizeSeed(seed);
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  const { signal } = options;
  const startTime = Date.now();

  const ctx: PageTaskContext = {
    seed: root,
    client: options.client,
    log: options.logger ?? defaultLogger,
    visited: options.visited ?? new VisitedSet(),
    frontier: new UrlFrontier(root),
    validateLinks: options.validateLinks ?? true,
    match: createKeywordMatcher(keywords),
    validations: new Map(),
    signal,
  };

  let pagesVisited = 0;
  let pagesMatched = 0;
  let pagesFailed = 0;
  let brokenLinks = 0;

  ctx.log.info({ seed: root, concurrency }, `Starting crawl at: ${root}`);

  let nextId = 0;
  const inflight = new Map<number, Promise<{ id: number; events: CrawlEvent[] }>>();

  function enqueue(): void {
    while (inflight.size < concurrency && ctx.frontier.hasMore() && !signal?.aborted) {
      const url = ctx.frontier.next();
      if (url === null) break;
      if (!ctx.visited.markVisited(url)) continue;

      const id = nextId++;
      pagesVisited++;
      inflight.set(
        id,
        processPage(ctx, url)
          .then((events) => ({ id, events }))
          .catch((error: unknown) => {
            ctx.log.error({ url, error: String(error) }, 'Unexpected error while processing page');
            const failed: PageEvent = { type: 'page', seed: root, url, status: 'failed', keywords: [] };
            return { id, events: [failed] };
          })
      );
    }
  }

  enqueue();

  while (inflight.size > 0) {
    const settled = await Promise.race(inflight.values());
    inflight.delete(settled.id);

    for (const event of settled.events) {
      if (event.type === 'page') {
        if (event.status === 'matched') pagesMatched++;
        if (event.status === 'failed') pagesFailed++;
      } else if (event.type === 'broken-link') {
        brokenLinks++;
      }
      yield event;
    }

    enqueue();
  }

  const summary: CrawlSummary = {
    type: 'summary',
    seed: root,
    pagesVisited,
    pagesMatched,
    pagesFailed,
    brokenLinks,
    durationMs: Date.now() - startTime,
    aborted: signal?.aborted ?? false,
  };
  ctx.log.info(summary, `Finished crawl at: ${root}`);
  yield summary;
}

/**
 * Crawl every seed in order and collect matches and broken links.
 * With visitedScope 'run' (default) a URL visited under one seed is skipped
 * under the next; with 'seed' each seed starts from an empty visited set.
 */
export async function runCrawl(options: RunCrawlOptions): Promise<CrawlReport> {
  const { seeds, keywords, onEvent, visitedScope = 'run', ...siteOptions } = options;
  const shared = visitedScope === 'run' ? new VisitedSet() : null;

  const report: CrawlReport = {
    results: [],
    brokenLinks: [],
    summaries: [],
    visitedCount: 0,
    aborted: false,
  };

  for (const seed of seeds) {
    if (options.signal?.aborted) {
      report.aborted = true;
      break;
    }

    const visited = shared ?? new VisitedSet();
    for await (const event of crawlSite(seed, keywords, { ...siteOptions, visited })) {
      collect(report, event);
      onEvent?.(event);
    }
    if (!shared) report.visitedCount += visited.size;
  }

  if (shared) report.visitedCount = shared.size;
  return report;
}

function collect(report: CrawlReport, event: CrawlEvent): void {
  switch (event.type) {
    case 'page':
      if (event.status === 'matched') report.results.push(pageResult(event));
      break;
    case 'broken-link':
      report.brokenLinks.push(event.link);
      break;
    case 'summary':
      report.summaries.push(event);
      if (event.aborted) report.aborted = true;
      break;
  }
}

function pageResult(event: PageEvent): PageResult {
  return { url: event.url, keywords: event.keywords };
}
