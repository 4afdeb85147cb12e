#!/usr/bin/env node
/**
 * CLI entry point for keyword-crawler
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { resolveCrawlConfig, parseKeywordList, type CrawlConfig } from './config/config-source.js';
import { runCrawl } from './crawl/crawler.js';
import type { CrawlEvent, VisitedScope } from './crawl/types.js';
import { StartupError } from './errors.js';
import { createHttpClient } from './fetch/http-client.js';
import { createLogger } from './logger.js';
import { DEFAULT_REPORT_FILE, writeCsvReport } from './report/csv-report.js';

export const DEFAULT_ERROR_LOG = 'errors.log';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    return pkg.version ?? 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

export interface CliOptions {
  seeds: string[];
  keywords: string[];
  config?: string;
  output: string;
  errorLog: string;
  concurrency?: number;
  timeout?: number;
  visitedScope?: VisitedScope;
  validateLinks: boolean;
  json: boolean;
  quiet: boolean;
}

export type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

export function parseArgs(args: string[]): ParseResult {
  const warnings: string[] = [];
  const opts: CliOptions = {
    seeds: [],
    keywords: [],
    output: DEFAULT_REPORT_FILE,
    errorLog: DEFAULT_ERROR_LOG,
    validateLinks: true,
    json: false,
    quiet: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      case '-k':
      case '--keywords':
        if (i + 1 >= args.length) return { kind: 'error', message: `${arg} requires a value` };
        opts.keywords.push(...parseKeywordList(args[++i]));
        break;
      case '-c':
      case '--config':
        if (i + 1 >= args.length) return { kind: 'error', message: `${arg} requires a value` };
        opts.config = args[++i];
        break;
      case '-o':
      case '--output':
        if (i + 1 >= args.length) return { kind: 'error', message: `${arg} requires a value` };
        opts.output = args[++i];
        break;
      case '--error-log':
        if (i + 1 >= args.length) return { kind: 'error', message: '--error-log requires a value' };
        opts.errorLog = args[++i];
        break;
      case '--concurrency': {
        if (i + 1 >= args.length)
          return { kind: 'error', message: '--concurrency requires a value' };
        const v = parseInt(args[++i], 10);
        if (isNaN(v) || v <= 0)
          return { kind: 'error', message: '--concurrency must be a positive integer' };
        if (v > 50) return { kind: 'error', message: '--concurrency must not exceed 50' };
        opts.concurrency = v;
        break;
      }
      case '--timeout': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--timeout requires a value' };
        const v = parseInt(args[++i], 10);
        if (isNaN(v) || v <= 0)
          return { kind: 'error', message: '--timeout must be a positive integer (milliseconds)' };
        opts.timeout = v;
        break;
      }
      case '--visited-scope': {
        if (i + 1 >= args.length)
          return { kind: 'error', message: '--visited-scope requires a value' };
        const v = args[++i];
        if (v !== 'seed' && v !== 'run')
          return { kind: 'error', message: '--visited-scope must be "seed" or "run"' };
        opts.visitedScope = v;
        break;
      }
      case '--no-validate-links':
        opts.validateLinks = false;
        break;
      case '--json':
        opts.json = true;
        break;
      case '-q':
      case '--quiet':
        opts.quiet = true;
        break;
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          opts.seeds.push(arg);
        }
    }
  }

  return { kind: 'ok', opts, warnings };
}

function printUsage(): void {
  console.log(`Usage: keyword-crawler [base-url...] [options]

Crawls each base URL breadth-first, staying on its origin, and writes every
page containing one of the keywords to a CSV report.

Options:
  -k, --keywords <list>    Comma-separated keywords to search for (repeatable)
  -c, --config <path>      JSON file with "base_urls" and "keywords" arrays
  -o, --output <path>      CSV report path (default: ${DEFAULT_REPORT_FILE})
  --error-log <path>       Diagnostics log for errors (default: ${DEFAULT_ERROR_LOG})
  --concurrency <n>        Pages fetched in parallel (default: 1)
  --timeout <ms>           Request timeout in milliseconds (default: 20000)
  --visited-scope <scope>  "run" shares visited URLs across base URLs (default), "seed" does not
  --no-validate-links      Skip the reachability check of discovered links
  --json                   Print crawl events as JSON lines on stdout
  -q, --quiet              No progress output
  -v, --version            Show version number
  -h, --help               Show this help message

Base URLs and keywords given on the command line are added to those from --config.

Disclaimer:
  Users are responsible for complying with website terms of service,
  robots.txt directives, and applicable laws.`);
}

function printEvent(event: CrawlEvent, opts: CliOptions): void {
  if (opts.json) {
    console.log(JSON.stringify(event));
    return;
  }
  if (opts.quiet) return;

  if (event.type === 'page' && event.status === 'matched') {
    console.error(`Match: ${event.url} (${event.keywords.join(', ')})`);
  } else if (event.type === 'summary') {
    console.error(
      `Finished ${event.seed}: ${event.pagesVisited} pages, ${event.pagesMatched} matched, ${event.pagesFailed} failed`
    );
  }
}

/**
 * Run the CLI and return the process exit code.
 */
export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  const result = parseArgs(args);

  switch (result.kind) {
    case 'version':
      console.log(`keyword-crawler ${getVersion()}`);
      return 0;
    case 'help':
      printUsage();
      return 0;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      return 1;
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  const log = createLogger({ errorLogFile: opts.errorLog });

  let config: CrawlConfig;
  try {
    config = resolveCrawlConfig({
      configFile: opts.config,
      seeds: opts.seeds,
      keywords: opts.keywords,
    });
  } catch (error) {
    if (error instanceof StartupError) {
      log.error({ kind: error.kind, path: error.path }, error.message);
      console.error(`Error: ${error.message} Check ${opts.errorLog} for details.`);
      return 1;
    }
    throw error;
  }

  const client = createHttpClient({ timeoutMs: opts.timeout, logger: log });
  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.error('\nInterrupted, writing partial results...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const report = await runCrawl({
      seeds: config.seeds,
      keywords: config.keywords,
      client,
      logger: log,
      concurrency: opts.concurrency,
      validateLinks: opts.validateLinks,
      visitedScope: opts.visitedScope,
      signal: controller.signal,
      onEvent: (event) => printEvent(event, opts),
    });

    const outPath = writeCsvReport(report.results, opts.output);
    if (!opts.quiet && !opts.json) {
      console.error(
        `Crawl complete: ${report.results.length} matching pages, ${report.brokenLinks.length} broken links, ${report.visitedCount} URLs visited. Results saved to ${outPath}`
      );
    }
    return report.aborted ? 130 : 0;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    await client.close();
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then((code) => {
      // httpcloak's native library keeps the event loop alive after close.
      process.exit(code);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
