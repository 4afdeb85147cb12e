/**
 * Structured logging with pino
 */
import { createRequire } from 'node:module';
import pino, { type Logger, type LoggerOptions } from 'pino';

const require = createRequire(import.meta.url);
const isDev = process.env.NODE_ENV === 'development';

/**
 * Check if pino-pretty is available in development mode.
 * Provides graceful degradation if the module is missing or corrupted.
 */
function isPinoPrettyAvailable(): boolean {
  if (!isDev) return false;
  try {
    require.resolve('pino-pretty');
    return true;
  } catch (e) {
    console.debug('pino-pretty not available, using JSON logs:', e);
    return false;
  }
}

const VALID_LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

type LogLevel = (typeof VALID_LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LOG_LEVELS as readonly string[]).includes(value);
}

function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

function moreVerbose(a: LogLevel, b: LogLevel): LogLevel {
  return VALID_LOG_LEVELS.indexOf(a) <= VALID_LOG_LEVELS.indexOf(b) ? a : b;
}

/** The subset of the pino API the crawler depends on; lets tests pass plain fakes. */
export type CrawlLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

function baseOptions(): LoggerOptions {
  return {
    level: getLogLevel(),
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    base: {
      service: 'keyword-crawler',
    },
  };
}

export interface CreateLoggerOptions {
  /**
   * Append error-and-above records to this file in addition to stderr.
   * The directory is created if needed.
   */
  errorLogFile?: string;
}

/**
 * Build a logger writing JSON to stderr. With `errorLogFile`, errors are also
 * teed into that file, which serves as the crawl's diagnostics log.
 */
export function createLogger(opts: CreateLoggerOptions = {}): Logger {
  const options = baseOptions();

  if (opts.errorLogFile) {
    const level = getLogLevel();
    // The root level gates every stream, so it must let error records reach the file.
    const rootLevel = moreVerbose(level, 'error');
    return pino(
      { ...options, level: rootLevel },
      pino.multistream([
        { level, stream: pino.destination(2) },
        {
          level: 'error',
          stream: pino.destination({ dest: opts.errorLogFile, append: true, mkdir: true, sync: true }),
        },
      ])
    );
  }

  if (isPinoPrettyAvailable()) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

export const logger = createLogger();
