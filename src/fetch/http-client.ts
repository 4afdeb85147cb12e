/**
 * Shared httpcloak session used for every request of a crawl run.
 * One session means one cookie jar and one connection pool per run.
 */
import httpcloak from 'httpcloak';
import { logger as defaultLogger, type CrawlLogger } from '../logger.js';
import type {
  HttpClient,
  HttpRequestOptions,
  HttpResponse,
  TransportError,
} from './types.js';

/** Identifying header sent with every request. */
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/143.0.0.0 Safari/537.36';

export const DEFAULT_REQUEST_TIMEOUT_MS = 20000;
export const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB

/** TLS preset */
const PRESET = httpcloak.Preset.CHROME_143;

export interface HttpClientOptions {
  /** Per-request deadline; a request still running after it is reported as `timeout`. */
  timeoutMs?: number;
  userAgent?: string;
  logger?: CrawlLogger;
}

/** Raised inside the request race when the deadline passes or the caller aborts. */
class RequestInterrupted extends Error {
  constructor(
    readonly reason: Extract<TransportError, 'timeout' | 'aborted'>,
    message: string
  ) {
    super(message);
    this.name = 'RequestInterrupted';
  }
}

/**
 * Create a promise that rejects after the timeout or when the signal fires,
 * whichever comes first.
 */
function createDeadline(
  url: string,
  timeoutMs: number,
  signal?: AbortSignal
): { promise: Promise<never>; cancel: () => void } {
  let timeoutId: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const promise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new RequestInterrupted('timeout', `Request timeout after ${timeoutMs}ms for ${url}`)),
      timeoutMs
    );
    if (signal) {
      onAbort = () => reject(new RequestInterrupted('aborted', `Request aborted for ${url}`));
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  return {
    promise,
    cancel: () => {
      clearTimeout(timeoutId);
      if (signal && onAbort) signal.removeEventListener('abort', onAbort);
    },
  };
}

function failure(url: string, error: TransportError, errorMessage: string): HttpResponse {
  return {
    success: false,
    statusCode: 0,
    url,
    finalUrl: url,
    body: '',
    headers: {},
    error,
    errorMessage,
  };
}

/**
 * Read the post-redirect URL. httpcloak exposes it under different names
 * across releases, so probe instead of trusting one property.
 */
export function readFinalUrl(response: object, requestedUrl: string): string {
  if ('finalUrl' in response && typeof response.finalUrl === 'string' && response.finalUrl) {
    return response.finalUrl;
  }
  if ('url' in response && typeof response.url === 'string' && response.url) {
    return response.url;
  }
  return requestedUrl;
}

/** httpcloak returns the body either as a property or as a method, depending on the release. */
function readBody(response: httpcloak.Response): string {
  const textValue: unknown = response.text;
  if (typeof textValue === 'function') return String(textValue.call(response));
  return typeof textValue === 'string' ? textValue : '';
}

/**
 * Create the run's HTTP client. The session is opened lazily on the first
 * request and reused until `close()`.
 */
export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  const log = options.logger ?? defaultLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const headers: Record<string, string> = {
    'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
    // Without a cache of our own a 304 would leave us with an empty body.
    'Cache-Control': 'no-cache',
  };

  let session: httpcloak.Session | null = null;

  function getSession(): httpcloak.Session {
    if (!session) {
      log.debug({ preset: PRESET }, 'Creating httpcloak session');
      session = new httpcloak.Session({
        preset: PRESET,
        timeout: Math.max(1, Math.ceil(timeoutMs / 1000)),
      });
    }
    return session;
  }

  async function get(url: string, requestOptions: HttpRequestOptions = {}): Promise<HttpResponse> {
    const { signal } = requestOptions;
    if (signal?.aborted) {
      return failure(url, 'aborted', `Request aborted for ${url}`);
    }

    let activeSession: httpcloak.Session;
    try {
      activeSession = getSession();
    } catch (error) {
      log.error({ preset: PRESET, error: String(error) }, 'Failed to create httpcloak session');
      return failure(url, 'network_error', String(error));
    }

    const deadline = createDeadline(url, timeoutMs, signal);
    const sessionRequest: httpcloak.RequestOptions = { headers };

    try {
      log.debug({ url }, 'Making httpcloak request');
      const response = await Promise.race([activeSession.get(url, sessionRequest), deadline.promise]);

      // Check Content-Length before reading the body
      const contentLength = response.headers?.['content-length'];
      if (contentLength) {
        const size = parseInt(contentLength, 10);
        if (!isNaN(size) && size > MAX_RESPONSE_SIZE) {
          log.warn({ url, contentLength: size, limit: MAX_RESPONSE_SIZE }, 'Content-Length exceeds size limit');
          return failure(url, 'response_too_large', `Content-Length ${size} exceeds ${MAX_RESPONSE_SIZE}`);
        }
      }

      const body = readBody(response);
      if (body.length > MAX_RESPONSE_SIZE) {
        log.warn({ url, size: body.length, limit: MAX_RESPONSE_SIZE }, 'Response exceeds size limit');
        return failure(url, 'response_too_large', `Body of ${body.length} bytes exceeds ${MAX_RESPONSE_SIZE}`);
      }

      const finalUrl = readFinalUrl(response, url);
      log.debug(
        { url, finalUrl, statusCode: response.statusCode, bodyLength: body.length },
        'httpcloak request complete'
      );

      return {
        success: response.statusCode >= 200 && response.statusCode < 300,
        statusCode: response.statusCode,
        url,
        finalUrl,
        body,
        headers: response.headers || {},
      };
    } catch (error) {
      if (error instanceof RequestInterrupted) {
        log.debug({ url, reason: error.reason }, 'httpcloak request interrupted');
        return failure(url, error.reason, error.message);
      }
      log.warn({ url, error: String(error) }, 'httpcloak request failed');
      return failure(url, 'network_error', String(error));
    } finally {
      deadline.cancel();
    }
  }

  async function close(): Promise<void> {
    if (!session) return;
    const current = session;
    session = null;
    try {
      current.close();
    } catch (error) {
      log.warn({ error: String(error) }, 'Error closing httpcloak session');
    }
  }

  return { get, close };
}
