/**
 * Fetch one page and classify the outcome. Never throws: every failure comes
 * back as a FetchFailure and is logged with its referrer.
 */
import { logger as defaultLogger } from '../logger.js';
import type {
  FetchFailure,
  FetchFailureReason,
  FetchOutcome,
  FetchPageOptions,
  HttpClient,
} from './types.js';

/** True for absolute http(s) URLs with a host. */
export function isFetchableUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname !== '';
  } catch {
    return false;
  }
}

export async function fetchPage(
  client: HttpClient,
  url: string,
  options: FetchPageOptions = {}
): Promise<FetchOutcome> {
  const log = options.logger ?? defaultLogger;
  const referrer = options.referrer ?? null;
  const startTime = Date.now();

  function fail(reason: FetchFailureReason, message: string, statusCode?: number): FetchFailure {
    const outcome: FetchFailure = {
      ok: false,
      url,
      reason,
      message,
      latencyMs: Date.now() - startTime,
      ...(statusCode !== undefined ? { statusCode } : {}),
    };

    if (reason === 'aborted') {
      log.debug({ url, referrer }, 'Fetch aborted');
    } else if (reason === 'http_status') {
      log.error({ url, reason, statusCode, referrer }, `Failed to fetch ${url}: Status ${statusCode}`);
    } else {
      log.error({ url, reason, error: message, referrer }, `Error fetching ${url}: ${message}`);
    }
    return outcome;
  }

  if (!isFetchableUrl(url)) {
    return fail('invalid_url', `Not an absolute http(s) URL: ${url}`);
  }

  const response = await client.get(url, { signal: options.signal });

  if (response.error) {
    return fail(response.error, response.errorMessage ?? response.error);
  }

  if (response.finalUrl !== url) {
    log.info({ url, finalUrl: response.finalUrl }, 'Request was redirected');
  }

  if (response.statusCode !== 200) {
    return fail('http_status', `HTTP ${response.statusCode}`, response.statusCode);
  }

  return {
    ok: true,
    url,
    finalUrl: response.finalUrl,
    body: response.body,
    statusCode: 200,
    redirected: response.finalUrl !== url,
    latencyMs: Date.now() - startTime,
  };
}
