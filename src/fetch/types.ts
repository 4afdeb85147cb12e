/**
 * Shared types for the fetch module
 */
import type { CrawlLogger } from '../logger.js';

/** Transport-level failures reported by the HTTP client. */
export type TransportError = 'network_error' | 'timeout' | 'response_too_large' | 'aborted';

export type FetchFailureReason = 'invalid_url' | 'http_status' | TransportError;

export interface HttpResponse {
  success: boolean;
  /** Final response status, 0 when no response was received. */
  statusCode: number;
  url: string;
  /** URL after redirects; equals `url` when none were followed or the library does not say. */
  finalUrl: string;
  body: string;
  headers: Record<string, string>;
  error?: TransportError;
  errorMessage?: string;
}

export interface HttpRequestOptions {
  signal?: AbortSignal;
}

/**
 * Connection context shared by every fetch of a run. Injected into the
 * crawler so tests can substitute an in-process fake.
 */
export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
  close(): Promise<void>;
}

export interface FetchSuccess {
  ok: true;
  url: string;
  finalUrl: string;
  body: string;
  statusCode: 200;
  redirected: boolean;
  latencyMs: number;
}

export interface FetchFailure {
  ok: false;
  url: string;
  reason: FetchFailureReason;
  /** Set for `http_status` failures. */
  statusCode?: number;
  message: string;
  latencyMs: number;
}

export type FetchOutcome = FetchSuccess | FetchFailure;

export interface FetchPageOptions {
  /** Page the URL was discovered on, recorded with failures. */
  referrer?: string;
  signal?: AbortSignal;
  logger?: CrawlLogger;
}
