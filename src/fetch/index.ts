/**
 * Public API exports for the fetch module
 */
export { fetchPage, isFetchableUrl } from './page-fetcher.js';
export { createHttpClient, DEFAULT_USER_AGENT, DEFAULT_REQUEST_TIMEOUT_MS } from './http-client.js';
export type { HttpClientOptions } from './http-client.js';
export type {
  FetchOutcome,
  FetchSuccess,
  FetchFailure,
  FetchFailureReason,
  FetchPageOptions,
  HttpClient,
  HttpRequestOptions,
  HttpResponse,
  TransportError,
} from './types.js';
