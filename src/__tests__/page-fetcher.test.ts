import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fetchPage, isFetchableUrl } from '../fetch/page-fetcher.js';
import type { HttpClient, HttpResponse } from '../fetch/types.js';
import { createFakeLogger } from './test-helpers.js';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const URL_A = 'https://site.test/a';

function response(overrides: Partial<HttpResponse> = {}): HttpResponse {
  return {
    success: true,
    statusCode: 200,
    url: URL_A,
    finalUrl: URL_A,
    body: '<html>ok</html>',
    headers: {},
    ...overrides,
  };
}

function clientReturning(res: HttpResponse) {
  const get = vi.fn().mockResolvedValue(res);
  const client: HttpClient = { get, close: vi.fn().mockResolvedValue(undefined) };
  return { client, get };
}

describe('fetch/page-fetcher', () => {
  let log: ReturnType<typeof createFakeLogger>;

  beforeEach(() => {
    vi.clearAllMocks();
    log = createFakeLogger();
  });

  describe('isFetchableUrl', () => {
    it('accepts absolute http and https URLs', () => {
      expect(isFetchableUrl('https://site.test/a')).toBe(true);
      expect(isFetchableUrl('http://site.test:8080/')).toBe(true);
    });

    it('rejects relative, non-http and malformed input', () => {
      expect(isFetchableUrl('/about')).toBe(false);
      expect(isFetchableUrl('ftp://site.test/file')).toBe(false);
      expect(isFetchableUrl('mailto:a@site.test')).toBe(false);
      expect(isFetchableUrl('not a url')).toBe(false);
    });
  });

  describe('fetchPage', () => {
    it('returns success with the body for a 200 response', async () => {
      const { client } = clientReturning(response());

      const outcome = await fetchPage(client, URL_A, { logger: log });

      expect(outcome).toMatchObject({
        ok: true,
        url: URL_A,
        finalUrl: URL_A,
        body: '<html>ok</html>',
        statusCode: 200,
        redirected: false,
      });
    });

    it('passes the abort signal to the client', async () => {
      const { client, get } = clientReturning(response());
      const controller = new AbortController();

      await fetchPage(client, URL_A, { logger: log, signal: controller.signal });

      expect(get).toHaveBeenCalledWith(URL_A, { signal: controller.signal });
    });

    it('does not send a request for a malformed URL', async () => {
      const { client, get } = clientReturning(response());

      const outcome = await fetchPage(client, 'not a url', { logger: log });

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) expect(outcome.reason).toBe('invalid_url');
      expect(get).not.toHaveBeenCalled();
    });

    it('classifies non-200 responses as http_status failures', async () => {
      const { client } = clientReturning(response({ success: false, statusCode: 404 }));

      const outcome = await fetchPage(client, URL_A, { logger: log });

      expect(outcome).toMatchObject({ ok: false, reason: 'http_status', statusCode: 404 });
      expect(log.error).toHaveBeenCalledWith(
        { url: URL_A, reason: 'http_status', statusCode: 404, referrer: null },
        `Failed to fetch ${URL_A}: Status 404`
      );
    });

    it('only accepts exactly 200 as success', async () => {
      const { client } = clientReturning(response({ statusCode: 204, body: '' }));

      const outcome = await fetchPage(client, URL_A, { logger: log });

      expect(outcome).toMatchObject({ ok: false, reason: 'http_status', statusCode: 204 });
    });

    it('classifies transport errors and logs the referrer', async () => {
      const { client } = clientReturning(
        response({
          success: false,
          statusCode: 0,
          body: '',
          error: 'network_error',
          errorMessage: 'connect ECONNREFUSED',
        })
      );

      const outcome = await fetchPage(client, URL_A, {
        logger: log,
        referrer: 'https://site.test/',
      });

      expect(outcome).toMatchObject({ ok: false, reason: 'network_error', message: 'connect ECONNREFUSED' });
      expect(outcome).not.toHaveProperty('statusCode');
      expect(log.error).toHaveBeenCalledWith(
        {
          url: URL_A,
          reason: 'network_error',
          error: 'connect ECONNREFUSED',
          referrer: 'https://site.test/',
        },
        `Error fetching ${URL_A}: connect ECONNREFUSED`
      );
    });

    it('distinguishes timeouts from other transport errors', async () => {
      const { client } = clientReturning(
        response({ success: false, statusCode: 0, error: 'timeout', errorMessage: 'too slow' })
      );

      const outcome = await fetchPage(client, URL_A, { logger: log });

      expect(outcome).toMatchObject({ ok: false, reason: 'timeout' });
    });

    it('logs aborted fetches at debug level only', async () => {
      const { client } = clientReturning(
        response({ success: false, statusCode: 0, error: 'aborted', errorMessage: 'aborted' })
      );

      const outcome = await fetchPage(client, URL_A, { logger: log });

      expect(outcome).toMatchObject({ ok: false, reason: 'aborted' });
      expect(log.error).not.toHaveBeenCalled();
      expect(log.debug).toHaveBeenCalledWith({ url: URL_A, referrer: null }, 'Fetch aborted');
    });

    it('logs redirects without treating them as failures', async () => {
      const { client } = clientReturning(response({ finalUrl: 'https://site.test/a/' }));

      const outcome = await fetchPage(client, URL_A, { logger: log });

      expect(outcome).toMatchObject({ ok: true, finalUrl: 'https://site.test/a/', redirected: true });
      expect(log.info).toHaveBeenCalledWith(
        { url: URL_A, finalUrl: 'https://site.test/a/' },
        'Request was redirected'
      );
      expect(log.error).not.toHaveBeenCalled();
    });

    it('falls back to the module logger', async () => {
      const { logger } = await import('../logger.js');
      const { client } = clientReturning(response({ success: false, statusCode: 500 }));

      await fetchPage(client, URL_A);

      expect(logger.error).toHaveBeenCalledTimes(1);
    });
  });
});
