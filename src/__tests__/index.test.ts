import { describe, it, expect, vi } from 'vitest';

vi.mock('httpcloak', () => ({
  default: {
    Session: class MockSession {},
    Preset: { CHROME_143: 'chrome_143' },
  },
}));

const EXPECTED_EXPORTS = [
  'crawlSite',
  'runCrawl',
  'extractLinks',
  'isWithinOrigin',
  'resolveHref',
  'matchKeywords',
  'createKeywordMatcher',
  'fetchPage',
  'createHttpClient',
  'loadConfigFile',
  'resolveCrawlConfig',
  'formatCsvReport',
  'writeCsvReport',
  'createLogger',
  'UrlFrontier',
  'VisitedSet',
  'ConfigError',
  'InputError',
] as const;

describe('public API exports', () => {
  it.each(EXPECTED_EXPORTS)('exports %s as a function', async (name) => {
    const mod: Record<string, unknown> = await import('../index.js');
    expect(typeof mod[name]).toBe('function');
  });
});
