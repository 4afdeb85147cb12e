import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  loadConfigFile,
  parseKeywordList,
  resolveCrawlConfig,
} from '../config/config-source.js';
import { ConfigError, InputError } from '../errors.js';

describe('config-source', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'keyword-crawler-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content, 'utf-8');
    return path;
  }

  describe('loadConfigFile', () => {
    it('reads base_urls and keywords', () => {
      const path = writeConfig(
        'config.json',
        JSON.stringify({ base_urls: ['https://site.test/'], keywords: ['hiring', 'remote'] })
      );

      expect(loadConfigFile(path)).toEqual({
        seeds: ['https://site.test/'],
        keywords: ['hiring', 'remote'],
      });
    });

    it('treats missing keys as empty lists', () => {
      const path = writeConfig('config.json', '{}');

      expect(loadConfigFile(path)).toEqual({ seeds: [], keywords: [] });
    });

    it('throws ConfigError for a missing file', () => {
      const path = join(dir, 'absent.json');

      expect(() => loadConfigFile(path)).toThrow(ConfigError);
      try {
        loadConfigFile(path);
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        if (error instanceof ConfigError) {
          expect(error.kind).toBe('config');
          expect(error.path).toBe(path);
        }
      }
    });

    it('throws ConfigError for malformed JSON', () => {
      const path = writeConfig('broken.json', '{ "keywords": [');

      expect(() => loadConfigFile(path)).toThrow(/is not valid JSON/);
    });

    it('throws ConfigError when the shape is wrong', () => {
      const path = writeConfig('wrong.json', JSON.stringify({ keywords: 'hiring' }));

      expect(() => loadConfigFile(path)).toThrow(ConfigError);
      expect(() => loadConfigFile(path)).toThrow(/Invalid configuration file .*: keywords: /);
    });
  });

  describe('parseKeywordList', () => {
    it('splits on commas and drops blanks', () => {
      expect(parseKeywordList('hiring, remote,,  careers ')).toEqual(['hiring', 'remote', 'careers']);
      expect(parseKeywordList('')).toEqual([]);
    });
  });

  describe('resolveCrawlConfig', () => {
    it('appends command-line input after the file', () => {
      const path = writeConfig(
        'config.json',
        JSON.stringify({ base_urls: ['https://a.test/'], keywords: ['hiring'] })
      );

      expect(
        resolveCrawlConfig({
          configFile: path,
          seeds: ['https://b.test/'],
          keywords: ['remote'],
        })
      ).toEqual({
        seeds: ['https://a.test/', 'https://b.test/'],
        keywords: ['hiring', 'remote'],
      });
    });

    it('works without a config file', () => {
      expect(resolveCrawlConfig({ seeds: ['https://a.test/'], keywords: ['hiring'] })).toEqual({
        seeds: ['https://a.test/'],
        keywords: ['hiring'],
      });
    });

    it('trims and drops duplicates, keeping the first occurrence', () => {
      const path = writeConfig(
        'config.json',
        JSON.stringify({ base_urls: ['https://a.test/'], keywords: ['hiring', ' '] })
      );

      expect(
        resolveCrawlConfig({
          configFile: path,
          seeds: [' https://a.test/ '],
          keywords: ['remote', 'hiring'],
        })
      ).toEqual({ seeds: ['https://a.test/'], keywords: ['hiring', 'remote'] });
    });

    it('throws InputError when no keywords remain', () => {
      expect(() => resolveCrawlConfig({ seeds: ['https://a.test/'], keywords: [] })).toThrow(
        InputError
      );
      expect(() => resolveCrawlConfig({ seeds: ['https://a.test/'] })).toThrow(
        'No base URLs or keywords provided.'
      );
    });

    it('throws InputError when no seeds remain', () => {
      expect(() => resolveCrawlConfig({ keywords: ['hiring'] })).toThrow(InputError);
    });

    it('throws InputError for seeds that are not http(s) URLs', () => {
      expect(() =>
        resolveCrawlConfig({ seeds: ['site.test', 'ftp://a.test/'], keywords: ['hiring'] })
      ).toThrow('Base URLs must start with http:// or https://: site.test, ftp://a.test/');
    });

    it('propagates ConfigError from the file before checking input', () => {
      expect(() =>
        resolveCrawlConfig({ configFile: join(dir, 'absent.json'), seeds: [], keywords: [] })
      ).toThrow(ConfigError);
    });
  });
});
