import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { formatCsvReport, writeCsvReport } from '../report/csv-report.js';

describe('csv-report', () => {
  describe('formatCsvReport', () => {
    it('writes a header row even without results', () => {
      expect(formatCsvReport([])).toBe('url,keywords\n');
    });

    it('joins matched keywords with a comma and quotes the field', () => {
      const csv = formatCsvReport([
        { url: 'https://site.test/about', keywords: ['hiring'] },
        { url: 'https://site.test/jobs', keywords: ['hiring', 'remote'] },
      ]);

      expect(csv).toBe(
        'url,keywords\n' +
          'https://site.test/about,hiring\n' +
          'https://site.test/jobs,"hiring, remote"\n'
      );
    });

    it('escapes embedded quotes', () => {
      expect(formatCsvReport([{ url: 'https://site.test/q', keywords: ['say "hi"'] }])).toBe(
        'url,keywords\nhttps://site.test/q,"say ""hi"""\n'
      );
    });

    it('quotes URLs containing commas', () => {
      expect(formatCsvReport([{ url: 'https://site.test/a,b', keywords: ['x'] }])).toBe(
        'url,keywords\n"https://site.test/a,b",x\n'
      );
    });
  });

  describe('writeCsvReport', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'keyword-crawler-report-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('writes the report and returns its path', () => {
      const path = join(dir, 'pages_with_keywords.csv');

      const written = writeCsvReport([{ url: 'https://site.test/about', keywords: ['hiring'] }], path);

      expect(written).toBe(path);
      expect(readFileSync(path, 'utf-8')).toBe('url,keywords\nhttps://site.test/about,hiring\n');
    });
  });
});
