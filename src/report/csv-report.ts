/**
 * CSV report of pages with keyword matches
 */
import { writeFileSync } from 'fs';
import { resolve } from 'path';
import type { PageResult } from '../crawl/types.js';

export const DEFAULT_REPORT_FILE = 'pages_with_keywords.csv';

const CSV_HEADER = ['url', 'keywords'];

function csvEscape(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvReport(results: readonly PageResult[]): string {
  const lines = [CSV_HEADER.join(',')];
  for (const result of results) {
    lines.push([result.url, result.keywords.join(', ')].map(csvEscape).join(','));
  }
  return lines.join('\n') + '\n';
}

/**
 * Write the report and return its absolute path.
 */
export function writeCsvReport(
  results: readonly PageResult[],
  path: string = DEFAULT_REPORT_FILE
): string {
  const outPath = resolve(path);
  writeFileSync(outPath, formatCsvReport(results), 'utf-8');
  return outPath;
}
