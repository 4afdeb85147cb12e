/**
 * Seeds and keywords from a JSON config file and command-line input.
 */
import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigError, InputError } from '../errors.js';

// --- Zod validation schema ---

export const ConfigFileSchema = z.object({
  base_urls: z.array(z.string()).optional(),
  keywords: z.array(z.string()).optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface CrawlConfig {
  seeds: string[];
  keywords: string[];
}

export interface ConfigInput {
  /** Path to a JSON file with `base_urls` and `keywords` arrays. */
  configFile?: string;
  /** Appended after the file's seeds. */
  seeds?: string[];
  /** Appended after the file's keywords. */
  keywords?: string[];
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Load and validate a config file. Throws ConfigError when the file is
 * missing, unreadable, not JSON or not of the expected shape.
 */
export function loadConfigFile(path: string): CrawlConfig {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${path}: ${String(error)}`, {
      path,
      cause: error,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Configuration file ${path} is not valid JSON: ${String(error)}`, {
      path,
      cause: error,
    });
  }

  const parsed = ConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration file ${path}: ${formatIssues(parsed.error)}`, {
      path,
      cause: parsed.error,
    });
  }

  return {
    seeds: parsed.data.base_urls ?? [],
    keywords: parsed.data.keywords ?? [],
  };
}

/**
 * Split a comma-separated keyword list, dropping blanks.
 */
export function parseKeywordList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/** Trim, drop blanks and exact duplicates; first occurrence wins. */
function dedupe(values: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    if (!trimmed || seen.has(trimmed)) continue;
    seen.add(trimmed);
    out.push(trimmed);
  }
  return out;
}

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Merge file and command-line input. Command-line seeds and keywords are
 * appended after the file's, never replacing them.
 * Throws ConfigError for file problems and InputError when nothing usable remains.
 */
export function resolveCrawlConfig(input: ConfigInput): CrawlConfig {
  const fromFile: CrawlConfig = input.configFile
    ? loadConfigFile(input.configFile)
    : { seeds: [], keywords: [] };

  const seeds = dedupe([...fromFile.seeds, ...(input.seeds ?? [])]);
  const keywords = dedupe([...fromFile.keywords, ...(input.keywords ?? [])]);

  if (seeds.length === 0 || keywords.length === 0) {
    throw new InputError('No base URLs or keywords provided.');
  }

  const invalid = seeds.filter((seed) => !isHttpUrl(seed));
  if (invalid.length > 0) {
    throw new InputError(`Base URLs must start with http:// or https://: ${invalid.join(', ')}`);
  }

  return { seeds, keywords };
}
