/**
 * Extract and resolve links from HTML
 */
import { parseHTML } from 'linkedom';

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Resolve one href against the seed:
 * `/path` joins the seed's origin root, a bare relative path joins the seed
 * itself, `http...` is taken as absolute. Returns null for hrefs that name no
 * crawlable page (empty, fragment-only, mailto:, javascript:, unparsable).
 */
export function resolveHref(href: string, seed: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#')) return null;

  let seedUrl: URL;
  try {
    seedUrl = new URL(seed);
  } catch {
    return null;
  }

  let candidate: string;
  if (trimmed.startsWith('//')) {
    candidate = seedUrl.protocol + trimmed;
  } else if (trimmed.startsWith('/')) {
    candidate = seedUrl.origin + trimmed;
  } else if (trimmed.startsWith('http')) {
    candidate = trimmed;
  } else if (SCHEME_PATTERN.test(trimmed)) {
    return null;
  } else {
    candidate = seed.replace(/\/+$/, '') + '/' + trimmed;
  }

  try {
    const resolved = new URL(candidate);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
    resolved.hash = '';
    return resolved.href;
  } catch {
    return null;
  }
}

/**
 * Extract absolute URLs from <a href> tags, in document order.
 * Duplicates are kept; the crawler deduplicates through its visited set.
 */
export function extractLinks(html: string, seed: string): string[] {
  const { document } = parseHTML(html);
  const links: string[] = [];

  for (const anchor of document.querySelectorAll('a[href]')) {
    const href = anchor.getAttribute('href');
    if (!href) continue;

    const resolved = resolveHref(href, seed);
    if (resolved) links.push(resolved);
  }

  return links;
}

/**
 * Same-origin test by string prefix. The character after the origin must end
 * the authority so that `https://a.test` does not admit `https://a.test.example`.
 */
export function isWithinOrigin(url: string, seed: string): boolean {
  let origin: string;
  try {
    origin = new URL(seed).origin;
  } catch {
    return false;
  }

  if (url === origin) return true;
  if (!url.startsWith(origin)) return false;
  const next = url.charAt(origin.length);
  return next === '/' || next === '?' || next === '#';
}
