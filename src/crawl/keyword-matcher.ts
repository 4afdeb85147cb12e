/**
 * Whole-word, case-insensitive keyword matching
 */

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a keyword into a literal pattern. A match may not be preceded or
 * followed by a letter, digit or underscore, so "cat" does not match "cats"
 * and "c++" still matches "C++ rocks". Returns null for blank keywords.
 */
export function compileKeyword(keyword: string): RegExp | null {
  const literal = keyword.trim();
  if (!literal) return null;
  return new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(literal)}(?![\\p{L}\\p{N}_])`, 'iu');
}

/**
 * Return the keywords found in `text`, in the order they were given.
 */
export function matchKeywords(text: string, keywords: readonly string[]): string[] {
  const found: string[] = [];
  for (const keyword of keywords) {
    const pattern = compileKeyword(keyword);
    if (pattern?.test(text)) found.push(keyword);
  }
  return found;
}

/**
 * Precompile a keyword list once per crawl.
 */
export function createKeywordMatcher(keywords: readonly string[]): (text: string) => string[] {
  const compiled = keywords
    .map((keyword) => ({ keyword, pattern: compileKeyword(keyword) }))
    .filter((entry): entry is { keyword: string; pattern: RegExp } => entry.pattern !== null);

  return (text) => compiled.filter(({ pattern }) => pattern.test(text)).map(({ keyword }) => keyword);
}
