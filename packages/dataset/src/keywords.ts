const patternCache = new Map<string, RegExp>();

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Whole-term pattern: the keyword may not touch a letter or digit on either side,
 * so "lead" does not match "leading" and "ai" does not match "available".
 */
export function keywordPattern(keyword: string): RegExp {
  const key = keyword.toLowerCase();
  let pattern = patternCache.get(key);
  if (!pattern) {
    pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(key)}(?![\\p{L}\\p{N}])`, 'u');
    patternCache.set(key, pattern);
  }

  return pattern;
}

/**
 * Lowercased haystack for keyword matching.
 */
export function searchText(...parts: string[]): string {
  return parts.join(' ').toLowerCase();
}

export function containsKeyword(text: string, keyword: string): boolean {
  return keywordPattern(keyword).test(text);
}

export function hasAnyKeyword(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => containsKeyword(text, keyword));
}

export function findKeywords(text: string, keywords: readonly string[]): string[] {
  return [...new Set(keywords.filter((keyword) => containsKeyword(text, keyword)))];
}

export function countKeywords(text: string, keywords: readonly string[]): number {
  return findKeywords(text, keywords).length;
}
