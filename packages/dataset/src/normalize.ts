import { coerceRawRecord } from '@jobcorpus/source-sdk';
import { defaultConfig, type DatasetConfig } from './config.js';
import { computeDedupKey } from './dedup.js';
import type { CleanedRecordDraft } from './types.js';

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  colon: ':',
  ndash: '-',
  mdash: '-',
  hellip: '...',
  lsquo: "'",
  rsquo: "'",
  ldquo: '"',
  rdquo: '"',
  bull: '*',
  copy: '(c)',
};

// Letters, digits, underscore, whitespace and . , ! ? - ( ) /
const DISALLOWED_CHARS = /[^\p{L}\p{N}_\s.,!?\-()\/]/gu;
const WORD_CHAR = /[\p{L}\p{N}]/u;

/**
 * Decode named and numeric (&#39; / &#x27;) HTML entities in a single pass.
 * Unknown entities are left as they are.
 */
export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match: string, entity: string) => {
    if (entity.startsWith('#')) {
      const hex = entity[1] === 'x' || entity[1] === 'X';
      const code = hex ? Number.parseInt(entity.slice(2), 16) : Number.parseInt(entity.slice(1), 10);
      return Number.isInteger(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }

    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

/**
 * Replace tag-like substrings with a space so adjacent words stay apart.
 */
export function stripTags(text: string): string {
  return text.replace(/<[^>]+>/g, ' ');
}

/**
 * Trim whitespace and collapse multiple spaces.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Decode entities, drop markup and disallowed characters, collapse whitespace.
 */
export function cleanText(text: string): string {
  const decoded = decodeHtmlEntities(text);
  const withoutTags = stripTags(decoded);
  return normalizeWhitespace(withoutTags.replace(DISALLOWED_CHARS, ''));
}

/**
 * Uppercase the first letter of every letter run and lowercase the rest.
 */
export function toTitleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match: string, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function expandAbbreviations(title: string, abbreviations: Readonly<Record<string, string>>): string {
  let result = title;

  for (const [abbreviation, expansion] of Object.entries(abbreviations)) {
    const pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(abbreviation)}(?![\\p{L}\\p{N}])\\.?`, 'giu');
    result = result.replace(pattern, (match: string, offset: number, whole: string) => {
      // "Sr.Engineer" must not glue the expansion onto the next word
      const next = whole.charAt(offset + match.length);
      return WORD_CHAR.test(next) ? `${expansion} ` : expansion;
    });
  }

  return result;
}

/**
 * Length in code points, so letters outside the BMP count once.
 */
export function characterCount(text: string): number {
  return [...text].length;
}

/**
 * Clean, title-case, then expand seniority abbreviations (Sr. → Senior).
 */
export function normalizeTitle(title: string, config: DatasetConfig = defaultConfig): string {
  return expandAbbreviations(toTitleCase(cleanText(title)), config.abbreviations);
}

function buildSuffixPattern(suffixes: readonly string[]): RegExp | null {
  if (suffixes.length === 0) return null;

  const alternatives = [...suffixes]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
  return new RegExp(`[\\s,]*(?<![\\p{L}\\p{N}])(?:${alternatives})\\.?$`, 'iu');
}

const suffixPatternCache = new WeakMap<readonly string[], RegExp | null>();

function suffixPatternFor(suffixes: readonly string[]): RegExp | null {
  if (!suffixPatternCache.has(suffixes)) {
    suffixPatternCache.set(suffixes, buildSuffixPattern(suffixes));
  }

  return suffixPatternCache.get(suffixes) ?? null;
}

/**
 * Clean, strip trailing legal-entity suffixes ("Acme, Inc." → "Acme"), title-case.
 * A name that consists only of a suffix is kept as it is.
 */
export function normalizeCompany(company: string, config: DatasetConfig = defaultConfig): string {
  let result = cleanText(company);
  const pattern = suffixPatternFor(config.companySuffixes);

  if (pattern) {
    for (;;) {
      const stripped = result.replace(pattern, '').trim();
      if (!stripped || stripped === result) break;
      result = stripped;
    }
  }

  return toTitleCase(result);
}

/**
 * Apply all normalizations to one collected record.
 * Pure function; absent or malformed fields become empty strings.
 */
export function normalize(record: unknown, config: DatasetConfig = defaultConfig): CleanedRecordDraft {
  const raw = coerceRawRecord(record);
  const title = normalizeTitle(raw.title, config);
  const company = normalizeCompany(raw.company, config);

  return {
    ...raw,
    source: raw.source.trim(),
    url: raw.url.trim(),
    title,
    company,
    description: cleanText(raw.description),
    dedupKey: computeDedupKey(title, company),
    _normalized: true as const,
  };
}

export function normalizeAll(records: readonly unknown[], config: DatasetConfig = defaultConfig): CleanedRecordDraft[] {
  return records.map((record) => normalize(record, config));
}
