import { defaultConfig, type DatasetConfig } from './config.js';
import { countKeywords, hasAnyKeyword, searchText } from './keywords.js';
import { characterCount } from './normalize.js';
import type { AnnotatedRecord, Annotations, CleanedRecord, CompanySize, ContentType, ExperienceLevel } from './types.js';

const YEARS_PATTERN = /(?<!\d)(\d{1,2})\s*\+?\s*(?:years?|yrs?)(?![\p{L}])/gu;
const EMPLOYEES_PATTERN = /(\d[\d,]*)\s*\+?\s*(?:employees|people|staff)(?![\p{L}])/u;

/**
 * Skill tags whose keyword list has at least one hit, in vocabulary order.
 */
export function extractSkills(text: string, config: DatasetConfig = defaultConfig): string[] {
  const haystack = searchText(text);
  return Object.entries(config.skills)
    .filter(([, keywords]) => hasAnyKeyword(haystack, keywords))
    .map(([skill]) => skill);
}

/**
 * Largest "N years" figure mentioned in the text.
 */
export function extractYearsOfExperience(text: string): number | undefined {
  let max: number | undefined;
  for (const match of text.matchAll(YEARS_PATTERN)) {
    const years = Number(match[1]);
    if (max === undefined || years > max) {
      max = years;
    }
  }

  return max;
}

/**
 * Tiers are checked Management → Senior → Entry and the first tier with a
 * keyword hit wins. Without a hit the largest year count decides; default Mid.
 */
export function classifyExperienceLevel(text: string, config: DatasetConfig = defaultConfig): ExperienceLevel {
  const haystack = searchText(text);
  const { management, senior, entry, entryMaxYears, seniorMinYears } = config.experience;

  const tiers: Array<[ExperienceLevel, readonly string[]]> = [
    ['Management', management],
    ['Senior', senior],
    ['Entry', entry],
  ];
  for (const [level, keywords] of tiers) {
    if (hasAnyKeyword(haystack, keywords)) {
      return level;
    }
  }

  const years = extractYearsOfExperience(haystack);
  if (years !== undefined) {
    if (years >= seniorMinYears) return 'Senior';
    if (years <= entryMaxYears) return 'Entry';
  }

  return 'Mid';
}

function isInterrogative(title: string, questionWords: readonly string[]): boolean {
  if (title.includes('?')) return true;
  const firstWord = title.trim().split(/\s+/)[0]?.toLowerCase() ?? '';
  return questionWords.includes(firstWord);
}

export interface ContentTypeInput {
  title: string;
  description: string;
  source: string;
}

/**
 * Exactly one label, by precedence:
 * JobDescription > InterviewQuestion > CareerAdvice > TechnicalDiscussion > CompanyInfo.
 */
export function classifyContentType(record: ContentTypeInput, config: DatasetConfig = defaultConfig): ContentType {
  const haystack = searchText(record.title, record.description);
  const source = record.source.trim().toLowerCase();
  const cues = config.contentType;

  if (hasAnyKeyword(haystack, cues.jobPosting)) {
    return 'JobDescription';
  }

  if (
    cues.qaSources.includes(source) ||
    (isInterrogative(record.title, cues.questionWords) && hasAnyKeyword(haystack, cues.interview))
  ) {
    return 'InterviewQuestion';
  }

  if (cues.discussionSources.includes(source) && hasAnyKeyword(haystack, cues.advice)) {
    return 'CareerAdvice';
  }

  if (countKeywords(haystack, config.technicalTerms) >= cues.technicalDensity) {
    return 'TechnicalDiscussion';
  }

  return 'CompanyInfo';
}

export function detectRemote(text: string, config: DatasetConfig = defaultConfig): boolean {
  return hasAnyKeyword(searchText(text), config.remoteKeywords);
}

export function hasRequirementKeywords(text: string, config: DatasetConfig = defaultConfig): boolean {
  return hasAnyKeyword(searchText(text), config.requirementKeywords);
}

/**
 * An explicit employee count wins; otherwise startup, large and medium cues are
 * checked in that order. No signal means Unknown.
 */
export function estimateCompanySize(text: string, config: DatasetConfig = defaultConfig): CompanySize {
  const haystack = searchText(text);
  const size = config.companySize;

  const employeeMatch = haystack.match(EMPLOYEES_PATTERN);
  if (employeeMatch?.[1]) {
    const employees = Number(employeeMatch[1].replaceAll(',', ''));
    if (Number.isFinite(employees) && employees > 0) {
      if (employees < size.startupMaxEmployees) return 'Startup';
      if (employees < size.mediumMaxEmployees) return 'Medium';
      return 'Large';
    }
  }

  if (hasAnyKeyword(haystack, size.startup)) return 'Startup';
  if (hasAnyKeyword(haystack, size.large)) return 'Large';
  if (hasAnyKeyword(haystack, size.medium)) return 'Medium';
  return 'Unknown';
}

export interface RelevanceSignals {
  skillCount: number;
  technicalTermCount: number;
  hasRequirements: boolean;
  textLength: number;
}

/**
 * Weighted sum of indicator signals (weights in `config.relevance`), clamped to
 * [0, 1] and rounded to two decimals. With the default weights:
 * skills 0.1 each up to 0.4, technical terms up to 0.3 (saturating at 10),
 * requirements 0.1, description length up to 0.2 (saturating at 1000 chars).
 */
export function calculateRelevanceScore(signals: RelevanceSignals, config: DatasetConfig = defaultConfig): number {
  const weights = config.relevance;
  const score =
    Math.min(signals.skillCount * weights.skillWeight, weights.skillCap) +
    Math.min(signals.technicalTermCount / weights.technicalSaturation, 1) * weights.technicalWeight +
    (signals.hasRequirements ? weights.requirementsBonus : 0) +
    Math.min(signals.textLength / weights.lengthSaturation, 1) * weights.lengthWeight;

  const bounded = Math.min(Math.max(score, 0), 1);
  return Math.round(bounded * 100) / 100;
}

/**
 * Derive every label for one validated record. Text fields are copied as they are.
 */
export function annotate(record: CleanedRecord, config: DatasetConfig = defaultConfig): AnnotatedRecord {
  const text = `${record.title} ${record.description}`;
  const skillTags = extractSkills(text, config);
  const hasRequirements = hasRequirementKeywords(text, config);
  const textLength = characterCount(record.description);

  const annotations: Annotations = {
    skillTags,
    experienceLevel: classifyExperienceLevel(text, config),
    contentType: classifyContentType(record, config),
    relevanceScore: calculateRelevanceScore(
      {
        skillCount: skillTags.length,
        technicalTermCount: countKeywords(searchText(text), config.technicalTerms),
        hasRequirements,
        textLength,
      },
      config,
    ),
    isRemote: detectRemote(text, config),
    companySize: estimateCompanySize(`${record.company} ${text}`, config),
    textLength,
    hasRequirements,
  };

  return { ...record, ...annotations };
}

export function annotateAll(records: readonly CleanedRecord[], config: DatasetConfig = defaultConfig): AnnotatedRecord[] {
  return records.map((record) => annotate(record, config));
}
