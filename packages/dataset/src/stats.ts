import type { AnnotatedRecord, CompanySize, ContentType, ExperienceLevel } from './types.js';

const TOP_SKILLS = 10;
const PREVIEW_LENGTH = 200;

export interface DatasetSummary {
  totalRecords: number;
  sources: Record<string, number>;
  experienceLevels: Partial<Record<ExperienceLevel, number>>;
  contentTypes: Partial<Record<ContentType, number>>;
  companySizes: Partial<Record<CompanySize, number>>;
  /** Most frequent skill tags, count descending, ties in first-seen order. */
  topSkills: Array<{ skill: string; count: number }>;
  averageRelevanceScore: number;
  remotePercentage: number;
  averageDescriptionLength: number;
  uniqueCompanies: number;
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function summarize(records: readonly AnnotatedRecord[]): DatasetSummary {
  const sources: Record<string, number> = {};
  const experienceLevels: Partial<Record<ExperienceLevel, number>> = {};
  const contentTypes: Partial<Record<ContentType, number>> = {};
  const companySizes: Partial<Record<CompanySize, number>> = {};
  const skillCounts = new Map<string, number>();
  const companies = new Set<string>();
  let relevanceTotal = 0;
  let remoteCount = 0;
  let descriptionTotal = 0;

  for (const record of records) {
    increment(sources, record.source || 'Unknown');
    increment(experienceLevels, record.experienceLevel);
    increment(contentTypes, record.contentType);
    increment(companySizes, record.companySize);
    for (const skill of record.skillTags) {
      skillCounts.set(skill, (skillCounts.get(skill) ?? 0) + 1);
    }
    companies.add(record.company);
    relevanceTotal += record.relevanceScore;
    descriptionTotal += record.textLength;
    if (record.isRemote) remoteCount += 1;
  }

  const total = records.length;
  const topSkills = [...skillCounts.entries()]
    .map(([skill, count]) => ({ skill, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, TOP_SKILLS);

  return {
    totalRecords: total,
    sources,
    experienceLevels,
    contentTypes,
    companySizes,
    topSkills,
    averageRelevanceScore: total > 0 ? round(relevanceTotal / total, 2) : 0,
    remotePercentage: total > 0 ? round((remoteCount / total) * 100, 1) : 0,
    averageDescriptionLength: total > 0 ? round(descriptionTotal / total, 1) : 0,
    uniqueCompanies: companies.size,
  };
}

export interface AnnotationSample {
  id: number;
  title: string;
  company: string;
  descriptionPreview: string;
  annotations: {
    skillTags: string[];
    experienceLevel: ExperienceLevel;
    contentType: ContentType;
    relevanceScore: number;
    isRemote: boolean;
    companySize: CompanySize;
  };
}

function preview(description: string): string {
  return description.length > PREVIEW_LENGTH ? `${description.slice(0, PREVIEW_LENGTH)}...` : description;
}

/**
 * Highest-relevance records for manual review. Ties keep pipeline order.
 */
export function sampleAnnotations(records: readonly AnnotatedRecord[], size = 20): AnnotationSample[] {
  return [...records]
    .sort((a, b) => b.relevanceScore - a.relevanceScore)
    .slice(0, Math.max(0, size))
    .map((record, index) => ({
      id: index + 1,
      title: record.title,
      company: record.company,
      descriptionPreview: preview(record.description),
      annotations: {
        skillTags: record.skillTags,
        experienceLevel: record.experienceLevel,
        contentType: record.contentType,
        relevanceScore: record.relevanceScore,
        isRemote: record.isRemote,
        companySize: record.companySize,
      },
    }));
}
