import type { RawRecord } from '@jobcorpus/source-sdk';
import type { DatasetConfig } from './config.js';

/**
 * After normalization: text fields cleaned and canonicalized, dedup key derived.
 * Branded type to prevent mixing with raw collector output.
 */
export interface CleanedRecordDraft extends RawRecord {
  dedupKey: string;
  readonly _normalized: true;
}

/**
 * A draft that passed the minimum-content checks.
 */
export interface CleanedRecord extends CleanedRecordDraft {
  readonly _validated: true;
}

export const EXPERIENCE_LEVELS = ['Entry', 'Mid', 'Senior', 'Management'] as const;
export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number];

export const CONTENT_TYPES = [
  'JobDescription',
  'InterviewQuestion',
  'CareerAdvice',
  'TechnicalDiscussion',
  'CompanyInfo',
] as const;
export type ContentType = (typeof CONTENT_TYPES)[number];

export const COMPANY_SIZES = ['Startup', 'Medium', 'Large', 'Unknown'] as const;
export type CompanySize = (typeof COMPANY_SIZES)[number];

export interface Annotations {
  skillTags: string[];
  experienceLevel: ExperienceLevel;
  contentType: ContentType;
  /** Bounded to [0, 1], two decimals. */
  relevanceScore: number;
  isRemote: boolean;
  companySize: CompanySize;
  textLength: number;
  hasRequirements: boolean;
}

export interface AnnotatedRecord extends CleanedRecord, Annotations {}

/**
 * Outcome for a single record after the in-batch dedup pass.
 */
export type DedupOutcome =
  | { action: 'keep'; record: CleanedRecord }
  | { action: 'skip'; record: CleanedRecord; duplicateOf: number; reason: string };

/**
 * Per-stage counts for reporting.
 */
export interface StageStats {
  input: number;
  normalized: number;
  validated: number;
  validationDropped: number;
  deduplicated: number;
  duplicates: number;
  annotated: number;
}

export type PipelineStage = 'normalize' | 'validate' | 'annotate';

export interface StageError {
  stage: PipelineStage;
  message: string;
}

export interface PipelineResult {
  cleaned: CleanedRecord[];
  records: AnnotatedRecord[];
  stats: StageStats;
  errors: StageError[];
  durationMs: number;
}

export interface InvalidRecordIssue {
  path: string;
  message: string;
}

export interface PipelineOptions {
  config?: DatasetConfig;
  logger?: PipelineLogger;
  onInvalid?: (issues: InvalidRecordIssue[], record: CleanedRecordDraft) => void;
}

/**
 * A source that threw, or a sub-request a source reported as failed.
 */
export interface SourceFailure {
  sourceId: string;
  message: string;
  /** True when the source still returned records. */
  partial: boolean;
}

export interface SourceCollection {
  sourceId: string;
  sourceName: string;
  collected: number;
  durationMs: number;
}

export interface CollectionResult {
  records: RawRecord[];
  sources: SourceCollection[];
  failures: SourceFailure[];
}

export interface CollectAllOptions {
  limitPerSource?: number;
  logger?: PipelineLogger;
}

export interface DatasetOptions extends PipelineOptions {
  limitPerSource?: number;
}

export interface DatasetResult extends PipelineResult {
  raw: RawRecord[];
  collection: CollectionResult;
}

/**
 * Minimal logger interface; defaults to console.
 */
export interface PipelineLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
