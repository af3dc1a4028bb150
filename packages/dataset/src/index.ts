// Pipeline
export { processRecords, buildDataset } from './pipeline.js';
export { collect } from './collect.js';

// Individual stages
export {
  normalize,
  normalizeAll,
  normalizeTitle,
  normalizeCompany,
  cleanText,
  decodeHtmlEntities,
  stripTags,
  normalizeWhitespace,
  toTitleCase,
  characterCount,
} from './normalize.js';
export { validate } from './validate.js';
export { dedup, computeDedupKey } from './dedup.js';
export { filterAndDedup } from './filter.js';
export {
  annotate,
  annotateAll,
  extractSkills,
  extractYearsOfExperience,
  classifyExperienceLevel,
  classifyContentType,
  detectRemote,
  hasRequirementKeywords,
  estimateCompanySize,
  calculateRelevanceScore,
} from './annotate.js';
export { summarize, sampleAnnotations } from './stats.js';

// Configuration
export { defaultConfig, loadConfig, parseConfig, createConfig, datasetConfigSchema } from './config.js';
export type { DatasetConfig, DatasetConfigInput } from './config.js';

// Types
export { EXPERIENCE_LEVELS, CONTENT_TYPES, COMPANY_SIZES } from './types.js';
export type {
  CleanedRecordDraft,
  CleanedRecord,
  AnnotatedRecord,
  Annotations,
  ExperienceLevel,
  ContentType,
  CompanySize,
  DedupOutcome,
  StageStats,
  StageError,
  PipelineStage,
  PipelineResult,
  PipelineOptions,
  PipelineLogger,
  InvalidRecordIssue,
  SourceFailure,
  SourceCollection,
  CollectionResult,
  CollectAllOptions,
  DatasetOptions,
  DatasetResult,
} from './types.js';
export type { FilterStats, FilterResult } from './filter.js';
export type { DatasetSummary, AnnotationSample } from './stats.js';
