import { coerceRawRecord, errorMessage, type Source } from '@jobcorpus/source-sdk';
import { annotateAll } from './annotate.js';
import { collect } from './collect.js';
import { defaultConfig } from './config.js';
import { filterAndDedup } from './filter.js';
import { defaultLogger } from './logger.js';
import { normalizeAll } from './normalize.js';
import type {
  AnnotatedRecord,
  CleanedRecord,
  CleanedRecordDraft,
  DatasetOptions,
  DatasetResult,
  PipelineLogger,
  PipelineOptions,
  PipelineResult,
  PipelineStage,
  StageError,
  StageStats,
} from './types.js';

function runStage<T>(
  stage: PipelineStage,
  errors: StageError[],
  logger: PipelineLogger,
  fallback: T,
  run: () => T,
): T {
  try {
    return run();
  } catch (err) {
    const message = errorMessage(err);
    errors.push({ stage, message });
    logger.error(`[pipeline:${stage}] Error: ${message}`);
    return fallback;
  }
}

/**
 * Run a collected batch through the transformation stages.
 * Stages: normalize → validate/dedup → annotate
 *
 * Each stage consumes the whole batch before the next begins. A stage that
 * throws is recorded in `errors` and the stages after it see an empty batch.
 */
export function processRecords(raw: readonly unknown[], options: PipelineOptions = {}): PipelineResult {
  const { config = defaultConfig, logger = defaultLogger, onInvalid } = options;
  const start = performance.now();
  const errors: StageError[] = [];

  const stats: StageStats = {
    input: raw.length,
    normalized: 0,
    validated: 0,
    validationDropped: 0,
    deduplicated: 0,
    duplicates: 0,
    annotated: 0,
  };

  logger.info(`[pipeline] Processing ${stats.input} records`);

  // 1. Normalize
  const drafts = runStage<CleanedRecordDraft[]>('normalize', errors, logger, [], () => normalizeAll(raw, config));
  stats.normalized = drafts.length;

  // 2. Validate + dedup
  const cleaned = runStage<CleanedRecord[]>('validate', errors, logger, [], () => {
    const result = filterAndDedup(drafts, config, { logger, onInvalid });
    stats.validated = result.stats.validated;
    stats.validationDropped = result.stats.validationDropped;
    stats.duplicates = result.stats.duplicates;
    return result.records;
  });
  stats.deduplicated = cleaned.length;

  // 3. Annotate
  const records = runStage<AnnotatedRecord[]>('annotate', errors, logger, [], () => annotateAll(cleaned, config));
  stats.annotated = records.length;

  logger.info(
    `[pipeline] Done. ${stats.input} in → ${stats.validated} validated → ${stats.deduplicated} unique → ${stats.annotated} annotated`,
  );
  if (errors.length > 0) {
    logger.error(`[pipeline] ${errors.length} stage(s) failed: ${errors.map((e) => e.stage).join(', ')}`);
  }

  return {
    cleaned,
    records,
    stats,
    errors,
    durationMs: performance.now() - start,
  };
}

/**
 * Collect from every source, then process whatever was gathered.
 * Sources that fail only shrink the input; an empty collection yields an
 * empty dataset with zero counts.
 */
export async function buildDataset(sources: readonly Source[], options: DatasetOptions = {}): Promise<DatasetResult> {
  const { limitPerSource, logger = defaultLogger } = options;
  const collection = await collect(sources, { limitPerSource, logger });
  const raw = collection.records.map(coerceRawRecord);
  const result = processRecords(raw, options);

  return { ...result, raw, collection };
}
