import { defaultConfig, type DatasetConfig } from './config.js';
import { dedup } from './dedup.js';
import { defaultLogger } from './logger.js';
import type { CleanedRecord, CleanedRecordDraft, PipelineOptions } from './types.js';
import { validate } from './validate.js';

export interface FilterStats {
  input: number;
  validated: number;
  validationDropped: number;
  deduplicated: number;
  duplicates: number;
}

export interface FilterResult {
  records: CleanedRecord[];
  stats: FilterStats;
}

/**
 * Validation then first-seen dedup. Output order is input order restricted
 * to the surviving first occurrences.
 */
export function filterAndDedup(
  drafts: readonly CleanedRecordDraft[],
  config: DatasetConfig = defaultConfig,
  options: Pick<PipelineOptions, 'logger' | 'onInvalid'> = {},
): FilterResult {
  const { logger = defaultLogger, onInvalid } = options;

  const { valid, invalidCount } = validate(drafts, config, { onInvalid });
  if (invalidCount > 0) {
    logger.info(`[pipeline:validate] ${invalidCount} records below minimum content`);
  }

  const { records, outcomes } = dedup(valid);
  const duplicates = outcomes.filter((outcome) => outcome.action === 'skip').length;
  if (duplicates > 0) {
    logger.info(`[pipeline:dedup] ${duplicates} records skipped (duplicate title/company)`);
  }

  const stats: FilterStats = {
    input: drafts.length,
    validated: valid.length,
    validationDropped: invalidCount,
    deduplicated: records.length,
    duplicates,
  };
  logger.info(
    `[pipeline:filter] ${stats.input} in, ${stats.validated} validated, ${stats.deduplicated} after dedup`,
  );

  return { records, stats };
}
