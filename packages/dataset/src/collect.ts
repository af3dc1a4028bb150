import { errorMessage, type RawRecord, type Source } from '@jobcorpus/source-sdk';
import { defaultLogger } from './logger.js';
import type { CollectAllOptions, CollectionResult, SourceCollection, SourceFailure } from './types.js';

/**
 * Collect from every source in turn. A source that throws is reported as a
 * failure with zero records; warnings from sources that still returned data
 * are reported as partial failures. Never throws.
 */
export async function collect(sources: readonly Source[], options: CollectAllOptions = {}): Promise<CollectionResult> {
  const { limitPerSource, logger = defaultLogger } = options;
  const records: RawRecord[] = [];
  const collections: SourceCollection[] = [];
  const failures: SourceFailure[] = [];

  for (const source of sources) {
    const { id, name } = source.manifest;
    const start = performance.now();
    let collected = 0;

    logger.info(`[collect:${id}] Fetching records from ${name}...`);
    try {
      const result = await source.collect({ limit: limitPerSource });
      const batch = limitPerSource !== undefined ? result.records.slice(0, limitPerSource) : result.records;
      records.push(...batch);
      collected = batch.length;

      for (const warning of result.warnings) {
        failures.push({ sourceId: id, message: warning, partial: true });
        logger.warn(`[collect:${id}] ${warning}`);
      }
      logger.info(`[collect:${id}] Received ${collected} records`);
    } catch (err) {
      const message = errorMessage(err);
      failures.push({ sourceId: id, message, partial: false });
      logger.error(`[collect:${id}] Error: ${message}`);
    }

    collections.push({ sourceId: id, sourceName: name, collected, durationMs: performance.now() - start });
  }

  const failedIds = [...new Set(failures.filter((f) => !f.partial).map((f) => f.sourceId))];
  logger.info(`[collect] Done. ${records.length} records from ${sources.length - failedIds.length}/${sources.length} sources.`);
  if (failedIds.length > 0) {
    logger.error(`[collect] ${failedIds.length} source(s) unavailable: ${failedIds.join(', ')}`);
  }

  return { records, sources: collections, failures };
}
