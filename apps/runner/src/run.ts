import { buildDataset, summarize, type CollectionResult } from '@jobcorpus/dataset';
import type { Source } from '@jobcorpus/source-sdk';
import type { Logger } from 'pino';
import type { RunnerConfig } from './config.js';
import { writeDataset } from './export.js';
import { createPipelineLogger } from './observability/pipeline-logger.js';

export interface RunDatasetDeps {
  logger: Logger;
  config: RunnerConfig;
  sources: Source[];
}

export interface RunDatasetResult {
  exitCode: number;
  files: string[];
}

/**
 * True when there was at least one source and none of them returned records.
 */
export function allSourcesFailed(collection: CollectionResult, sourceCount: number): boolean {
  if (sourceCount === 0) {
    return false;
  }

  const failed = new Set(collection.failures.filter((failure) => !failure.partial).map((failure) => failure.sourceId));
  return failed.size >= sourceCount;
}

export async function runDataset({ logger, config, sources }: RunDatasetDeps): Promise<RunDatasetResult> {
  logger.info(
    {
      event: 'dataset_started',
      sources: sources.map((source) => source.manifest.id),
      limitPerSource: config.limitPerSource,
      outputDir: config.outputDir,
    },
    'Dataset build started',
  );

  const result = await buildDataset(sources, {
    limitPerSource: config.limitPerSource,
    logger: createPipelineLogger(logger),
  });

  for (const failure of result.collection.failures) {
    logger.warn(
      { event: 'source_failed', sourceId: failure.sourceId, partial: failure.partial, reason: failure.message },
      'Source failed',
    );
  }

  for (const error of result.errors) {
    logger.error({ event: 'stage_failed', stage: error.stage, reason: error.message }, 'Pipeline stage failed');
  }

  const files = await writeDataset(result, config.outputDir, { sampleSize: config.sampleSize });

  logger.info(
    {
      event: 'dataset_completed',
      stats: result.stats,
      summary: summarize(result.records),
      files,
      durationMs: Math.round(result.durationMs),
    },
    'Dataset build completed',
  );

  if (allSourcesFailed(result.collection, sources.length)) {
    logger.error({ event: 'all_sources_failed' }, 'Every source failed; dataset is empty');
    return { exitCode: 1, files };
  }

  return { exitCode: 0, files };
}
