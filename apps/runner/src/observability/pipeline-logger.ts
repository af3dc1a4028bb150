import type { PipelineLogger } from '@jobcorpus/dataset';
import type { Logger } from 'pino';

export function createPipelineLogger(logger: Logger): PipelineLogger {
  return {
    info: (message) => logger.debug({ event: 'pipeline_stage' }, message),
    warn: (message) => logger.warn({ event: 'pipeline_stage' }, message),
    error: (message) => logger.error({ event: 'pipeline_stage' }, message),
  };
}
