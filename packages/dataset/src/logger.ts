import type { PipelineLogger } from './types.js';

export const defaultLogger: PipelineLogger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};
