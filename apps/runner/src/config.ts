const DEFAULT_OUTPUT_DIR = 'data';
const DEFAULT_LIMIT_PER_SOURCE = 15;
const DEFAULT_SAMPLE_SIZE = 20;

export interface RunnerConfig {
  outputDir: string;
  /** Undefined means every catalogued source. */
  sourceIds: string[] | undefined;
  limitPerSource: number;
  sampleSize: number;
}

export function readIntEnv(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return Math.floor(parsed);
}

/**
 * Comma-separated, trimmed and lowercased. Blank input reads as unset.
 */
export function readListEnv(env: NodeJS.ProcessEnv, name: string): string[] | undefined {
  const raw = env[name];
  if (!raw) {
    return undefined;
  }

  const items = raw
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);

  return items.length > 0 ? items : undefined;
}

export function readRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  return {
    outputDir: env.DATASET_OUTPUT_DIR?.trim() || DEFAULT_OUTPUT_DIR,
    sourceIds: readListEnv(env, 'DATASET_SOURCES'),
    limitPerSource: readIntEnv(env, 'DATASET_LIMIT_PER_SOURCE', DEFAULT_LIMIT_PER_SOURCE),
    sampleSize: readIntEnv(env, 'DATASET_SAMPLE_SIZE', DEFAULT_SAMPLE_SIZE),
  };
}
