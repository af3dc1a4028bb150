import { describe, expect, it } from 'vitest';
import { readIntEnv, readListEnv, readRunnerConfig } from '../src/config.js';

describe('runner config', () => {
  it('uses defaults when nothing is set', () => {
    expect(readRunnerConfig({})).toEqual({
      outputDir: 'data',
      sourceIds: undefined,
      limitPerSource: 15,
      sampleSize: 20,
    });
  });

  it('reads and cleans environment values', () => {
    expect(
      readRunnerConfig({
        DATASET_OUTPUT_DIR: ' out ',
        DATASET_SOURCES: ' GitHub, ,reddit',
        DATASET_LIMIT_PER_SOURCE: '5.9',
        DATASET_SAMPLE_SIZE: '-3',
      }),
    ).toEqual({
      outputDir: 'out',
      sourceIds: ['github', 'reddit'],
      limitPerSource: 5,
      sampleSize: 20,
    });
  });

  it('falls back on unusable numbers', () => {
    expect(readIntEnv({ LIMIT: 'abc' }, 'LIMIT', 7)).toBe(7);
    expect(readIntEnv({ LIMIT: '0' }, 'LIMIT', 7)).toBe(7);
    expect(readIntEnv({ LIMIT: '12' }, 'LIMIT', 7)).toBe(12);
  });

  it('treats a blank list as unset', () => {
    expect(readListEnv({ SOURCES: ' , ' }, 'SOURCES')).toBeUndefined();
    expect(readListEnv({}, 'SOURCES')).toBeUndefined();
  });
});
