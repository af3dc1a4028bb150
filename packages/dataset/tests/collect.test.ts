import { describe, it, expect, vi } from 'vitest';
import { defineSource, type Source } from '@jobcorpus/source-sdk';
import { collect } from '../src/collect.js';
import type { PipelineLogger } from '../src/types.js';

function silentLogger(): PipelineLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function fakeSource(id: string, run: Source['collect']): Source {
  return defineSource({ manifest: { id, name: id.toUpperCase(), version: '0.0.0' }, collect: run });
}

const record = (title: string) => ({
  source: 'Test',
  title,
  company: 'Acme',
  description: 'A description',
  url: 'https://example.com',
});

describe('collect', () => {
  it('concatenates records in source order', async () => {
    const result = await collect(
      [
        fakeSource('one', async () => ({ records: [record('a'), record('b')], warnings: [] })),
        fakeSource('two', async () => ({ records: [record('c')], warnings: [] })),
      ],
      { logger: silentLogger() },
    );

    expect(result.records.map((r) => r.title)).toEqual(['a', 'b', 'c']);
    expect(result.failures).toEqual([]);
    expect(result.sources.map(({ sourceId, sourceName, collected }) => ({ sourceId, sourceName, collected }))).toEqual([
      { sourceId: 'one', sourceName: 'ONE', collected: 2 },
      { sourceId: 'two', sourceName: 'TWO', collected: 1 },
    ]);
  });

  it('turns a thrown error into a failure and never rejects', async () => {
    const logger = silentLogger();
    const result = await collect(
      [
        fakeSource('down', async () => {
          throw new Error('connection refused');
        }),
      ],
      { logger },
    );

    expect(result.records).toEqual([]);
    expect(result.failures).toEqual([{ sourceId: 'down', message: 'connection refused', partial: false }]);
    expect(result.sources[0]?.collected).toBe(0);
    expect(logger.error).toHaveBeenCalledWith('[collect:down] Error: connection refused');
    expect(logger.error).toHaveBeenCalledWith('[collect] 1 source(s) unavailable: down');
  });

  it('reports warnings as partial failures', async () => {
    const logger = silentLogger();
    const result = await collect(
      [fakeSource('half', async () => ({ records: [record('a')], warnings: ['query x failed'] }))],
      { logger },
    );

    expect(result.records).toHaveLength(1);
    expect(result.failures).toEqual([{ sourceId: 'half', message: 'query x failed', partial: true }]);
    expect(logger.warn).toHaveBeenCalledWith('[collect:half] query x failed');
  });

  it('truncates a source that ignores the limit', async () => {
    const result = await collect(
      [fakeSource('greedy', async () => ({ records: [record('a'), record('b'), record('c')], warnings: [] }))],
      { logger: silentLogger(), limitPerSource: 1 },
    );

    expect(result.records.map((r) => r.title)).toEqual(['a']);
  });

  it('returns nothing for no sources', async () => {
    const result = await collect([], { logger: silentLogger() });
    expect(result).toEqual({ records: [], sources: [], failures: [] });
  });
});
