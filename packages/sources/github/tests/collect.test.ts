import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { collectedRecordSchema } from '@jobcorpus/source-sdk';
import { collect } from '../src/index.js';

const currentDir = dirname(fileURLToPath(import.meta.url));
const fixture: unknown = JSON.parse(readFileSync(resolve(currentDir, '../fixtures/response.json'), 'utf-8'));

function mockFetch(impl: (url: string) => { ok: boolean; status?: number; json?: unknown }) {
  const fetchMock = vi.fn().mockImplementation((url: string) => {
    const response = impl(url);
    return Promise.resolve({
      ok: response.ok,
      status: response.status ?? (response.ok ? 200 : 500),
      json: () => Promise.resolve(response.json),
    });
  });

  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('GitHub source', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('maps repositories to raw records', async () => {
    mockFetch(() => ({ ok: true, json: fixture }));
    const result = await collect();

    // 4 queries x 2 usable repositories
    expect(result.records).toHaveLength(8);
    expect(result.warnings).toEqual([]);
    expect(result.records[0]).toEqual({
      source: 'GitHub',
      title: 'tech-interview-handbook',
      company: 'example-org',
      description: 'Curated coding interview preparation materials for busy software engineers',
      url: 'https://github.com/example-org/tech-interview-handbook',
      type: 'repository',
      score: 1200,
      extras: { fullName: 'example-org/tech-interview-handbook', language: 'TypeScript' },
    });
  });

  it('defaults a null description to an empty string', async () => {
    mockFetch(() => ({ ok: true, json: fixture }));
    const result = await collect();
    expect(result.records[1]!.description).toBe('');
  });

  it('builds search urls sorted by stars', async () => {
    const fetchMock = mockFetch(() => ({ ok: true, json: fixture }));
    await collect({ limit: 1 });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]![0]).toBe(
      'https://api.github.com/search/repositories?q=job+description+software+engineer&sort=stars&order=desc&per_page=10',
    );
  });

  it('honours the limit', async () => {
    mockFetch(() => ({ ok: true, json: fixture }));
    const result = await collect({ limit: 3 });
    expect(result.records).toHaveLength(3);
  });

  it('every record passes the collected record schema', async () => {
    mockFetch(() => ({ ok: true, json: fixture }));
    const result = await collect();

    for (const record of result.records) {
      const parsed = collectedRecordSchema.safeParse(record);
      if (!parsed.success) {
        expect.fail(`Record "${record.title}" failed schema validation: ${JSON.stringify(parsed.error.issues)}`);
      }
    }
  });

  it('keeps going when one query is rejected', async () => {
    mockFetch((url) => (url.includes('resume') ? { ok: false, status: 422 } : { ok: true, json: fixture }));
    const result = await collect();

    expect(result.records).toHaveLength(6);
    expect(result.warnings).toEqual(['GitHub query "resume template developer": GitHub API returned 422']);
  });

  it('throws when every query fails', async () => {
    mockFetch(() => ({ ok: false, status: 403 }));
    await expect(collect()).rejects.toThrow(
      'GitHub unavailable: GitHub query "job description software engineer": GitHub API returned 403',
    );
  });
});
