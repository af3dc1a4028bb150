import { describe, it, expect, vi, afterEach } from 'vitest';
import { collect, isJobRelated } from '../src/index.js';

const stories: Record<number, unknown> = {
  1: { id: 1, title: 'Ask HN: Who is hiring? (October)', by: 'whoishiring', text: 'Post your openings &amp; roles.', score: 400 },
  2: { id: 2, title: 'A new sorting algorithm', by: 'someone', score: 50 },
  3: { id: 3, title: 'Show HN: Resume builder for developers', score: 20, url: 'https://example.com/resume' },
  4: null,
};

function mockHackerNews(topStories: unknown, failing: number[] = []) {
  const fetchMock = vi.fn().mockImplementation((url: string) => {
    const itemMatch = url.match(/\/item\/(\d+)\.json$/);
    if (!itemMatch) {
      return Promise.resolve({ ok: true, status: 200, json: () => Promise.resolve(topStories) });
    }

    const id = Number(itemMatch[1]);
    if (failing.includes(id)) {
      return Promise.resolve({ ok: false, status: 404, json: () => Promise.resolve(null) });
    }

    return Promise.resolve({ ok: true, status: 200, json: () => Promise.resolve(stories[id] ?? null) });
  });

  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('isJobRelated', () => {
  it('matches job keywords case-insensitively', () => {
    expect(isJobRelated('We are HIRING')).toBe(true);
    expect(isJobRelated('Rust 2.0 released')).toBe(false);
  });
});

describe('HackerNews source', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('keeps only job-related stories', async () => {
    mockHackerNews([1, 2, 3, 4]);
    const result = await collect();

    expect(result.records.map((r) => r.title)).toEqual([
      'Ask HN: Who is hiring? (October)',
      'Show HN: Resume builder for developers',
    ]);
    expect(result.warnings).toEqual([]);
  });

  it('maps story fields and defaults the author', async () => {
    mockHackerNews([3]);
    const result = await collect();

    expect(result.records[0]).toEqual({
      source: 'HackerNews',
      title: 'Show HN: Resume builder for developers',
      company: 'Anonymous',
      description: '',
      url: 'https://news.ycombinator.com/item?id=3',
      type: 'story',
      score: 20,
      extras: { storyId: 3, link: 'https://example.com/resume' },
    });
  });

  it('records a failing item as a warning', async () => {
    mockHackerNews([1, 9], [9]);
    const result = await collect();

    expect(result.records).toHaveLength(1);
    expect(result.warnings).toEqual(['HackerNews item 9: HackerNews API returned 404']);
  });

  it('throws when the top stories list is not an array', async () => {
    mockHackerNews({ error: 'nope' });
    await expect(collect()).rejects.toThrow('HackerNews API returned non-array payload');
  });

  it('stops fetching items once the limit is reached', async () => {
    const fetchMock = mockHackerNews([1, 3, 2]);
    const result = await collect({ limit: 1 });

    expect(result.records).toHaveLength(1);
    // top stories + first item
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
