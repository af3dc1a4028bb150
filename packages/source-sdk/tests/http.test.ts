import { describe, it, expect, vi, afterEach } from 'vitest';
import { fetchJson } from '../src/http.js';

interface MockFetchResponse {
  ok: boolean;
  status?: number;
  json?: unknown;
}

function mockFetchSequence(responses: MockFetchResponse[]) {
  let idx = 0;
  const fetchMock = vi.fn().mockImplementation(() => {
    const response = responses[Math.min(idx, responses.length - 1)]!;
    idx += 1;

    return Promise.resolve({
      ok: response.ok,
      status: response.status ?? (response.ok ? 200 : 500),
      json: () => Promise.resolve(response.json),
    });
  });

  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

const options = { label: 'Test API', retryDelaysMs: [0, 0] };

describe('fetchJson', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the parsed payload', async () => {
    mockFetchSequence([{ ok: true, json: { items: [1, 2] } }]);
    await expect(fetchJson('https://example.com/api', options)).resolves.toEqual({ items: [1, 2] });
  });

  it('sends a user agent and merges custom headers', async () => {
    const fetchMock = mockFetchSequence([{ ok: true, json: [] }]);
    await fetchJson('https://example.com/api', { ...options, headers: { 'X-Test': '1' } });

    const [url, init] = fetchMock.mock.calls[0]!;
    expect(url).toBe('https://example.com/api');
    expect(init.headers['User-Agent']).toBe('jobcorpus/0.1 (dataset builder)');
    expect(init.headers['X-Test']).toBe('1');
  });

  it('retries on 5xx and then succeeds', async () => {
    const fetchMock = mockFetchSequence([{ ok: false, status: 502 }, { ok: true, json: { ok: 1 } }]);
    await expect(fetchJson('https://example.com/api', options)).resolves.toEqual({ ok: 1 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('throws immediately on 404 without retries', async () => {
    const fetchMock = mockFetchSequence([{ ok: false, status: 404 }]);
    await expect(fetchJson('https://example.com/api', options)).rejects.toThrow('Test API returned 404');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('gives up after the last attempt on 429', async () => {
    const fetchMock = mockFetchSequence([{ ok: false, status: 429 }]);
    await expect(fetchJson('https://example.com/api', options)).rejects.toThrow('Test API returned 429');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('retries network errors', async () => {
    const fetchMock = vi
      .fn()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce({ ok: true, status: 200, json: () => Promise.resolve({ ok: 2 }) });
    vi.stubGlobal('fetch', fetchMock);

    await expect(fetchJson('https://example.com/api', options)).resolves.toEqual({ ok: 2 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('reports parse failures once attempts run out', async () => {
    const fetchMock = vi.fn().mockResolvedValue({
      ok: true,
      status: 200,
      json: () => Promise.reject(new Error('Unexpected token <')),
    });
    vi.stubGlobal('fetch', fetchMock);

    await expect(fetchJson('https://example.com/api', { ...options, maxAttempts: 2 })).rejects.toThrow(
      'Test API response parse failed: Unexpected token <',
    );
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
