const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_DELAYS_MS = [100, 300];
const DEFAULT_USER_AGENT = 'jobcorpus/0.1 (dataset builder)';

export interface FetchJsonOptions {
  /** Prefix for error messages, e.g. "GitHub API". */
  label: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  maxAttempts?: number;
  retryDelaysMs?: number[];
}

function shouldRetryStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * GET a JSON document with a timeout and bounded retries.
 * Network errors, 429 and 5xx are retried; any other non-2xx status throws at once.
 */
export async function fetchJson(url: string, options: FetchJsonOptions): Promise<unknown> {
  const {
    label,
    headers = {},
    timeoutMs = DEFAULT_TIMEOUT_MS,
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    retryDelaysMs = DEFAULT_RETRY_DELAYS_MS,
  } = options;
  let lastError: Error | undefined;

  const backoff = async (attempt: number): Promise<void> => {
    if (attempt < maxAttempts) {
      const delay = retryDelaysMs[attempt - 1] ?? retryDelaysMs[retryDelaysMs.length - 1] ?? 0;
      await sleep(delay);
    }
  };

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let res: Response;

    try {
      res = await fetch(url, {
        headers: { 'User-Agent': DEFAULT_USER_AGENT, Accept: 'application/json', ...headers },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      lastError = toError(error);
      await backoff(attempt);
      continue;
    }

    if (!res.ok) {
      const statusError = new Error(`${label} returned ${res.status}`);
      if (!shouldRetryStatus(res.status)) {
        throw statusError;
      }

      lastError = statusError;
      await backoff(attempt);
      continue;
    }

    try {
      return await res.json();
    } catch (error) {
      lastError = new Error(`${label} response parse failed: ${toError(error).message}`);
      await backoff(attempt);
    }
  }

  throw lastError ?? new Error(`${label} request failed after ${maxAttempts} attempts`);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function asNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
