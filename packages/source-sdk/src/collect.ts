import { errorMessage } from './http.js';
import type { CollectResult, RawRecord } from './types.js';

export interface CollectQueriesOptions<Q> {
  /** Source name used in warnings and the failure message. */
  label: string;
  limit?: number;
  describe?: (query: Q) => string;
}

/**
 * Run sub-requests one after another until `limit` records are gathered.
 * A failing sub-request becomes a warning; the source only throws when every
 * sub-request failed and nothing was gathered.
 */
export async function collectFromQueries<Q>(
  queries: readonly Q[],
  run: (query: Q) => Promise<RawRecord[]>,
  options: CollectQueriesOptions<Q>,
): Promise<CollectResult> {
  const { label, limit, describe = (query: Q) => String(query) } = options;
  const records: RawRecord[] = [];
  const warnings: string[] = [];
  let attempted = 0;

  for (const query of queries) {
    if (limit !== undefined && records.length >= limit) break;
    attempted += 1;

    try {
      records.push(...(await run(query)));
    } catch (error) {
      warnings.push(`${label} ${describe(query)}: ${errorMessage(error)}`);
    }
  }

  if (attempted > 0 && warnings.length === attempted && records.length === 0) {
    throw new Error(`${label} unavailable: ${warnings[0]}`);
  }

  return {
    records: limit !== undefined ? records.slice(0, limit) : records,
    warnings,
  };
}
