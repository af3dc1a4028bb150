import type { CleanedRecord, DedupOutcome } from './types.js';

/**
 * Case-insensitive identity of a record: normalized title and company.
 */
export function computeDedupKey(title: string, company: string): string {
  return `${title.toLowerCase().trim()}|${company.toLowerCase().trim()}`;
}

export interface DedupResult {
  records: CleanedRecord[];
  outcomes: DedupOutcome[];
}

/**
 * In-batch dedup: walk records in input order and keep the first record per
 * dedup key. Later collisions are skipped regardless of their other fields.
 */
export function dedup(records: readonly CleanedRecord[]): DedupResult {
  const firstIndexByKey = new Map<string, number>();
  const kept: CleanedRecord[] = [];
  const outcomes: DedupOutcome[] = [];

  records.forEach((record, index) => {
    const firstIndex = firstIndexByKey.get(record.dedupKey);
    if (firstIndex !== undefined) {
      outcomes.push({
        action: 'skip',
        record,
        duplicateOf: firstIndex,
        reason: `duplicate of record #${firstIndex} (${record.dedupKey})`,
      });
      return;
    }

    firstIndexByKey.set(record.dedupKey, index);
    kept.push(record);
    outcomes.push({ action: 'keep', record });
  });

  return { records: kept, outcomes };
}
