import { z } from 'zod';
import { isRecord } from './http.js';
import type { RawRecord } from './types.js';

function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

const textField = z.unknown().transform(toText);

/**
 * Lenient input schema: absent or non-text fields become empty strings,
 * unusable optional fields are dropped. Parsing an object never fails.
 */
export const rawRecordSchema = z.object({
  source: textField,
  title: textField,
  company: textField,
  description: textField,
  url: textField,
  type: z.string().optional().catch(undefined),
  score: z.number().finite().optional().catch(undefined),
  extras: z.record(z.string(), z.unknown()).optional().catch(undefined),
});

/**
 * Shape every collector is expected to emit.
 */
export const collectedRecordSchema = z.object({
  source: z.string().min(1),
  title: z.string().min(1),
  company: z.string(),
  description: z.string(),
  url: z.string().url(),
  type: z.string().min(1).optional(),
  score: z.number().finite().optional(),
  extras: z.record(z.string(), z.unknown()).optional(),
});

export function coerceRawRecord(value: unknown): RawRecord {
  const result = rawRecordSchema.safeParse(isRecord(value) ? value : {});
  if (result.success) {
    return result.data;
  }

  return { source: '', title: '', company: '', description: '', url: '' };
}
