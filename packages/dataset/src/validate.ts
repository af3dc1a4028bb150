import { z } from 'zod';
import { defaultConfig, type DatasetConfig } from './config.js';
import { characterCount } from './normalize.js';
import type { CleanedRecord, CleanedRecordDraft, InvalidRecordIssue } from './types.js';

export interface ValidationResult {
  valid: CleanedRecord[];
  invalidCount: number;
}

export interface ValidateOptions {
  onInvalid?: (issues: InvalidRecordIssue[], record: CleanedRecordDraft) => void;
}

function buildSchema(config: DatasetConfig) {
  return z.object({
    description: z
      .string()
      .refine((description) => characterCount(description) >= config.minDescriptionLength, {
        message: `description shorter than ${config.minDescriptionLength} characters`,
      }),
  });
}

type RecordSchema = ReturnType<typeof buildSchema>;

const schemaCache = new WeakMap<DatasetConfig, RecordSchema>();

function schemaFor(config: DatasetConfig): RecordSchema {
  let schema = schemaCache.get(config);
  if (!schema) {
    schema = buildSchema(config);
    schemaCache.set(config, schema);
  }

  return schema;
}

/**
 * Enforce minimum content on normalized drafts.
 * Returns the passing records (order kept) and a count of dropped ones.
 */
export function validate(
  drafts: readonly CleanedRecordDraft[],
  config: DatasetConfig = defaultConfig,
  options: ValidateOptions = {},
): ValidationResult {
  const schema = schemaFor(config);
  const valid: CleanedRecord[] = [];

  for (const draft of drafts) {
    const result = schema.safeParse(draft);
    if (result.success) {
      valid.push({ ...draft, _validated: true as const });
    } else {
      const issues = result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
      options.onInvalid?.(issues, draft);
    }
  }

  return {
    valid,
    invalidCount: drafts.length - valid.length,
  };
}
