import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  sampleAnnotations,
  type AnnotatedRecord,
  type AnnotationSample,
  type CleanedRecord,
  type DatasetResult,
} from '@jobcorpus/dataset';

export type CellValue = string | number | boolean | null;
export type DatasetRow = Record<string, CellValue>;

export const DATASET_FILES = {
  raw: 'raw_records.json',
  cleanedJson: 'cleaned_records.json',
  cleanedCsv: 'cleaned_records.csv',
  annotatedJson: 'annotated_records.json',
  annotatedCsv: 'annotated_records.csv',
  sample: 'sample_annotations.json',
} as const;

export function toCleanedRow(record: CleanedRecord): DatasetRow {
  return {
    source: record.source,
    title: record.title,
    company: record.company,
    description: record.description,
    url: record.url,
    type: record.type ?? null,
    score: record.score ?? null,
    dedup_key: record.dedupKey,
  };
}

/**
 * Flat snake_case row for one annotated record.
 */
export function toDatasetRow(record: AnnotatedRecord): DatasetRow {
  return {
    ...toCleanedRow(record),
    skill_tags: record.skillTags.join(', '),
    experience_level: record.experienceLevel,
    content_type: record.contentType,
    relevance_score: record.relevanceScore,
    is_remote: record.isRemote,
    company_size: record.companySize,
    text_length: record.textLength,
    has_requirements: record.hasRequirements,
  };
}

/**
 * Nested JSON entry: collector extras are kept and `skill_tags` stays a list.
 */
export function toCleanedJson(record: CleanedRecord) {
  return {
    ...toCleanedRow(record),
    extras: record.extras ?? {},
  };
}

export function toAnnotatedJson(record: AnnotatedRecord) {
  return {
    ...toDatasetRow(record),
    skill_tags: [...record.skillTags],
    extras: record.extras ?? {},
  };
}

function toSampleRow(sample: AnnotationSample) {
  const { annotations } = sample;
  return {
    id: sample.id,
    title: sample.title,
    company: sample.company,
    description_preview: sample.descriptionPreview,
    annotations: {
      skill_tags: annotations.skillTags,
      experience_level: annotations.experienceLevel,
      content_type: annotations.contentType,
      relevance_score: annotations.relevanceScore,
      is_remote: annotations.isRemote,
      company_size: annotations.companySize,
    },
  };
}

function escapeCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';

  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
}

/**
 * RFC 4180 CSV with CRLF line breaks. Columns come from the first row.
 */
export function toCsv(rows: readonly DatasetRow[]): string {
  const [first] = rows;
  if (!first) return '';

  const columns = Object.keys(first);
  const lines = [columns.map(escapeCell).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCell(row[column])).join(','));
  }

  return `${lines.join('\r\n')}\r\n`;
}

function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export interface WriteDatasetOptions {
  sampleSize?: number;
}

/**
 * Write every dataset artifact into `outputDir`, creating it if needed.
 * Returns the written paths.
 */
export async function writeDataset(
  result: DatasetResult,
  outputDir: string,
  options: WriteDatasetOptions = {},
): Promise<string[]> {
  await mkdir(outputDir, { recursive: true });

  const sample = sampleAnnotations(result.records, options.sampleSize).map(toSampleRow);

  const contents: Array<[string, string]> = [
    [DATASET_FILES.raw, toJson(result.raw)],
    [DATASET_FILES.cleanedJson, toJson(result.cleaned.map(toCleanedJson))],
    [DATASET_FILES.cleanedCsv, toCsv(result.cleaned.map(toCleanedRow))],
    [DATASET_FILES.annotatedJson, toJson(result.records.map(toAnnotatedJson))],
    [DATASET_FILES.annotatedCsv, toCsv(result.records.map(toDatasetRow))],
    [DATASET_FILES.sample, toJson(sample)],
  ];

  const paths: string[] = [];
  for (const [file, content] of contents) {
    const path = join(outputDir, file);
    await writeFile(path, content, 'utf-8');
    paths.push(path);
  }

  return paths;
}
