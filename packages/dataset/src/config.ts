import { readFileSync } from 'node:fs';
import { z } from 'zod';

const keyword = z.string().trim().toLowerCase().min(1);
const keywordList = z.array(keyword).readonly();
const weight = z.number().min(0).max(1);

export const datasetConfigSchema = z
  .object({
    minDescriptionLength: z.number().int().nonnegative(),
    abbreviations: z.record(keyword, z.string().trim().min(1)).readonly(),
    companySuffixes: keywordList,
    skills: z.record(z.string().trim().min(1), keywordList).readonly(),
    experience: z
      .object({
        management: keywordList,
        senior: keywordList,
        entry: keywordList,
        entryMaxYears: z.number().int().nonnegative(),
        seniorMinYears: z.number().int().positive(),
      })
      .refine((experience) => experience.entryMaxYears < experience.seniorMinYears, {
        message: 'entryMaxYears must be below seniorMinYears',
      })
      .readonly(),
    contentType: z
      .object({
        jobPosting: keywordList,
        interview: keywordList,
        advice: keywordList,
        questionWords: keywordList,
        qaSources: keywordList,
        discussionSources: keywordList,
        technicalDensity: z.number().int().positive(),
      })
      .readonly(),
    technicalTerms: keywordList,
    remoteKeywords: keywordList,
    requirementKeywords: keywordList,
    companySize: z
      .object({
        startup: keywordList,
        medium: keywordList,
        large: keywordList,
        startupMaxEmployees: z.number().int().positive(),
        mediumMaxEmployees: z.number().int().positive(),
      })
      .refine((size) => size.startupMaxEmployees < size.mediumMaxEmployees, {
        message: 'startupMaxEmployees must be below mediumMaxEmployees',
      })
      .readonly(),
    relevance: z
      .object({
        skillWeight: weight,
        skillCap: weight,
        technicalWeight: weight,
        technicalSaturation: z.number().positive(),
        requirementsBonus: weight,
        lengthWeight: weight,
        lengthSaturation: z.number().positive(),
      })
      .readonly(),
  })
  .readonly();

/**
 * Vocabularies, thresholds and scoring weights shared by every stage.
 * Parsed objects are frozen; build variants with {@link createConfig}.
 */
export type DatasetConfig = z.infer<typeof datasetConfigSchema>;
export type DatasetConfigInput = z.input<typeof datasetConfigSchema>;

const DEFAULT_CONFIG_URL = new URL('../config/default.json', import.meta.url);

export function parseConfig(input: unknown): DatasetConfig {
  const result = datasetConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Invalid dataset config: ${details.join('; ')}`);
  }

  return result.data;
}

export function loadConfig(path: string | URL = DEFAULT_CONFIG_URL): DatasetConfig {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return parseConfig(raw);
}

export const defaultConfig: DatasetConfig = loadConfig();

/**
 * Replace whole top-level sections of a base config and re-validate.
 */
export function createConfig(
  overrides: Partial<DatasetConfigInput> = {},
  base: DatasetConfig = defaultConfig,
): DatasetConfig {
  return parseConfig({ ...base, ...overrides });
}
