import { z } from 'zod';
import { ConfigError } from './errors';

export const DEFAULT_COMPANIES_HOUSE_BASE_URL = 'https://api.company-information.service.gov.uk';

// Unset and blank variables both fall back to the default
const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = (fallback: string) =>
  z.preprocess(blankAsUndefined, z.string().trim().default(fallback));

const AnalyzerEnvSchema = z.object({
  SAMPLE_FILE: optionalString('data/overseas_directors_sample.json'),
  UK_VARIANT_FILE: optionalString('data/uk_variants.txt'),
  CONFIDENCE_Z: z.preprocess(blankAsUndefined, z.coerce.number().positive().default(1.96)),
  LOG_DIR: optionalString('logs'),
});

const SampleBuilderEnvSchema = z.object({
  COMPANIES_HOUSE_API_BASE_URL: z.preprocess(
    blankAsUndefined,
    z.string().url().default(DEFAULT_COMPANIES_HOUSE_BASE_URL)
  ),
  COMPANIES_HOUSE_API_KEYS: z.preprocess(
    blankAsUndefined,
    z.string({ required_error: 'COMPANIES_HOUSE_API_KEYS environment variable is not set' })
  ),
  COMPANY_CSV_FILE: optionalString('data/BasicCompanyData.csv'),
  SAMPLE_FILE: optionalString('data/overseas_directors_sample.json'),
  SAMPLE_SIZE: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(1000)),
  CONCURRENCY_LIMIT: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().optional()),
  DELAY_BETWEEN_REQUESTS_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().nonnegative().default(300)),
  LOG_DIR: optionalString('logs'),
});

export interface AnalyzerConfig {
  sampleFile: string;
  ukVariantFile: string;
  confidenceZ: number;
  logDir: string;
}

export interface SampleBuilderConfig {
  apiBaseUrl: string;
  apiKeys: string[];
  companyCsvFile: string;
  outputFile: string;
  sampleSize: number;
  concurrencyLimit: number;
  delayBetweenRequestsMs: number;
  logDir: string;
}

type Env = Record<string, string | undefined>;

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function loadAnalyzerConfig(env: Env = process.env): AnalyzerConfig {
  const parsed = AnalyzerEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(describeIssues(parsed.error));
  }

  return {
    sampleFile: parsed.data.SAMPLE_FILE,
    ukVariantFile: parsed.data.UK_VARIANT_FILE,
    confidenceZ: parsed.data.CONFIDENCE_Z,
    logDir: parsed.data.LOG_DIR,
  };
}

export function loadSampleBuilderConfig(env: Env = process.env): SampleBuilderConfig {
  const parsed = SampleBuilderEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(describeIssues(parsed.error));
  }

  const apiKeys = parsed.data.COMPANIES_HOUSE_API_KEYS
    .split(',')
    .map(key => key.trim())
    .filter(key => key.length > 0);
  if (apiKeys.length === 0) {
    throw new ConfigError(['COMPANIES_HOUSE_API_KEYS: no API keys provided']);
  }

  return {
    apiBaseUrl: parsed.data.COMPANIES_HOUSE_API_BASE_URL,
    apiKeys,
    companyCsvFile: parsed.data.COMPANY_CSV_FILE,
    outputFile: parsed.data.SAMPLE_FILE,
    sampleSize: parsed.data.SAMPLE_SIZE,
    // Default to 5 or double the number of keys, whichever is smaller
    concurrencyLimit: parsed.data.CONCURRENCY_LIMIT ?? Math.min(5, apiKeys.length * 2),
    delayBetweenRequestsMs: parsed.data.DELAY_BETWEEN_REQUESTS_MS,
    logDir: parsed.data.LOG_DIR,
  };
}
