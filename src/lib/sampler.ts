import csvParser from 'csv-parser';
import pLimit from 'p-limit';
import type { Readable } from 'stream';
import type { CompaniesHouseApi } from './companies-house-api';
import type { ApiKeyManager } from './key-manager';
import { describeError, logProcess } from './logger';
import {
  COMPANY_NUMBER_FIELD,
  DirectorRecordSchema,
  type CompanyRecord,
  type DirectorRecord,
  type Officer,
  type SampledCompanies,
} from './models';

export type CsvRow = Record<string, string>;

export interface CsvSample {
  rows: CsvRow[];
  /** Number of rows read from the CSV, sampled or not. */
  total: number;
}

export interface BuildSampleOptions {
  /** The manager whose keys the API client rotates through. */
  keyManager: ApiKeyManager;
  concurrency: number;
  delayBetweenRequestsMs: number;
  sleep: (ms: number) => Promise<void>;
}

export interface BuildSampleResult {
  sampledCompanies: SampledCompanies;
  succeeded: number;
  failed: string[];
}

const DIRECTOR_ROLES = new Set(['director', 'corporate-director']);

/**
 * Draw a uniform random sample of `size` rows from a company CSV stream using
 * reservoir sampling. Headers and values are trimmed; rows without a company
 * number are skipped.
 */
export function sampleCsvRows(
  input: Readable,
  size: number,
  random: () => number = Math.random
): Promise<CsvSample> {
  const reservoir: CsvRow[] = [];
  let total = 0;

  return new Promise<CsvSample>((resolve, reject) => {
    input
      .pipe(csvParser({
        mapHeaders: ({ header }) => header.trim(),
        mapValues: ({ value }) => (typeof value === 'string' ? value.trim() : value),
      }))
      .on('data', (row: CsvRow) => {
        if (!row[COMPANY_NUMBER_FIELD]) {
          return;
        }

        if (reservoir.length < size) {
          reservoir.push(row);
        } else {
          const slot = Math.floor(random() * (total + 1));
          if (slot < size) {
            reservoir[slot] = row;
          }
        }
        total += 1;
      })
      .on('end', () => resolve({ rows: reservoir, total }))
      .on('error', reject);
    input.on('error', reject);
  });
}

/**
 * Officers still serving as (corporate) directors.
 */
export function activeDirectors(officers: Officer[]): DirectorRecord[] {
  return officers
    .filter(officer => officer.officer_role !== undefined && DIRECTOR_ROLES.has(officer.officer_role))
    .filter(officer => !officer.resigned_on)
    .map(officer => DirectorRecordSchema.parse(officer));
}

function logKeyUsage(keyManager: ApiKeyManager): void {
  const keyStats = keyManager.getStats();
  logProcess(
    `Current key usage: ${keyStats.map(stat => `${stat.maskedKey}: ${stat.usagePercent.toFixed(1)}% (${stat.requestCount} calls)`).join(', ')}`,
    'info',
    { keyUsageStats: keyStats }
  );
}

/**
 * Pause until a key window resets when every key is close to its rate limit.
 */
export async function waitForKeyCapacity(options: Pick<BuildSampleOptions, 'keyManager' | 'sleep'>): Promise<void> {
  if (!options.keyManager.areAllKeysExhausted()) {
    return;
  }

  const waitTime = options.keyManager.getWaitTimeMs() + 1000; // 1s buffer
  logProcess(`All keys approaching rate limits. Waiting ${waitTime / 1000} seconds`, 'warning');
  await options.sleep(waitTime);
}

/**
 * Fetch the directors of every sampled company and assemble the sample file
 * contents. Companies whose officer lookup fails are left out and reported.
 */
export async function buildSample(
  rows: CsvRow[],
  api: CompaniesHouseApi,
  options: BuildSampleOptions
): Promise<BuildSampleResult> {
  const limit = pLimit(options.concurrency);
  const failed: string[] = [];
  let processed = 0;

  const records = await Promise.all(
    rows.map(row => limit(async (): Promise<CompanyRecord | null> => {
      const companyNumber = row[COMPANY_NUMBER_FIELD];
      await waitForKeyCapacity(options);

      let record: CompanyRecord | null = null;
      try {
        const officers = await api.getCompanyOfficers(companyNumber);
        record = {
          company_data: row,
          directors: activeDirectors(officers),
        };
      } catch (error) {
        failed.push(companyNumber);
        logProcess(`Failed to fetch officers for ${companyNumber}: ${describeError(error)}`, 'error');
      }

      processed += 1;
      if (processed % 50 === 0 || processed === rows.length) {
        logProcess(`Processed ${processed}/${rows.length} companies...`);
        logKeyUsage(options.keyManager);
      }

      await options.sleep(options.delayBetweenRequestsMs);
      return record;
    }))
  );

  // Keep the sample in CSV order regardless of completion order
  const sampledCompanies: SampledCompanies = {};
  records.forEach((record, index) => {
    if (record) {
      sampledCompanies[rows[index][COMPANY_NUMBER_FIELD]] = record;
    }
  });

  return {
    sampledCompanies,
    succeeded: Object.keys(sampledCompanies).length,
    failed,
  };
}
