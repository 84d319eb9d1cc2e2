import path from 'path';
import fs from 'fs-extra';
import dotenv from 'dotenv';
import { parseFlags, parsePositiveInteger } from '../lib/cli-args';
import { createCompaniesHouseApi, sleep } from '../lib/companies-house-api';
import { loadSampleBuilderConfig } from '../lib/config';
import { DataFileNotFoundError } from '../lib/errors';
import { ApiKeyManager } from '../lib/key-manager';
import { describeError, logProcess, openLogFile } from '../lib/logger';
import { buildSample, sampleCsvRows } from '../lib/sampler';

// Load environment variables
dotenv.config();

/**
 * Draw a random sample from the Companies House bulk company CSV and fetch the
 * current directors of each sampled company.
 *
 * Usage: build-sample [--csv file] [--size n] [--output file]
 */
async function main() {
  const config = loadSampleBuilderConfig();
  const flags = parseFlags(process.argv.slice(2), ['csv', 'size', 'output']);

  const csvFile = path.resolve(flags.csv ?? config.companyCsvFile);
  const outputFile = path.resolve(flags.output ?? config.outputFile);
  const sampleSize = flags.size ? parsePositiveInteger('size', flags.size) : config.sampleSize;

  const logFile = openLogFile(config.logDir, 'sample-build');
  logProcess(`Starting sample build with ${config.apiKeys.length} API keys and concurrency ${config.concurrencyLimit}. Logs will be saved to ${logFile}`);

  if (!(await fs.pathExists(csvFile))) {
    throw new DataFileNotFoundError(csvFile);
  }

  logProcess(`Reading CSV file from: ${csvFile}`);
  const { rows, total } = await sampleCsvRows(fs.createReadStream(csvFile), sampleSize);
  logProcess(`Sampled ${rows.length} of ${total} companies`);

  const keyManager = new ApiKeyManager(config.apiKeys, { debug: true });
  const api = createCompaniesHouseApi({ baseUrl: config.apiBaseUrl, keyManager });

  const startTime = Date.now();
  const result = await buildSample(rows, api, {
    keyManager,
    concurrency: config.concurrencyLimit,
    delayBetweenRequestsMs: config.delayBetweenRequestsMs,
    sleep,
  });

  await fs.ensureDir(path.dirname(outputFile));
  await fs.writeJson(outputFile, { sampled_companies: result.sampledCompanies }, { spaces: 2 });

  const durationMinutes = (Date.now() - startTime) / 60000;
  logProcess(`Wrote ${result.succeeded} companies to ${outputFile}`, 'info', {
    successful: result.succeeded,
    failed: result.failed.length,
    durationMinutes: Number(durationMinutes.toFixed(2)),
  });
  if (result.failed.length > 0) {
    logProcess(`Officer lookups failed for: ${result.failed.join(', ')}`, 'warning');
  }
}

main().catch((error: unknown) => {
  logProcess(`Sample build failed: ${describeError(error)}`, 'error');
  process.exitCode = 1;
});
