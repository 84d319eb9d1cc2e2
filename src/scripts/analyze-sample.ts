import path from 'path';
import dotenv from 'dotenv';
import { runAudit } from '../lib/audit';
import { parseFlags, parseIsoDate, parsePositiveNumber } from '../lib/cli-args';
import { loadAnalyzerConfig } from '../lib/config';
import { toUtcDay } from '../lib/dates';
import { loadSampledCompanies, loadUkVariantLines } from '../lib/loader';
import { describeError, logProcess, openLogFile } from '../lib/logger';
import { formatReport } from '../lib/report';
import { buildUkVariantSet } from '../lib/variants';

// Load environment variables
dotenv.config();

/**
 * Analyse a sample of companies for UK director presence and compliance red flags.
 *
 * Usage: analyze-sample [--input file] [--variants file] [--date YYYY-MM-DD] [--z score]
 */
async function main() {
  const config = loadAnalyzerConfig();
  const flags = parseFlags(process.argv.slice(2), ['input', 'variants', 'date', 'z']);

  const sampleFile = path.resolve(flags.input ?? config.sampleFile);
  const variantFile = path.resolve(flags.variants ?? config.ukVariantFile);
  const today = flags.date ? parseIsoDate(flags.date) : toUtcDay(new Date());
  const z = flags.z ? parsePositiveNumber('z', flags.z) : config.confidenceZ;

  const logFile = openLogFile(config.logDir, 'analysis');
  logProcess(`Starting analysis of ${sampleFile}. Logs will be saved to ${logFile}`);

  const ukVariants = buildUkVariantSet(await loadUkVariantLines(variantFile));
  logProcess(`Loaded ${ukVariants.size} UK variants from ${variantFile}`);

  const companies = await loadSampledCompanies(sampleFile);
  const result = runAudit(companies, ukVariants, { today, z });

  for (const line of formatReport(result)) {
    console.log(line);
  }

  if (!result.defaultAddressRatio) {
    logProcess('No default addresses among companies with a UK director; ratio left undefined', 'warning');
  }
  logProcess('Analysis complete');
}

main().catch((error: unknown) => {
  logProcess(`Analysis failed: ${describeError(error)}`, 'error');
  process.exitCode = 1;
});
