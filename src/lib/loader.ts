import fs from 'fs-extra';
import { DataFileNotFoundError, SampleValidationError } from './errors';
import { describeError } from './logger';
import { SampleFileSchema, type SampledCompanies } from './models';

async function readDataFile(filePath: string): Promise<string> {
  if (!(await fs.pathExists(filePath))) {
    throw new DataFileNotFoundError(filePath);
  }
  return fs.readFile(filePath, 'utf8');
}

/**
 * Read the UK variant list: one variant per line, trimmed, blank lines dropped.
 */
export async function loadUkVariantLines(filePath: string): Promise<string[]> {
  const contents = await readDataFile(filePath);
  return contents
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Read and validate the sample file produced by the sample builder.
 */
export async function loadSampledCompanies(filePath: string): Promise<SampledCompanies> {
  const contents = await readDataFile(filePath);

  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch (error) {
    throw new SampleValidationError(filePath, [`not valid JSON: ${describeError(error)}`]);
  }

  const parsed = SampleFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new SampleValidationError(
      filePath,
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  return parsed.data.sampled_companies ?? {};
}
