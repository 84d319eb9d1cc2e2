import { DEFAULT_COMPANIES_HOUSE_BASE_URL, loadAnalyzerConfig, loadSampleBuilderConfig } from '../src/lib/config';
import { ConfigError } from '../src/lib/errors';

describe('loadAnalyzerConfig', () => {
  it('applies defaults', () => {
    expect(loadAnalyzerConfig({})).toEqual({
      sampleFile: 'data/overseas_directors_sample.json',
      ukVariantFile: 'data/uk_variants.txt',
      confidenceZ: 1.96,
      logDir: 'logs',
    });
  });

  it('reads overrides and treats blank values as unset', () => {
    const config = loadAnalyzerConfig({
      SAMPLE_FILE: 'input/sample.json',
      UK_VARIANT_FILE: '  ',
      CONFIDENCE_Z: '2.58',
    });

    expect(config.sampleFile).toBe('input/sample.json');
    expect(config.ukVariantFile).toBe('data/uk_variants.txt');
    expect(config.confidenceZ).toBe(2.58);
  });

  it('rejects a non-numeric confidence z-score', () => {
    expect(() => loadAnalyzerConfig({ CONFIDENCE_Z: 'high' })).toThrow(ConfigError);
    expect(() => loadAnalyzerConfig({ CONFIDENCE_Z: '-1' })).toThrow(/CONFIDENCE_Z/);
  });
});

describe('loadSampleBuilderConfig', () => {
  it('requires API keys', () => {
    expect(() => loadSampleBuilderConfig({})).toThrow(ConfigError);
    expect(() => loadSampleBuilderConfig({ COMPANIES_HOUSE_API_KEYS: ' , ' })).toThrow('no API keys provided');
  });

  it('splits keys and derives the concurrency limit from them', () => {
    const config = loadSampleBuilderConfig({ COMPANIES_HOUSE_API_KEYS: 'key-one, key-two' });

    expect(config.apiKeys).toEqual(['key-one', 'key-two']);
    expect(config.concurrencyLimit).toBe(4);
    expect(config.apiBaseUrl).toBe(DEFAULT_COMPANIES_HOUSE_BASE_URL);
    expect(config.sampleSize).toBe(1000);
    expect(config.delayBetweenRequestsMs).toBe(300);
  });

  it('caps the derived concurrency at five', () => {
    const config = loadSampleBuilderConfig({ COMPANIES_HOUSE_API_KEYS: 'a,b,c' });
    expect(config.concurrencyLimit).toBe(5);
  });

  it('honours explicit settings', () => {
    const config = loadSampleBuilderConfig({
      COMPANIES_HOUSE_API_KEYS: 'test-key',
      CONCURRENCY_LIMIT: '8',
      SAMPLE_SIZE: '250',
      COMPANY_CSV_FILE: 'data/companies.csv',
    });

    expect(config.concurrencyLimit).toBe(8);
    expect(config.sampleSize).toBe(250);
    expect(config.companyCsvFile).toBe('data/companies.csv');
  });

  it('rejects a fractional sample size', () => {
    expect(() => loadSampleBuilderConfig({ COMPANIES_HOUSE_API_KEYS: 'test-key', SAMPLE_SIZE: '2.5' })).toThrow(/SAMPLE_SIZE/);
  });
});
