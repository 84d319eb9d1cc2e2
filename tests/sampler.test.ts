import { Readable } from 'stream';
import type { CompaniesHouseApi } from '../src/lib/companies-house-api';
import { ApiKeyManager, RATE_LIMIT_WINDOW_MS } from '../src/lib/key-manager';
import type { Officer } from '../src/lib/models';
import { activeDirectors, buildSample, sampleCsvRows, waitForKeyCapacity } from '../src/lib/sampler';

const CSV = [
  'CompanyName, CompanyNumber,RegAddress.AddressLine1,ConfStmtNextDueDate',
  'ALPHA LTD,00000001,1 High Street,01/01/2025',
  'BETA LTD,00000002, Default Address ,01/02/2027',
  'NO NUMBER LTD,,2 Low Road,',
  'GAMMA LTD,00000003,3 Mill Lane,',
  'DELTA LTD,00000004,4 Park Row,15/06/2026',
].join('\n');

describe('sampleCsvRows', () => {
  it('keeps every row when the sample is larger than the file', async () => {
    const sample = await sampleCsvRows(Readable.from([CSV]), 10);

    expect(sample.total).toBe(4);
    expect(sample.rows.map(row => row.CompanyNumber)).toEqual(['00000001', '00000002', '00000003', '00000004']);
    expect(sample.rows[1]).toEqual({
      CompanyName: 'BETA LTD',
      CompanyNumber: '00000002',
      'RegAddress.AddressLine1': 'Default Address',
      ConfStmtNextDueDate: '01/02/2027',
    });
  });

  it('replaces reservoir slots using the random source', async () => {
    const sample = await sampleCsvRows(Readable.from([CSV]), 2, () => 0.1);

    expect(sample.total).toBe(4);
    expect(sample.rows.map(row => row.CompanyNumber)).toEqual(['00000004', '00000002']);
  });

  it('keeps the reservoir when the random source lands past it', async () => {
    const sample = await sampleCsvRows(Readable.from([CSV]), 2, () => 0.99);

    expect(sample.rows.map(row => row.CompanyNumber)).toEqual(['00000001', '00000002']);
  });
});

describe('activeDirectors', () => {
  it('keeps serving directors and corporate directors only', () => {
    const officers: Officer[] = [
      { name: 'ONE, Ann', officer_role: 'director', country_of_residence: 'England' },
      { name: 'TWO, Bob', officer_role: 'secretary' },
      { name: 'THREE, Cy', officer_role: 'director', resigned_on: '2020-01-01' },
      { name: 'HOLDCO LTD', officer_role: 'corporate-director', address: { country: 'Jersey' } },
      { name: 'FOUR, Di' },
    ];

    expect(activeDirectors(officers).map(director => director.name)).toEqual(['ONE, Ann', 'HOLDCO LTD']);
  });
});

describe('buildSample', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('pairs each sampled row with its directors and reports failures', async () => {
    const api: CompaniesHouseApi = {
      getCompanyOfficers: vi.fn(async (companyNumber: string): Promise<Officer[]> => {
        if (companyNumber === '00000002') {
          throw new Error('Request failed with status code 500');
        }
        return [
          { name: `DIRECTOR ${companyNumber}`, officer_role: 'director', country_of_residence: 'Wales' },
          { name: 'SECRETARY', officer_role: 'secretary' },
        ];
      }),
    };
    const sleep = vi.fn(async (_ms: number) => undefined);
    const rows = [
      { CompanyNumber: '00000001', ConfStmtNextDueDate: '01/01/2025' },
      { CompanyNumber: '00000002', ConfStmtNextDueDate: '' },
      { CompanyNumber: '00000003', ConfStmtNextDueDate: '' },
    ];

    const keyManager = new ApiKeyManager(['test-key-a'], { now: () => 0 });

    const result = await buildSample(rows, api, { keyManager, concurrency: 2, delayBetweenRequestsMs: 250, sleep });

    expect(result.succeeded).toBe(2);
    expect(result.failed).toEqual(['00000002']);
    expect(Object.keys(result.sampledCompanies)).toEqual(['00000001', '00000003']);
    expect(result.sampledCompanies['00000001']).toEqual({
      company_data: { CompanyNumber: '00000001', ConfStmtNextDueDate: '01/01/2025' },
      directors: [{ name: 'DIRECTOR 00000001', officer_role: 'director', country_of_residence: 'Wales' }],
    });
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(250);
  });

  it('waits for a key window before fetching when every key is near its limit', async () => {
    let now = 0;
    const keyManager = new ApiKeyManager(['test-key-a'], { now: () => now });
    for (let i = 0; i < 541; i++) {
      keyManager.registerRequest('test-key-a');
    }
    now = 60_000;

    const api: CompaniesHouseApi = { getCompanyOfficers: vi.fn(async (): Promise<Officer[]> => []) };
    const sleep = vi.fn(async (_ms: number) => undefined);

    await buildSample([{ CompanyNumber: '00000001' }], api, { keyManager, concurrency: 1, delayBetweenRequestsMs: 250, sleep });

    expect(sleep.mock.calls).toEqual([[RATE_LIMIT_WINDOW_MS - 60_000 + 1000], [250]]);
    expect(api.getCompanyOfficers).toHaveBeenCalledWith('00000001');
  });
});

describe('waitForKeyCapacity', () => {
  it('does not wait while a key has capacity left', async () => {
    const keyManager = new ApiKeyManager(['test-key-a', 'test-key-b'], { now: () => 0 });
    for (let i = 0; i < 600; i++) {
      keyManager.registerRequest('test-key-a');
    }
    const sleep = vi.fn(async (_ms: number) => undefined);

    await waitForKeyCapacity({ keyManager, sleep });

    expect(sleep).not.toHaveBeenCalled();
  });
});
