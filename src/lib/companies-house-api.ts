import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { ApiKeyManager } from './key-manager';
import { describeError, logProcess } from './logger';
import { OfficerListSchema, type Officer } from './models';

// The officers endpoint returns at most 100 items per page
const OFFICERS_PAGE_SIZE = 100;

export interface CompaniesHouseApiOptions {
  baseUrl: string;
  keyManager: ApiKeyManager;
  /** Replaces the HTTP transport; tests pass an in-process adapter. */
  adapter?: AxiosAdapter;
  sleep?: (ms: number) => Promise<void>;
}

export interface CompaniesHouseApi {
  getCompanyOfficers(companyNumber: string): Promise<Officer[]>;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function isRateLimited(error: unknown): boolean {
  return axios.isAxiosError(error) && error.response?.status === 429;
}

export function createCompaniesHouseApi(options: CompaniesHouseApiOptions): CompaniesHouseApi {
  const { baseUrl, keyManager, adapter } = options;
  const wait = options.sleep ?? sleep;

  /**
   * Get an axios instance authenticated with the next available API key
   */
  function getApiClient(apiKey: string): AxiosInstance {
    return axios.create({
      baseURL: baseUrl,
      auth: {
        username: apiKey,
        password: '',
      },
      headers: {
        Accept: 'application/json',
      },
      adapter,
    });
  }

  async function getWithKeyRotation(url: string, params: Record<string, number>): Promise<unknown> {
    const apiKey = keyManager.getNextKey();
    try {
      const response = await getApiClient(apiKey).get<unknown>(url, { params });
      keyManager.registerRequest(apiKey);
      return response.data;
    } catch (error: unknown) {
      // Failed requests still count against the key's window
      keyManager.registerRequest(apiKey);
      throw error;
    }
  }

  async function getOfficerPage(companyNumber: string, startIndex: number): Promise<unknown> {
    const url = `/company/${encodeURIComponent(companyNumber)}/officers`;
    const params = { items_per_page: OFFICERS_PAGE_SIZE, start_index: startIndex };

    try {
      return await getWithKeyRotation(url, params);
    } catch (error: unknown) {
      if (!isRateLimited(error)) {
        const status = axios.isAxiosError(error) ? error.response?.status : undefined;
        logProcess(`[API] ❌ Error fetching officers for ${companyNumber}: Status ${status} - ${describeError(error)}`, 'error');
        throw error;
      }

      const waitMs = keyManager.getWaitTimeMs();
      logProcess(`[API] Rate limited fetching officers for ${companyNumber}; retrying in ${waitMs} ms`, 'warning');
      await wait(waitMs);
      return getWithKeyRotation(url, params);
    }
  }

  return {
    /**
     * All officers listed for a company, across every page of results.
     */
    async getCompanyOfficers(companyNumber: string): Promise<Officer[]> {
      const officers: Officer[] = [];
      let startIndex = 0;

      for (;;) {
        const page = OfficerListSchema.parse(await getOfficerPage(companyNumber, startIndex));
        const items = page.items ?? [];
        officers.push(...items);

        startIndex += items.length;
        if (items.length === 0 || startIndex >= (page.total_results ?? 0)) {
          break;
        }
      }

      logProcess(`[API] ✅ Fetched ${officers.length} officers for ${companyNumber}`);
      return officers;
    },
  };
}
