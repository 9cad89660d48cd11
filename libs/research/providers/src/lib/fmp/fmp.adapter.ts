import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { toProviderError } from '../http-errors';
import { FmpIncomeStatement, FmpQuote } from './fmp.types';

export interface FmpAdapterOptions {
  baseURL?: string;
  timeoutMs?: number;
  /** Transport override, used by tests */
  adapter?: AxiosAdapter;
}

const PROVIDER_NAME = 'Financial Modeling Prep';

export class FMPAdapter {
  private readonly client: AxiosInstance;

  constructor(private readonly apiKey: string, options: FmpAdapterOptions = {}) {
    if (!apiKey) {
      throw new Error('FMP API key is required');
    }

    this.client = axios.create({
      baseURL: options.baseURL ?? 'https://financialmodelingprep.com/api/v3',
      timeout: options.timeoutMs ?? 30000,
      headers: {
        'Content-Type': 'application/json',
      },
      adapter: options.adapter,
    });

    this.client.interceptors.request.use((config) => {
      config.params = {
        ...config.params,
        apikey: this.apiKey,
      };
      return config;
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        const ticker = axios.isAxiosError(error) ? error.config?.url?.split('/').pop() : undefined;
        throw toProviderError(error, PROVIDER_NAME, ticker);
      }
    );
  }

  async getQuote(ticker: string, signal?: AbortSignal): Promise<FmpQuote | null> {
    const response = await this.client.get<FmpQuote[]>(`/quote/${ticker.toUpperCase()}`, { signal });
    return response.data?.[0] ?? null;
  }

  async getIncomeStatements(
    ticker: string,
    limit = 2,
    period: 'annual' | 'quarter' = 'annual',
    signal?: AbortSignal
  ): Promise<FmpIncomeStatement[]> {
    const response = await this.client.get<FmpIncomeStatement[]>(`/income-statement/${ticker.toUpperCase()}`, {
      params: { limit, period },
      signal,
    });

    return response.data ?? [];
  }
}
