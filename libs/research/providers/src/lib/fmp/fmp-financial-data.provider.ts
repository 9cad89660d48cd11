import { Logger } from '@nestjs/common';
import { RawMetrics } from '@equity-research/shared/types';
import {
  CacheManager,
  CancelledError,
  ProviderUnavailableError,
  RateLimitedError,
  RateLimiter,
  TickerNotFoundError,
  errorMessage,
} from '@equity-research/shared/utils';
import { FinancialDataProvider } from '../interfaces/providers.interface';
import { FMPAdapter } from './fmp.adapter';
import { FmpIncomeStatement, FmpQuote } from './fmp.types';

const RATE_LIMIT_KEY = 'fmp';
const RATE_LIMIT_WAIT_MS = 2000;
const STATEMENT_LIMIT = 2;

const round2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * Fundamentals from FMP: valuation from the quote, revenue, earnings, margin
 * and year-over-year growth from the two latest annual income statements.
 */
export class FmpFinancialDataProvider implements FinancialDataProvider {
  private readonly logger = new Logger(FmpFinancialDataProvider.name);
  private fmpAdapter: FMPAdapter | null;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly cacheManager: CacheManager,
    private readonly rateLimiter: RateLimiter,
    adapter?: FMPAdapter
  ) {
    this.fmpAdapter = adapter ?? null;
  }

  private ensureAdapter(): FMPAdapter {
    if (!this.fmpAdapter) {
      if (!this.apiKey) {
        throw new ProviderUnavailableError('FMP_API_KEY is not configured');
      }
      this.fmpAdapter = new FMPAdapter(this.apiKey);
    }
    return this.fmpAdapter;
  }

  async fetch(ticker: string, signal?: AbortSignal): Promise<RawMetrics> {
    const symbol = ticker.toUpperCase();
    const adapter = this.ensureAdapter();

    const quote = await this.getQuote(adapter, symbol, signal);
    if (!quote) {
      throw new TickerNotFoundError(symbol);
    }

    let statements: FmpIncomeStatement[] = [];
    try {
      statements = await this.getIncomeStatements(adapter, symbol, signal);
    } catch (error) {
      if (error instanceof CancelledError || error instanceof TickerNotFoundError) {
        throw error;
      }
      // Quote data alone is still a usable partial result
      this.logger.warn(`[${symbol}] Income statements unavailable: ${errorMessage(error)}`);
    }

    return this.toRawMetrics(quote, statements);
  }

  private async getQuote(adapter: FMPAdapter, symbol: string, signal?: AbortSignal): Promise<FmpQuote | null> {
    const cacheKey = this.cacheManager.generateKey(symbol, 'quote');
    const cached = this.cacheManager.get<FmpQuote>(cacheKey);
    if (cached) {
      return cached;
    }

    await this.acquireToken(signal);
    const quote = await adapter.getQuote(symbol, signal);
    if (quote) {
      this.cacheManager.set(cacheKey, quote, 'quote');
    }
    return quote;
  }

  private async getIncomeStatements(
    adapter: FMPAdapter,
    symbol: string,
    signal?: AbortSignal
  ): Promise<FmpIncomeStatement[]> {
    const cacheKey = this.cacheManager.generateKey(symbol, 'income_statement', { limit: STATEMENT_LIMIT });
    const cached = this.cacheManager.get<FmpIncomeStatement[]>(cacheKey);
    if (cached) {
      return cached;
    }

    await this.acquireToken(signal);
    const statements = await adapter.getIncomeStatements(symbol, STATEMENT_LIMIT, 'annual', signal);
    this.cacheManager.set(cacheKey, statements, 'income_statement');
    return statements;
  }

  private async acquireToken(signal?: AbortSignal): Promise<void> {
    const acquired = await this.rateLimiter.waitForTokens(RATE_LIMIT_KEY, 1, RATE_LIMIT_WAIT_MS, signal);
    if (!acquired) {
      throw new RateLimitedError('FMP client-side rate limit exceeded');
    }
  }

  private toRawMetrics(quote: FmpQuote, statements: FmpIncomeStatement[]): RawMetrics {
    const [latest, previous] = [...statements].sort((a, b) => b.date.localeCompare(a.date));
    const revenue = latest?.revenue ?? null;
    const netIncome = latest?.netIncome ?? null;
    const previousRevenue = previous?.revenue ?? null;

    return {
      peRatio: quote.pe ?? null,
      marketCap: quote.marketCap ?? null,
      revenue,
      earnings: netIncome,
      profitMargin: revenue && netIncome !== null ? round2((netIncome / revenue) * 100) : null,
      revenueGrowth:
        revenue !== null && previousRevenue ? round2(((revenue - previousRevenue) / Math.abs(previousRevenue)) * 100) : null,
    };
  }
}
