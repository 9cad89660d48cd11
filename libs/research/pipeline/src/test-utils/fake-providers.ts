import { NewsItem, RawMetrics, ResearchRecord } from '@equity-research/shared/types';
import { CancelledError, TickerNotFoundError } from '@equity-research/shared/utils';
import {
  FinancialDataProvider,
  NewsFeedProvider,
  SummarizationService,
} from '@equity-research/research/providers';

type Scripted<T> = T | Error | 'hang';

/**
 * Settles only when the caller's signal aborts
 */
function hang<T>(signal?: AbortSignal): Promise<T> {
  return new Promise<T>((_, reject) => {
    signal?.addEventListener('abort', () => reject(new CancelledError()), { once: true });
  });
}

async function play<T>(scripted: Scripted<T>, signal?: AbortSignal): Promise<T> {
  if (scripted === 'hang') {
    return hang<T>(signal);
  }
  if (scripted instanceof Error) {
    throw scripted;
  }
  return scripted;
}

export class FakeFinancialDataProvider implements FinancialDataProvider {
  readonly calls: string[] = [];

  constructor(private readonly data: Record<string, Scripted<RawMetrics>> = {}) {}

  async fetch(ticker: string, signal?: AbortSignal): Promise<RawMetrics> {
    this.calls.push(ticker);
    const scripted = this.data[ticker];
    if (scripted === undefined) {
      throw new TickerNotFoundError(ticker);
    }
    return play(scripted, signal);
  }
}

/**
 * Answers by the first word of the query, which the research stage sets to the ticker
 */
export class FakeNewsFeedProvider implements NewsFeedProvider {
  readonly calls: Array<{ query: string; limit: number }> = [];

  constructor(private readonly data: Record<string, Scripted<NewsItem[]>> = {}) {}

  async search(query: string, limit: number, signal?: AbortSignal): Promise<NewsItem[]> {
    this.calls.push({ query, limit });
    const [ticker] = query.split(' ');
    const items = await play(this.data[ticker] ?? [], signal);
    return items.slice(0, limit);
  }
}

export class FakeSummarizationService implements SummarizationService {
  readonly calls: ResearchRecord[] = [];

  constructor(private readonly result: Scripted<string> = 'Summary unavailable in tests') {}

  async summarize(record: ResearchRecord, signal?: AbortSignal): Promise<string> {
    this.calls.push(record);
    return play(this.result, signal);
  }
}

export function newsItem(title: string, snippet = '', source = 'Test Wire'): NewsItem {
  return {
    title,
    snippet,
    url: `https://news.example.com/${encodeURIComponent(title.toLowerCase())}`,
    publishedAt: '2025-03-01T08:00:00Z',
    source,
  };
}

/** PE 10, growth 25 %, margin 30 %: valuation 60, Hold */
export const ACME_METRICS: RawMetrics = {
  peRatio: 10,
  marketCap: '80B',
  revenue: '$5,000,000,000',
  earnings: '1.5B',
  profitMargin: '30%',
  revenueGrowth: 25,
};

/** PE 40, growth -3 %, margin 2 %: valuation 0, Sell */
export const GLOBEX_METRICS: RawMetrics = {
  peRatio: 40,
  marketCap: 1200000000,
  revenue: 300000000,
  earnings: 6000000,
  profitMargin: 2,
  revenueGrowth: -3,
};

export const ACME_NEWS: NewsItem[] = [
  newsItem('Acme beats earnings estimates', 'Quarterly results topped forecasts'),
  newsItem('Acme shares surge after the report', 'Investors cheered the numbers'),
];
