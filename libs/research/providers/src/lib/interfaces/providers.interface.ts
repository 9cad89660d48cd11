import { NewsItem, RawMetrics, ResearchRecord } from '@equity-research/shared/types';

/**
 * Injection tokens for the external collaborators
 * Use these tokens when injecting a provider via @Inject()
 */
export const FINANCIAL_DATA_PROVIDER = 'FINANCIAL_DATA_PROVIDER';
export const NEWS_FEED_PROVIDER = 'NEWS_FEED_PROVIDER';
export const SUMMARIZATION_SERVICE = 'SUMMARIZATION_SERVICE';

/**
 * Fundamentals for one ticker.
 * Faults: TickerNotFound, ProviderUnavailable, RateLimited.
 */
export interface FinancialDataProvider {
  fetch(ticker: string, signal?: AbortSignal): Promise<RawMetrics>;
}

/**
 * News search in provider order.
 * Faults: ProviderUnavailable, RateLimited.
 */
export interface NewsFeedProvider {
  search(query: string, limit: number, signal?: AbortSignal): Promise<NewsItem[]>;
}

/**
 * Narrative summary of gathered research.
 * Faults: ServiceUnavailable.
 */
export interface SummarizationService {
  summarize(record: ResearchRecord, signal?: AbortSignal): Promise<string>;
}
