import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DataSource,
  NewsItem,
  RawMetrics,
  ResearchRecord,
  SourceError,
} from '@equity-research/shared/types';
import {
  ProviderUnavailableError,
  ResearchFailedError,
  ServiceUnavailableError,
  errorMessage,
  throwIfAborted,
  toResearchError,
  withRetry,
} from '@equity-research/shared/utils';
import { ResearchConfig, researchConfig } from '@equity-research/research/config';
import {
  FINANCIAL_DATA_PROVIDER,
  FinancialDataProvider,
  NEWS_FEED_PROVIDER,
  NewsFeedProvider,
  SUMMARIZATION_SERVICE,
  SummarizationService,
} from '@equity-research/research/providers';

export interface ResearchContext {
  sessionId: string;
  signal?: AbortSignal;
}

export const newsQueryFor = (ticker: string): string => `${ticker} stock news latest`;

/**
 * Gathers fundamentals and news concurrently, then an optional summary.
 * A news failure degrades the record; a financial-data failure fails the ticker.
 */
@Injectable()
export class ResearchStage {
  private readonly logger = new Logger(ResearchStage.name);

  constructor(
    @Inject(researchConfig.KEY)
    private readonly config: ResearchConfig,
    @Inject(FINANCIAL_DATA_PROVIDER)
    private readonly financialData: FinancialDataProvider,
    @Inject(NEWS_FEED_PROVIDER)
    private readonly newsFeed: NewsFeedProvider,
    @Inject(SUMMARIZATION_SERVICE)
    private readonly summarizer: SummarizationService
  ) {}

  async run(ticker: string, context: ResearchContext): Promise<ResearchRecord> {
    const symbol = ticker.toUpperCase();
    const { sessionId, signal } = context;

    const [metricsResult, newsResult] = await Promise.allSettled([
      this.call<RawMetrics>(DataSource.FINANCIAL_DATA, context, (s) => this.financialData.fetch(symbol, s)),
      this.call<NewsItem[]>(DataSource.NEWS_FEED, context, (s) =>
        this.newsFeed.search(newsQueryFor(symbol), this.config.newsResultsPerSearch, s)
      ),
    ]);

    throwIfAborted(signal);

    const sourceErrors: SourceError[] = [];
    let rawMetrics: RawMetrics = {};
    let news: NewsItem[] = [];

    if (metricsResult.status === 'fulfilled') {
      rawMetrics = metricsResult.value;
    } else {
      sourceErrors.push(this.toSourceError(DataSource.FINANCIAL_DATA, metricsResult.reason, sessionId, symbol));
    }

    if (newsResult.status === 'fulfilled') {
      news = newsResult.value;
    } else {
      sourceErrors.push(this.toSourceError(DataSource.NEWS_FEED, newsResult.reason, sessionId, symbol));
    }

    // Without fundamentals there is nothing to value; news alone never yields a recommendation.
    if (metricsResult.status === 'rejected') {
      const detail = sourceErrors.map((e) => `${e.source} (${e.kind})`).join(', ');
      throw new ResearchFailedError(
        newsResult.status === 'rejected'
          ? `All data sources failed for ${symbol}: ${detail}`
          : `Financial data unavailable for ${symbol}: ${detail}`,
        { cause: metricsResult.reason }
      );
    }

    const record: ResearchRecord = {
      ticker: symbol,
      researchedAt: new Date().toISOString(),
      rawMetrics,
      news,
      summary: null,
      sourceErrors,
    };

    if (!this.config.summarizationEnabled) {
      return record;
    }

    try {
      const summary = await this.call(DataSource.SUMMARIZATION, context, (s) => this.summarizer.summarize(record, s));
      return { ...record, summary };
    } catch (error) {
      throwIfAborted(signal);
      return {
        ...record,
        sourceErrors: [...sourceErrors, this.toSourceError(DataSource.SUMMARIZATION, error, sessionId, symbol)],
      };
    }
  }

  private call<T>(
    source: DataSource,
    context: ResearchContext,
    operation: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    return withRetry(operation, {
      maxRetries: this.config.maxRetries,
      baseDelayMs: this.config.retryBaseDelayMs,
      timeoutMs: this.config.callTimeoutMs,
      signal: context.signal,
      createTimeoutError: (ms) =>
        source === DataSource.SUMMARIZATION
          ? new ServiceUnavailableError(`${source} timed out after ${ms}ms`)
          : new ProviderUnavailableError(`${source} timed out after ${ms}ms`),
      onRetry: (attempt, delayMs, error) => {
        this.logger.warn(
          `[${context.sessionId}] ${source} attempt ${attempt} failed, retrying in ${delayMs}ms: ${errorMessage(error)}`
        );
      },
    });
  }

  private toSourceError(source: DataSource, reason: unknown, sessionId: string, ticker: string): SourceError {
    const error = toResearchError(reason);
    this.logger.warn(`[${sessionId}] ${ticker}: ${source} unavailable (${error.kind}): ${error.message}`);
    return { source, kind: error.kind, message: error.message };
  }
}
