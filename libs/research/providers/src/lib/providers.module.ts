import { Inject, Module, OnModuleDestroy } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CacheManager, RateLimiter } from '@equity-research/shared/utils';
import { ResearchConfig, researchConfig } from '@equity-research/research/config';
import {
  FINANCIAL_DATA_PROVIDER,
  NEWS_FEED_PROVIDER,
  SUMMARIZATION_SERVICE,
} from './interfaces/providers.interface';
import { FmpFinancialDataProvider } from './fmp/fmp-financial-data.provider';
import { NewsApiProvider } from './news/news-api.provider';
import { AnthropicSummarizationService } from './summarization/anthropic-summarization.service';

export const PROVIDER_CACHE = 'PROVIDER_CACHE';
export const PROVIDER_RATE_LIMITER = 'PROVIDER_RATE_LIMITER';

@Module({
  imports: [ConfigModule.forFeature(researchConfig)],
  providers: [
    {
      provide: PROVIDER_CACHE,
      useFactory: () => new CacheManager({ stdTTL: 300, checkperiod: 60 }),
    },
    {
      provide: PROVIDER_RATE_LIMITER,
      useFactory: () => new RateLimiter({ capacity: 5, refillRate: 5 }),
    },
    {
      provide: FINANCIAL_DATA_PROVIDER,
      useFactory: (config: ResearchConfig, cache: CacheManager, limiter: RateLimiter) =>
        new FmpFinancialDataProvider(config.fmpApiKey, cache, limiter),
      inject: [researchConfig.KEY, PROVIDER_CACHE, PROVIDER_RATE_LIMITER],
    },
    {
      provide: NEWS_FEED_PROVIDER,
      useFactory: (config: ResearchConfig, cache: CacheManager) => new NewsApiProvider(config.newsApiKey, cache),
      inject: [researchConfig.KEY, PROVIDER_CACHE],
    },
    {
      provide: SUMMARIZATION_SERVICE,
      useFactory: (config: ResearchConfig) =>
        new AnthropicSummarizationService({
          apiKey: config.anthropicApiKey,
          model: config.summaryModel,
          timeoutMs: config.callTimeoutMs,
        }),
      inject: [researchConfig.KEY],
    },
  ],
  exports: [FINANCIAL_DATA_PROVIDER, NEWS_FEED_PROVIDER, SUMMARIZATION_SERVICE],
})
export class ProvidersModule implements OnModuleDestroy {
  constructor(@Inject(PROVIDER_CACHE) private readonly cache: CacheManager) {}

  onModuleDestroy() {
    this.cache.close();
  }
}
