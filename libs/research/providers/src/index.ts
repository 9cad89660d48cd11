export * from './lib/interfaces/providers.interface';
export * from './lib/http-errors';
export * from './lib/fmp/fmp.types';
export * from './lib/fmp/fmp.adapter';
export * from './lib/fmp/fmp-financial-data.provider';
export * from './lib/news/news-api.types';
export * from './lib/news/news-api.provider';
export * from './lib/summarization/anthropic-summarization.service';
export * from './lib/providers.module';
