import { Logger } from '@nestjs/common';
import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { NewsItem } from '@equity-research/shared/types';
import {
  CacheManager,
  ProviderUnavailableError,
  RateLimitedError,
} from '@equity-research/shared/utils';
import { NewsFeedProvider } from '../interfaces/providers.interface';
import { toProviderError } from '../http-errors';
import { NewsApiArticle, NewsApiResponse } from './news-api.types';

export interface NewsApiProviderOptions {
  baseURL?: string;
  timeoutMs?: number;
  /** Transport override, used by tests */
  adapter?: AxiosAdapter;
}

const PROVIDER_NAME = 'NewsAPI';
// NewsAPI keeps deleted articles in results with this placeholder
const REMOVED_MARKER = '[Removed]';

export class NewsApiProvider implements NewsFeedProvider {
  private readonly logger = new Logger(NewsApiProvider.name);
  private readonly client: AxiosInstance | null;

  constructor(
    apiKey: string | undefined,
    private readonly cacheManager: CacheManager,
    options: NewsApiProviderOptions = {}
  ) {
    this.client = apiKey ? this.createClient(apiKey, options) : null;
  }

  private createClient(apiKey: string, options: NewsApiProviderOptions): AxiosInstance {
    const client = axios.create({
      baseURL: options.baseURL ?? 'https://newsapi.org/v2',
      timeout: options.timeoutMs ?? 30000,
      headers: { 'X-Api-Key': apiKey },
      adapter: options.adapter,
    });

    client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        throw toProviderError(error, PROVIDER_NAME);
      }
    );

    return client;
  }

  async search(query: string, limit: number, signal?: AbortSignal): Promise<NewsItem[]> {
    if (!this.client) {
      throw new ProviderUnavailableError('NEWS_API_KEY is not configured');
    }

    const cacheKey = this.cacheManager.generateKey(query, 'news', { limit });
    const cached = this.cacheManager.get<NewsItem[]>(cacheKey);
    if (cached) {
      return cached;
    }

    const response = await this.client.get<NewsApiResponse>('/everything', {
      params: {
        q: query,
        sortBy: 'publishedAt',
        language: 'en',
        pageSize: limit,
      },
      signal,
    });

    const body = response.data;
    if (body.status === 'error') {
      if (body.code === 'rateLimited') {
        throw new RateLimitedError(`${PROVIDER_NAME} rate limit exceeded`);
      }
      throw new ProviderUnavailableError(`${PROVIDER_NAME} error: ${body.message ?? body.code ?? 'unknown'}`);
    }

    const items = (body.articles ?? [])
      .filter((article) => article.title && article.title !== REMOVED_MARKER)
      .slice(0, limit)
      .map((article) => this.toNewsItem(article));

    this.logger.log(`Found ${items.length} news results for "${query}"`);
    this.cacheManager.set(cacheKey, items, 'news');
    return items;
  }

  private toNewsItem(article: NewsApiArticle): NewsItem {
    return {
      title: article.title ?? '',
      snippet: article.description ?? '',
      url: article.url ?? '',
      publishedAt: article.publishedAt ?? null,
      source: article.source?.name ?? undefined,
    };
  }
}
