import { Logger } from '@nestjs/common';
import NodeCache = require('node-cache');
import { errorMessage } from './errors';

export type CacheDataType = 'quote' | 'income_statement' | 'news';

interface CacheConfig {
  stdTTL: number;
  checkperiod: number;
  useClones: boolean;
  maxKeys: number;
}

export interface CacheStats {
  keys: number;
  hits: number;
  misses: number;
  hitRate: number;
}

/**
 * TTL cache for provider responses. Quotes move fast, statements do not.
 */
export class CacheManager {
  private readonly logger = new Logger(CacheManager.name);
  private readonly cache: NodeCache;
  private readonly defaultTTL: number;
  private readonly cacheTTLs: Map<CacheDataType, number>;

  constructor(config?: Partial<CacheConfig>) {
    this.defaultTTL = config?.stdTTL ?? 300;

    this.cache = new NodeCache({
      stdTTL: this.defaultTTL,
      checkperiod: config?.checkperiod ?? 60,
      useClones: config?.useClones ?? true,
      maxKeys: config?.maxKeys ?? 1000,
    });

    this.cacheTTLs = new Map<CacheDataType, number>([
      ['quote', 60],
      ['income_statement', 3600],
      ['news', 300],
    ]);

    this.cache.on('expired', (key: string) => {
      this.logger.debug(`Cache expired for key: ${key}`);
    });
  }

  generateKey(ticker: string, dataType: CacheDataType, additionalParams?: Record<string, string | number>): string {
    const baseKey = `${ticker.toUpperCase()}:${dataType}`;

    if (additionalParams && Object.keys(additionalParams).length > 0) {
      const paramString = Object.entries(additionalParams)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([key, value]) => `${key}:${value}`)
        .join(':');
      return `${baseKey}:${paramString}`;
    }

    return baseKey;
  }

  get<T>(key: string): T | null {
    const value = this.cache.get<T>(key);
    if (value !== undefined) {
      this.logger.debug(`Cache hit for key: ${key}`);
      return value;
    }
    return null;
  }

  set<T>(key: string, value: T, dataType?: CacheDataType): boolean {
    const ttl = dataType ? this.cacheTTLs.get(dataType) ?? this.defaultTTL : this.defaultTTL;
    try {
      return this.cache.set(key, value, ttl);
    } catch (error) {
      // node-cache throws once maxKeys is reached; a missed cache write is not a fault
      this.logger.warn(`Cache set failed for key ${key}: ${errorMessage(error)}`);
      return false;
    }
  }

  delete(key: string): boolean {
    return this.cache.del(key) > 0;
  }

  flush(): void {
    this.cache.flushAll();
  }

  getStats(): CacheStats {
    const stats = this.cache.getStats();

    return {
      keys: this.cache.keys().length,
      hits: stats.hits,
      misses: stats.misses,
      hitRate: stats.hits / (stats.hits + stats.misses) || 0,
    };
  }

  close(): void {
    this.cache.close();
  }
}
