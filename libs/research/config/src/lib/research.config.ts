import { registerAs, ConfigType } from '@nestjs/config';
import { z } from 'zod';
import { DEFAULT_SUMMARY_MODEL } from '@equity-research/shared/types';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

export const researchEnvSchema = z.object({
  SESSION_TIMEOUT_SECONDS: positiveInt(3600),
  MAX_CONCURRENT_SESSIONS: positiveInt(10),
  NEWS_RESULTS_PER_SEARCH: positiveInt(5),
  MAX_RETRIES: nonNegativeInt(3),
  BATCH_SIZE_LIMIT: positiveInt(5),
  CALL_TIMEOUT_MS: positiveInt(10000),
  RETRY_BASE_DELAY_MS: nonNegativeInt(500),
  SESSION_SWEEP_INTERVAL_MS: nonNegativeInt(300000),
  MEMORY_BANK_PATH: z.string().min(1).default('data/memory_bank.json'),
  SUMMARIZATION_ENABLED: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  SUMMARY_MODEL: z.string().min(1).default(DEFAULT_SUMMARY_MODEL),
  FMP_API_KEY: optionalSecret,
  NEWS_API_KEY: optionalSecret,
  ANTHROPIC_API_KEY: optionalSecret,
});

/**
 * Maps validated environment variables onto the research settings.
 * Throws a ZodError listing every invalid key.
 */
export function parseResearchConfig(env: Record<string, string | undefined>) {
  const parsed = researchEnvSchema.parse(env);

  return {
    sessionTimeoutSeconds: parsed.SESSION_TIMEOUT_SECONDS,
    maxConcurrentSessions: parsed.MAX_CONCURRENT_SESSIONS,
    newsResultsPerSearch: parsed.NEWS_RESULTS_PER_SEARCH,
    maxRetries: parsed.MAX_RETRIES,
    batchSizeLimit: parsed.BATCH_SIZE_LIMIT,
    callTimeoutMs: parsed.CALL_TIMEOUT_MS,
    retryBaseDelayMs: parsed.RETRY_BASE_DELAY_MS,
    sessionSweepIntervalMs: parsed.SESSION_SWEEP_INTERVAL_MS, // 0 = lazy sweep only
    memoryBankPath: parsed.MEMORY_BANK_PATH,
    summarizationEnabled: parsed.SUMMARIZATION_ENABLED,
    summaryModel: parsed.SUMMARY_MODEL,
    fmpApiKey: parsed.FMP_API_KEY,
    newsApiKey: parsed.NEWS_API_KEY,
    anthropicApiKey: parsed.ANTHROPIC_API_KEY,
  };
}

export const researchConfig = registerAs('research', () => parseResearchConfig(process.env));

export type ResearchConfig = ConfigType<typeof researchConfig>;
