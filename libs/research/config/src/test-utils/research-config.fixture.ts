import { ResearchConfig } from '../lib/research.config';

export function createTestResearchConfig(overrides: Partial<ResearchConfig> = {}): ResearchConfig {
  return {
    sessionTimeoutSeconds: 3600,
    maxConcurrentSessions: 10,
    newsResultsPerSearch: 5,
    maxRetries: 0,
    batchSizeLimit: 5,
    callTimeoutMs: 1000,
    retryBaseDelayMs: 1,
    sessionSweepIntervalMs: 0,
    memoryBankPath: 'data/test_memory_bank.json',
    summarizationEnabled: false,
    summaryModel: 'test-model',
    fmpApiKey: 'test-fmp-key',
    newsApiKey: 'test-news-key',
    anthropicApiKey: 'test-secret',
    ...overrides,
  };
}
