/**
 * Shared enums used across the entire application
 * Engines, pipeline, memory bank and API all reference these constants
 */

// ============================================================================
// Classification Labels
// ============================================================================

export enum SentimentLabel {
  POSITIVE = 'positive',
  NEUTRAL = 'neutral',
  NEGATIVE = 'negative',
}

export enum RiskLevel {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
}

export enum RecommendationAction {
  BUY = 'Buy',
  HOLD = 'Hold',
  SELL = 'Sell',
}

/**
 * Ranking priority used when comparing tickers in a batch (higher wins)
 */
export const RecommendationPriority: Record<RecommendationAction, number> = {
  [RecommendationAction.BUY]: 3,
  [RecommendationAction.HOLD]: 2,
  [RecommendationAction.SELL]: 1,
};

// ============================================================================
// Failure Kinds
// ============================================================================

/**
 * Closed failure taxonomy. Callers branch on the kind, never on message text.
 */
export enum FailureKind {
  // Session lifecycle
  CAPACITY_EXCEEDED = 'CapacityExceeded',
  SESSION_NOT_FOUND = 'SessionNotFound',
  SESSION_EXPIRED = 'SessionExpired',

  // Collaborator faults
  PROVIDER_UNAVAILABLE = 'ProviderUnavailable',
  RATE_LIMITED = 'RateLimited',
  TICKER_NOT_FOUND = 'TickerNotFound',
  SERVICE_UNAVAILABLE = 'ServiceUnavailable',

  // Stage faults
  RESEARCH_FAILED = 'ResearchFailed',
  PERSISTENCE_FAILED = 'PersistenceFailed',

  // Run aborted because its session was closed
  CANCELLED = 'Cancelled',
}

// ============================================================================
// Pipeline
// ============================================================================

export enum PipelineStage {
  RESEARCH = 'research',
  ANALYSIS = 'analysis',
  REPORT = 'report',
}

export enum DataSource {
  FINANCIAL_DATA = 'financial_data',
  NEWS_FEED = 'news_feed',
  SUMMARIZATION = 'summarization',
}

// ============================================================================
// Research Event Types (EventEmitter payload discriminator)
// ============================================================================

export enum ResearchEventType {
  SESSION_OPENED = 'session_opened',
  SESSION_CLOSED = 'session_closed',
  SESSION_EXPIRED = 'session_expired',
  STAGE_COMPLETED = 'stage_completed',
  PIPELINE_COMPLETED = 'pipeline_completed',
  PIPELINE_FAILED = 'pipeline_failed',
  BATCH_COMPLETED = 'batch_completed',
}

// ============================================================================
// Anthropic Model IDs
// ============================================================================

export enum AnthropicModel {
  /** Claude Haiku 4.5 - Fast, cost-effective for high-volume tasks */
  HAIKU_4_5 = 'claude-haiku-4-5-20251001',

  /** Claude Sonnet 4.5 */
  SONNET_4_5 = 'claude-sonnet-4-5-20250929',

  /** Claude 3.5 Haiku - October 2024 snapshot */
  HAIKU_3_5 = 'claude-3-5-haiku-20241022',
}

export const DEFAULT_SUMMARY_MODEL = AnthropicModel.HAIKU_4_5;

// ============================================================================
// Event Names (for EventEmitter)
// ============================================================================

export const RESEARCH_EVENT_PREFIX = 'research';

export const createResearchEventName = (sessionId: string): string => {
  return `${RESEARCH_EVENT_PREFIX}.${sessionId}`;
};
