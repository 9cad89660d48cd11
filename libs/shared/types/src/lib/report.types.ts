/**
 * Report & Memory Types
 * The report is a wire contract (snake_case) and is persisted verbatim in the memory bank
 */

import {
  FailureKind,
  RecommendationAction,
  RiskLevel,
  SentimentLabel,
} from './enums';
import { MetricField } from './research.types';

export interface ReportScoreComponent {
  value: number | null;
  points: number;
  unavailable: boolean;
}

export interface ReportNewsItem {
  title: string;
  snippet: string;
  url: string;
  published_at: string | null;
  source: string | null;
}

export interface ReportSourceError {
  source: string;
  kind: FailureKind;
  message: string;
}

export interface ReportComparison {
  previous_report_date: string;
  previous_action: RecommendationAction;
  previous_valuation_score: number;
  valuation_score_change: number;
  action_changed: boolean;
  previous_risk_level: RiskLevel;
  previous_sentiment: SentimentLabel;
}

export interface Report {
  ticker: string;
  report_date: string;
  executive_summary: string;
  llm_research_summary: string | null;
  recommendation: {
    action: RecommendationAction;
    confidence_score: number;
    reasoning: string;
    time_horizon: string;
    key_points: string[];
  };
  financial_analysis: {
    valuation_score: number;
    raw_valuation_total: number;
    score_breakdown: {
      pe_ratio: ReportScoreComponent;
      revenue_growth: ReportScoreComponent;
      profit_margin: ReportScoreComponent;
    };
    key_metrics: {
      pe_ratio: number | null;
      revenue: number | null;
      market_cap: number | null;
      earnings: number | null;
      profit_margin: number | null;
      revenue_growth: number | null;
    };
  };
  sentiment_analysis: {
    overall_sentiment: SentimentLabel;
    confidence: number;
    positive_count: number;
    negative_count: number;
    neutral_count: number;
    recent_headlines: string[];
  };
  risk_assessment: {
    risk_level: RiskLevel;
    risk_score: number;
    risk_factors: string[];
    mitigation_suggestions: string[];
  };
  recent_news: ReportNewsItem[];
  data_quality: {
    missing_fields: MetricField[];
    warnings: string[];
    source_errors: ReportSourceError[];
  };
  comparison_with_past: ReportComparison | null;
  metadata: {
    session_id: string;
    generated_at: string;
  };
}

export interface MemoryEntry {
  sessionId: string;
  ticker: string;
  report: Report;
  storedAt: string;
}

// ============================================================================
// Batch
// ============================================================================

export type TickerOutcome =
  | { ticker: string; status: 'success'; report: Report; persisted: boolean }
  | { ticker: string; status: 'failure'; kind: FailureKind; reason: string };

export interface BatchSummaryEntry {
  ticker: string;
  action: RecommendationAction;
  score: number;
}

export interface BatchFailureEntry {
  ticker: string;
  kind: FailureKind;
  reason: string;
}

export interface BatchSummary {
  total: number;
  successful: number;
  failed: number;
  entries: BatchSummaryEntry[];
  failures: BatchFailureEntry[];
  recommendationCounts: Record<RecommendationAction, number>;
  topPick: string | null;
  note?: string;
  narrative: string;
}

export interface SingleResearchResult {
  sessionId: string;
  report: Report;
  persisted: boolean;
}

export interface BatchResearchResult {
  sessionId: string;
  reports: Report[];
  outcomes: TickerOutcome[];
  summary: BatchSummary;
}
