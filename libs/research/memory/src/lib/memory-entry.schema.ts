import { z } from 'zod';
import {
  FailureKind,
  METRIC_FIELDS,
  MemoryEntry,
  RecommendationAction,
  Report,
  RiskLevel,
  SentimentLabel,
} from '@equity-research/shared/types';

const scoreComponentSchema = z.object({
  value: z.number().nullable(),
  points: z.number(),
  unavailable: z.boolean(),
});

export const reportSchema: z.ZodType<Report> = z.object({
  ticker: z.string(),
  report_date: z.string(),
  executive_summary: z.string(),
  llm_research_summary: z.string().nullable(),
  recommendation: z.object({
    action: z.nativeEnum(RecommendationAction),
    confidence_score: z.number(),
    reasoning: z.string(),
    time_horizon: z.string(),
    key_points: z.array(z.string()),
  }),
  financial_analysis: z.object({
    valuation_score: z.number(),
    raw_valuation_total: z.number(),
    score_breakdown: z.object({
      pe_ratio: scoreComponentSchema,
      revenue_growth: scoreComponentSchema,
      profit_margin: scoreComponentSchema,
    }),
    key_metrics: z.object({
      pe_ratio: z.number().nullable(),
      revenue: z.number().nullable(),
      market_cap: z.number().nullable(),
      earnings: z.number().nullable(),
      profit_margin: z.number().nullable(),
      revenue_growth: z.number().nullable(),
    }),
  }),
  sentiment_analysis: z.object({
    overall_sentiment: z.nativeEnum(SentimentLabel),
    confidence: z.number(),
    positive_count: z.number().int(),
    negative_count: z.number().int(),
    neutral_count: z.number().int(),
    recent_headlines: z.array(z.string()),
  }),
  risk_assessment: z.object({
    risk_level: z.nativeEnum(RiskLevel),
    risk_score: z.number(),
    risk_factors: z.array(z.string()),
    mitigation_suggestions: z.array(z.string()),
  }),
  recent_news: z.array(
    z.object({
      title: z.string(),
      snippet: z.string(),
      url: z.string(),
      published_at: z.string().nullable(),
      source: z.string().nullable(),
    })
  ),
  data_quality: z.object({
    missing_fields: z.array(z.enum(METRIC_FIELDS)),
    warnings: z.array(z.string()),
    source_errors: z.array(
      z.object({
        source: z.string(),
        kind: z.nativeEnum(FailureKind),
        message: z.string(),
      })
    ),
  }),
  comparison_with_past: z
    .object({
      previous_report_date: z.string(),
      previous_action: z.nativeEnum(RecommendationAction),
      previous_valuation_score: z.number(),
      valuation_score_change: z.number(),
      action_changed: z.boolean(),
      previous_risk_level: z.nativeEnum(RiskLevel),
      previous_sentiment: z.nativeEnum(SentimentLabel),
    })
    .nullable(),
  metadata: z.object({
    session_id: z.string(),
    generated_at: z.string(),
  }),
});

export const memoryEntrySchema: z.ZodType<MemoryEntry> = z.object({
  sessionId: z.string(),
  ticker: z.string(),
  report: reportSchema,
  storedAt: z.string(),
});

export const memoryLogSchema = z.array(memoryEntrySchema);
