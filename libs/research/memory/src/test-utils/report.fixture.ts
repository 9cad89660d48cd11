import {
  MemoryEntry,
  RecommendationAction,
  Report,
  RiskLevel,
  SentimentLabel,
} from '@equity-research/shared/types';

export function createTestReport(overrides: Partial<Report> = {}): Report {
  return {
    ticker: 'ACME',
    report_date: '2025-03-01T10:00:00.000Z',
    executive_summary:
      'ACME Analysis Summary: Recommendation: Hold | Market Sentiment: Positive | Risk Level: Low',
    llm_research_summary: null,
    recommendation: {
      action: RecommendationAction.HOLD,
      confidence_score: 70,
      reasoning: 'Valuation score 60.0: Hold signal. Sentiment: positive, Risk: low.',
      time_horizon: 'long-term (1+ years)',
      key_points: ['Valuation: 60.0/100', 'Sentiment: positive', 'Risk: low'],
    },
    financial_analysis: {
      valuation_score: 60,
      raw_valuation_total: 60,
      score_breakdown: {
        pe_ratio: { value: 10, points: 25, unavailable: false },
        revenue_growth: { value: 25, points: 20, unavailable: false },
        profit_margin: { value: 30, points: 15, unavailable: false },
      },
      key_metrics: {
        pe_ratio: 10,
        revenue: 5000000000,
        market_cap: 80000000000,
        earnings: 1500000000,
        profit_margin: 30,
        revenue_growth: 25,
      },
    },
    sentiment_analysis: {
      overall_sentiment: SentimentLabel.POSITIVE,
      confidence: 100,
      positive_count: 1,
      negative_count: 0,
      neutral_count: 0,
      recent_headlines: ['Acme beats earnings estimates'],
    },
    risk_assessment: {
      risk_level: RiskLevel.LOW,
      risk_score: 20,
      risk_factors: [],
      mitigation_suggestions: ['Continue regular monitoring'],
    },
    recent_news: [],
    data_quality: { missing_fields: [], warnings: [], source_errors: [] },
    comparison_with_past: null,
    metadata: { session_id: 'session-1', generated_at: '2025-03-01T10:00:00.000Z' },
    ...overrides,
  };
}

export function createTestMemoryEntry(
  ticker: string,
  sessionId: string,
  storedAt: string,
  reportOverrides: Partial<Report> = {}
): MemoryEntry {
  return {
    sessionId,
    ticker,
    storedAt,
    report: createTestReport({
      ticker,
      report_date: storedAt,
      metadata: { session_id: sessionId, generated_at: storedAt },
      ...reportOverrides,
    }),
  };
}
