import {
  AnalysisResult,
  MemoryEntry,
  Report,
  ReportComparison,
  ReportScoreComponent,
  ResearchRecord,
  ScoreComponent,
} from '@equity-research/shared/types';

const capitalize = (value: string): string =>
  value.length === 0 ? value : value[0].toUpperCase() + value.slice(1);

const round1 = (value: number): number => Math.round(value * 10) / 10;

export function buildExecutiveSummary(analysis: AnalysisResult): string {
  return (
    `${analysis.ticker} Analysis Summary: ` +
    `Recommendation: ${analysis.recommendation.action} | ` +
    `Market Sentiment: ${capitalize(analysis.sentiment.label)} | ` +
    `Risk Level: ${capitalize(analysis.risk.level)}`
  );
}

function toReportComponent(component: ScoreComponent): ReportScoreComponent {
  return {
    value: component.value,
    points: component.points,
    unavailable: component.status === 'unavailable',
  };
}

/**
 * Change against the most recent earlier report for the same ticker
 */
export function compareWithPast(analysis: AnalysisResult, previous: MemoryEntry | null): ReportComparison | null {
  if (!previous) {
    return null;
  }

  const past = previous.report;
  return {
    previous_report_date: past.report_date,
    previous_action: past.recommendation.action,
    previous_valuation_score: past.financial_analysis.valuation_score,
    valuation_score_change: round1(analysis.valuation.score - past.financial_analysis.valuation_score),
    action_changed: past.recommendation.action !== analysis.recommendation.action,
    previous_risk_level: past.risk_assessment.risk_level,
    previous_sentiment: past.sentiment_analysis.overall_sentiment,
  };
}

export interface ReportInput {
  sessionId: string;
  record: ResearchRecord;
  analysis: AnalysisResult;
  previous: MemoryEntry | null;
  generatedAt?: Date;
}

export function buildReport({ sessionId, record, analysis, previous, generatedAt = new Date() }: ReportInput): Report {
  const { metrics, valuation, sentiment, risk, recommendation } = analysis;
  const timestamp = generatedAt.toISOString();

  return {
    ticker: analysis.ticker,
    report_date: timestamp,
    executive_summary: buildExecutiveSummary(analysis),
    llm_research_summary: record.summary,
    recommendation: {
      action: recommendation.action,
      confidence_score: recommendation.confidence,
      reasoning: recommendation.reasoning,
      time_horizon: recommendation.timeHorizon,
      key_points: [...recommendation.keyPoints],
    },
    financial_analysis: {
      valuation_score: valuation.score,
      raw_valuation_total: valuation.rawTotal,
      score_breakdown: {
        pe_ratio: toReportComponent(valuation.breakdown.peRatio),
        revenue_growth: toReportComponent(valuation.breakdown.revenueGrowth),
        profit_margin: toReportComponent(valuation.breakdown.profitMargin),
      },
      key_metrics: {
        pe_ratio: metrics.peRatio,
        revenue: metrics.revenue,
        market_cap: metrics.marketCap,
        earnings: metrics.earnings,
        profit_margin: metrics.profitMargin,
        revenue_growth: metrics.revenueGrowth,
      },
    },
    sentiment_analysis: {
      overall_sentiment: sentiment.label,
      confidence: sentiment.confidence,
      positive_count: sentiment.positiveCount,
      negative_count: sentiment.negativeCount,
      neutral_count: sentiment.neutralCount,
      recent_headlines: [...sentiment.recentHeadlines],
    },
    risk_assessment: {
      risk_level: risk.level,
      risk_score: risk.score,
      risk_factors: [...risk.factors],
      mitigation_suggestions: [...risk.mitigationSuggestions],
    },
    recent_news: record.news.map((item) => ({
      title: item.title,
      snippet: item.snippet,
      url: item.url,
      published_at: item.publishedAt,
      source: item.source ?? null,
    })),
    data_quality: {
      missing_fields: [...analysis.missingFields],
      warnings: analysis.warnings.map((w) => `${w.field}: ${w.message}`),
      source_errors: record.sourceErrors.map((e) => ({ source: e.source, kind: e.kind, message: e.message })),
    },
    comparison_with_past: compareWithPast(analysis, previous),
    metadata: {
      session_id: sessionId,
      generated_at: timestamp,
    },
  };
}
