import { Logger } from '@nestjs/common';
import {
  DataSource,
  FailureKind,
  RecommendationAction,
  ResearchRecord,
  RiskLevel,
  SentimentLabel,
} from '@equity-research/shared/types';
import {
  FinancialMetricsParser,
  RecommendationEngine,
  RiskAssessor,
  SentimentClassifier,
  ValuationScorer,
} from '@equity-research/research/analysis';
import { createTestMemoryEntry } from '@equity-research/research/memory/testing';
import { AnalysisStage } from './analysis.stage';
import { buildExecutiveSummary, buildReport, compareWithPast } from './report.builder';
import { GLOBEX_METRICS, newsItem } from '../../test-utils/fake-providers';

describe('report builder', () => {
  const stage = new AnalysisStage(
    new FinancialMetricsParser(),
    new ValuationScorer(),
    new SentimentClassifier(),
    new RiskAssessor(),
    new RecommendationEngine()
  );

  const record: ResearchRecord = {
    ticker: 'GLOBEX',
    researchedAt: '2025-03-01T09:59:00.000Z',
    rawMetrics: GLOBEX_METRICS,
    news: [{ ...newsItem('Globex holds annual meeting', 'Shareholders gathered in Springfield'), source: undefined }],
    summary: 'Globex is a diversified holding company.',
    sourceErrors: [{ source: DataSource.SUMMARIZATION, kind: FailureKind.SERVICE_UNAVAILABLE, message: 'unused' }],
  };

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should format the executive summary with capitalized labels', () => {
    const analysis = stage.run(record);

    expect(buildExecutiveSummary(analysis)).toBe(
      'GLOBEX Analysis Summary: Recommendation: Sell | Market Sentiment: Neutral | Risk Level: High'
    );
  });

  it('should map the analysis into the snake_case report contract', () => {
    const analysis = stage.run(record);

    const report = buildReport({
      sessionId: 'session-9',
      record,
      analysis,
      previous: null,
      generatedAt: new Date('2025-03-01T10:00:00.000Z'),
    });

    expect(report.report_date).toBe('2025-03-01T10:00:00.000Z');
    expect(report.metadata).toEqual({ session_id: 'session-9', generated_at: '2025-03-01T10:00:00.000Z' });
    expect(report.llm_research_summary).toBe('Globex is a diversified holding company.');
    expect(report.recommendation.action).toBe(RecommendationAction.SELL);
    expect(report.recommendation.confidence_score).toBe(85);
    expect(report.financial_analysis.raw_valuation_total).toBe(-60);
    expect(report.financial_analysis.valuation_score).toBe(0);
    expect(report.financial_analysis.score_breakdown).toEqual({
      pe_ratio: { value: 40, points: -25, unavailable: false },
      revenue_growth: { value: -3, points: -20, unavailable: false },
      profit_margin: { value: 2, points: -15, unavailable: false },
    });
    expect(report.risk_assessment).toEqual({
      risk_level: RiskLevel.HIGH,
      risk_score: 70,
      risk_factors: ['Weak valuation profile (score 0.0/100)', 'Mixed or uncertain market sentiment'],
      mitigation_suggestions: [
        'Consider smaller position size',
        'Use stop-loss orders',
        'Diversify across multiple stocks',
      ],
    });
    expect(report.sentiment_analysis.overall_sentiment).toBe(SentimentLabel.NEUTRAL);
    expect(report.recent_news).toEqual([
      {
        title: 'Globex holds annual meeting',
        snippet: 'Shareholders gathered in Springfield',
        url: 'https://news.example.com/globex%20holds%20annual%20meeting',
        published_at: '2025-03-01T08:00:00Z',
        source: null,
      },
    ]);
    expect(report.data_quality.source_errors).toEqual([
      { source: 'summarization', kind: FailureKind.SERVICE_UNAVAILABLE, message: 'unused' },
    ]);
    expect(report.comparison_with_past).toBeNull();
  });

  it('should compare against the previous report for the ticker', () => {
    const analysis = stage.run(record);
    const previous = createTestMemoryEntry('GLOBEX', 'session-0', '2025-02-01T00:00:00.000Z');

    expect(compareWithPast(analysis, previous)).toEqual({
      previous_report_date: '2025-02-01T00:00:00.000Z',
      previous_action: RecommendationAction.HOLD,
      previous_valuation_score: 60,
      valuation_score_change: -60,
      action_changed: true,
      previous_risk_level: RiskLevel.LOW,
      previous_sentiment: SentimentLabel.POSITIVE,
    });
  });

  it('should return a serializable report', () => {
    const analysis = stage.run(record);
    const report = buildReport({ sessionId: 'session-9', record, analysis, previous: null });

    expect(JSON.parse(JSON.stringify(report))).toEqual(report);
  });
});
