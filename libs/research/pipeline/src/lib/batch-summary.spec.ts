import { FailureKind, RecommendationAction, TickerOutcome } from '@equity-research/shared/types';
import { createTestReport } from '@equity-research/research/memory/testing';
import { rankEntries, summarizeBatch } from './batch-summary';

const success = (ticker: string, action: RecommendationAction, score: number): TickerOutcome => ({
  ticker,
  status: 'success',
  persisted: true,
  report: createTestReport({
    ticker,
    recommendation: { ...createTestReport().recommendation, action },
    financial_analysis: { ...createTestReport().financial_analysis, valuation_score: score },
  }),
});

const failure = (ticker: string, kind: FailureKind, reason: string): TickerOutcome => ({
  ticker,
  status: 'failure',
  kind,
  reason,
});

describe('summarizeBatch', () => {
  it('should name the top pick by action priority, then score', () => {
    const summary = summarizeBatch([
      success('ACME', RecommendationAction.HOLD, 60),
      success('GLOBEX', RecommendationAction.BUY, 75),
      success('INITECH', RecommendationAction.SELL, 10),
      success('UMBRELLA', RecommendationAction.BUY, 80),
    ]);

    expect(summary.topPick).toBe('UMBRELLA');
    expect(summary.note).toBeUndefined();
    expect(summary.recommendationCounts).toEqual({ Buy: 2, Hold: 1, Sell: 1 });
    expect(summary.narrative).toBe(
      'Analyzed 4 stocks: 4 succeeded, 0 failed. Recommendations: 2 Buy, 1 Hold, 1 Sell. Top pick: UMBRELLA (Buy, valuation score 80.0).'
    );
  });

  it('should keep entries and failures in input order', () => {
    const summary = summarizeBatch([
      failure('BADCO', FailureKind.RESEARCH_FAILED, 'All data sources failed for BADCO'),
      success('ACME', RecommendationAction.HOLD, 60),
      failure('NOPE', FailureKind.CANCELLED, 'Operation cancelled'),
      success('GLOBEX', RecommendationAction.SELL, 0),
    ]);

    expect(summary.total).toBe(4);
    expect(summary.successful).toBe(2);
    expect(summary.failed).toBe(2);
    expect(summary.entries).toEqual([
      { ticker: 'ACME', action: RecommendationAction.HOLD, score: 60 },
      { ticker: 'GLOBEX', action: RecommendationAction.SELL, score: 0 },
    ]);
    expect(summary.failures).toEqual([
      { ticker: 'BADCO', kind: FailureKind.RESEARCH_FAILED, reason: 'All data sources failed for BADCO' },
      { ticker: 'NOPE', kind: FailureKind.CANCELLED, reason: 'Operation cancelled' },
    ]);
    expect(summary.topPick).toBe('ACME');
  });

  it('should state no favorite when every action is the same', () => {
    const summary = summarizeBatch([
      success('ACME', RecommendationAction.HOLD, 60),
      success('GLOBEX', RecommendationAction.HOLD, 40),
    ]);

    expect(summary.topPick).toBeNull();
    expect(summary.note).toBe('All analyzed stocks are rated Hold; no clear favorite.');
    expect(summary.narrative).toBe(
      'Analyzed 2 stocks: 2 succeeded, 0 failed. Recommendations: 0 Buy, 2 Hold, 0 Sell. All analyzed stocks are rated Hold; no clear favorite.'
    );
  });

  it('should summarize a fully failed batch without throwing', () => {
    const summary = summarizeBatch([
      failure('BADCO', FailureKind.RESEARCH_FAILED, 'boom'),
      failure('NOPE', FailureKind.TICKER_NOT_FOUND, 'Ticker NOPE not found'),
    ]);

    expect(summary.successful).toBe(0);
    expect(summary.failed).toBe(2);
    expect(summary.topPick).toBeNull();
    expect(summary.narrative).toBe('Analyzed 2 stocks: 0 succeeded, 2 failed. No stock completed analysis.');
  });
});

describe('rankEntries', () => {
  it('should keep input order for equal action and score', () => {
    const ranked = rankEntries([
      { ticker: 'A', action: RecommendationAction.HOLD, score: 50 },
      { ticker: 'B', action: RecommendationAction.HOLD, score: 55 },
      { ticker: 'C', action: RecommendationAction.HOLD, score: 50 },
    ]);

    expect(ranked.map((entry) => entry.ticker)).toEqual(['B', 'A', 'C']);
  });
});
