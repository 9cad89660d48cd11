import { FinancialMetrics } from '@equity-research/shared/types';
import { ValuationScorer } from './valuation.scorer';

const metrics = (overrides: Partial<FinancialMetrics>): FinancialMetrics => ({
  peRatio: null,
  marketCap: null,
  revenue: null,
  earnings: null,
  profitMargin: null,
  revenueGrowth: null,
  ...overrides,
});

describe('ValuationScorer', () => {
  const scorer = new ValuationScorer();

  describe('PE ratio buckets', () => {
    it.each([
      [-5, 25],
      [11.99, 25],
      [12, 15],
      [17.99, 15],
      [18, 5],
      [25, -10],
      [34.99, -10],
      [35, -25],
      [80, -25],
    ])('PE %p scores %p', (pe, points) => {
      expect(scorer.score(metrics({ peRatio: pe })).breakdown.peRatio.points).toBe(points);
    });
  });

  describe('revenue growth buckets', () => {
    it.each([
      [25, 20],
      [20, 10],
      [10, 10],
      [9.99, 5],
      [5, 5],
      [3, 0],
      [0, 0],
      [-0.1, -20],
    ])('growth %p%% scores %p', (growth, points) => {
      expect(scorer.score(metrics({ revenueGrowth: growth })).breakdown.revenueGrowth.points).toBe(points);
    });
  });

  describe('profit margin buckets', () => {
    it.each([
      [30, 15],
      [25, 8],
      [15, 8],
      [14.99, 3],
      [8, 3],
      [6, 0],
      [5, 0],
      [4.99, -15],
    ])('margin %p%% scores %p', (margin, points) => {
      expect(scorer.score(metrics({ profitMargin: margin })).breakdown.profitMargin.points).toBe(points);
    });
  });

  it('should mark absent metrics unavailable and contribute nothing', () => {
    const result = scorer.score(metrics({}));

    expect(result).toEqual({
      rawTotal: 0,
      score: 0,
      breakdown: {
        peRatio: { status: 'unavailable', value: null, points: 0 },
        revenueGrowth: { status: 'unavailable', value: null, points: 0 },
        profitMargin: { status: 'unavailable', value: null, points: 0 },
      },
    });
  });

  it('should sum the best buckets', () => {
    const result = scorer.score(metrics({ peRatio: 10, revenueGrowth: 25, profitMargin: 30 }));

    expect(result.rawTotal).toBe(60);
    expect(result.score).toBe(60);
  });

  it('should clamp a negative total to zero', () => {
    const result = scorer.score(metrics({ peRatio: 40, revenueGrowth: -5, profitMargin: 2 }));

    expect(result.rawTotal).toBe(-60);
    expect(result.score).toBe(0);
  });

  it('should follow the bucket table for a richly valued, slower-growing company', () => {
    const result = scorer.score(metrics({ peRatio: 37.33, revenueGrowth: 7.9, profitMargin: 26.92 }));

    expect(result.breakdown.peRatio).toEqual({ status: 'scored', value: 37.33, points: -25 });
    expect(result.breakdown.revenueGrowth).toEqual({ status: 'scored', value: 7.9, points: 5 });
    expect(result.breakdown.profitMargin).toEqual({ status: 'scored', value: 26.92, points: 15 });
    expect(result.rawTotal).toBe(-5);
    expect(result.score).toBe(0);
  });

  it('should ignore non-scored metrics', () => {
    const result = scorer.score(metrics({ peRatio: 15, marketCap: 1e12, revenue: 5e9 }));

    expect(result.rawTotal).toBe(15);
  });
});
