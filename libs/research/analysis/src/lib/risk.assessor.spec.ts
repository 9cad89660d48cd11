import {
  RiskLevel,
  SentimentLabel,
  SentimentResult,
  ValuationResult,
} from '@equity-research/shared/types';
import { RiskAssessor, riskLevelFor } from './risk.assessor';

const valuation = (score: number): ValuationResult => ({
  rawTotal: score,
  score,
  breakdown: {
    peRatio: { status: 'unavailable', value: null, points: 0 },
    revenueGrowth: { status: 'unavailable', value: null, points: 0 },
    profitMargin: { status: 'unavailable', value: null, points: 0 },
  },
});

const sentiment = (label: SentimentLabel, confidence: number): SentimentResult => ({
  label,
  confidence,
  positiveCount: 0,
  negativeCount: 0,
  neutralCount: 0,
  totalCount: 0,
  recentHeadlines: [],
});

describe('RiskAssessor', () => {
  const assessor = new RiskAssessor();

  it('should rate a well-valued stock with positive news as low risk', () => {
    const result = assessor.assess(valuation(60), sentiment(SentimentLabel.POSITIVE, 80), []);

    expect(result).toEqual({
      level: RiskLevel.LOW,
      score: 20,
      factors: [],
      mitigationSuggestions: ['Continue regular monitoring'],
    });
  });

  it('should rate weak valuation with negative news as high risk', () => {
    const result = assessor.assess(valuation(0), sentiment(SentimentLabel.NEGATIVE, 100), []);

    expect(result.score).toBe(70);
    expect(result.level).toBe(RiskLevel.HIGH);
    expect(result.factors).toEqual(['Weak valuation profile (score 0.0/100)', 'Negative news sentiment']);
    expect(result.mitigationSuggestions).toEqual([
      'Consider smaller position size',
      'Use stop-loss orders',
      'Diversify across multiple stocks',
    ]);
  });

  it('should add penalties for uncertain sentiment and each missing field', () => {
    const result = assessor.assess(valuation(30), sentiment(SentimentLabel.NEUTRAL, 40), ['peRatio', 'revenue']);

    expect(result.score).toBe(65);
    expect(result.level).toBe(RiskLevel.MEDIUM);
    expect(result.factors).toEqual([
      'Weak valuation profile (score 30.0/100)',
      'Mixed or uncertain market sentiment',
      'Incomplete fundamentals: missing peRatio, revenue',
    ]);
    expect(result.mitigationSuggestions).toEqual(['Monitor regularly', 'Maintain balanced portfolio']);
  });

  it('should round the score to an integer', () => {
    const result = assessor.assess(valuation(15), sentiment(SentimentLabel.POSITIVE, 100), []);

    expect(result.score).toBe(43);
  });

  it('should clamp the score at 100', () => {
    const result = assessor.assess(valuation(0), sentiment(SentimentLabel.NEGATIVE, 40), [
      'peRatio',
      'marketCap',
      'revenue',
      'earnings',
      'profitMargin',
      'revenueGrowth',
    ]);

    expect(result.score).toBe(100);
  });

  describe('riskLevelFor', () => {
    it.each([
      [0, RiskLevel.LOW],
      [33, RiskLevel.LOW],
      [34, RiskLevel.MEDIUM],
      [66, RiskLevel.MEDIUM],
      [67, RiskLevel.HIGH],
      [100, RiskLevel.HIGH],
    ])('score %p is %p', (score, level) => {
      expect(riskLevelFor(score)).toBe(level);
    });
  });
});
