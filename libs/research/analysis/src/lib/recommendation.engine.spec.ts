import {
  RecommendationAction,
  RiskAssessment,
  RiskLevel,
  SentimentLabel,
  SentimentResult,
} from '@equity-research/shared/types';
import { RecommendationEngine, actionFor } from './recommendation.engine';

const sentiment = (label: SentimentLabel): SentimentResult => ({
  label,
  confidence: 100,
  positiveCount: 0,
  negativeCount: 0,
  neutralCount: 0,
  totalCount: 0,
  recentHeadlines: [],
});

const risk = (level: RiskLevel): RiskAssessment => ({
  level,
  score: 0,
  factors: [],
  mitigationSuggestions: [],
});

describe('RecommendationEngine', () => {
  const engine = new RecommendationEngine();

  describe('actionFor', () => {
    it.each([
      [75, RecommendationAction.BUY],
      [70.1, RecommendationAction.BUY],
      [70, RecommendationAction.HOLD],
      [60, RecommendationAction.HOLD],
      [45, RecommendationAction.HOLD],
      [35, RecommendationAction.HOLD],
      [34.9, RecommendationAction.SELL],
      [20, RecommendationAction.SELL],
    ])('score %p maps to %p', (score, action) => {
      expect(actionFor(score)).toBe(action);
    });
  });

  it('should raise confidence when sentiment agrees with a bullish score', () => {
    const result = engine.recommend(60, sentiment(SentimentLabel.POSITIVE), risk(RiskLevel.LOW));

    expect(result).toEqual({
      action: RecommendationAction.HOLD,
      confidence: 70,
      reasoning: 'Valuation score 60.0: Hold signal. Sentiment: positive, Risk: low.',
      timeHorizon: 'long-term (1+ years)',
      keyPoints: ['Valuation: 60.0/100', 'Sentiment: positive', 'Risk: low'],
    });
  });

  it('should lower confidence when sentiment disagrees and risk is medium', () => {
    const result = engine.recommend(60, sentiment(SentimentLabel.NEGATIVE), risk(RiskLevel.MEDIUM));

    expect(result.confidence).toBe(45);
    expect(result.timeHorizon).toBe('medium-term (6-12 months)');
  });

  it('should treat negative sentiment as agreeing with a bearish score', () => {
    const result = engine.recommend(20, sentiment(SentimentLabel.NEGATIVE), risk(RiskLevel.HIGH));

    expect(result.action).toBe(RecommendationAction.SELL);
    expect(result.confidence).toBe(75);
    expect(result.timeHorizon).toBe('short-term (< 6 months)');
  });

  it('should not adjust for sentiment at the midpoint', () => {
    expect(engine.recommend(50, sentiment(SentimentLabel.POSITIVE), risk(RiskLevel.LOW)).confidence).toBe(50);
  });

  it('should not adjust for neutral sentiment', () => {
    expect(engine.recommend(80, sentiment(SentimentLabel.NEUTRAL), risk(RiskLevel.LOW)).confidence).toBe(80);
  });

  it('should clamp confidence to 100', () => {
    const result = engine.recommend(0, sentiment(SentimentLabel.NEGATIVE), risk(RiskLevel.LOW));

    expect(result.confidence).toBe(100);
    expect(result.reasoning).toBe('Valuation score 0.0: Sell signal. Sentiment: negative, Risk: low.');
  });
});
