import { Injectable } from '@nestjs/common';
import {
  Recommendation,
  RecommendationAction,
  RiskAssessment,
  RiskLevel,
  SentimentLabel,
  SentimentResult,
} from '@equity-research/shared/types';
import { clamp } from './valuation.scorer';

const SENTIMENT_ALIGNMENT_BONUS = 10;

const RISK_ADJUSTMENT: Record<RiskLevel, number> = {
  [RiskLevel.LOW]: 0,
  [RiskLevel.MEDIUM]: -5,
  [RiskLevel.HIGH]: -15,
};

const TIME_HORIZON: Record<RiskLevel, string> = {
  [RiskLevel.LOW]: 'long-term (1+ years)',
  [RiskLevel.MEDIUM]: 'medium-term (6-12 months)',
  [RiskLevel.HIGH]: 'short-term (< 6 months)',
};

export function actionFor(valuationScore: number): RecommendationAction {
  if (valuationScore > 70) return RecommendationAction.BUY;
  if (valuationScore >= 35) return RecommendationAction.HOLD;
  return RecommendationAction.SELL;
}

@Injectable()
export class RecommendationEngine {
  recommend(valuationScore: number, sentiment: SentimentResult, risk: RiskAssessment): Recommendation {
    const action = actionFor(valuationScore);

    const base = 50 + Math.abs(valuationScore - 50);
    const confidence = clamp(
      base + this.sentimentAdjustment(valuationScore, sentiment.label) + RISK_ADJUSTMENT[risk.level],
      0,
      100
    );

    const score = valuationScore.toFixed(1);

    return {
      action,
      confidence: Math.round(confidence * 100) / 100,
      reasoning: `Valuation score ${score}: ${action} signal. Sentiment: ${sentiment.label}, Risk: ${risk.level}.`,
      timeHorizon: TIME_HORIZON[risk.level],
      keyPoints: [`Valuation: ${score}/100`, `Sentiment: ${sentiment.label}`, `Risk: ${risk.level}`],
    };
  }

  /**
   * +10 when sentiment points the same way as the valuation (above 50 bullish,
   * below 50 bearish), -10 when it points the other way. Neutral or a score of
   * exactly 50 leaves confidence unchanged.
   */
  private sentimentAdjustment(valuationScore: number, label: SentimentLabel): number {
    if (label === SentimentLabel.NEUTRAL || valuationScore === 50) {
      return 0;
    }

    const bullish = valuationScore > 50;
    const agrees = bullish === (label === SentimentLabel.POSITIVE);
    return agrees ? SENTIMENT_ALIGNMENT_BONUS : -SENTIMENT_ALIGNMENT_BONUS;
  }
}
