import { Injectable } from '@nestjs/common';
import {
  MetricField,
  RiskAssessment,
  RiskLevel,
  SentimentLabel,
  SentimentResult,
  ValuationResult,
} from '@equity-research/shared/types';
import { clamp } from './valuation.scorer';

const SENTIMENT_PENALTY: Record<SentimentLabel, number> = {
  [SentimentLabel.NEGATIVE]: 20,
  [SentimentLabel.NEUTRAL]: 10,
  [SentimentLabel.POSITIVE]: 0,
};
const UNCERTAINTY_PENALTY = 10;
const UNCERTAIN_CONFIDENCE_BELOW = 50;
const MISSING_FIELD_PENALTY = 5;
const WEAK_VALUATION_BELOW = 35;

const MITIGATION: Record<RiskLevel, string[]> = {
  [RiskLevel.HIGH]: [
    'Consider smaller position size',
    'Use stop-loss orders',
    'Diversify across multiple stocks',
  ],
  [RiskLevel.MEDIUM]: ['Monitor regularly', 'Maintain balanced portfolio'],
  [RiskLevel.LOW]: ['Continue regular monitoring'],
};

export function riskLevelFor(score: number): RiskLevel {
  if (score < 34) return RiskLevel.LOW;
  if (score < 67) return RiskLevel.MEDIUM;
  return RiskLevel.HIGH;
}

/**
 * Risk score (0-100, higher is riskier) from inverse valuation, sentiment
 * polarity, sentiment certainty and data completeness.
 */
@Injectable()
export class RiskAssessor {
  assess(
    valuation: ValuationResult,
    sentiment: SentimentResult,
    missingFields: readonly MetricField[]
  ): RiskAssessment {
    const uncertain = sentiment.confidence < UNCERTAIN_CONFIDENCE_BELOW;

    const rawScore =
      0.5 * (100 - valuation.score) +
      SENTIMENT_PENALTY[sentiment.label] +
      (uncertain ? UNCERTAINTY_PENALTY : 0) +
      MISSING_FIELD_PENALTY * missingFields.length;

    const score = clamp(Math.round(rawScore), 0, 100);
    const level = riskLevelFor(score);

    const factors: string[] = [];
    if (valuation.score < WEAK_VALUATION_BELOW) {
      factors.push(`Weak valuation profile (score ${valuation.score.toFixed(1)}/100)`);
    }
    if (sentiment.label === SentimentLabel.NEGATIVE) {
      factors.push('Negative news sentiment');
    }
    if (uncertain) {
      factors.push('Mixed or uncertain market sentiment');
    }
    if (missingFields.length > 0) {
      factors.push(`Incomplete fundamentals: missing ${missingFields.join(', ')}`);
    }

    return {
      level,
      score,
      factors,
      mitigationSuggestions: [...MITIGATION[level]],
    };
  }
}
