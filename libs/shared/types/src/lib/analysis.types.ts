/**
 * Analysis Stage Types
 * Output of the deterministic scoring, classification and recommendation engines
 */

import {
  RecommendationAction,
  RiskLevel,
  SentimentLabel,
} from './enums';
import { MetricField } from './research.types';

export type FinancialMetrics = Readonly<Record<MetricField, number | null>>;

export interface MetricWarning {
  readonly field: MetricField;
  readonly rawValue: string;
  readonly message: string;
}

export interface ParsedMetrics {
  readonly metrics: FinancialMetrics;
  readonly missingFields: readonly MetricField[];
  readonly warnings: readonly MetricWarning[];
}

export type ScoreComponent =
  | { readonly status: 'scored'; readonly value: number; readonly points: number }
  | { readonly status: 'unavailable'; readonly value: null; readonly points: 0 };

export interface ValuationBreakdown {
  readonly peRatio: ScoreComponent;
  readonly revenueGrowth: ScoreComponent;
  readonly profitMargin: ScoreComponent;
}

export interface ValuationResult {
  readonly rawTotal: number; // sum of components, [-60, 60]
  readonly score: number; // rawTotal clamped to [0, 100]
  readonly breakdown: ValuationBreakdown;
}

export interface SentimentResult {
  readonly label: SentimentLabel;
  readonly confidence: number; // 0-100
  readonly positiveCount: number;
  readonly negativeCount: number;
  readonly neutralCount: number;
  readonly totalCount: number;
  readonly recentHeadlines: readonly string[];
}

export interface RiskAssessment {
  readonly level: RiskLevel;
  readonly score: number; // 0-100, higher = riskier
  readonly factors: readonly string[];
  readonly mitigationSuggestions: readonly string[];
}

export interface Recommendation {
  readonly action: RecommendationAction;
  readonly confidence: number; // 0-100
  readonly reasoning: string;
  readonly timeHorizon: string;
  readonly keyPoints: readonly string[];
}

export interface AnalysisResult {
  readonly ticker: string;
  readonly analyzedAt: string;
  readonly metrics: FinancialMetrics;
  readonly missingFields: readonly MetricField[];
  readonly warnings: readonly MetricWarning[];
  readonly valuation: ValuationResult;
  readonly sentiment: SentimentResult;
  readonly risk: RiskAssessment;
  readonly recommendation: Recommendation;
}
