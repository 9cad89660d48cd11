import { Module } from '@nestjs/common';
import { FinancialMetricsParser } from './financial-metrics.parser';
import { ValuationScorer } from './valuation.scorer';
import { SentimentClassifier } from './sentiment.classifier';
import { RiskAssessor } from './risk.assessor';
import { RecommendationEngine } from './recommendation.engine';

const ENGINES = [
  FinancialMetricsParser,
  ValuationScorer,
  SentimentClassifier,
  RiskAssessor,
  RecommendationEngine,
];

@Module({
  providers: ENGINES,
  exports: ENGINES,
})
export class AnalysisModule {}
