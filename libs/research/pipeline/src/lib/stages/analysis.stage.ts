import { Injectable, Logger } from '@nestjs/common';
import { AnalysisResult, ResearchRecord } from '@equity-research/shared/types';
import {
  FinancialMetricsParser,
  RecommendationEngine,
  RiskAssessor,
  SentimentClassifier,
  ValuationScorer,
} from '@equity-research/research/analysis';

/**
 * Deterministic composition of the analysis engines. Degraded input is
 * absorbed into missing fields and warnings.
 */
@Injectable()
export class AnalysisStage {
  private readonly logger = new Logger(AnalysisStage.name);

  constructor(
    private readonly parser: FinancialMetricsParser,
    private readonly valuationScorer: ValuationScorer,
    private readonly sentimentClassifier: SentimentClassifier,
    private readonly riskAssessor: RiskAssessor,
    private readonly recommendationEngine: RecommendationEngine
  ) {}

  run(record: ResearchRecord): AnalysisResult {
    const { metrics, missingFields, warnings } = this.parser.parse(record.rawMetrics, record.ticker);
    const valuation = this.valuationScorer.score(metrics);
    const sentiment = this.sentimentClassifier.classify(record.news);
    const risk = this.riskAssessor.assess(valuation, sentiment, missingFields);
    const recommendation = this.recommendationEngine.recommend(valuation.score, sentiment, risk);

    this.logger.log(
      `${record.ticker}: valuation ${valuation.score} (raw ${valuation.rawTotal}), sentiment ${sentiment.label}, risk ${risk.level}, ${recommendation.action}`
    );

    return {
      ticker: record.ticker,
      analyzedAt: new Date().toISOString(),
      metrics,
      missingFields,
      warnings,
      valuation,
      sentiment,
      risk,
      recommendation,
    };
  }
}
