export * from './lib/financial-metrics.parser';
export * from './lib/valuation.scorer';
export * from './lib/sentiment.classifier';
export * from './lib/risk.assessor';
export * from './lib/recommendation.engine';
export * from './lib/analysis.module';
