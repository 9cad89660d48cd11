export * from './lib/stages/research.stage';
export * from './lib/stages/analysis.stage';
export * from './lib/stages/report.builder';
export * from './lib/stages/report.stage';
export * from './lib/research-pipeline.service';
export * from './lib/batch-summary';
export * from './lib/batch-coordinator.service';
export * from './lib/research.service';
export * from './lib/activity-log.service';
export * from './lib/research-pipeline.module';
