export * from './lib/enums';
export * from './lib/research.types';
export * from './lib/analysis.types';
export * from './lib/report.types';
export * from './lib/session.types';
export * from './lib/research-events.types';
