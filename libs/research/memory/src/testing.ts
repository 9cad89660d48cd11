export * from './test-utils/report.fixture';
