export * from './test-utils/research-config.fixture';
