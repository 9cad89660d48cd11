export * from './test-utils/fake-providers';
