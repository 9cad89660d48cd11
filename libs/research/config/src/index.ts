export * from './lib/research.config';
