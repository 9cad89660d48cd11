export * from './lib/errors';
export * from './lib/retry';
export * from './lib/cache';
export * from './lib/rate-limiter';
