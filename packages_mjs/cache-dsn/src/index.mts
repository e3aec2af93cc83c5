/**
 * @hosts-sentinel/cache-dsn
 * Name and SRV resolution, recency-windowed address tracking and health-gated selection
 * Pure ESM module
 */

// Type exports
export * from './types.mjs';

// Config exports
export * from './config.mjs';
export { default as config } from './config.mjs';

// Store exports
export * from './stores/index.mjs';

// Resolvers
export * from './priority-filter.mjs';
export * from './resolver.mjs';

// Cache and gate
export * from './recency-cache.mjs';
export * from './health-gate.mjs';
export { RecencyCache as default } from './recency-cache.mjs';
