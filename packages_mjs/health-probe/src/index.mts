/**
 * @hosts-sentinel/health-probe
 * One-shot PostgreSQL and Redis reachability probes with typed results
 * Pure ESM module
 */

export * from './types.mjs';
export * from './config.mjs';
export * from './scoped.mjs';
export * from './postgres.mjs';
export * from './redis.mjs';
