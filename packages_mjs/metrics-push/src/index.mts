/**
 * @hosts-sentinel/metrics-push
 * Counter pushes to a local metrics collector
 * Pure ESM module
 */

export * from './types.mjs';
export * from './reporter.mjs';
