/**
 * @hosts-sentinel/daemon
 * Keeps hosts-file entries for monitored names pointed at healthy addresses
 * Pure ESM module
 */

export * from './types.mjs';
export * from './config.mjs';
export * from './logger.mjs';
export * from './monitored.mjs';
export * from './orchestrator.mjs';
export * from './app.mjs';
export * from './cli.mjs';
