/**
 * @hosts-sentinel/hosts-file
 * Hosts file parsing and change-only rewriting
 * Pure ESM module
 */

export * from './types.mjs';
export * from './parser.mjs';
export * from './writer.mjs';
