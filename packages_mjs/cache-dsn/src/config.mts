/**
 * Configuration utilities for cache-dsn
 */

import { isIP } from 'node:net';
import type { DnsResolverConfig, PriorityFilterSpec, RecencyCacheConfig } from './types.mjs';

export const MIN_PRIORITY = 0;
export const MAX_PRIORITY = 65535;

/**
 * Default resolver configuration
 */
export const DEFAULT_DNS_RESOLVER_CONFIG: Required<Omit<DnsResolverConfig, 'servers'>> = {
  timeoutMs: 2000,
  tries: 1,
};

/**
 * Default recency cache configuration
 */
export const DEFAULT_RECENCY_CACHE_CONFIG: Required<Omit<RecencyCacheConfig, 'id' | 'name'>> = {
  maxAgeMs: 30 * 60 * 1000, // 30 minutes
  now: () => Date.now(),
};

/**
 * Accepts every priority an SRV record can carry
 */
export const DEFAULT_PRIORITY_FILTER: PriorityFilterSpec = {
  min: MIN_PRIORITY,
  max: MAX_PRIORITY,
};

export class InvalidPriorityRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPriorityRangeError';
  }
}

/**
 * Merge user config with defaults
 */
export function mergeConfig(config: RecencyCacheConfig): Required<RecencyCacheConfig> {
  return {
    id: config.id,
    name: config.name,
    maxAgeMs: config.maxAgeMs ?? DEFAULT_RECENCY_CACHE_CONFIG.maxAgeMs,
    now: config.now ?? DEFAULT_RECENCY_CACHE_CONFIG.now,
  };
}

/**
 * An entry is stale once it has gone unseen for strictly longer than maxAgeMs
 */
export function isStale(lastSeen: number, maxAgeMs: number, now: number = Date.now()): boolean {
  return now - lastSeen > maxAgeMs;
}

/**
 * Validate an inclusive priority window
 *
 * @throws InvalidPriorityRangeError when a bound is not an integer in
 * [0, 65535] or when min > max
 */
export function validatePriorityFilter(spec: PriorityFilterSpec): PriorityFilterSpec {
  for (const [label, value] of [
    ['min', spec.min],
    ['max', spec.max],
  ] as const) {
    if (!Number.isInteger(value) || value < MIN_PRIORITY || value > MAX_PRIORITY) {
      throw new InvalidPriorityRangeError(
        `Priority ${label} must be an integer in [${MIN_PRIORITY}, ${MAX_PRIORITY}], got ${value}`
      );
    }
  }

  if (spec.min > spec.max) {
    throw new InvalidPriorityRangeError(
      `Priority min (${spec.min}) must not exceed max (${spec.max})`
    );
  }

  return Object.freeze({ min: spec.min, max: spec.max });
}

/**
 * True when the value is an IPv4 or IPv6 literal
 */
export function isIpLiteral(value: string): boolean {
  return isIP(value) !== 0;
}

/**
 * DNS error codes that mean the name has no records of the queried type
 */
export const EMPTY_ANSWER_CODES: ReadonlySet<string> = new Set(['ENODATA', 'ENOTFOUND']);

/**
 * True when a rejected query only reported an empty answer
 */
export function isEmptyAnswer(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    EMPTY_ANSWER_CODES.has(error.code)
  );
}

/**
 * De-duplicate while keeping first-occurrence order
 */
export function uniqueAddresses(addresses: Iterable<string>): string[] {
  return Array.from(new Set(addresses));
}

/**
 * Wrap any thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export default {
  DEFAULT_DNS_RESOLVER_CONFIG,
  DEFAULT_RECENCY_CACHE_CONFIG,
  DEFAULT_PRIORITY_FILTER,
  mergeConfig,
  isStale,
  validatePriorityFilter,
  isIpLiteral,
  uniqueAddresses,
  toError,
};
