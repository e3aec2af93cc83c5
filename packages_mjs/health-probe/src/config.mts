/**
 * Configuration utilities for health-probe
 */

import type { PostgresProbeConfig, RedisProbeConfig } from './types.mjs';

export const DEFAULT_POSTGRES_PROBE_CONFIG = {
  port: 5432,
  user: 'postgres',
  password: '',
  database: 'postgres',
  connectTimeoutMs: 2000,
  deadlineMs: 3000,
  closeTimeoutMs: 1000,
} satisfies Required<Omit<PostgresProbeConfig, 'logger'>>;

export const DEFAULT_REDIS_PROBE_CONFIG = {
  port: 6379,
  password: '',
  tls: false,
  connectTimeoutMs: 1000,
  deadlineMs: 3000,
  closeTimeoutMs: 1000,
} satisfies Required<Omit<RedisProbeConfig, 'logger'>>;

export class ProbeTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'ProbeTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Settle with the task, or reject with ProbeTimeoutError once timeoutMs
 * elapses. The timer is always cleared.
 */
export async function withDeadline<T>(
  task: () => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ProbeTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([task(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Turn a thrown value into a probe failure reason
 */
export function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return code && !error.message.includes(code) ? `${error.message} (${code})` : error.message;
  }
  return String(error);
}
