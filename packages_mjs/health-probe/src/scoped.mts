/**
 * Scoped probe execution: acquire a fresh client, run one roundtrip under a
 * deadline, release the client on every exit path
 */

import type { Logger } from 'pino';
import type { ProbeResult } from './types.mjs';
import { describeFailure, withDeadline } from './config.mjs';

export interface ScopedProbeOptions<C> {
  /** Used in timeout messages and logs, e.g. "postgres 10.0.0.5" */
  label: string;
  acquire: () => C;
  roundtrip: (client: C) => Promise<ProbeResult>;
  release: (client: C) => Promise<void> | void;
  deadlineMs: number;
  closeTimeoutMs: number;
  logger?: Logger;
}

export async function runScopedProbe<C>(options: ScopedProbeOptions<C>): Promise<ProbeResult> {
  const { label, acquire, roundtrip, release, deadlineMs, closeTimeoutMs, logger } = options;
  let client: C | undefined;

  try {
    const acquired = acquire();
    client = acquired;
    return await withDeadline(() => roundtrip(acquired), deadlineMs, label);
  } catch (error) {
    return { healthy: false, reason: describeFailure(error) };
  } finally {
    if (client !== undefined) {
      const held = client;
      try {
        await withDeadline(async () => release(held), closeTimeoutMs, `${label} close`);
      } catch (error) {
        logger?.debug({ err: error }, `${label}: releasing connection failed`);
      }
    }
  }
}
