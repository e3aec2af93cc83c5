/**
 * Type definitions for metrics-push
 */

import type { Logger } from 'pino';

/**
 * Body of one push, as the local collector expects it
 */
export interface MetricPayload {
  type: 'counter';
  name: string;
  description: string;
  labels: Record<string, string>;
  value: number;
}

/**
 * Failures accumulated during a pass for one monitored name. An empty name
 * marks a failure not tied to any name.
 */
export interface FailureCount {
  name: string;
  reason: string;
  count: number;
}

export interface MetricsReporterConfig {
  /** Collector port on the local host */
  port: number;
  /** Default: 127.0.0.1 */
  host?: string;
  /** Default: / */
  path?: string;
  /** Upper bound for one push (ms). Default: 2000 */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * What the orchestrator needs from a reporter
 */
export interface Reporter {
  reportSuccess(): Promise<void>;
  reportFailures(failures: FailureCount[]): Promise<void>;
}
