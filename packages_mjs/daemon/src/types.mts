/**
 * Type definitions for the daemon
 */

import type { Logger } from 'pino';
import type { HealthGate, PriorityFilterSpec, RecencyCache } from '@hosts-sentinel/cache-dsn';
import type { HostsMapping, ReconcileResult } from '@hosts-sentinel/hosts-file';
import type { FailureCount, Reporter } from '@hosts-sentinel/metrics-push';

export type Protocol = 'postgres' | 'redis';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/**
 * A monitored variable whose value is a name to keep resolved
 */
export interface MonitoredTarget {
  /** Environment variable name, e.g. POSTGRES_HOST */
  name: string;
  /** Hostname written to the hosts file */
  hostname: string;
  protocol: Protocol;
  /** SRV name to resolve instead of the hostname */
  srv?: string;
  priority: PriorityFilterSpec;
}

export interface SkippedVariable {
  name: string;
  reason: 'unset' | 'ip-literal';
  value?: string;
}

export interface AppConfig {
  hostsFile: string;
  intervalMs: number;
  /** null switches metrics off */
  metricsPort: number | null;
  dnsServers: string[];
  postgres: { port: number; user: string; password: string; database: string };
  redis: { port: number; password: string; tls: boolean };
  log: { level: LogLevel; pretty: boolean };
  targets: MonitoredTarget[];
  skipped: SkippedVariable[];
}

/**
 * Per-variable state: the recency cache and the gate wrapped around it
 */
export interface MonitoredVariable {
  name: string;
  hostname: string;
  cache: RecencyCache;
  gate: HealthGate;
}

export type FailureReason = 'unresolved' | 'unhealthy' | 'error' | 'pass';

/**
 * What the orchestrator needs from the hosts file
 */
export interface HostsReconciler {
  reconcile(mappings: HostsMapping[]): Promise<ReconcileResult>;
}

export interface OrchestratorConfig {
  variables: MonitoredVariable[];
  hosts: HostsReconciler;
  reporter: Reporter;
  logger: Logger;
  /** Delay between passes (ms). Default: 30000 */
  intervalMs?: number;
}

export interface PassReport {
  healthy: HostsMapping[];
  failures: FailureCount[];
  changed: string[];
  written: boolean;
  durationMs: number;
}
