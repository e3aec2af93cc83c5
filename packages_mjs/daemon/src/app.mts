/**
 * Assemble the daemon from its configuration
 */

import type { Logger } from 'pino';
import { createDnsBackend, type DnsBackend } from '@hosts-sentinel/cache-dsn';
import { createPostgresProbe, createRedisProbe } from '@hosts-sentinel/health-probe';
import { HostsFileWriter } from '@hosts-sentinel/hosts-file';
import { createReporter, type Reporter } from '@hosts-sentinel/metrics-push';
import { buildMonitoredVariables, logVariableEvents, type ProbeSet } from './monitored.mjs';
import { Orchestrator } from './orchestrator.mjs';
import type { AppConfig, HostsReconciler } from './types.mjs';

/**
 * Replacements for the real network and file dependencies
 */
export interface DaemonOverrides {
  dns?: DnsBackend;
  probes?: ProbeSet;
  hosts?: HostsReconciler;
  reporter?: Reporter;
  now?: () => number;
}

export function createProbes(config: AppConfig, logger: Logger): ProbeSet {
  return {
    postgres: createPostgresProbe({ ...config.postgres, logger }),
    redis: createRedisProbe({ ...config.redis, logger }),
  };
}

/**
 * Build the orchestrator, logging each skipped variable once
 */
export function createDaemon(
  config: AppConfig,
  logger: Logger,
  overrides: DaemonOverrides = {}
): Orchestrator {
  for (const skipped of config.skipped) {
    if (skipped.reason === 'ip-literal') {
      logger.info({ variable: skipped.name, value: skipped.value }, 'address literal, not monitored');
    } else {
      logger.warn({ variable: skipped.name }, 'variable unset, not monitored');
    }
  }

  const variables = buildMonitoredVariables(config.targets, {
    dns: overrides.dns ?? createDnsBackend({ servers: config.dnsServers }),
    probes: overrides.probes ?? createProbes(config, logger),
    ...(overrides.now ? { now: overrides.now } : {}),
  });

  for (const variable of variables) {
    logVariableEvents(variable, logger);
  }

  logger.info(
    { variables: variables.map((v) => v.name), hostsFile: config.hostsFile },
    'monitoring'
  );

  return new Orchestrator({
    variables,
    hosts: overrides.hosts ?? new HostsFileWriter({ path: config.hostsFile }),
    reporter:
      overrides.reporter ??
      createReporter(config.metricsPort === null ? null : { port: config.metricsPort, logger }),
    logger,
    intervalMs: config.intervalMs,
  });
}
