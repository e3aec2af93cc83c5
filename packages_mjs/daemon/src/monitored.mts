/**
 * Builds the per-variable cache and gate pairs and forwards their events to
 * the logger
 */

import type { Logger } from 'pino';
import {
  HealthGate,
  NameResolver,
  PriorityFilter,
  RecencyCache,
  ServiceRecordResolver,
  type DnsBackend,
  type HealthProbe,
} from '@hosts-sentinel/cache-dsn';
import type { MonitoredTarget, MonitoredVariable, Protocol } from './types.mjs';

export type ProbeSet = Record<Protocol, HealthProbe>;

export interface MonitoredVariableDeps {
  dns: DnsBackend;
  probes: ProbeSet;
  /** Clock for the recency window */
  now?: () => number;
}

export function buildMonitoredVariable(
  target: MonitoredTarget,
  deps: MonitoredVariableDeps
): MonitoredVariable {
  const resolver = target.srv
    ? new ServiceRecordResolver(new PriorityFilter(target.priority), deps.dns)
    : new NameResolver(deps.dns);

  const cache = new RecencyCache(
    {
      id: target.name,
      name: target.srv ?? target.hostname,
      ...(deps.now ? { now: deps.now } : {}),
    },
    resolver
  );

  return {
    name: target.name,
    hostname: target.hostname,
    cache,
    gate: new HealthGate(cache, deps.probes[target.protocol]),
  };
}

export function buildMonitoredVariables(
  targets: MonitoredTarget[],
  deps: MonitoredVariableDeps
): MonitoredVariable[] {
  return targets.map((target) => buildMonitoredVariable(target, deps));
}

/**
 * Subscribe the logger to a variable's cache and gate events
 *
 * @returns unsubscribe function
 */
export function logVariableEvents(variable: MonitoredVariable, logger: Logger): () => void {
  const log = logger.child({ variable: variable.name });

  const offCache = variable.cache.on((event) => {
    switch (event.type) {
      case 'cache:insert':
        log.info({ address: event.address }, 'new address seen');
        break;
      case 'cache:refresh':
        log.trace({ address: event.address }, 'address seen again');
        break;
      case 'cache:evicted':
        log.info({ address: event.address, idleMs: event.idleMs }, 'address evicted');
        break;
      case 'resolve:success':
        log.debug(
          { name: event.name, addressCount: event.addressCount, durationMs: event.durationMs },
          'resolved'
        );
        break;
      case 'resolve:error':
        log.warn({ name: event.name, err: event.error }, 'resolution failed');
        break;
    }
  });

  const offGate = variable.gate.on((event) => {
    switch (event.type) {
      case 'health:check':
        if (event.result.healthy) {
          log.debug({ address: event.address, durationMs: event.durationMs }, 'probe passed');
        } else {
          log.debug(
            { address: event.address, durationMs: event.durationMs, reason: event.result.reason },
            'probe failed'
          );
        }
        break;
      case 'health:changed':
        log.info({ address: event.address, previous: event.previous }, 'healthy address changed');
        break;
    }
  });

  return () => {
    offCache();
    offGate();
  };
}
