/**
 * Metrics reporter - pushes counters to a local collector over HTTP/1.1
 */

import { request } from 'undici';
import type { Logger } from 'pino';
import type { FailureCount, MetricPayload, MetricsReporterConfig, Reporter } from './types.mjs';

export const SUCCESS_COUNTER = 'hosts_sentinel_pass_success';
export const FAILURE_COUNTER = 'hosts_sentinel_resolve_failure';

export class MetricsDeliveryError extends Error {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'MetricsDeliveryError';
    this.statusCode = statusCode;
  }
}

export function successPayload(): MetricPayload {
  return {
    type: 'counter',
    name: SUCCESS_COUNTER,
    description: 'Passes in which every monitored name resolved to a healthy address',
    labels: {},
    value: 1,
  };
}

export function failurePayload(failure: FailureCount): MetricPayload {
  return {
    type: 'counter',
    name: FAILURE_COUNTER,
    description: 'Monitored names without a healthy address, by cause',
    labels: { name: failure.name, reason: failure.reason },
    value: failure.count,
  };
}

/**
 * Metrics Reporter
 *
 * One POST per counter increment. Delivery problems are logged and never
 * retried or rethrown.
 *
 * @example
 * const reporter = new MetricsReporter({ port: 9102, logger });
 * await reporter.reportFailures([{ name: 'REDIS_HOST', reason: 'unhealthy', count: 1 }]);
 */
export class MetricsReporter implements Reporter {
  readonly url: string;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(config: MetricsReporterConfig) {
    const host = config.host ?? '127.0.0.1';
    this.url = `http://${host}:${config.port}${config.path ?? '/'}`;
    this.timeoutMs = config.timeoutMs ?? 2000;
    this.logger = config.logger;
  }

  /**
   * Push one counter increment
   *
   * @returns true when the collector answered 200
   */
  async increment(payload: MetricPayload): Promise<boolean> {
    try {
      const { statusCode, body } = await request(this.url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(payload),
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      await body.dump();

      if (statusCode !== 200) {
        throw new MetricsDeliveryError(`collector answered ${statusCode}`, statusCode);
      }
      return true;
    } catch (error) {
      this.logger?.warn({ err: error, metric: payload.name }, 'metrics push failed');
      return false;
    }
  }

  async reportSuccess(): Promise<void> {
    await this.increment(successPayload());
  }

  async reportFailures(failures: FailureCount[]): Promise<void> {
    for (const failure of failures) {
      await this.increment(failurePayload(failure));
    }
  }
}

/**
 * Reporter used when metrics are switched off
 */
export class NoopReporter implements Reporter {
  async reportSuccess(): Promise<void> {
    return undefined;
  }

  async reportFailures(): Promise<void> {
    return undefined;
  }
}

export function createReporter(config: MetricsReporterConfig | null): Reporter {
  return config ? new MetricsReporter(config) : new NoopReporter();
}
