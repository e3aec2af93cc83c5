/**
 * Orchestrator - one resolution pass over every monitored variable, repeated
 * on a fixed interval
 */

import type { Logger } from 'pino';
import { toError, uniqueAddresses } from '@hosts-sentinel/cache-dsn';
import type { HostsMapping } from '@hosts-sentinel/hosts-file';
import type { FailureCount, Reporter } from '@hosts-sentinel/metrics-push';
import { PASS_INTERVAL_MS } from './config.mjs';
import type {
  FailureReason,
  HostsReconciler,
  MonitoredVariable,
  OrchestratorConfig,
  PassReport,
} from './types.mjs';

/**
 * Merge mappings that share a hostname, keeping first-seen order
 */
export function mergeMappings(mappings: HostsMapping[]): HostsMapping[] {
  const merged = new Map<string, string[]>();

  for (const { hostname, addresses } of mappings) {
    merged.set(hostname, uniqueAddresses([...(merged.get(hostname) ?? []), ...addresses]));
  }

  return [...merged].map(([hostname, addresses]) => ({ hostname, addresses }));
}

/**
 * Orchestrator
 *
 * Variables are processed strictly in order and a failure on one never stops
 * the others. The hosts file is reconciled once per pass, after every
 * variable has been looked at.
 *
 * @example
 * const orchestrator = new Orchestrator({ variables, hosts, reporter, logger });
 * orchestrator.start();
 * process.once('SIGTERM', () => orchestrator.stop());
 */
export class Orchestrator {
  private readonly variables: MonitoredVariable[];
  private readonly hosts: HostsReconciler;
  private readonly reporter: Reporter;
  private readonly logger: Logger;
  readonly intervalMs: number;
  private timer: ReturnType<typeof setTimeout> | undefined;
  private running = false;
  private current: Promise<PassReport> | undefined;

  constructor(config: OrchestratorConfig) {
    this.variables = config.variables;
    this.hosts = config.hosts;
    this.reporter = config.reporter;
    this.logger = config.logger;
    this.intervalMs = config.intervalMs ?? PASS_INTERVAL_MS;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async runPass(): Promise<PassReport> {
    const startTime = Date.now();
    const healthy: HostsMapping[] = [];
    const failures = new Map<string, FailureCount>();
    let changed: string[] = [];
    let written = false;

    const fail = (name: string, reason: FailureReason) => {
      const key = `${name}\u0000${reason}`;
      const entry = failures.get(key);
      if (entry) {
        entry.count++;
      } else {
        failures.set(key, { name, reason, count: 1 });
      }
    };

    try {
      for (const variable of this.variables) {
        const log = this.logger.child({ variable: variable.name, hostname: variable.hostname });

        try {
          const result = await variable.gate.firstHealthy();

          switch (result.kind) {
            case 'fresh':
              healthy.push({ hostname: variable.hostname, addresses: [result.address] });
              break;
            case 'sticky':
              log.warn(
                { address: result.address, failures: result.failures },
                'no candidate passed, keeping last healthy address'
              );
              healthy.push({ hostname: variable.hostname, addresses: [result.address] });
              break;
            case 'unresolved':
              log.error({ err: result.error }, 'no address known');
              fail(variable.name, 'unresolved');
              break;
            case 'unhealthy':
              log.error({ failures: result.failures }, 'no healthy address');
              fail(variable.name, 'unhealthy');
              break;
          }
        } catch (error) {
          log.error({ err: toError(error) }, 'health check failed');
          fail(variable.name, 'error');
        }
      }

      const merged = mergeMappings(healthy);
      const result = await this.hosts.reconcile(merged);
      changed = result.changed;
      written = result.written;

      if (written) {
        this.logger.info({ changed }, 'hosts file updated');
      }
    } catch (error) {
      this.logger.error({ err: toError(error) }, 'pass failed');
      fail('', 'pass');
    }

    const failureList = [...failures.values()];
    await this.report(failureList);

    const report: PassReport = {
      healthy: mergeMappings(healthy),
      failures: failureList,
      changed,
      written,
      durationMs: Date.now() - startTime,
    };

    this.logger.debug(
      { failures: failureList.length, written, durationMs: report.durationMs },
      'pass complete'
    );
    return report;
  }

  private async report(failures: FailureCount[]): Promise<void> {
    try {
      if (failures.length === 0) {
        await this.reporter.reportSuccess();
      } else {
        await this.reporter.reportFailures(failures);
      }
    } catch (error) {
      this.logger.warn({ err: toError(error) }, 'metrics report failed');
    }
  }

  /**
   * Run a pass now, then one every intervalMs after the previous finished.
   * Restarting while a pass is still in flight resumes that pass's schedule.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    if (this.current) return;
    this.tick();
  }

  private tick(): void {
    this.timer = undefined;
    this.current = this.runPass();
    void this.current
      .catch((error: unknown) => {
        this.logger.error({ err: toError(error) }, 'pass failed');
      })
      .finally(() => {
        this.current = undefined;
        if (this.running) {
          this.timer = setTimeout(() => this.tick(), this.intervalMs);
        }
      });
  }

  /**
   * Stop scheduling passes. Resolves once an in-flight pass has finished.
   */
  async stop(): Promise<void> {
    this.running = false;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }

    if (this.current) {
      await this.current;
    }
  }
}

export function createOrchestrator(config: OrchestratorConfig): Orchestrator {
  return new Orchestrator(config);
}

export default Orchestrator;
