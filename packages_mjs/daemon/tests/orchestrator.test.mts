/**
 * Tests for Orchestrator
 *
 * Coverage includes:
 * - Hosts file follows the newest healthy address across passes
 * - Failure isolation between variables
 * - Failure reasons: unresolved, unhealthy, error, pass
 * - Success vs failure reporting
 * - Scheduling without overlapping passes
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pino } from 'pino';
import type { DnsBackend, HealthProbe, ProbeResult } from '@hosts-sentinel/cache-dsn';
import { HostsFileWriter, type HostsMapping, type ReconcileResult } from '@hosts-sentinel/hosts-file';
import type { Reporter } from '@hosts-sentinel/metrics-push';
import { buildMonitoredVariable } from '../src/monitored.mjs';
import { Orchestrator, mergeMappings } from '../src/orchestrator.mjs';
import type { HostsReconciler, MonitoredTarget, PassReport } from '../src/types.mjs';

const STAMP = new Date('2026-01-02T03:04:05.000Z');
const MINUTE = 60 * 1000;
const logger = pino({ level: 'silent' });

function createFakeDns(a: Record<string, string[]>): DnsBackend {
  const noData = () => Promise.reject(Object.assign(new Error('no data'), { code: 'ENODATA' }));
  return {
    resolve4: async (name) => a[name] ?? noData(),
    resolve6: () => noData(),
    resolveSrv: () => noData(),
  };
}

function createFakeReporter() {
  return {
    reportSuccess: vi.fn(async (): Promise<void> => undefined),
    reportFailures: vi.fn(async (): Promise<void> => undefined),
  } satisfies Reporter;
}

function createFakeHosts() {
  return {
    reconcile: vi.fn(
      async (_mappings: HostsMapping[]): Promise<ReconcileResult> => ({ changed: [], written: false })
    ),
  } satisfies HostsReconciler;
}

const target = (name: string, hostname: string): MonitoredTarget => ({
  name,
  hostname,
  protocol: name.startsWith('REDIS') ? 'redis' : 'postgres',
  priority: { min: 0, max: 65535 },
});

describe('Orchestrator', () => {
  let clock: number;
  let a: Record<string, string[]>;
  let healthyAddresses: Set<string>;
  let probe: HealthProbe;

  const variable = (name: string, hostname: string) =>
    buildMonitoredVariable(target(name, hostname), {
      dns: createFakeDns(a),
      probes: { postgres: probe, redis: probe },
      now: () => clock,
    });

  beforeEach(() => {
    clock = 0;
    a = {};
    healthyAddresses = new Set();
    probe = async (address): Promise<ProbeResult> =>
      healthyAddresses.has(address)
        ? { healthy: true }
        : { healthy: false, reason: 'connection refused' };
  });

  describe('runPass with a hosts file', () => {
    let dir: string;
    let path: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(join(tmpdir(), 'daemon-pass-'));
      path = join(dir, 'hosts');
      await fs.writeFile(path, '127.0.0.1 localhost\n');
    });

    afterEach(async () => {
      await fs.remove(dir);
    });

    it('should follow the newest healthy address', async () => {
      a['db.internal'] = ['1.1.1.1'];
      healthyAddresses = new Set(['1.1.1.1', '2.2.2.2']);
      const reporter = createFakeReporter();
      const orchestrator = new Orchestrator({
        variables: [variable('POSTGRES_HOST', 'db.internal')],
        hosts: new HostsFileWriter({ path, now: () => STAMP }),
        reporter,
        logger,
      });

      const first = await orchestrator.runPass();
      expect(first).toMatchObject({
        healthy: [{ hostname: 'db.internal', addresses: ['1.1.1.1'] }],
        failures: [],
        changed: ['db.internal'],
        written: true,
      });
      expect(await fs.readFile(path, 'utf-8')).toBe(
        '127.0.0.1 localhost\n1.1.1.1 db.internal # AUTO GENERATED: 2026-01-02T03:04:05.000Z\n'
      );

      a['db.internal'] = ['2.2.2.2'];
      clock += MINUTE;
      const second = await orchestrator.runPass();
      expect(second.healthy).toEqual([{ hostname: 'db.internal', addresses: ['2.2.2.2'] }]);
      expect(await fs.readFile(path, 'utf-8')).toBe(
        '127.0.0.1 localhost\n2.2.2.2 db.internal # AUTO GENERATED: 2026-01-02T03:04:05.000Z\n'
      );

      clock += MINUTE;
      const third = await orchestrator.runPass();
      expect(third).toMatchObject({ changed: [], written: false });

      expect(reporter.reportSuccess).toHaveBeenCalledTimes(3);
      expect(reporter.reportFailures).not.toHaveBeenCalled();
    });

    it('should keep processing after a variable fails', async () => {
      a['cache.internal'] = ['10.0.0.7'];
      healthyAddresses = new Set(['10.0.0.7']);
      const reporter = createFakeReporter();
      const orchestrator = new Orchestrator({
        variables: [variable('POSTGRES_HOST', 'db.internal'), variable('REDIS_HOST', 'cache.internal')],
        hosts: new HostsFileWriter({ path, now: () => STAMP }),
        reporter,
        logger,
      });

      const report = await orchestrator.runPass();

      expect(report.failures).toEqual([{ name: 'POSTGRES_HOST', reason: 'unresolved', count: 1 }]);
      expect(report.healthy).toEqual([{ hostname: 'cache.internal', addresses: ['10.0.0.7'] }]);
      expect(await fs.readFile(path, 'utf-8')).toBe(
        '127.0.0.1 localhost\n10.0.0.7 cache.internal # AUTO GENERATED: 2026-01-02T03:04:05.000Z\n'
      );
      expect(reporter.reportFailures).toHaveBeenCalledWith(report.failures);
      expect(reporter.reportSuccess).not.toHaveBeenCalled();
    });
  });

  describe('failure reasons', () => {
    it('should report candidates that all fail their probe as unhealthy', async () => {
      a['db.internal'] = ['10.0.0.1'];
      const orchestrator = new Orchestrator({
        variables: [variable('POSTGRES_HOST', 'db.internal')],
        hosts: createFakeHosts(),
        reporter: createFakeReporter(),
        logger,
      });

      const report = await orchestrator.runPass();

      expect(report.failures).toEqual([{ name: 'POSTGRES_HOST', reason: 'unhealthy', count: 1 }]);
      expect(report.healthy).toEqual([]);
    });

    it('should keep the last healthy address without a failure', async () => {
      a['db.internal'] = ['10.0.0.1'];
      healthyAddresses = new Set(['10.0.0.1']);
      const hosts = createFakeHosts();
      const orchestrator = new Orchestrator({
        variables: [variable('POSTGRES_HOST', 'db.internal')],
        hosts,
        reporter: createFakeReporter(),
        logger,
      });

      await orchestrator.runPass();
      healthyAddresses.clear();
      const report = await orchestrator.runPass();

      expect(report.failures).toEqual([]);
      expect(hosts.reconcile).toHaveBeenLastCalledWith([
        { hostname: 'db.internal', addresses: ['10.0.0.1'] },
      ]);
    });

    it('should count a thrown gate error against its variable', async () => {
      a['cache.internal'] = ['10.0.0.7'];
      healthyAddresses = new Set(['10.0.0.7']);
      const failing = variable('POSTGRES_HOST', 'db.internal');
      vi.spyOn(failing.gate, 'firstHealthy').mockRejectedValue(new Error('boom'));
      const hosts = createFakeHosts();
      const orchestrator = new Orchestrator({
        variables: [failing, variable('REDIS_HOST', 'cache.internal')],
        hosts,
        reporter: createFakeReporter(),
        logger,
      });

      const report = await orchestrator.runPass();

      expect(report.failures).toEqual([{ name: 'POSTGRES_HOST', reason: 'error', count: 1 }]);
      expect(hosts.reconcile).toHaveBeenCalledWith([
        { hostname: 'cache.internal', addresses: ['10.0.0.7'] },
      ]);
    });

    it('should count a hosts file failure as one anonymous failure', async () => {
      a['db.internal'] = ['10.0.0.1'];
      healthyAddresses = new Set(['10.0.0.1']);
      const hosts = createFakeHosts();
      hosts.reconcile.mockRejectedValue(new Error('EACCES: permission denied'));
      const reporter = createFakeReporter();
      const orchestrator = new Orchestrator({
        variables: [variable('POSTGRES_HOST', 'db.internal')],
        hosts,
        reporter,
        logger,
      });

      const report = await orchestrator.runPass();

      expect(report).toMatchObject({
        failures: [{ name: '', reason: 'pass', count: 1 }],
        changed: [],
        written: false,
      });
      expect(reporter.reportFailures).toHaveBeenCalledWith([{ name: '', reason: 'pass', count: 1 }]);
    });

    it('should survive a reporter that throws', async () => {
      const reporter = createFakeReporter();
      reporter.reportSuccess.mockRejectedValue(new Error('collector down'));
      const orchestrator = new Orchestrator({
        variables: [],
        hosts: createFakeHosts(),
        reporter,
        logger,
      });

      await expect(orchestrator.runPass()).resolves.toMatchObject({ failures: [] });
    });
  });

  describe('start / stop', () => {
    const report: PassReport = { healthy: [], failures: [], changed: [], written: false, durationMs: 0 };

    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    const idle = () =>
      new Orchestrator({
        variables: [],
        hosts: createFakeHosts(),
        reporter: createFakeReporter(),
        logger,
        intervalMs: 30_000,
      });

    it('should run immediately and then on the interval', async () => {
      const orchestrator = idle();
      const runPass = vi.spyOn(orchestrator, 'runPass').mockResolvedValue(report);

      orchestrator.start();
      expect(runPass).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(0);
      await vi.advanceTimersByTimeAsync(30_000);
      expect(runPass).toHaveBeenCalledTimes(2);

      await orchestrator.stop();
      await vi.advanceTimersByTimeAsync(90_000);
      expect(runPass).toHaveBeenCalledTimes(2);
      expect(orchestrator.isRunning).toBe(false);
    });

    it('should not start a pass while one is running', async () => {
      const orchestrator = idle();
      let finish: (value: PassReport) => void = () => undefined;
      const runPass = vi
        .spyOn(orchestrator, 'runPass')
        .mockImplementationOnce(() => new Promise<PassReport>((resolve) => (finish = resolve)))
        .mockResolvedValue(report);

      orchestrator.start();
      await vi.advanceTimersByTimeAsync(90_000);
      expect(runPass).toHaveBeenCalledTimes(1);

      finish(report);
      await vi.advanceTimersByTimeAsync(0);
      await vi.advanceTimersByTimeAsync(30_000);
      expect(runPass).toHaveBeenCalledTimes(2);

      await orchestrator.stop();
    });

    it('should keep a single schedule when restarted during a pass', async () => {
      const orchestrator = idle();
      let finish: (value: PassReport) => void = () => undefined;
      const runPass = vi
        .spyOn(orchestrator, 'runPass')
        .mockImplementationOnce(() => new Promise<PassReport>((resolve) => (finish = resolve)))
        .mockResolvedValue(report);

      orchestrator.start();
      const stopping = orchestrator.stop();
      orchestrator.start();
      expect(runPass).toHaveBeenCalledTimes(1);

      finish(report);
      await stopping;
      await vi.advanceTimersByTimeAsync(0);
      await vi.advanceTimersByTimeAsync(30_000);
      expect(runPass).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(30_000);
      expect(runPass).toHaveBeenCalledTimes(3);
      expect(orchestrator.isRunning).toBe(true);

      await orchestrator.stop();
      await vi.advanceTimersByTimeAsync(90_000);
      expect(runPass).toHaveBeenCalledTimes(3);
    });

    it('should ignore a second start', () => {
      const orchestrator = idle();
      const runPass = vi.spyOn(orchestrator, 'runPass').mockResolvedValue(report);

      orchestrator.start();
      orchestrator.start();

      expect(runPass).toHaveBeenCalledTimes(1);
      return orchestrator.stop();
    });
  });
});

describe('mergeMappings', () => {
  it('should union addresses for a shared hostname', () => {
    expect(
      mergeMappings([
        { hostname: 'db.internal', addresses: ['10.0.0.1'] },
        { hostname: 'cache.internal', addresses: ['10.0.0.7'] },
        { hostname: 'db.internal', addresses: ['10.0.0.2', '10.0.0.1'] },
      ])
    ).toEqual([
      { hostname: 'db.internal', addresses: ['10.0.0.1', '10.0.0.2'] },
      { hostname: 'cache.internal', addresses: ['10.0.0.7'] },
    ]);
  });
});
