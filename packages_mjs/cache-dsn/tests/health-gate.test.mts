/**
 * Tests for HealthGate
 *
 * Coverage includes:
 * - Lazy probing: stops at the first healthy candidate
 * - Sticky last-known-good: never regresses once healthy
 * - Result kinds: fresh, sticky, unresolved, unhealthy
 * - Probe exceptions treated as unhealthy results
 */

import { describe, it, expect, vi } from 'vitest';
import { HealthGate, createHealthGate, probeInOrder } from '../src/health-gate.mjs';
import { RecencyCache } from '../src/recency-cache.mjs';
import type { AddressResolver, HealthGateEvent, HealthProbe, ProbeResult } from '../src/types.mjs';

const MINUTE = 60 * 1000;

function scripted(answers: Array<string[] | Error>): AddressResolver {
  return {
    async resolve() {
      const next = answers.shift() ?? [];
      if (next instanceof Error) throw next;
      return next;
    },
  };
}

function probeFrom(healthy: Set<string>) {
  return vi.fn(
    async (address: string): Promise<ProbeResult> =>
      healthy.has(address) ? { healthy: true } : { healthy: false, reason: 'connection refused' }
  );
}

describe('HealthGate', () => {
  let clock = 0;

  const createCache = (answers: Array<string[] | Error>): RecencyCache =>
    new RecencyCache({ id: 'POSTGRES_HOST', name: 'db.internal', now: () => clock }, scripted(answers));

  describe('firstHealthy', () => {
    it('should return the newest healthy candidate', async () => {
      clock = 0;
      const cache = createCache([['10.0.0.1'], ['10.0.0.1', '10.0.0.2']]);
      const gate = new HealthGate(cache, probeFrom(new Set(['10.0.0.1', '10.0.0.2'])));

      expect(await gate.firstHealthy()).toEqual({ kind: 'fresh', address: '10.0.0.1' });
      clock += MINUTE;
      expect(await gate.firstHealthy()).toEqual({ kind: 'fresh', address: '10.0.0.2' });
      expect(gate.lastHealthy).toBe('10.0.0.2');
    });

    it('should skip unhealthy newer candidates', async () => {
      clock = 0;
      const cache = createCache([['10.0.0.1'], ['10.0.0.1', '10.0.0.2']]);
      const gate = new HealthGate(cache, probeFrom(new Set(['10.0.0.1'])));

      await gate.firstHealthy();
      clock += MINUTE;

      expect(await gate.firstHealthy()).toEqual({ kind: 'fresh', address: '10.0.0.1' });
    });

    it('should stop probing at the first healthy candidate', async () => {
      clock = 0;
      const cache = createCache([['10.0.0.1', '10.0.0.2', '10.0.0.3']]);
      const probe = probeFrom(new Set(['10.0.0.2', '10.0.0.3']));
      const gate = new HealthGate(cache, probe);

      expect(await gate.firstHealthy()).toEqual({ kind: 'fresh', address: '10.0.0.2' });
      expect(probe.mock.calls.map((call) => call[0])).toEqual(['10.0.0.1', '10.0.0.2']);
    });

    it('should keep the last healthy address when nothing passes', async () => {
      clock = 0;
      const healthy = new Set(['10.0.0.1']);
      const cache = createCache([['10.0.0.1'], ['10.0.0.1']]);
      const gate = new HealthGate(cache, probeFrom(healthy));

      await gate.firstHealthy();
      healthy.clear();

      expect(await gate.firstHealthy()).toEqual({
        kind: 'sticky',
        address: '10.0.0.1',
        failures: [{ address: '10.0.0.1', reason: 'connection refused' }],
      });
    });

    it('should keep the last healthy address after it was evicted', async () => {
      clock = 0;
      const cache = createCache([['10.0.0.1'], new Error('NXDOMAIN')]);
      const gate = new HealthGate(cache, probeFrom(new Set(['10.0.0.1'])));

      await gate.firstHealthy();
      clock += 31 * MINUTE;

      expect(await gate.firstHealthy()).toEqual({ kind: 'sticky', address: '10.0.0.1', failures: [] });
    });

    it('should report unresolved when nothing was ever resolved', async () => {
      clock = 0;
      const gate = new HealthGate(createCache([[]]), probeFrom(new Set()));

      expect(await gate.firstHealthy()).toEqual({ kind: 'unresolved' });
      expect(gate.lastHealthy).toBeNull();
    });

    it('should carry the resolver error when unresolved', async () => {
      clock = 0;
      const gate = new HealthGate(createCache([new Error('SERVFAIL')]), probeFrom(new Set()));

      const result = await gate.firstHealthy();

      expect(result.kind).toBe('unresolved');
      expect(result.kind === 'unresolved' ? result.error?.message : undefined).toBe('SERVFAIL');
    });

    it('should report unhealthy when candidates exist but none ever passed', async () => {
      clock = 0;
      const gate = new HealthGate(createCache([['10.0.0.1', '10.0.0.2']]), probeFrom(new Set()));

      expect(await gate.firstHealthy()).toEqual({
        kind: 'unhealthy',
        failures: [
          { address: '10.0.0.1', reason: 'connection refused' },
          { address: '10.0.0.2', reason: 'connection refused' },
        ],
      });
    });

    it('should treat a throwing probe as unhealthy', async () => {
      clock = 0;
      const probe: HealthProbe = async () => {
        throw new Error('socket hang up');
      };
      const gate = new HealthGate(createCache([['10.0.0.1']]), probe);

      expect(await gate.firstHealthy()).toEqual({
        kind: 'unhealthy',
        failures: [{ address: '10.0.0.1', reason: 'socket hang up' }],
      });
    });

    it('should never return nothing once an address has been healthy', async () => {
      clock = 0;
      const healthy = new Set(['10.0.0.1']);
      const cache = createCache([['10.0.0.1'], [], new Error('timeout'), ['10.0.0.9']]);
      const gate = new HealthGate(cache, probeFrom(healthy));

      await gate.firstHealthy();
      healthy.clear();

      for (let pass = 0; pass < 3; pass++) {
        clock += 20 * MINUTE;
        const result = await gate.firstHealthy();
        expect(result).toMatchObject({ kind: 'sticky', address: '10.0.0.1' });
      }
    });
  });

  describe('events', () => {
    it('should emit health:check per probe and health:changed on promotion', async () => {
      clock = 0;
      const gate = createHealthGate(
        createCache([['10.0.0.1', '10.0.0.2'], ['10.0.0.1', '10.0.0.2']]),
        probeFrom(new Set(['10.0.0.2']))
      );
      const events: HealthGateEvent[] = [];
      gate.on((e) => events.push(e));

      await gate.firstHealthy();
      await gate.firstHealthy();

      expect(events.map((e) => `${e.type}:${e.address}`)).toEqual([
        'health:check:10.0.0.1',
        'health:check:10.0.0.2',
        'health:changed:10.0.0.2',
        'health:check:10.0.0.1',
        'health:check:10.0.0.2',
      ]);
      expect(events[2]).toEqual({
        type: 'health:changed',
        id: 'POSTGRES_HOST',
        address: '10.0.0.2',
        previous: null,
      });
    });
  });

  describe('probeInOrder', () => {
    it('should not probe beyond what the consumer reads', async () => {
      const probe = vi.fn(async (): Promise<ProbeResult> => ({ healthy: true }));

      for await (const candidate of probeInOrder(['a', 'b', 'c'], probe)) {
        expect(candidate.address).toBe('a');
        break;
      }

      expect(probe).toHaveBeenCalledTimes(1);
    });
  });
});
