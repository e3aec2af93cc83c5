/**
 * Health gate - picks the newest healthy candidate from a recency cache
 */

import type {
  GateResult,
  HealthGateEvent,
  HealthGateEventListener,
  HealthProbe,
  ProbeFailure,
  ProbeResult,
} from './types.mjs';
import { toError } from './config.mjs';
import type { RecencyCache } from './recency-cache.mjs';

interface ProbedCandidate {
  address: string;
  result: ProbeResult;
}

/**
 * Probe candidates one at a time, in order. Consumers that stop iterating
 * stop the probing, so candidates after the first healthy one are never
 * contacted.
 */
export async function* probeInOrder(
  candidates: Iterable<string>,
  probe: HealthProbe,
  onChecked?: (candidate: ProbedCandidate, durationMs: number) => void
): AsyncGenerator<ProbedCandidate> {
  for (const address of candidates) {
    const startTime = Date.now();
    let result: ProbeResult;

    try {
      result = await probe(address);
    } catch (error) {
      result = { healthy: false, reason: toError(error).message };
    }

    const candidate = { address, result };
    onChecked?.(candidate, Date.now() - startTime);
    yield candidate;
  }
}

/**
 * Health Gate
 *
 * Wraps a recency cache with a health probe. Each call resolves, probes the
 * candidates newest first and stops at the first that passes. When none
 * passes it keeps returning the last address that did; once an address has
 * been healthy the gate never reports "no address" again.
 */
export class HealthGate {
  private readonly cache: RecencyCache;
  private readonly probe: HealthProbe;
  private readonly listeners: Set<HealthGateEventListener> = new Set();
  private healthy: string | null = null;

  constructor(cache: RecencyCache, probe: HealthProbe) {
    this.cache = cache;
    this.probe = probe;
  }

  get id(): string {
    return this.cache.id;
  }

  /**
   * The last address that passed its probe, or null if none ever has
   */
  get lastHealthy(): string | null {
    return this.healthy;
  }

  async firstHealthy(): Promise<GateResult> {
    const candidates = await this.cache.resolve();
    const failures: ProbeFailure[] = [];

    const checks = probeInOrder(candidates, this.probe, ({ address, result }, durationMs) => {
      this.emit({ type: 'health:check', id: this.id, address, result, durationMs });
    });

    for await (const { address, result } of checks) {
      if (result.healthy) {
        this.promote(address);
        return { kind: 'fresh', address };
      }
      failures.push({ address, reason: result.reason });
    }

    if (this.healthy !== null) {
      return { kind: 'sticky', address: this.healthy, failures };
    }

    if (candidates.length === 0) {
      const error = this.cache.lastError;
      return error ? { kind: 'unresolved', error } : { kind: 'unresolved' };
    }

    return { kind: 'unhealthy', failures };
  }

  private promote(address: string): void {
    const previous = this.healthy;
    this.healthy = address;

    if (previous !== address) {
      this.emit({ type: 'health:changed', id: this.id, address, previous });
    }
  }

  /**
   * Subscribe to events
   */
  on(listener: HealthGateEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  off(listener: HealthGateEventListener): void {
    this.listeners.delete(listener);
  }

  private emit(event: HealthGateEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch {
        // Listener failures never affect selection
      }
    }
  }
}

export function createHealthGate(cache: RecencyCache, probe: HealthProbe): HealthGate {
  return new HealthGate(cache, probe);
}

export default HealthGate;
