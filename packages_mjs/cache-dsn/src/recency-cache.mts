/**
 * Recency cache - addresses seen recently for one monitored name
 */

import type {
  AddressResolver,
  CandidateAddress,
  RecencyCacheConfig,
  RecencyCacheEvent,
  RecencyCacheEventListener,
  RecencyStore,
} from './types.mjs';
import { isStale, mergeConfig, toError } from './config.mjs';
import { MemoryStore } from './stores/memory.mjs';

/**
 * Newest first by firstSeen. Array.prototype.sort is stable, so candidates
 * first seen in the same pass keep the order the resolver returned them in.
 */
export function orderNewestFirst(entries: CandidateAddress[]): CandidateAddress[] {
  return [...entries].sort((a, b) => b.firstSeen - a.firstSeen);
}

/**
 * Recency Cache
 *
 * Tracks every address a resolver has returned for one name, with first and
 * last seen stamps, and evicts addresses unseen for longer than maxAgeMs.
 * A failing resolution still runs eviction and returns what remains, so a
 * transient DNS outage falls back to the recently seen addresses.
 *
 * @example
 * const cache = new RecencyCache(
 *   { id: 'POSTGRES_HOST', name: 'db.internal' },
 *   new NameResolver()
 * );
 * const candidates = await cache.resolve(); // newest first
 */
export class RecencyCache {
  private readonly config: Required<RecencyCacheConfig>;
  private readonly resolver: AddressResolver;
  private readonly store: RecencyStore;
  private readonly listeners: Set<RecencyCacheEventListener> = new Set();
  private error: Error | undefined;

  constructor(config: RecencyCacheConfig, resolver: AddressResolver, store?: RecencyStore) {
    this.config = mergeConfig(config);
    this.resolver = resolver;
    this.store = store ?? new MemoryStore();
  }

  get id(): string {
    return this.config.id;
  }

  get name(): string {
    return this.config.name;
  }

  /**
   * Error raised by the most recent resolution, cleared on success
   */
  get lastError(): Error | undefined {
    return this.error;
  }

  /**
   * Resolve once, record what was seen, evict stale entries and return the
   * tracked addresses newest first
   */
  async resolve(): Promise<string[]> {
    const startTime = this.config.now();

    try {
      const addresses = await this.resolver.resolve(this.config.name);
      await this.observe(addresses);
      this.error = undefined;

      this.emit({
        type: 'resolve:success',
        id: this.config.id,
        name: this.config.name,
        addressCount: addresses.length,
        durationMs: this.config.now() - startTime,
      });
    } catch (error) {
      this.error = toError(error);
      this.emit({
        type: 'resolve:error',
        id: this.config.id,
        name: this.config.name,
        error: this.error,
      });
    } finally {
      await this.evictStale();
    }

    return this.addresses();
  }

  /**
   * Record a batch of observed addresses
   */
  private async observe(addresses: string[]): Promise<void> {
    const now = this.config.now();

    for (const address of addresses) {
      const existing = await this.store.get(address);

      if (existing) {
        await this.store.set(address, { ...existing, lastSeen: now });
        this.emit({ type: 'cache:refresh', id: this.config.id, address });
      } else {
        await this.store.set(address, { address, firstSeen: now, lastSeen: now });
        this.emit({ type: 'cache:insert', id: this.config.id, address });
      }
    }
  }

  /**
   * Remove every entry unseen for longer than maxAgeMs
   */
  async evictStale(): Promise<number> {
    const now = this.config.now();
    let evicted = 0;

    for (const entry of await this.store.entries()) {
      if (isStale(entry.lastSeen, this.config.maxAgeMs, now)) {
        await this.store.delete(entry.address);
        evicted++;

        this.emit({
          type: 'cache:evicted',
          id: this.config.id,
          address: entry.address,
          idleMs: now - entry.lastSeen,
        });
      }
    }

    return evicted;
  }

  /**
   * Tracked addresses, newest first, without resolving
   */
  async addresses(): Promise<string[]> {
    return orderNewestFirst(await this.store.entries()).map((entry) => entry.address);
  }

  /**
   * Tracked candidates with their stamps, newest first
   */
  async entries(): Promise<CandidateAddress[]> {
    return orderNewestFirst(await this.store.entries());
  }

  async size(): Promise<number> {
    return this.store.size();
  }

  async clear(): Promise<void> {
    await this.store.clear();
    this.error = undefined;
  }

  /**
   * Subscribe to events
   */
  on(listener: RecencyCacheEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Unsubscribe from events
   */
  off(listener: RecencyCacheEventListener): void {
    this.listeners.delete(listener);
  }

  private emit(event: RecencyCacheEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch {
        // Listener failures never affect resolution
      }
    }
  }

  async destroy(): Promise<void> {
    this.listeners.clear();
    await this.store.close();
  }
}

export function createRecencyCache(
  config: RecencyCacheConfig,
  resolver: AddressResolver,
  store?: RecencyStore
): RecencyCache {
  return new RecencyCache(config, resolver, store);
}

export default RecencyCache;
