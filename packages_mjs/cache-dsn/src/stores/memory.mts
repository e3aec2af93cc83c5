/**
 * In-memory recency store implementation
 */

import type { CandidateAddress, RecencyStore } from '../types.mjs';

/**
 * In-memory recency store
 *
 * Backed by a Map, so entries() yields candidates in the order they were first
 * inserted; replacing an existing address keeps its position.
 */
export class MemoryStore implements RecencyStore {
  private readonly cache: Map<string, CandidateAddress> = new Map();

  async get(address: string): Promise<CandidateAddress | undefined> {
    return this.cache.get(address);
  }

  async set(address: string, entry: CandidateAddress): Promise<void> {
    this.cache.set(address, entry);
  }

  async delete(address: string): Promise<boolean> {
    return this.cache.delete(address);
  }

  async entries(): Promise<CandidateAddress[]> {
    return Array.from(this.cache.values(), (entry) => ({ ...entry }));
  }

  async size(): Promise<number> {
    return this.cache.size;
  }

  async clear(): Promise<void> {
    this.cache.clear();
  }

  async close(): Promise<void> {
    await this.clear();
  }
}

/**
 * Create a memory store instance
 */
export function createMemoryStore(): MemoryStore {
  return new MemoryStore();
}

export default MemoryStore;
