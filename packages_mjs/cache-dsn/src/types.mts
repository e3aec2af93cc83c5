/**
 * Type definitions for cache-dsn
 */

/**
 * A candidate address tracked by a recency cache
 */
export interface CandidateAddress {
  /** The resolved IP literal (v4 or v6) */
  address: string;
  /** First time this address was observed (Unix timestamp ms) */
  firstSeen: number;
  /** Last time this address was observed (Unix timestamp ms) */
  lastSeen: number;
}

/**
 * Inclusive priority window applied to SRV targets
 */
export interface PriorityFilterSpec {
  /** Lowest accepted priority. Default: 0 */
  min: number;
  /** Highest accepted priority. Default: 65535 */
  max: number;
}

/**
 * A single SRV answer
 */
export interface ServiceRecord {
  name: string;
  port: number;
  priority: number;
  weight: number;
}

/**
 * Resolves a name to a list of IP literals
 */
export interface AddressResolver {
  resolve(name: string): Promise<string[]>;
}

/**
 * Subset of node:dns/promises Resolver used by the name and SRV resolvers
 */
export interface DnsBackend {
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
  resolveSrv(hostname: string): Promise<ServiceRecord[]>;
}

/**
 * Configuration for the DNS-backed resolvers
 */
export interface DnsResolverConfig {
  /** Per-query timeout (ms). Default: 2000 */
  timeoutMs?: number;
  /** Number of tries per query. Default: 1 */
  tries?: number;
  /** Nameservers to query instead of the system ones */
  servers?: string[];
}

/**
 * Configuration for a recency cache
 */
export interface RecencyCacheConfig {
  /** Identifier used in events, usually the monitored variable name */
  id: string;
  /** Name handed to the resolver on every pass */
  name: string;
  /** Evict entries unseen for longer than this (ms). Default: 1800000 (30 minutes) */
  maxAgeMs?: number;
  /** Clock used for first/last seen stamps. Default: Date.now */
  now?: () => number;
}

/**
 * Events emitted by a recency cache
 */
export type RecencyCacheEvent =
  | { type: 'cache:insert'; id: string; address: string }
  | { type: 'cache:refresh'; id: string; address: string }
  | { type: 'cache:evicted'; id: string; address: string; idleMs: number }
  | { type: 'resolve:success'; id: string; name: string; addressCount: number; durationMs: number }
  | { type: 'resolve:error'; id: string; name: string; error: Error };

export type RecencyCacheEventListener = (event: RecencyCacheEvent) => void;

/**
 * State store interface for recency caches
 */
export interface RecencyStore {
  /** Get a tracked candidate */
  get(address: string): Promise<CandidateAddress | undefined>;
  /** Insert or replace a tracked candidate */
  set(address: string, entry: CandidateAddress): Promise<void>;
  /** Delete a tracked candidate */
  delete(address: string): Promise<boolean>;
  /** All tracked candidates, in insertion order */
  entries(): Promise<CandidateAddress[]>;
  /** Number of tracked candidates */
  size(): Promise<number>;
  /** Clear all tracked candidates */
  clear(): Promise<void>;
  /** Close the store */
  close(): Promise<void>;
}

/**
 * Outcome of a single health probe
 */
export type ProbeResult = { healthy: true } | { healthy: false; reason: string };

/**
 * Protocol-specific health predicate
 */
export type HealthProbe = (address: string) => Promise<ProbeResult>;

/**
 * A candidate that failed its probe during a gate pass
 */
export interface ProbeFailure {
  address: string;
  reason: string;
}

/**
 * Result of HealthGate.firstHealthy()
 */
export type GateResult =
  /** A current candidate passed its probe */
  | { kind: 'fresh'; address: string }
  /** No candidate passed; the last known healthy address is kept */
  | { kind: 'sticky'; address: string; failures: ProbeFailure[] }
  /** Nothing to probe and nothing was ever healthy */
  | { kind: 'unresolved'; error?: Error }
  /** Candidates were probed, none passed, nothing was ever healthy */
  | { kind: 'unhealthy'; failures: ProbeFailure[] };

/**
 * Events emitted by a health gate
 */
export type HealthGateEvent =
  | { type: 'health:check'; id: string; address: string; result: ProbeResult; durationMs: number }
  | { type: 'health:changed'; id: string; address: string; previous: string | null };

export type HealthGateEventListener = (event: HealthGateEvent) => void;
