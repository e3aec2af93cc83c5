/**
 * Type definitions for health-probe
 */

import type { Logger } from 'pino';

export type { HealthProbe, ProbeResult } from '@hosts-sentinel/cache-dsn';

/**
 * Settings shared by every probe
 */
export interface ProbeConfig {
  /** Connect timeout handed to the client (ms) */
  connectTimeoutMs?: number;
  /** Upper bound for the whole probe, connect and roundtrip (ms). Default: 3000 */
  deadlineMs?: number;
  /** Upper bound for releasing the connection (ms). Default: 1000 */
  closeTimeoutMs?: number;
  /** Receives client-level errors and close failures at debug level */
  logger?: Logger;
}

/**
 * PostgreSQL probe configuration; the host is always the candidate address
 */
export interface PostgresProbeConfig extends ProbeConfig {
  /** Default: 5432 */
  port?: number;
  /** Default: 'postgres' */
  user?: string;
  password?: string;
  /** Default: 'postgres' */
  database?: string;
}

/**
 * Redis probe configuration; the host is always the candidate address
 */
export interface RedisProbeConfig extends ProbeConfig {
  /** Default: 6379 */
  port?: number;
  password?: string;
  /** Connect over TLS without verifying the server certificate. Default: false */
  tls?: boolean;
}

/**
 * Connection settings for a single PostgreSQL probe
 */
export interface PostgresConnectionConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  connectTimeoutMs: number;
  onError: (error: Error) => void;
}

/**
 * Connection settings for a single Redis probe
 */
export interface RedisConnectionConfig {
  host: string;
  port: number;
  password?: string;
  tls: boolean;
  connectTimeoutMs: number;
  onError: (error: Error) => void;
}

/**
 * PostgreSQL client interface (compatible with pg.Client)
 */
export interface PostgresClient {
  connect(): Promise<void>;
  query(text: string): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

/**
 * Redis client interface (compatible with ioredis)
 */
export interface RedisClient {
  connect(): Promise<void>;
  ping(): Promise<string>;
  disconnect(): void;
}

export type PostgresClientFactory = (config: PostgresConnectionConfig) => PostgresClient;

export type RedisClientFactory = (config: RedisConnectionConfig) => RedisClient;
