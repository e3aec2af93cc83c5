/**
 * Redis health probe: connect, PING, disconnect
 */

import { Redis } from 'ioredis';
import type {
  HealthProbe,
  RedisClient,
  RedisClientFactory,
  RedisConnectionConfig,
  RedisProbeConfig,
} from './types.mjs';
import { DEFAULT_REDIS_PROBE_CONFIG } from './config.mjs';
import { runScopedProbe } from './scoped.mjs';

/**
 * Build an ioredis client for one probe: connects lazily, never retries and
 * never queues commands while offline.
 */
export const defaultRedisClientFactory: RedisClientFactory = (config) => {
  const client = new Redis({
    host: config.host,
    port: config.port,
    password: config.password,
    tls: config.tls ? { rejectUnauthorized: false } : undefined,
    connectTimeout: config.connectTimeoutMs,
    commandTimeout: config.connectTimeoutMs,
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 0,
    retryStrategy: () => null,
  });

  client.on('error', config.onError);
  return client;
};

/**
 * Create a probe that checks a Redis server answers PING with PONG
 */
export function createRedisProbe(
  config: RedisProbeConfig = {},
  factory: RedisClientFactory = defaultRedisClientFactory
): HealthProbe {
  const settings = { ...DEFAULT_REDIS_PROBE_CONFIG, ...config };
  const logger = settings.logger;

  return (address) => {
    const connection: RedisConnectionConfig = {
      host: address,
      port: settings.port,
      password: settings.password || undefined,
      tls: settings.tls,
      connectTimeoutMs: settings.connectTimeoutMs,
      onError: (error) => logger?.debug({ err: error, address }, 'redis probe client error'),
    };

    return runScopedProbe<RedisClient>({
      label: `redis ${address}`,
      acquire: () => factory(connection),
      roundtrip: async (client) => {
        await client.connect();
        const reply = await client.ping();
        return reply === 'PONG'
          ? { healthy: true }
          : { healthy: false, reason: `unexpected PING reply: ${reply}` };
      },
      release: (client) => client.disconnect(),
      deadlineMs: settings.deadlineMs,
      closeTimeoutMs: settings.closeTimeoutMs,
      logger,
    });
  };
}
