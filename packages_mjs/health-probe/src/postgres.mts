/**
 * PostgreSQL health probe: connect, SELECT 1, disconnect
 */

import pg from 'pg';
import type {
  HealthProbe,
  PostgresClient,
  PostgresClientFactory,
  PostgresConnectionConfig,
  PostgresProbeConfig,
} from './types.mjs';
import { DEFAULT_POSTGRES_PROBE_CONFIG } from './config.mjs';
import { runScopedProbe } from './scoped.mjs';

/**
 * Build a pg client for one probe. Statement and query timeouts follow the
 * connect timeout so a stalled server cannot hold the roundtrip open.
 * Client 'error' events go to onError.
 */
export const defaultPostgresClientFactory: PostgresClientFactory = (config) => {
  const client = new pg.Client({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    connectionTimeoutMillis: config.connectTimeoutMs,
    query_timeout: config.connectTimeoutMs,
    statement_timeout: config.connectTimeoutMs,
    application_name: 'hosts-sentinel',
  });

  client.on('error', config.onError);
  return client;
};

/**
 * Create a probe that checks a PostgreSQL server answers a no-op query
 *
 * @example
 * const probe = createPostgresProbe({ user: 'app', password: 'test-secret', database: 'app' });
 * const result = await probe('10.0.0.5'); // { healthy: true } or { healthy: false, reason }
 */
export function createPostgresProbe(
  config: PostgresProbeConfig = {},
  factory: PostgresClientFactory = defaultPostgresClientFactory
): HealthProbe {
  const settings = { ...DEFAULT_POSTGRES_PROBE_CONFIG, ...config };
  const logger = settings.logger;

  return (address) => {
    const connection: PostgresConnectionConfig = {
      host: address,
      port: settings.port,
      user: settings.user,
      password: settings.password,
      database: settings.database,
      connectTimeoutMs: settings.connectTimeoutMs,
      onError: (error) => logger?.debug({ err: error, address }, 'postgres probe client error'),
    };

    return runScopedProbe<PostgresClient>({
      label: `postgres ${address}`,
      acquire: () => factory(connection),
      roundtrip: async (client) => {
        await client.connect();
        const result = await client.query('SELECT 1');
        return result.rows.length === 1
          ? { healthy: true }
          : { healthy: false, reason: `SELECT 1 returned ${result.rows.length} rows` };
      },
      release: (client) => client.end(),
      deadlineMs: settings.deadlineMs,
      closeTimeoutMs: settings.closeTimeoutMs,
      logger,
    });
  };
}
