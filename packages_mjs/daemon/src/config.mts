/**
 * Environment configuration for the daemon
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';
import {
  DEFAULT_PRIORITY_FILTER,
  isIpLiteral,
  validatePriorityFilter,
} from '@hosts-sentinel/cache-dsn';
import type { AppConfig, MonitoredTarget, Protocol, SkippedVariable } from './types.mjs';

export const PASS_INTERVAL_MS = 30_000;
export const DEFAULT_METRICS_PORT = 9102;

/**
 * Variables the daemon keeps in the hosts file, with the probe each one uses
 */
export const MONITORED_VARIABLES: ReadonlyArray<{ name: string; protocol: Protocol }> = [
  { name: 'POSTGRES_HOST', protocol: 'postgres' },
  { name: 'POSTGRES_REPLICA_HOST', protocol: 'postgres' },
  { name: 'REDIS_HOST', protocol: 'redis' },
  { name: 'REDIS_REPLICA_HOST', protocol: 'redis' },
];

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

// Empty strings count as unset
const blankAsUnset = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const flag = (fallback: boolean) =>
  z.preprocess(
    blankAsUnset,
    z
      .string()
      .optional()
      .transform((value, ctx) => {
        if (value === undefined) return fallback;
        const normalized = value.trim().toLowerCase();
        if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
        if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
        return z.NEVER;
      })
  );

const port = (fallback: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().min(1).max(65535).default(fallback));

const text = (fallback: string) => z.preprocess(blankAsUnset, z.string().default(fallback));

const EnvSchema = z.object({
  POSTGRES_PORT: port(5432),
  POSTGRES_USER: text('postgres'),
  POSTGRES_PASSWORD: z.string().default(''),
  POSTGRES_DB: text('postgres'),
  REDIS_PORT: port(6379),
  REDIS_PASSWORD: z.string().default(''),
  REDIS_TLS: flag(false),
  HOSTS_FILE: text('/etc/hosts'),
  METRICS_PORT: z.preprocess(
    blankAsUnset,
    z
      .union([z.literal('off'), z.coerce.number().int().min(0).max(65535)])
      .default(DEFAULT_METRICS_PORT)
      .transform((value) => (value === 'off' || value === 0 ? null : value))
  ),
  DNS_SERVERS: z.preprocess(
    blankAsUnset,
    z
      .string()
      .optional()
      .transform((value) =>
        value === undefined
          ? []
          : value
              .split(',')
              .map((server) => server.trim())
              .filter((server) => server.length > 0)
      )
  ),
  LOG_LEVEL: z.preprocess(
    blankAsUnset,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
  ),
  LOG_PRETTY: flag(true),
});

const PriorityBound = z.preprocess(blankAsUnset, z.coerce.number().int().optional());

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`);
}

/**
 * Load a dotenv file into process.env. A missing default .env is ignored;
 * a missing file named explicitly is an error.
 */
export function loadEnvFile(path?: string): void {
  const result = dotenv.config(path ? { path } : undefined);

  if (path && result.error) {
    throw new ConfigValidationError([`env file ${path}: ${result.error.message}`]);
  }
}

/**
 * Split the monitored variables into targets and skipped entries
 *
 * @throws ConfigValidationError when a priority bound is not an integer
 * @throws InvalidPriorityRangeError when the bounds are out of range or inverted
 */
export function loadTargets(env: NodeJS.ProcessEnv): {
  targets: MonitoredTarget[];
  skipped: SkippedVariable[];
} {
  const targets: MonitoredTarget[] = [];
  const skipped: SkippedVariable[] = [];
  const issues: string[] = [];

  for (const { name, protocol } of MONITORED_VARIABLES) {
    const le = PriorityBound.safeParse(env[`${name}_SRV_PRIORITY_LE`]);
    const ge = PriorityBound.safeParse(env[`${name}_SRV_PRIORITY_GE`]);
    if (!le.success) issues.push(`${name}_SRV_PRIORITY_LE: ${le.error.issues[0].message}`);
    if (!ge.success) issues.push(`${name}_SRV_PRIORITY_GE: ${ge.error.issues[0].message}`);
    if (!le.success || !ge.success) continue;

    const priority = validatePriorityFilter({
      min: ge.data ?? DEFAULT_PRIORITY_FILTER.min,
      max: le.data ?? DEFAULT_PRIORITY_FILTER.max,
    });

    const hostname = env[name]?.trim() ?? '';
    if (hostname === '') {
      skipped.push({ name, reason: 'unset' });
      continue;
    }
    if (isIpLiteral(hostname)) {
      skipped.push({ name, reason: 'ip-literal', value: hostname });
      continue;
    }

    const srv = env[`${name}_SRV`]?.trim();
    targets.push({
      name,
      hostname,
      protocol,
      priority,
      ...(srv ? { srv } : {}),
    });
  }

  if (issues.length > 0) {
    throw new ConfigValidationError(issues);
  }

  return { targets, skipped };
}

/**
 * Validate the environment into the daemon configuration
 *
 * @example
 * loadEnvFile();
 * const config = loadConfig(process.env);
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigValidationError(formatIssues(parsed.error));
  }

  const values = parsed.data;
  const { targets, skipped } = loadTargets(env);

  return {
    hostsFile: values.HOSTS_FILE,
    intervalMs: PASS_INTERVAL_MS,
    metricsPort: values.METRICS_PORT,
    dnsServers: values.DNS_SERVERS,
    postgres: {
      port: values.POSTGRES_PORT,
      user: values.POSTGRES_USER,
      password: values.POSTGRES_PASSWORD,
      database: values.POSTGRES_DB,
    },
    redis: {
      port: values.REDIS_PORT,
      password: values.REDIS_PASSWORD,
      tls: values.REDIS_TLS,
    },
    log: {
      level: values.LOG_LEVEL,
      pretty: values.LOG_PRETTY,
    },
    targets,
    skipped,
  };
}
