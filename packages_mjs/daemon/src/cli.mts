/**
 * hosts-sentinel command line
 *
 * Usage:
 *   hosts-sentinel                    Run a pass every 30 seconds until stopped
 *   hosts-sentinel --once             Run one pass, exit 0 when every name is healthy
 *   hosts-sentinel --env-file <path>  Load a different dotenv file
 */

import { Command } from 'commander';
import { pino } from 'pino';
import { loadConfig, loadEnvFile } from './config.mjs';
import { createDaemon } from './app.mjs';
import { createLogger } from './logger.mjs';
import type { AppConfig } from './types.mjs';

interface CliOptions {
  once?: boolean;
  envFile?: string;
}

/**
 * Run the daemon; resolves with the process exit code
 */
export async function run(options: CliOptions): Promise<number> {
  let config: AppConfig;
  try {
    loadEnvFile(options.envFile);
    config = loadConfig(process.env);
  } catch (error) {
    pino({ name: 'hosts-sentinel' }).fatal({ err: error }, 'configuration rejected');
    return 1;
  }

  const logger = createLogger(config.log);
  const orchestrator = createDaemon(config, logger);

  if (options.once) {
    const report = await orchestrator.runPass();
    return report.failures.length === 0 ? 0 : 1;
  }

  return new Promise<number>((resolve) => {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'stopping');
      orchestrator.stop().then(
        () => resolve(0),
        (error: unknown) => {
          logger.error({ err: error }, 'stop failed');
          resolve(1);
        }
      );
    };

    process.once('SIGTERM', shutdown);
    process.once('SIGINT', shutdown);
    orchestrator.start();
  });
}

export function createProgram(): Command {
  return new Command()
    .name('hosts-sentinel')
    .description('Keep hosts-file entries for database and cache hosts pointed at healthy addresses')
    .version('0.1.0')
    .option('--once', 'Run a single pass and exit')
    .option('--env-file <path>', 'Load environment variables from this file')
    .action(async (options: CliOptions) => {
      process.exitCode = await run(options);
    });
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
