/**
 * Process logger
 */

import { pino, type Logger } from 'pino';
import type { AppConfig } from './types.mjs';

export function createLogger(options: AppConfig['log']): Logger {
  if (options.pretty) {
    return pino({
      name: 'hosts-sentinel',
      level: options.level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard' },
      },
    });
  }

  return pino({
    name: 'hosts-sentinel',
    level: options.level,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
