import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Process-wide logger. Writes JSON lines to stderr; stdout carries only the
 * module result document.
 */
export function createLogger(level = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino(
    {
      name: 'zabbix-workhours-report',
      level,
      redact: {
        paths: ['password', 'params.password', '*.password', 'token', '*.token'],
        censor: '[REDACTED]',
      },
    },
    pino.destination(2),
  );
}

export const logger = createLogger();

export type { Logger };
