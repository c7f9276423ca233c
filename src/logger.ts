/**
 * Structured logging via pino.
 *
 * One root logger for the process; components take a child so every line
 * carries a `component` field.
 */

import pino, { type Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({
  level:     process.env.LOG_LEVEL ?? 'info',
  base:      { service: 'container-health-watchdog' },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
});

export function createLogger(component: string): Logger {
  return logger.child({ component });
}

/** Plain info line, for the entry point's banner output. */
export function log(message: string): void {
  logger.info(message);
}
