/**
 * Structured logging. One root pino logger writing to stderr, so stdout stays
 * free for CLI output; modules get a child logger tagged with their name.
 */

import pino, { type Logger } from 'pino';

const root: Logger = pino(
  {
    level: process.env.LOG_LEVEL ?? 'info',
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);

export function createLogger(name: string): Logger {
  return root.child({ module: name });
}

export type { Logger };
