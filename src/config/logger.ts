import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/**
 * Create the process logger
 *
 * The same instance is handed to fastify so request logs and scheduler logs
 * share one stream and format.
 */
export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({
    name: 'project-usage-exporter',
    level,
  });
}

/** Logger for tests and library callers that do not care about output */
export const silentLogger: Logger = pino({ level: 'silent' });
