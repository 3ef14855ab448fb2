import { pino } from 'pino';

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

/**
 * Shared logger for the session runtime
 */
export const logger = pino({
  name: 'termfocus',
  level: resolveLevel(),
});

export type Logger = typeof logger;
