import pino from 'pino';

const level = process.env.NODE_ENV === 'test' ? 'silent' : process.env.LOG_LEVEL || 'info';

export const logger = pino({
  level,
  base: { app: 'voice-minutes-server' },
  timestamp: pino.stdTimeFunctions.isoTime
});

/**
 * Child logger bound to a component, e.g. `createLogger({ service: 'SessionRegistry' })`
 */
export function createLogger(bindings: Record<string, string>): pino.Logger {
  return logger.child(bindings);
}
