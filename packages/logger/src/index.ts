import pino, { type Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({ level: process.env.LOG_LEVEL || 'info' });

/**
 * Child logger tagged with the component that writes through it.
 */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}
