import pino from 'pino';
import type { LogLevel } from '../config/config.js';

export type Logger = pino.Logger;

/**
 * Logger tagged with a component name. Writes to stderr so CLI output on
 * stdout stays machine-readable; tests pass `'silent'`.
 */
export function createLogger(component: string, level: LogLevel = 'info'): Logger {
  return pino({ level }, pino.destination(2)).child({ component });
}
