import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from './config.js';

/** Logger for the facade's own diagnostics. */
export function createLogger(name: string, level: LogLevel): Logger {
  return pino({ name, level });
}
