import { destination, pino } from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from '../types/index.js';

export type { Logger };

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

/**
 * Operational logger. Writes JSON lines to stderr so stdout stays free for
 * the CLI's event stream.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? 'wizard-runner',
      level: options.level ?? 'info',
      redact: { paths: ['userData', '*.userData', 'value', '*.value'], censor: '[redacted]' },
    },
    destination(2),
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
