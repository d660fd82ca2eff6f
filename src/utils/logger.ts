import pino, { Logger } from 'pino';
import { LogLevel } from '../types';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  // Route output to stderr so stdout stays free for command output
  stderr?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const config = {
    level: options.level || 'info',
    name: options.name || 'jokebot'
  };

  return options.stderr
    ? pino(config, pino.destination(2))
    : pino(config);
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export type { Logger };
