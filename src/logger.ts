import pino from 'pino';

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const satisfies readonly LogLevel[];

export function createLogger(level: LogLevel = 'silent'): Logger {
  return pino({
    name: 'things-db-reader',
    level,
    base: null,
  });
}
