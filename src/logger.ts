import pino from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  name?: string;
}

export type Logger = pino.Logger;

/**
 * Create the root logger. Output goes to stderr: stdout carries the MCP stdio stream.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level ?? 'info',
    name: options.name ?? 'tutor-persona',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (options.pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

/**
 * Logger that drops everything; used where no logger is injected
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
