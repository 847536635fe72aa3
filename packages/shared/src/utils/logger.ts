import pino from 'pino';
import { RUNPROF_LOG_LEVEL, RUNPROF_NAME } from '../constants.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
  /** File path or file descriptor. Defaults to stderr so the child's stdout mirror stays clean. */
  destination?: string | number;
}

export function createLogger(options: CreateLoggerOptions = {}): pino.Logger {
  const { name = RUNPROF_NAME, level = 'warn', pretty = false, destination = 2 } = options;

  const transport =
    pretty && destination === 2
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            destination: 2,
            translateTime: 'SYS:HH:MM:ss.l',
            ignore: 'pid,hostname',
          },
        }
      : undefined;

  if (transport) {
    return pino({
      name,
      level,
      transport,
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }

  return pino(
    {
      name,
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    pino.destination({ dest: destination, sync: true }),
  );
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

let defaultLogger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger({
      level: isLogLevel(RUNPROF_LOG_LEVEL) ? RUNPROF_LOG_LEVEL : 'warn',
      pretty: process.stderr.isTTY === true,
    });
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: pino.Logger): void {
  defaultLogger = logger;
}
