// src/logging.ts
// What: Application logger.
// How: Creates a pino logger. In development, attempts to use pino-pretty transport for readable logs.
//      Tests run silent unless LOG_LEVEL says otherwise. Services take child loggers tagged with their module.

import pino, { Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

const nodeEnv = process.env.NODE_ENV;
const isDev = nodeEnv !== 'production' && nodeEnv !== 'test';
const defaultLevel = nodeEnv === 'test' ? 'silent' : isDev ? 'debug' : 'info';

const baseOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL || defaultLevel,
};

function createLogger(): Logger {
  // Try pretty transport in development; fall back to standard if unavailable.
  if (isDev) {
    try {
      return pino({
        ...baseOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            singleLine: false,
          },
        },
      });
    } catch {
      return pino(baseOptions);
    }
  }
  return pino(baseOptions);
}

const logger = createLogger();

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}

export default logger;
