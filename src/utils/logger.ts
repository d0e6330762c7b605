import { pino, type LoggerOptions } from 'pino';
import { loadLoggingConfig } from '../config.js';

const { level, pretty } = loadLoggingConfig();

/** Shared by the application logger and the API server's request logger. */
export const loggerOptions: LoggerOptions = {
  level,
  ...(pretty
    ? { transport: { target: 'pino-pretty', options: { colorize: true } } }
    : {}),
};

export const logger = pino(loggerOptions);

export type Logger = typeof logger;
