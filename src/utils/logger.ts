/**
 * Logging configuration using Pino.
 */

import pino from 'pino';
import type { LoggerOptions } from 'pino';
import { LogLevelSchema } from '../config.js';

const level = LogLevelSchema.catch('INFO').parse(process.env.LOG_LEVEL).toLowerCase();

const pretty =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

/**
 * Options shared by the application logger and Fastify's request logger.
 */
export const loggerConfig: LoggerOptions = {
  level,
  transport: pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
};

/**
 * Global logger instance configured with environment settings.
 */
export const logger = pino(loggerConfig);
