import pino from 'pino';
import { env } from './env';

/**
 * Shared pino options. Fastify is built with the same options so request
 * logs and service logs share one format.
 */
export const loggerOptions: pino.LoggerOptions = {
  level: env.LOG_LEVEL,
  transport:
    env.NODE_ENV === 'development'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
};

export const logger = pino(loggerOptions);
