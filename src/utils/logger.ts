import { pino } from 'pino';
import { config } from '../config.js';

export const logger = pino({
  level: config.logLevel,
  redact: ['apiKey', '*.apiKey', 'config.apiKey', 'headers.authorization', 'headers["x-api-key"]', 'headers["x-goog-api-key"]'],
  transport:
    config.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export const createChildLogger = (name: string) => logger.child({ name });
