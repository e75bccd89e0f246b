// Shared pino logger
// The server hands this instance to Fastify so route and service logs share one stream

import { pino } from 'pino';
import { env } from './env.js';

const isTest = env.NODE_ENV === 'test';

export const logger = pino({
  level: isTest ? 'silent' : env.LOG_LEVEL,
  ...(isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }),
});

export function componentLogger(component: string) {
  return logger.child({ component });
}
