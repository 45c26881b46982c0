/**
 * Application logger
 */

import pino from 'pino';

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export const logger = pino({
  name: 'http-signature',
  level: defaultLevel(),
  // The pretty transport runs in a worker thread; only start it when asked for
  ...(process.env.LOG_PRETTY === 'true' ? {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  } : {}),
});
