import pino from 'pino';

const env = process.env.NODE_ENV;
const isTest = env === 'test';
const isDev = env !== 'production' && !isTest;

export const logger = pino({
  name: 'midprice-analytics',
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  redact: {
    paths: ['apiKey', 'token', 'password', '*.apiKey', '*.token', '*.password'],
    censor: '[REDACTED]',
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
});

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return logger.child({ module: name });
}
