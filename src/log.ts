import pino from 'pino';
import { env } from './env';

// Logs go to stderr; stdout carries dictated text.
export const log = pino(
  {
    name: 'dictation-runtime',
    level: env.LOG_LEVEL,
    redact: {
      paths: ['apiKey', 'api_key', 'authorization', 'headers.authorization', 'headers.Authorization'],
      censor: '[REDACTED]',
    },
  },
  pino.destination({ dest: 2, sync: true }),
);

export type Logger = typeof log;
