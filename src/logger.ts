import config from 'config';
import { pino } from 'pino';

const fileLevel = config.has('logLevel') ? config.get<string>('logLevel') : 'info';
const logLevel = process.env.LOG_LEVEL || fileLevel;

export const logger = pino({
  level: logLevel,
  redact: {
    paths: ['headers["x-ima-cookie"]', 'headers["x-ima-bkn"]', 'headers.authorization', 'headers.cookie'],
    censor: '[redacted]',
  },
});

export type { Logger } from 'pino';
