import { pino } from 'pino';

const nodeEnv = process.env.NODE_ENV ?? 'development';

export const logger = pino({
  level: process.env.LOG_LEVEL?.trim() || (nodeEnv === 'test' ? 'silent' : 'info'),
  base: { service: 'countryfx-api' },
  redact: { paths: ['req.headers.authorization', 'req.headers.cookie'], remove: true },
});

export type Logger = typeof logger;
