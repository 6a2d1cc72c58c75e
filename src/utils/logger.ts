import pino from 'pino';

const redactionPaths = [
  'req.headers.authorization',
  'req.headers["x-api-key"]',
  'req.headers["x-core-token"]',
  '*.authorization',
  '*.apiKey',
  '*.token',
];

export const logger = pino({
  name: process.env.SERVICE_NAME || 'dc-thermal-core',
  level: process.env.LOG_LEVEL || 'info',
  redact: { paths: redactionPaths, censor: '[REDACTED]' },
});

export type { Logger } from 'pino';
