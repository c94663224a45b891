import pino from 'pino';

const isDev = process.env.NODE_ENV !== 'production';

/** Scheduler credentials, session cookies and the cookie signing secret. */
export const REDACTED_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'res.headers["set-cookie"]',
  '*.password',
  '*.cookieSecret',
];

export const logger = pino({
  name: process.env.WEBLAB_LOGGER_NAME ?? 'weblab',
  level: process.env.LOG_LEVEL ?? 'info',
  ...(isDev
    ? {
        transport: {
          target: 'pino/file',
          options: { destination: 1 }, // stdout
        },
      }
    : {}),
  redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
});
