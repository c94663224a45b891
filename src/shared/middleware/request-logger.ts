import { pinoHttp } from 'pino-http';
import { logger } from '../logger.js';

export const requestLogger = pinoHttp({
  logger,
  // The scheduler polls status every few seconds
  autoLogging: {
    ignore: (req) => req.url?.endsWith('/status') ?? false,
  },
});
