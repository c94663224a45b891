import type { Request, Response, NextFunction } from 'express';
import { AppError } from '../errors.js';
import { logger } from '../logger.js';

/** body-parser tags its errors with a `type`, e.g. `entity.parse.failed`. */
function bodyParserErrorType(err: Error): unknown {
  return 'type' in err ? err.type : undefined;
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof AppError) {
    logger.warn({ err, statusCode: err.statusCode, code: err.code }, err.message);
    res.status(err.statusCode).json({
      error: {
        code: err.code,
        message: err.message,
      },
    });
    return;
  }

  const bodyError = bodyParserErrorType(err);
  if (bodyError === 'entity.parse.failed') {
    logger.warn({ err }, 'Malformed request body');
    res.status(400).json({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Malformed JSON body',
      },
    });
    return;
  }
  if (bodyError === 'entity.too.large') {
    logger.warn({ err }, 'Request body too large');
    res.status(413).json({
      error: {
        code: 'PAYLOAD_TOO_LARGE',
        message: 'Request body too large',
      },
    });
    return;
  }

  // Unexpected error
  logger.error({ err }, 'Unhandled error');
  res.status(500).json({
    error: {
      code: 'INTERNAL_ERROR',
      message:
        process.env.NODE_ENV === 'production'
          ? 'Internal server error'
          : err.message,
    },
  });
}
