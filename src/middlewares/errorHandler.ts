import { NextFunction, Request, Response } from 'express';

import { CustomError } from 'App/errors/CustomError';
import type { Logger } from 'App/logger';
// --------------------------------------------------------------

/**
 * Builds the global error handling middleware. Errors thrown in routes are
 * logged and answered with `{ code, message, details }`; anything that is not
 * a CustomError becomes a 500 without leaking its message.
 */
export function createErrorHandler(logger: Logger) {
  return function errorHandler(
    err: CustomError | Error,
    req: Request,
    res: Response,
    // express recognizes error middleware by its four parameters
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    next: NextFunction,
  ): void {
    const statusCode: number = err instanceof CustomError ? err.statusCode : 500;
    const code: string =
      err instanceof CustomError ? err.code : 'INTERNAL_SERVER_ERROR';
    const message: string =
      err instanceof CustomError ? err.message : 'An unexpected error occurred';
    const details = err instanceof CustomError ? err.details : undefined;

    logger.error('Error occurred', {
      statusCode,
      code,
      message: err.message,
      method: req.method,
      url: req.originalUrl,
      stack: err.stack,
    });

    res.status(statusCode).json({
      code,
      message,
      details,
    });
  };
}

export default createErrorHandler;
