// src/middleware/error.middleware.ts
import { Request, Response, NextFunction } from 'express';
import { env } from '@/config';
import logger from '@/utils/logger';
import ApiError, { type ErrorDetails } from '@/utils/ApiError';
import httpStatus from 'http-status';
import {
  PG_CHECK_VIOLATION,
  PG_FOREIGN_KEY_VIOLATION,
  PG_UNIQUE_VIOLATION,
  isPostgresError,
} from '@/db/pg-errors';

/** body-parser marks malformed JSON with `type: 'entity.parse.failed'` and a numeric status. */
const hasStatusCode = (error: unknown): error is { statusCode: number } =>
  typeof error === 'object' &&
  error !== null &&
  'statusCode' in error &&
  typeof error.statusCode === 'number';

/**
 * Middleware to convert non-ApiError errors into ApiError instances.
 * Ensures consistent error structure before the final error handler.
 * PostgreSQL constraint errors raised through `postgres` become operational 4xx errors.
 */
export const errorConverter = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  if (err instanceof ApiError) {
    return next(err);
  }

  let statusCode: number;
  let message: string;
  let isOperational = false; // Assume non-ApiErrors are programming errors unless identified otherwise
  let details: ErrorDetails | undefined;
  let code: string | undefined;

  if (isPostgresError(err)) {
    switch (err.code) {
      case PG_UNIQUE_VIOLATION:
        isOperational = true;
        statusCode = httpStatus.CONFLICT;
        message = `Record already exists or violates unique constraint${err.constraint_name ? ` ${err.constraint_name}` : ''}.`;
        code = 'UNIQUE_VIOLATION';
        details = { pgCode: err.code, constraint: err.constraint_name };
        break;
      case PG_FOREIGN_KEY_VIOLATION:
        isOperational = true;
        statusCode = httpStatus.BAD_REQUEST;
        message = 'Invalid reference: a related record does not exist.';
        code = 'FOREIGN_KEY_VIOLATION';
        details = { pgCode: err.code, constraint: err.constraint_name };
        break;
      case PG_CHECK_VIOLATION:
        isOperational = true;
        statusCode = httpStatus.BAD_REQUEST;
        message = 'The operation would break a ledger constraint.';
        code = 'CHECK_VIOLATION';
        details = { pgCode: err.code, constraint: err.constraint_name };
        break;
      default:
        logger.warn(`Unhandled PostgreSQL error code: ${err.code}`);
        statusCode = httpStatus.INTERNAL_SERVER_ERROR;
        message = 'A database error occurred.';
        details = { pgCode: err.code };
        break;
    }
  } else {
    statusCode = hasStatusCode(err) ? err.statusCode : httpStatus.INTERNAL_SERVER_ERROR;
    message =
      err instanceof Error && err.message
        ? err.message
        : 'An unexpected error occurred';
    // A specific status below 500 was set on purpose
    isOperational = statusCode < 500;
  }

  next(new ApiError(statusCode, message, isOperational, details, err instanceof Error ? err.stack : '', code));
};

/**
 * Final Express error handling middleware.
 * Sends `{ code, message, details?, stack? }` based on the ApiError instance.
 */
// eslint-disable-next-line @typescript-eslint/no-unused-vars
export const errorHandler = (err: ApiError, req: Request, res: Response, next: NextFunction) => {
  let { statusCode, message, errorDetails, code } = err;
  const { isOperational } = err;

  // In production, prevent leaking details of non-operational (programming) errors
  if (env.NODE_ENV === 'production' && !isOperational) {
    statusCode = httpStatus.INTERNAL_SERVER_ERROR;
    message = httpStatus[httpStatus.INTERNAL_SERVER_ERROR];
    errorDetails = undefined;
    code = 'INTERNAL_ERROR';
  }

  res.locals.errorMessage = err.message;

  const response: Record<string, unknown> = {
    code,
    message,
    ...(errorDetails && { details: errorDetails }),
    ...(env.NODE_ENV === 'development' && { stack: err.stack }),
  };

  if (env.NODE_ENV === 'development') {
    logger.error('Error caught by handler:', err);
  } else if (statusCode >= 500) {
    logger.error(
      `[${statusCode}${isOperational ? '' : ' NON-OPERATIONAL'}] ${message} - ${req.method} ${req.originalUrl} - IP: ${req.ip}` +
        `${err.stack && !isOperational ? `\nStack: ${err.stack}` : ''}`
    );
  } else {
    logger.warn(`[${statusCode}] ${message} - ${req.method} ${req.originalUrl}`);
  }

  res.status(statusCode).send(response);
};
