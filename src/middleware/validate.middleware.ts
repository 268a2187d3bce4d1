// src/middleware/validate.middleware.ts
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { validate, ValidationError } from 'class-validator';
import { plainToInstance, ClassConstructor } from 'class-transformer';
import ApiError from '@/utils/ApiError';
import httpStatus from 'http-status';
import logger from '@/utils/logger';

type RequestSource = 'body' | 'query' | 'params';

/**
 * Recursively extracts constraint messages from validation errors.
 * @param errors - Array of ValidationErrors.
 * @returns An array of string error messages.
 */
const formatValidationErrors = (errors: ValidationError[]): string[] => {
  let messages: string[] = [];
  errors.forEach((err) => {
    if (err.constraints) {
      messages = messages.concat(Object.values(err.constraints));
    }
    // nested DTOs
    if (err.children && err.children.length > 0) {
      messages = messages.concat(formatValidationErrors(err.children));
    }
  });
  return messages;
};

/**
 * Middleware factory that validates `req[source]` against a DTO class.
 *
 * On success the plain object is replaced by the transformed DTO instance
 * (`@Type` conversions applied, unknown properties stripped), which controllers
 * read back through {@link getValidated}.
 */
const validateRequest = <T extends object>(
    dtoClass: ClassConstructor<T>,
    source: RequestSource = 'body',
    skipMissingProperties = false
): RequestHandler => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const dtoInstance = plainToInstance(dtoClass, req[source] ?? {});

    const errors = await validate(dtoInstance, {
        skipMissingProperties,
        whitelist: true,
        forbidNonWhitelisted: true,
        forbidUnknownValues: true,
    });

    if (errors.length > 0) {
      const errorMessages = formatValidationErrors(errors);
      const message = `Input validation failed: ${errorMessages.join(', ')}`;
      logger.warn(`Validation Error (${req.method} ${req.originalUrl}): ${message}`);
      return next(new ApiError(httpStatus.BAD_REQUEST, message, true, { errors: errorMessages }));
    }

    req[source] = dtoInstance;
    next();
  };
};

/**
 * Reads the DTO that {@link validateRequest} left on the request. Throws when the
 * route was mounted without the matching validator.
 */
export const getValidated = <T extends object>(
    req: Request,
    dtoClass: ClassConstructor<T>,
    source: RequestSource = 'body'
): T => {
  const value: unknown = req[source];
  if (value instanceof dtoClass) {
    return value;
  }
  throw ApiError.internal(`Request ${source} was not validated as ${dtoClass.name}.`);
};

export default validateRequest;
