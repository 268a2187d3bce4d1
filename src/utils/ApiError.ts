// src/utils/ApiError.ts
import httpStatus from 'http-status';

export type ErrorDetails = Record<string, unknown>;

class ApiError extends Error {
  public statusCode: number;
  public isOperational: boolean;
  /** Stable, machine-readable reason (e.g. `SHIFT_ALREADY_OPEN`) for bot handlers and UIs. */
  public code: string;
  public errorDetails?: ErrorDetails;

  /**
   * @param statusCode - HTTP status sent to the caller.
   * @param isOperational - false marks a programming error; its message is masked in production.
   * @param stack - Preserved when wrapping another error.
   */
  constructor(
    statusCode: number,
    message: string,
    isOperational = true,
    errorDetails?: ErrorDetails,
    stack = '',
    code?: string
  ) {
    super(message);

    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.code = code ?? defaultCodeFor(statusCode);
    if (errorDetails) {
      this.errorDetails = errorDetails;
    }

    Object.setPrototypeOf(this, new.target.prototype);

    if (stack) {
      this.stack = stack;
    } else {
      Error.captureStackTrace(this, this.constructor);
    }

    this.name = this.constructor.name;
  }

  static notFound(message: string = httpStatus[httpStatus.NOT_FOUND], details?: ErrorDetails): ApiError {
    return new ApiError(httpStatus.NOT_FOUND, message, true, details);
  }

  static internal(message: string = httpStatus[httpStatus.INTERNAL_SERVER_ERROR], details?: ErrorDetails, originalError?: Error): ApiError {
    return new ApiError(httpStatus.INTERNAL_SERVER_ERROR, message, false, details, originalError?.stack);
  }
}

function defaultCodeFor(statusCode: number): string {
  switch (statusCode) {
    case httpStatus.BAD_REQUEST:
      return 'BAD_REQUEST';
    case httpStatus.NOT_FOUND:
      return 'NOT_FOUND';
    case httpStatus.CONFLICT:
      return 'CONFLICT';
    case httpStatus.TOO_MANY_REQUESTS:
      return 'TOO_MANY_REQUESTS';
    default:
      return statusCode >= 500 ? 'INTERNAL_ERROR' : 'REQUEST_FAILED';
  }
}

export default ApiError;
