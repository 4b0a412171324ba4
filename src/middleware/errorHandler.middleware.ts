/**
 * Error Handler Middleware
 *
 * Global error handling for the API
 * - Catches and formats all errors
 * - Maps database error codes to client errors
 * - Logs errors for debugging
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../config/logger';

/**
 * Custom error class with additional properties
 */
export class ApiError extends Error {
  statusCode: number;
  isOperational: boolean;
  details?: unknown;

  constructor(
    statusCode: number,
    message: string,
    isOperational = true,
    details?: unknown,
    stack = ''
  ) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;

    if (stack) {
      this.stack = stack;
    } else {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Common API errors
 */
export class BadRequestError extends ApiError {
  constructor(message = 'Bad Request', details?: unknown) {
    super(400, message, true, details);
  }
}

export class NotFoundError extends ApiError {
  constructor(message = 'Resource not found') {
    super(404, message, true);
  }
}

export class ConflictError extends ApiError {
  constructor(message = 'Conflict', details?: unknown) {
    super(409, message, true, details);
  }
}

/**
 * A stored snapshot whose payload cannot be parsed into the snapshot schema.
 */
export class CorruptSnapshotError extends ApiError {
  constructor(message = 'Snapshot payload is corrupt', details?: unknown) {
    super(422, message, true, details);
  }
}

export class InternalServerError extends ApiError {
  constructor(message = 'Internal Server Error') {
    super(500, message, false);
  }
}

export class ServiceUnavailableError extends ApiError {
  constructor(message = 'Service Unavailable') {
    super(503, message, false);
  }
}

interface DatabaseErrorLike {
  code: string;
  message?: string;
  constraint?: string;
  column?: string;
  detail?: string;
}

const isDatabaseError = (err: unknown): err is DatabaseErrorLike =>
  typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';

/**
 * Convert error to API error format
 */
const convertToApiError = (err: unknown): ApiError => {
  // Already an API error
  if (err instanceof ApiError) {
    return err;
  }

  // Database errors
  if (isDatabaseError(err)) {
    switch (err.code) {
      case '23505': // Unique violation
        return new ConflictError('Duplicate entry found', { field: err.constraint });
      case '23503': // Foreign key violation
        return new BadRequestError('Referenced resource not found', { field: err.constraint });
      case '23502': // Not null violation
        return new BadRequestError('Required field missing', { field: err.column });
      case '22P02': // Invalid text representation
        return new BadRequestError('Invalid data format');
      case 'ECONNREFUSED':
        return new ServiceUnavailableError('Database connection refused');
      case 'ETIMEDOUT':
        return new ServiceUnavailableError('Request timeout');
      default:
        logger.error('Unhandled database error', { code: err.code, message: err.message, detail: err.detail });
        return new InternalServerError('Database error');
    }
  }

  // Malformed JSON body from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    return new BadRequestError('Malformed JSON body');
  }

  // Default to internal server error
  const message = err instanceof Error && err.message ? err.message : 'An unexpected error occurred';
  return new InternalServerError(message);
};

/**
 * Global error handler middleware
 * Must be the last middleware in the chain
 */
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler
  next: NextFunction
): void => {
  const apiError = convertToApiError(err);

  const errorLog = {
    message: apiError.message,
    statusCode: apiError.statusCode,
    path: req.path,
    method: req.method,
    ip: req.ip,
    requestId: res.locals.requestId,
    stack: apiError.stack,
    details: apiError.details
  };

  if (apiError.statusCode >= 500) {
    logger.error('Server error', errorLog);
  } else if (apiError.statusCode >= 400) {
    logger.warn('Client error', errorLog);
  }

  const response: {
    success: false;
    message: string;
    statusCode: number;
    details?: unknown;
    stack?: string;
  } = {
    success: false,
    message: apiError.message,
    statusCode: apiError.statusCode
  };

  // Include details for client errors (4xx)
  if (apiError.statusCode < 500 && apiError.details) {
    response.details = apiError.details;
  }

  // Include stack trace in development mode only
  if (process.env.NODE_ENV === 'development' && apiError.stack) {
    response.stack = apiError.stack;
  }

  res.status(apiError.statusCode).json(response);
};

/**
 * 404 handler for undefined routes
 */
export const notFoundHandler = (req: Request, res: Response, next: NextFunction): void => {
  const error = new NotFoundError(`Route ${req.method} ${req.path} not found`);
  next(error);
};

/**
 * Async handler wrapper
 * Catches errors in async route handlers
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

export default errorHandler;
