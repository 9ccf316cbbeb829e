/**
 * Error Handling Middleware
 *
 * Centralized error handling with a consistent error response format,
 * error logging, and sanitized 5xx messages in production.
 */

import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
}

const resolveErrorCode = (err: AppError, statusCode: number | undefined): ErrorCode => {
  if (err.errorCode) return err.errorCode;
  // Framework errors (body-parser, etc.) carry only an HTTP status
  if (statusCode && statusCode < 500) return ErrorCode.VALIDATION_ERROR;
  return ErrorCode.INTERNAL_ERROR;
};

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 */
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const errorCode = resolveErrorCode(err, err.statusCode);
  const statusCode = err.statusCode || errorCodeToStatus[errorCode] || 500;

  const logPayload = {
    errorCode,
    statusCode,
    error: err.message,
    stack: config.isDevelopment ? err.stack : undefined,
    path: req.path,
    method: req.method,
    isOperational: err.isOperational,
  };

  if (statusCode >= 500) {
    logger.error(logPayload, `Error: ${err.message}`);
  } else {
    logger.warn(logPayload, `Request rejected: ${err.message}`);
  }

  const message =
    config.isProduction && statusCode >= 500
      ? 'Internal server error'
      : err.message || 'An error occurred';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  if (err.validationErrors) {
    response.error.details = err.validationErrors;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId: getCorrelationId() || 'unknown',
    },
  };

  res.status(404).json(response);
};

/**
 * API Error class for throwing operational errors
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      statusCode?: number;
      isOperational?: boolean;
      validationErrors?: Record<string, string[]>;
    }
  ) {
    super(message);
    this.name = 'ApiError';
    this.errorCode = code;
    this.statusCode = options?.statusCode || errorCodeToStatus[code] || 500;
    this.isOperational = options?.isOperational ?? true;
    this.validationErrors = options?.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  static unauthorized(message = 'Unauthorized'): ApiError {
    return new ApiError(ErrorCode.UNAUTHORIZED, message);
  }

  static invalidToken(message = 'Invalid token'): ApiError {
    return new ApiError(ErrorCode.INVALID_TOKEN, message);
  }

  static tokenExpired(message = 'Token expired'): ApiError {
    return new ApiError(ErrorCode.TOKEN_EXPIRED, message);
  }

  static validationError(
    message: string,
    validationErrors?: Record<string, string[]>
  ): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, {
      validationErrors,
    });
  }

  static insufficientBalance(message = 'Insufficient balance'): ApiError {
    return new ApiError(ErrorCode.INSUFFICIENT_BALANCE, message);
  }

  static transactionNotFound(message: string): ApiError {
    return new ApiError(ErrorCode.TRANSACTION_NOT_FOUND, message);
  }

  static accountNotFound(accountId: string): ApiError {
    return new ApiError(ErrorCode.ACCOUNT_NOT_FOUND, `Account not found with id: ${accountId}`);
  }

  static accountInactive(accountId: string, status: string): ApiError {
    return new ApiError(ErrorCode.ACCOUNT_INACTIVE, `Account ${accountId} is ${status}`);
  }

  static invalidOperation(message: string): ApiError {
    return new ApiError(ErrorCode.INVALID_TRANSACTION_OPERATION, message);
  }

  static invalidTransition(message: string): ApiError {
    return new ApiError(ErrorCode.INVALID_STATE_TRANSITION, message);
  }

  static concurrentModification(transactionId: string): ApiError {
    return new ApiError(
      ErrorCode.CONCURRENT_MODIFICATION,
      `Transaction ${transactionId} was modified concurrently, reload and try again`
    );
  }

  static duplicateTransaction(message = 'Duplicate transaction'): ApiError {
    return new ApiError(ErrorCode.DUPLICATE_TRANSACTION, message);
  }

  static operationRejected(message: string): ApiError {
    return new ApiError(ErrorCode.ACCOUNT_OPERATION_REJECTED, message);
  }

  static externalService(message: string): ApiError {
    return new ApiError(ErrorCode.EXTERNAL_SERVICE_ERROR, message);
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, {
      isOperational: false,
    });
  }

  static rateLimitExceeded(message = 'Rate limit exceeded'): ApiError {
    return new ApiError(ErrorCode.RATE_LIMIT_EXCEEDED, message);
  }
}
