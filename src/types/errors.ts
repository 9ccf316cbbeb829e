/**
 * Error Codes for the transaction service API
 *
 * Categorized by error type:
 * - 1xxx: Authentication errors
 * - 2xxx: Validation errors
 * - 3xxx: Business logic errors
 * - 4xxx: Rate limiting errors
 * - 5xxx: System and downstream errors
 */

export enum ErrorCode {
  // Authentication errors (1xxx)
  UNAUTHORIZED = 1001,
  INVALID_TOKEN = 1002,
  TOKEN_EXPIRED = 1003,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_INPUT = 2003,

  // Business errors (3xxx)
  INSUFFICIENT_BALANCE = 3001,
  ACCOUNT_NOT_FOUND = 3003,
  TRANSACTION_NOT_FOUND = 3004,
  DUPLICATE_TRANSACTION = 3006,
  RESOURCE_NOT_FOUND = 3010,
  INVALID_TRANSACTION_OPERATION = 3011,
  INVALID_STATE_TRANSITION = 3012,
  CONCURRENT_MODIFICATION = 3013,
  ACCOUNT_INACTIVE = 3014,
  ACCOUNT_OPERATION_REJECTED = 3015,

  // Rate limiting errors (4xxx)
  RATE_LIMIT_EXCEEDED = 4001,
  TOO_MANY_TRANSACTIONS = 4003,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  DATABASE_ERROR = 5002,
  REDIS_ERROR = 5003,
  EXTERNAL_SERVICE_ERROR = 5006,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Auth errors -> 401
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.INVALID_TOKEN]: 401,
  [ErrorCode.TOKEN_EXPIRED]: 401,

  // Validation errors -> 400
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_INPUT]: 400,

  // Business errors -> 400/404/409/422
  [ErrorCode.INSUFFICIENT_BALANCE]: 400,
  [ErrorCode.ACCOUNT_NOT_FOUND]: 404,
  [ErrorCode.TRANSACTION_NOT_FOUND]: 404,
  [ErrorCode.DUPLICATE_TRANSACTION]: 409,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,
  [ErrorCode.INVALID_TRANSACTION_OPERATION]: 400,
  [ErrorCode.INVALID_STATE_TRANSITION]: 400,
  [ErrorCode.CONCURRENT_MODIFICATION]: 409,
  [ErrorCode.ACCOUNT_INACTIVE]: 400,
  [ErrorCode.ACCOUNT_OPERATION_REJECTED]: 422,

  // Rate limiting errors -> 429
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.TOO_MANY_TRANSACTIONS]: 429,

  // System errors -> 500/502/503
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.DATABASE_ERROR]: 503,
  [ErrorCode.REDIS_ERROR]: 503,
  [ErrorCode.EXTERNAL_SERVICE_ERROR]: 502,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
    timestamp: string;
    correlationId?: string;
  };
}
