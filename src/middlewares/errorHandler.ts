/**
 * Error Handling Middleware
 *
 * Provides centralized error handling with consistent error response format,
 * error logging, and appropriate error sanitization for production.
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

const isErrorCode = (value: number): value is ErrorCode =>
  Object.prototype.hasOwnProperty.call(errorCodeToStatus, value);

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 * Logs errors with correlation ID for traceability.
 */
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  // Body parser failures arrive with a status but no error code
  const errorCode =
    err.errorCode ?? (err.statusCode === 400 ? ErrorCode.VALIDATION_ERROR : ErrorCode.INTERNAL_ERROR);
  const statusCode = err.statusCode || errorCodeToStatus[errorCode] || 500;

  const logPayload = {
    correlationId,
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
    logger.warn(logPayload, `Error: ${err.message}`);
  }

  // Sanitize error message for production 5xx errors
  const message =
    config.isProduction && statusCode >= 500
      ? 'Internal server error'
      : err.message || 'An error occurred';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      reason: ErrorCode[errorCode],
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
  const correlationId = getCorrelationId() || 'unknown';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.RESOURCE_NOT_FOUND,
      reason: ErrorCode[ErrorCode.RESOURCE_NOT_FOUND],
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  res.status(404).json(response);
};

/**
 * Map HTTP status codes to error codes for status-style construction
 */
const statusToErrorCode: Record<number, ErrorCode> = {
  400: ErrorCode.VALIDATION_ERROR,
  401: ErrorCode.UNAUTHORIZED,
  403: ErrorCode.FORBIDDEN,
  404: ErrorCode.RESOURCE_NOT_FOUND,
  500: ErrorCode.INTERNAL_ERROR,
  503: ErrorCode.DATABASE_ERROR,
};

/**
 * API Error class for throwing operational errors
 *
 * Accepts either an ErrorCode or an HTTP status code. Every rejected ledger
 * precondition is raised through one of the static factories below.
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;

  constructor(
    codeOrStatus: ErrorCode | number,
    message: string,
    options?: {
      statusCode?: number;
      isOperational?: boolean;
      validationErrors?: Record<string, string[]>;
    }
  ) {
    super(message);
    this.name = 'ApiError';

    // ErrorCodes are 1000+ while HTTP status codes are < 600
    if (codeOrStatus >= 1000 && isErrorCode(codeOrStatus)) {
      this.errorCode = codeOrStatus;
      this.statusCode = options?.statusCode || errorCodeToStatus[codeOrStatus];
    } else {
      this.statusCode = codeOrStatus;
      this.errorCode = statusToErrorCode[codeOrStatus] || ErrorCode.INTERNAL_ERROR;
    }

    this.isOperational = options?.isOperational ?? true;
    this.validationErrors = options?.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Factory methods for authentication and validation failures
   */
  static unauthorized(message = 'Unauthorized'): ApiError {
    return new ApiError(ErrorCode.UNAUTHORIZED, message);
  }

  static invalidToken(message = 'Invalid token'): ApiError {
    return new ApiError(ErrorCode.INVALID_TOKEN, message);
  }

  static tokenExpired(message = 'Token expired'): ApiError {
    return new ApiError(ErrorCode.TOKEN_EXPIRED, message);
  }

  static forbidden(message = 'Forbidden'): ApiError {
    return new ApiError(ErrorCode.FORBIDDEN, message);
  }

  static validationError(
    message: string,
    validationErrors?: Record<string, string[]>
  ): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, {
      validationErrors,
    });
  }

  static invalidInput(message: string): ApiError {
    return new ApiError(ErrorCode.INVALID_INPUT, message);
  }

  static invalidAmount(message = 'Amount must be an unsigned 256-bit integer'): ApiError {
    return new ApiError(ErrorCode.INVALID_AMOUNT, message);
  }

  /**
   * Factory methods for the ledger failure taxonomy
   */
  static notOwner(message = 'Caller is not the owner'): ApiError {
    return new ApiError(ErrorCode.NOT_OWNER, message);
  }

  static notAuthorized(message = 'Caller is not authorized'): ApiError {
    return new ApiError(ErrorCode.NOT_AUTHORIZED, message);
  }

  static invalidAddress(message = 'Address must not be the zero address'): ApiError {
    return new ApiError(ErrorCode.INVALID_ADDRESS, message);
  }

  static invalidRecipient(message = 'Recipient must not be the zero address'): ApiError {
    return new ApiError(ErrorCode.INVALID_RECIPIENT, message);
  }

  static insufficientBalance(message = 'Insufficient balance'): ApiError {
    return new ApiError(ErrorCode.INSUFFICIENT_BALANCE, message);
  }

  static insufficientAllowance(message = 'Insufficient allowance'): ApiError {
    return new ApiError(ErrorCode.INSUFFICIENT_ALLOWANCE, message);
  }

  static insufficientEscrowBalance(message = 'Insufficient escrow balance'): ApiError {
    return new ApiError(ErrorCode.INSUFFICIENT_ESCROW_BALANCE, message);
  }

  static noBalance(message = 'No available escrow balance'): ApiError {
    return new ApiError(ErrorCode.NO_BALANCE, message);
  }

  static lengthMismatch(message = 'Recipients and amounts must be the same length'): ApiError {
    return new ApiError(ErrorCode.LENGTH_MISMATCH, message);
  }

  static escrowNotConfigured(message = 'Escrow contract address is not configured'): ApiError {
    return new ApiError(ErrorCode.ESCROW_NOT_CONFIGURED, message);
  }

  static arithmeticOverflow(message = 'Arithmetic overflow'): ApiError {
    return new ApiError(ErrorCode.ARITHMETIC_OVERFLOW, message);
  }

  static contractUnreachable(address: string): ApiError {
    return new ApiError(ErrorCode.CONTRACT_UNREACHABLE, `No compatible contract at ${address}`);
  }

  static migrationNotConfigured(message = 'Legacy token migration is not configured'): ApiError {
    return new ApiError(ErrorCode.MIGRATION_NOT_CONFIGURED, message);
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, {
      isOperational: false,
    });
  }
}
