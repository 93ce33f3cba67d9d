/**
 * Error Codes for the ledger API
 *
 * Categorized by error type:
 * - 1xxx: Authentication errors
 * - 2xxx: Validation errors
 * - 3xxx: Ledger errors (a rejected precondition of a ledger entry point)
 * - 4xxx: Rate limiting errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Authentication errors (1xxx)
  UNAUTHORIZED = 1001,
  INVALID_TOKEN = 1002,
  TOKEN_EXPIRED = 1003,
  FORBIDDEN = 1004,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_INPUT = 2003,

  // Ledger errors (3xxx)
  INSUFFICIENT_BALANCE = 3001,
  NOT_OWNER = 3002,
  NOT_AUTHORIZED = 3003,
  INVALID_ADDRESS = 3004,
  INVALID_RECIPIENT = 3005,
  INSUFFICIENT_ALLOWANCE = 3006,
  INSUFFICIENT_ESCROW_BALANCE = 3007,
  NO_BALANCE = 3008,
  LENGTH_MISMATCH = 3009,
  ESCROW_NOT_CONFIGURED = 3010,
  ARITHMETIC_OVERFLOW = 3011,
  CONTRACT_UNREACHABLE = 3012,
  MIGRATION_NOT_CONFIGURED = 3013,
  RESOURCE_NOT_FOUND = 3014,

  // Rate limiting errors (4xxx)
  RATE_LIMIT_EXCEEDED = 4001,
  TOO_MANY_TOKEN_REQUESTS = 4002,
  TOO_MANY_LEDGER_CALLS = 4003,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  DATABASE_ERROR = 5002,
  LEDGER_STORE_ERROR = 5006,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Auth errors -> 401/403
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.INVALID_TOKEN]: 401,
  [ErrorCode.TOKEN_EXPIRED]: 401,
  [ErrorCode.FORBIDDEN]: 403,

  // Validation errors -> 400
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_INPUT]: 400,

  // Ledger errors -> 400/403/404/409/502
  [ErrorCode.INSUFFICIENT_BALANCE]: 400,
  [ErrorCode.NOT_OWNER]: 403,
  [ErrorCode.NOT_AUTHORIZED]: 403,
  [ErrorCode.INVALID_ADDRESS]: 400,
  [ErrorCode.INVALID_RECIPIENT]: 400,
  [ErrorCode.INSUFFICIENT_ALLOWANCE]: 400,
  [ErrorCode.INSUFFICIENT_ESCROW_BALANCE]: 409,
  [ErrorCode.NO_BALANCE]: 409,
  [ErrorCode.LENGTH_MISMATCH]: 400,
  [ErrorCode.ESCROW_NOT_CONFIGURED]: 409,
  [ErrorCode.ARITHMETIC_OVERFLOW]: 400,
  [ErrorCode.CONTRACT_UNREACHABLE]: 502,
  [ErrorCode.MIGRATION_NOT_CONFIGURED]: 409,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  // Rate limiting errors -> 429
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.TOO_MANY_TOKEN_REQUESTS]: 429,
  [ErrorCode.TOO_MANY_LEDGER_CALLS]: 429,

  // System errors -> 500/503
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.DATABASE_ERROR]: 503,
  [ErrorCode.LEDGER_STORE_ERROR]: 503,
};

/**
 * Standard error response format
 *
 * `reason` is the symbolic name of `code` (e.g. INSUFFICIENT_ALLOWANCE).
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    reason: string;
    message: string;
    details?: Record<string, string[]>;
    timestamp: string;
    correlationId?: string;
  };
}
