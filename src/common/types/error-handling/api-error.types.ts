/**
 * API error types
 */

export interface ApiErrorResponse {
  success: false;
  error: string;
  code: ApiErrorCodes;
  message: string;
  timestamp: number;
  requestId: string;
  details?: Record<string, unknown>;
}

export enum ApiErrorCodes {
  // Client errors (4xxx)
  VALIDATION_FAILED = 4000,
  INVALID_PRICE = 4001,
  INVALID_ASSET = 4002,
  MISSING_CALLER = 4011,
  NOT_AUTHORIZED = 4031,
  ROUTE_NOT_FOUND = 4040,
  SOURCE_NOT_FOUND = 4041,
  STALE_PRICE = 4091,
  ALREADY_EXISTS = 4092,
  INSUFFICIENT_SOURCES = 4221,

  // Server errors (5xxx)
  INTERNAL_ERROR = 5001,
}
