import { HttpException, HttpStatus } from "@nestjs/common";
import { v4 as uuidv4 } from "uuid";
import { type OracleError, OracleErrorKind } from "@/oracle/errors/oracle.errors";
import { ApiErrorCodes, type ApiErrorResponse } from "@/common/types/error-handling";

interface ErrorMapping {
  status: HttpStatus;
  code: ApiErrorCodes;
}

const ORACLE_ERROR_MAPPINGS: Readonly<Record<OracleErrorKind, ErrorMapping>> = {
  [OracleErrorKind.NotAuthorized]: { status: HttpStatus.FORBIDDEN, code: ApiErrorCodes.NOT_AUTHORIZED },
  [OracleErrorKind.InvalidPrice]: { status: HttpStatus.BAD_REQUEST, code: ApiErrorCodes.INVALID_PRICE },
  [OracleErrorKind.StalePrice]: { status: HttpStatus.CONFLICT, code: ApiErrorCodes.STALE_PRICE },
  [OracleErrorKind.SourceNotFound]: { status: HttpStatus.NOT_FOUND, code: ApiErrorCodes.SOURCE_NOT_FOUND },
  [OracleErrorKind.AlreadyExists]: { status: HttpStatus.CONFLICT, code: ApiErrorCodes.ALREADY_EXISTS },
  [OracleErrorKind.InsufficientSources]: {
    status: HttpStatus.UNPROCESSABLE_ENTITY,
    code: ApiErrorCodes.INSUFFICIENT_SOURCES,
  },
  [OracleErrorKind.InvalidAsset]: { status: HttpStatus.BAD_REQUEST, code: ApiErrorCodes.INVALID_ASSET },
};

/**
 * Error response builder to standardize error formats
 */
export class ErrorResponseBuilder {
  static generateRequestId(): string {
    return uuidv4();
  }

  static createErrorResponse(
    errorCode: ApiErrorCodes,
    message: string,
    requestId?: string,
    details?: Record<string, unknown>
  ): ApiErrorResponse {
    return {
      success: false,
      error: ApiErrorCodes[errorCode],
      code: errorCode,
      message,
      timestamp: Date.now(),
      requestId: requestId || this.generateRequestId(),
      details,
    };
  }

  /**
   * Translate an engine failure into its HTTP form; the error kind and its
   * stable numeric code travel in `details`.
   */
  static fromOracleError(error: OracleError, requestId?: string): HttpException {
    const { status, code } = ORACLE_ERROR_MAPPINGS[error.kind];
    const errorResponse = this.createErrorResponse(code, error.message, requestId, {
      kind: error.kind,
      oracleCode: error.code,
      ...error.context,
    });

    return new HttpException(errorResponse, status);
  }

  static createValidationError(message: string, requestId?: string, details?: Record<string, unknown>): HttpException {
    const errorResponse = this.createErrorResponse(ApiErrorCodes.VALIDATION_FAILED, message, requestId, details);
    return new HttpException(errorResponse, HttpStatus.BAD_REQUEST);
  }

  static createMissingCallerError(header: string, requestId?: string): HttpException {
    const errorResponse = this.createErrorResponse(
      ApiErrorCodes.MISSING_CALLER,
      `Missing caller identity header: ${header}`,
      requestId,
      { header }
    );
    return new HttpException(errorResponse, HttpStatus.UNAUTHORIZED);
  }

  /**
   * The underlying failure is logged by the caller, never sent to the client
   */
  static createInternalError(requestId?: string): HttpException {
    const errorResponse = this.createErrorResponse(ApiErrorCodes.INTERNAL_ERROR, "Internal server error", requestId);
    return new HttpException(errorResponse, HttpStatus.INTERNAL_SERVER_ERROR);
  }

  /**
   * Maps a bare HTTP status (from Nest's own exceptions) onto an error code
   */
  static codeForStatus(status: number): ApiErrorCodes {
    switch (status) {
      case HttpStatus.UNAUTHORIZED:
        return ApiErrorCodes.MISSING_CALLER;
      case HttpStatus.FORBIDDEN:
        return ApiErrorCodes.NOT_AUTHORIZED;
      case HttpStatus.NOT_FOUND:
        return ApiErrorCodes.ROUTE_NOT_FOUND;
      default:
        return status >= 500 ? ApiErrorCodes.INTERNAL_ERROR : ApiErrorCodes.VALIDATION_FAILED;
    }
  }
}

export function isApiErrorResponse(value: unknown): value is ApiErrorResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    "success" in value &&
    value.success === false &&
    "code" in value &&
    typeof value.code === "number" &&
    "requestId" in value
  );
}
