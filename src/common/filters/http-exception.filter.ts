import { type ArgumentsHost, Catch, type ExceptionFilter, HttpException, HttpStatus, Injectable, Logger } from "@nestjs/common";
import type { Request, Response } from "express";
import { ErrorResponseBuilder, isApiErrorResponse } from "@/common/errors/error-response.builder";
import type { ApiErrorResponse } from "@/common/types/error-handling";
import { isOracleError } from "@/oracle/errors/oracle.errors";

export const REQUEST_ID_HEADER = "x-request-id";

/**
 * Global exception filter: every failure leaves the API in the
 * ApiErrorResponse envelope, with the request id echoed back.
 */
@Catch()
@Injectable()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const requestId = request.get(REQUEST_ID_HEADER) || ErrorResponseBuilder.generateRequestId();

    const httpException = this.toHttpException(exception, requestId);
    const status = httpException.getStatus();
    const errorResponse = this.toErrorResponse(httpException, requestId);

    this.addSecurityHeaders(response);
    response.setHeader("X-Request-ID", errorResponse.requestId);

    this.logError(exception, errorResponse, request, status);

    response.status(status).json(errorResponse);
  }

  private toHttpException(exception: unknown, requestId: string): HttpException {
    if (isOracleError(exception)) {
      return ErrorResponseBuilder.fromOracleError(exception, requestId);
    }
    if (exception instanceof HttpException) {
      return exception;
    }
    return ErrorResponseBuilder.createInternalError(requestId);
  }

  private toErrorResponse(exception: HttpException, requestId: string): ApiErrorResponse {
    const body = exception.getResponse();
    if (isApiErrorResponse(body)) {
      return { ...body, requestId };
    }

    const status = exception.getStatus();
    const { message, details } = this.describeBody(body, exception.message);
    return ErrorResponseBuilder.createErrorResponse(
      ErrorResponseBuilder.codeForStatus(status),
      message,
      requestId,
      details
    );
  }

  /**
   * Nest's built-in exceptions carry `message` as a string or, from the
   * ValidationPipe, a list of constraint messages
   */
  private describeBody(body: string | object, fallback: string): { message: string; details?: Record<string, unknown> } {
    if (typeof body === "string") {
      return { message: body };
    }
    if ("message" in body) {
      const { message } = body;
      if (Array.isArray(message)) {
        const violations = message.map(item => String(item));
        return { message: violations.join("; "), details: { violations } };
      }
      if (typeof message === "string") {
        return { message };
      }
    }
    return { message: fallback };
  }

  private addSecurityHeaders(response: Response): void {
    response.setHeader("X-Content-Type-Options", "nosniff");
    response.setHeader("X-Frame-Options", "DENY");
  }

  private logError(exception: unknown, errorResponse: ApiErrorResponse, request: Request, status: number): void {
    const message = `${request.method} ${request.path} - ${status} - ${errorResponse.message}`;
    const logContext = {
      requestId: errorResponse.requestId,
      error: errorResponse.error,
      status,
    };

    if (status >= 500) {
      const reason = exception instanceof Error ? exception.message : String(exception);
      this.logger.error(
        `${message}: ${reason}`,
        exception instanceof Error ? exception.stack : undefined,
        logContext
      );
    } else {
      this.logger.warn(message, logContext);
    }
  }
}
