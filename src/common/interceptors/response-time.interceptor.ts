import { type CallHandler, type ExecutionContext, Injectable, type NestInterceptor } from "@nestjs/common";
import type { Request, Response } from "express";
import type { Observable } from "rxjs";
import { tap } from "rxjs/operators";
import { BaseService } from "../base/base.service";

const SLOW_RESPONSE_MS = 1000;

@Injectable()
export class ResponseTimeInterceptor extends BaseService implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const startTime = Date.now();
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const { method, url } = request;

    return next.handle().pipe(
      tap({
        next: () => {
          const responseTime = Date.now() - startTime;
          response.setHeader("X-Response-Time", `${responseTime}ms`);

          if (responseTime > SLOW_RESPONSE_MS) {
            this.logger.warn(`${method} ${url} - ${response.statusCode} - ${responseTime}ms - SLOW RESPONSE`);
          } else {
            this.logger.log(`${method} ${url} - ${response.statusCode} - ${responseTime}ms`);
          }
        },
        error: (error: unknown) => {
          const responseTime = Date.now() - startTime;
          response.setHeader("X-Response-Time", `${responseTime}ms`);
          const reason = error instanceof Error ? error.message : String(error);
          this.logger.debug(`${method} ${url} - failed after ${responseTime}ms: ${reason}`);
        },
      })
    );
  }
}
