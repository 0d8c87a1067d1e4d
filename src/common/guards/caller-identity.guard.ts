import { type CanActivate, type ExecutionContext, Injectable } from "@nestjs/common";
import type { Request } from "express";
import { ErrorResponseBuilder } from "../errors/error-response.builder";
import { CALLER_HEADER, readCaller } from "../decorators/caller.decorator";
import { REQUEST_ID_HEADER } from "../filters/http-exception.filter";

@Injectable()
export class CallerIdentityGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    if (readCaller(request) === undefined) {
      throw ErrorResponseBuilder.createMissingCallerError(CALLER_HEADER, request.get(REQUEST_ID_HEADER));
    }
    return true;
  }
}
