import { createParamDecorator, type ExecutionContext } from "@nestjs/common";
import type { Request } from "express";

export const CALLER_HEADER = "x-oracle-caller";

/**
 * Authenticated caller identity carried by the request, if any
 */
export function readCaller(request: Request): string | undefined {
  const caller = request.get(CALLER_HEADER)?.trim();
  return caller ? caller : undefined;
}

/**
 * Injects the caller identity. Routes using it sit behind CallerIdentityGuard,
 * which rejects requests without one.
 */
export const Caller = createParamDecorator((_data: unknown, ctx: ExecutionContext): string => {
  return readCaller(ctx.switchToHttp().getRequest<Request>()) ?? "";
});
