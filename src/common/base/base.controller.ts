import { isOracleError } from "@/oracle/errors/oracle.errors";
import { BaseService } from "./base.service";

/**
 * Base controller class consolidates common controller patterns
 */
export abstract class BaseController extends BaseService {
  protected readonly startupTime: number = Date.now();

  /**
   * Runs an engine operation with timing and debug logging. Failures are
   * rethrown for the global filter, which owns the request id.
   */
  protected handleControllerOperation<T>(operation: () => T, operationName: string, performanceThreshold = 100): T {
    const startTime = performance.now();

    try {
      const result = operation();
      this.logPerformance(operationName, Math.round(performance.now() - startTime), performanceThreshold);
      return result;
    } catch (error) {
      const duration = Math.round(performance.now() - startTime);
      if (isOracleError(error)) {
        this.logDebug(`${operationName} rejected after ${duration}ms: ${error.kind}`);
      } else {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logError(err, operationName, { duration });
      }
      throw error;
    }
  }

  protected getUptime(): number {
    return Date.now() - this.startupTime;
  }
}
