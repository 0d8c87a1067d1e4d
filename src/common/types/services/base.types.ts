import type { Logger } from "@nestjs/common";
import type { LoggingCapabilities } from "../../base/mixins/logging.mixin";

/**
 * Type utilities for mixins
 */

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = {}> = new (...args: any[]) => T;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractConstructor<T = {}> = abstract new (...args: any[]) => T;

/**
 * Minimal public surface of every service built on BaseService
 */
export interface IBaseService extends LoggingCapabilities {
  readonly logger: Logger;
}
