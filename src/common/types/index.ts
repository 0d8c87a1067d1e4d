/**
 * Unified index for the shared type definitions
 */

export * from "./error-handling";
export * from "./logging";
export * from "./services";
