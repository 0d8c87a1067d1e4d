/**
 * Environment Constants - Centralized Environment Variable Management
 */

import { EnvironmentUtils, type EnvSource } from "@/common/utils/environment.utils";
import { LOG_LEVELS } from "@/common/types/logging";

export const DEFAULT_ORACLE_OWNER = "owner";

/**
 * Build the environment constants from an arbitrary variable source.
 * `ENV` below is the process-wide instance; tests build their own.
 */
export function loadEnvironment(env: EnvSource = process.env) {
  return {
    // Application Settings
    APPLICATION: {
      NODE_ENV: EnvironmentUtils.parseString("NODE_ENV", "production", {}, env),
      PORT: EnvironmentUtils.parseInt("APP_PORT", 3101, { min: 1, max: 65535, fieldName: "APP_PORT" }, env),
      BASE_PATH: EnvironmentUtils.parseString("APP_BASE_PATH", "", {}, env),
      CORS_MAX_AGE: EnvironmentUtils.parseInt("APP_CORS_MAX_AGE", 3600, { min: 300, max: 86400 }, env),
    },

    // Logging Configuration
    LOGGING: {
      LOG_LEVEL: EnvironmentUtils.parseEnum("LOG_LEVEL", LOG_LEVELS, "log", env),
    },

    // Oracle parameters (initial values; minSources and the staleness threshold are owner-adjustable at run time)
    ORACLE: {
      OWNER: EnvironmentUtils.parseString("ORACLE_OWNER", DEFAULT_ORACLE_OWNER, { maxLength: 128 }, env),
      MIN_SOURCES: EnvironmentUtils.parseInt("ORACLE_MIN_SOURCES", 1, { min: 1, max: 1000 }, env),
      STALENESS_THRESHOLD: EnvironmentUtils.parseInt("ORACLE_STALENESS_THRESHOLD", 120, { min: 1 }, env),
      MAX_ASSET_LENGTH: EnvironmentUtils.parseInt("ORACLE_MAX_ASSET_LENGTH", 32, { min: 1, max: 256 }, env),
      STATE_FILE: EnvironmentUtils.parseString("ORACLE_STATE_FILE", "", {}, env),
    },

    // Height clock
    CLOCK: {
      GENESIS_MS: EnvironmentUtils.parseInt("CLOCK_GENESIS_MS", 0, { min: 0 }, env),
      BLOCK_INTERVAL_MS: EnvironmentUtils.parseInt("CLOCK_BLOCK_INTERVAL_MS", 10000, { min: 1 }, env),
    },
  };
}

export type Environment = ReturnType<typeof loadEnvironment>;

export const ENV: Environment = loadEnvironment();

// Environment Helpers
export const ENV_HELPERS = {
  isTest: (): boolean => ENV.APPLICATION.NODE_ENV === "test",
  isDevelopment: (): boolean => ENV.APPLICATION.NODE_ENV === "development",
  isProduction: (): boolean => ENV.APPLICATION.NODE_ENV === "production",
};
