/**
 * Environment Utilities
 * Consolidates environment variable parsing: every parser falls back to its
 * default (with a warning) instead of failing start-up on a malformed value.
 */

import { Logger } from "@nestjs/common";

export type EnvSource = Record<string, string | undefined>;

interface NumericOptions {
  min?: number;
  max?: number;
  fieldName?: string;
}

const logger = new Logger("EnvironmentUtils");

export class EnvironmentUtils {
  /**
   * Parse integer from environment variable with validation
   */
  static parseInt(key: string, defaultValue: number, options: NumericOptions = {}, env: EnvSource = process.env): number {
    const value = env[key];
    if (!value) return defaultValue;

    if (!/^-?\d+$/.test(value.trim())) {
      logger.warn(`Invalid integer value "${value}" for ${options.fieldName || key}, using default ${defaultValue}`);
      return defaultValue;
    }

    return this.checkRange(Number.parseInt(value, 10), key, defaultValue, options);
  }

  /**
   * Parse string from environment variable with validation
   */
  static parseString(
    key: string,
    defaultValue: string,
    options: {
      maxLength?: number;
      pattern?: RegExp;
      fieldName?: string;
    } = {},
    env: EnvSource = process.env
  ): string {
    const value = env[key];
    if (!value) return defaultValue;

    if (options.maxLength !== undefined && value.length > options.maxLength) {
      logger.warn(
        `Value for ${options.fieldName || key} is too long (${value.length} > ${options.maxLength}), using default`
      );
      return defaultValue;
    }

    if (options.pattern && !options.pattern.test(value)) {
      logger.warn(`Value for ${options.fieldName || key} doesn't match pattern, using default`);
      return defaultValue;
    }

    return value;
  }

  /**
   * Parse one of a fixed set of string values
   */
  static parseEnum<T extends string>(
    key: string,
    allowed: readonly T[],
    defaultValue: T,
    env: EnvSource = process.env
  ): T {
    const value = env[key];
    if (!value) return defaultValue;

    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
      logger.warn(`Value "${value}" for ${key} is not one of [${allowed.join(", ")}], using default ${defaultValue}`);
      return defaultValue;
    }
    return match;
  }

  private static checkRange(parsed: number, key: string, defaultValue: number, options: NumericOptions): number {
    if (options.min !== undefined && parsed < options.min) {
      logger.warn(
        `Value ${parsed} for ${options.fieldName || key} is below minimum ${options.min}, using default ${defaultValue}`
      );
      return defaultValue;
    }

    if (options.max !== undefined && parsed > options.max) {
      logger.warn(
        `Value ${parsed} for ${options.fieldName || key} is above maximum ${options.max}, using default ${defaultValue}`
      );
      return defaultValue;
    }

    return parsed;
  }
}
