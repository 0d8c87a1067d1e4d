/**
 * Config Service
 * Typed views over the environment constants for the modules that need them
 */

import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import type { OracleConfig } from "@/oracle/types";
import { ENV, type Environment } from "./environment.constants";

export interface ClockConfig {
  genesisMs: number;
  blockIntervalMs: number;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

@Injectable()
export class ConfigService extends BaseService {
  constructor(private readonly env: Environment = ENV) {
    super();
  }

  getOracleConfig(): OracleConfig {
    const { OWNER, MIN_SOURCES, STALENESS_THRESHOLD, MAX_ASSET_LENGTH, STATE_FILE } = this.env.ORACLE;
    return {
      owner: OWNER,
      minSources: MIN_SOURCES,
      stalenessThreshold: STALENESS_THRESHOLD,
      maxAssetLength: MAX_ASSET_LENGTH,
      stateFile: STATE_FILE,
    };
  }

  getClockConfig(): ClockConfig {
    return {
      genesisMs: this.env.CLOCK.GENESIS_MS,
      blockIntervalMs: this.env.CLOCK.BLOCK_INTERVAL_MS,
    };
  }

  getEnvironment(): Environment {
    return this.env;
  }

  /**
   * Cross-field checks the individual parsers cannot make
   */
  validateConfiguration(): ConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const { OWNER, STATE_FILE } = this.env.ORACLE;

    if (OWNER.trim().length === 0) {
      errors.push("ORACLE_OWNER must not be blank");
    }

    const genesis = this.env.CLOCK.GENESIS_MS;
    if (genesis > Date.now()) {
      warnings.push(`CLOCK_GENESIS_MS (${genesis}) is in the future; height stays 0 until then`);
    }

    if (!STATE_FILE && this.env.APPLICATION.NODE_ENV === "production") {
      warnings.push("ORACLE_STATE_FILE is not set; oracle state will not survive a restart");
    }

    return { isValid: errors.length === 0, errors, warnings };
  }
}
