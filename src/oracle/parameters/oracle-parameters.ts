import { Inject, Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { WithConfiguration } from "@/common/base/mixins/configurable.mixin";
import { OracleError } from "../errors/oracle.errors";
import { DEFAULT_MIN_SOURCES, DEFAULT_STALENESS_THRESHOLD, ORACLE_CONFIG } from "../oracle.constants";
import type { OracleConfig } from "../types";

export interface OracleParametersConfig {
  minSources: number;
  stalenessThreshold: number;
}

const ParametersBase = WithConfiguration<OracleParametersConfig>({
  minSources: DEFAULT_MIN_SOURCES,
  stalenessThreshold: DEFAULT_STALENESS_THRESHOLD,
})(BaseService);

/**
 * The two scalar parameters of the oracle. Updates are validated as a whole
 * and leave the previous values in place when rejected.
 */
@Injectable()
export class OracleParameters extends ParametersBase {
  constructor(@Inject(ORACLE_CONFIG) config: OracleConfig) {
    super();
    this.updateConfig({ minSources: config.minSources, stalenessThreshold: config.stalenessThreshold });
  }

  get minSources(): number {
    return this.config.minSources;
  }

  get stalenessThreshold(): number {
    return this.config.stalenessThreshold;
  }

  override validateConfig(config: Readonly<OracleParametersConfig>): void {
    if (!Number.isSafeInteger(config.minSources) || config.minSources < 1) {
      throw OracleError.invalidPrice(`minSources must be a positive integer, got ${config.minSources}`, {
        minSources: config.minSources,
      });
    }
    if (!Number.isSafeInteger(config.stalenessThreshold) || config.stalenessThreshold < 1) {
      throw OracleError.invalidPrice(
        `Staleness threshold must be a positive integer, got ${config.stalenessThreshold}`,
        { stalenessThreshold: config.stalenessThreshold }
      );
    }
  }
}
