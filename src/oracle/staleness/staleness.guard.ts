import { Inject, Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { AggregatePriceCache } from "../aggregation/aggregate-price.cache";
import type { HeightClock } from "../clock/height-clock";
import { OracleError } from "../errors/oracle.errors";
import { HEIGHT_CLOCK } from "../oracle.constants";
import { OracleParameters } from "../parameters/oracle-parameters";
import type { Asset } from "../types";

/**
 * A value recorded at `recordedHeight` is usable while its age is within the
 * threshold. A value recorded ahead of the clock is never usable.
 */
export function isWithinStalenessWindow(recordedHeight: number, currentHeight: number, threshold: number): boolean {
  const age = currentHeight - recordedHeight;
  return age >= 0 && age <= threshold;
}

/**
 * Read path for aggregates: rejects values older than the staleness threshold
 */
@Injectable()
export class StalenessGuard extends BaseService {
  constructor(
    private readonly cache: AggregatePriceCache,
    private readonly parameters: OracleParameters,
    @Inject(HEIGHT_CLOCK) private readonly clock: HeightClock
  ) {
    super();
  }

  getPrice(asset: Asset): bigint {
    const aggregate = this.cache.get(asset);
    if (!aggregate) {
      throw OracleError.sourceNotFound(`No aggregate price for ${asset}`, { asset });
    }

    const height = this.clock.currentHeight();
    const threshold = this.parameters.stalenessThreshold;
    if (height < aggregate.lastUpdateHeight) {
      throw OracleError.aheadOfClock(asset, aggregate.lastUpdateHeight, height);
    }
    if (!isWithinStalenessWindow(aggregate.lastUpdateHeight, height, threshold)) {
      throw OracleError.stalePrice(asset, height - aggregate.lastUpdateHeight, threshold);
    }

    return aggregate.price;
  }

  isPriceFresh(asset: Asset): boolean {
    const aggregate = this.cache.get(asset);
    if (!aggregate) {
      return false;
    }
    return isWithinStalenessWindow(
      aggregate.lastUpdateHeight,
      this.clock.currentHeight(),
      this.parameters.stalenessThreshold
    );
  }
}
