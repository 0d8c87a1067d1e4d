import { Inject, Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { AuthorizationRegistry } from "../auth/authorization.registry";
import { AggregatePriceCache } from "./aggregate-price.cache";
import type { HeightClock } from "../clock/height-clock";
import { OracleError } from "../errors/oracle.errors";
import { HEIGHT_CLOCK } from "../oracle.constants";
import { OracleParameters } from "../parameters/oracle-parameters";
import { QuoteStore } from "../quotes/quote.store";
import { isWithinStalenessWindow } from "../staleness/staleness.guard";
import type { AggregatePrice, Asset, Quote, SourceId } from "../types";

export interface WeightedContribution {
  source: SourceId;
  price: bigint;
  weight: number;
}

/**
 * Truncated weighted mean of the contributions. Callers guarantee a
 * non-empty list, so the weight sum is at least 1.
 */
export function weightedAverage(contributions: readonly WeightedContribution[]): bigint {
  let weightedSum = 0n;
  let totalWeight = 0n;
  for (const { price, weight } of contributions) {
    const w = BigInt(weight);
    weightedSum += price * w;
    totalWeight += w;
  }
  return weightedSum / totalWeight;
}

/**
 * Recomputes an asset's aggregate from the quotes of authorized sources.
 * Quotes are folded in source-registration order.
 */
@Injectable()
export class WeightedAverageAggregator extends BaseService {
  constructor(
    private readonly registry: AuthorizationRegistry,
    private readonly quotes: QuoteStore,
    private readonly cache: AggregatePriceCache,
    private readonly parameters: OracleParameters,
    @Inject(HEIGHT_CLOCK) private readonly clock: HeightClock
  ) {
    super();
  }

  /**
   * Writes and returns the new aggregate. Throws InsufficientSources and
   * leaves the cache untouched when too few quotes qualify.
   */
  recompute(asset: Asset): AggregatePrice {
    const height = this.clock.currentHeight();
    const contributions = this.collectContributions(asset, height);
    const required = this.parameters.minSources;

    if (contributions.length < required) {
      throw OracleError.insufficientSources(asset, contributions.length, required);
    }

    const aggregate: AggregatePrice = {
      price: weightedAverage(contributions),
      lastUpdateHeight: height,
      sourceCount: contributions.length,
    };
    this.cache.set(asset, aggregate);
    this.logDebug(`Aggregated ${asset} from ${aggregate.sourceCount} sources`, "recompute", {
      price: aggregate.price.toString(),
      height,
    });

    return aggregate;
  }

  collectContributions(asset: Asset, height: number): WeightedContribution[] {
    const threshold = this.parameters.stalenessThreshold;
    const contributions: WeightedContribution[] = [];

    for (const source of this.registry.registeredSources()) {
      const quote = this.quotes.get(asset, source);
      if (quote && this.qualifies(quote, height, threshold)) {
        contributions.push({ source, price: quote.price, weight: quote.weight });
      }
    }

    return contributions;
  }

  private qualifies(quote: Quote, height: number, threshold: number): boolean {
    return quote.active && isWithinStalenessWindow(quote.height, height, threshold);
  }
}
