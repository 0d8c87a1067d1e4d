import { Inject, Injectable } from "@nestjs/common";
import { EventService } from "@/common/base/composed.service";
import { OracleAdminService } from "./admin/oracle-admin.service";
import { AggregatePriceCache } from "./aggregation/aggregate-price.cache";
import { WeightedAverageAggregator } from "./aggregation/weighted-average.aggregator";
import { AuthorizationRegistry } from "./auth/authorization.registry";
import type { HeightClock } from "./clock/height-clock";
import { ConversionHelper } from "./conversion/conversion.helper";
import { OracleError, isOracleError } from "./errors/oracle.errors";
import { HEIGHT_CLOCK, ORACLE_CONFIG } from "./oracle.constants";
import { QuoteStore } from "./quotes/quote.store";
import { validateSubmission } from "./quotes/quote.validation";
import { StalenessGuard } from "./staleness/staleness.guard";
import {
  ORACLE_EVENTS,
  type AggregateUpdatedEvent,
  type AggregatePrice,
  type AggregationSkippedEvent,
  type Asset,
  type OracleConfig,
  type OracleParametersView,
  type OwnershipTransferredEvent,
  type ParameterUpdatedEvent,
  type PriceSubmittedEvent,
  type Quote,
  type RegisteredSource,
  type SourceChangedEvent,
  type SourceId,
  type SourcePausedEvent,
  type StateChangedEvent,
} from "./types";

/**
 * Boundary of the oracle engine. Every operation runs to completion
 * synchronously and either applies all of its writes or throws an
 * OracleError having applied none.
 */
@Injectable()
export class PriceOracleService extends EventService {
  constructor(
    @Inject(ORACLE_CONFIG) private readonly oracleConfig: OracleConfig,
    @Inject(HEIGHT_CLOCK) private readonly clock: HeightClock,
    private readonly registry: AuthorizationRegistry,
    private readonly quotes: QuoteStore,
    private readonly cache: AggregatePriceCache,
    private readonly aggregator: WeightedAverageAggregator,
    private readonly stalenessGuard: StalenessGuard,
    private readonly conversion: ConversionHelper,
    private readonly admin: OracleAdminService
  ) {
    super();
  }

  // Source authorization

  authorizeSource(caller: SourceId, source: SourceId): void {
    if (this.registry.authorize(caller, source)) {
      const event: SourceChangedEvent = { source, changedBy: caller };
      this.emitWithLogging(ORACLE_EVENTS.SOURCE_AUTHORIZED, event);
      this.stateChanged("authorizeSource");
    }
  }

  deauthorizeSource(caller: SourceId, source: SourceId): void {
    if (this.registry.deauthorize(caller, source)) {
      const event: SourceChangedEvent = { source, changedBy: caller };
      this.emitWithLogging(ORACLE_EVENTS.SOURCE_DEAUTHORIZED, event);
      this.stateChanged("deauthorizeSource");
    }
  }

  isAuthorized(source: SourceId): boolean {
    return this.registry.isAuthorized(source);
  }

  listSources(): RegisteredSource[] {
    return this.registry.listSources();
  }

  // Quotes

  /**
   * Records the caller's quote and recomputes the asset's aggregate.
   * A failed recomputation keeps the quote and the previous aggregate.
   */
  submit(caller: SourceId, asset: Asset, price: bigint, weight: number): Asset {
    if (!this.registry.isAuthorized(caller)) {
      throw OracleError.notAuthorized(caller, "submit prices");
    }
    validateSubmission(asset, price, weight, this.oracleConfig.maxAssetLength);

    const height = this.clock.currentHeight();
    this.quotes.put(asset, caller, { price, weight, height, active: true });

    this.refreshAggregate(asset, height);

    const event: PriceSubmittedEvent = { source: caller, asset, price, weight, height };
    this.emitWithLogging(ORACLE_EVENTS.PRICE_SUBMITTED, event);
    this.stateChanged("submit", height);

    return asset;
  }

  getPrice(asset: Asset): bigint {
    return this.stalenessGuard.getPrice(asset);
  }

  /**
   * Assets that have had at least one successful aggregation
   */
  listAssets(): Asset[] {
    return this.cache.assets();
  }

  getPriceData(asset: Asset): AggregatePrice | null {
    return this.cache.get(asset) ?? null;
  }

  getSourceQuote(asset: Asset, source: SourceId): Quote | null {
    return this.quotes.get(asset, source) ?? null;
  }

  isPriceFresh(asset: Asset): boolean {
    return this.stalenessGuard.isPriceFresh(asset);
  }

  convert(assetFrom: Asset, assetTo: Asset, amount: bigint): bigint {
    return this.conversion.convert(assetFrom, assetTo, amount);
  }

  // Administration

  setMinSources(caller: SourceId, minSources: number): void {
    const change = this.admin.setMinSources(caller, minSources);
    const event: ParameterUpdatedEvent = { ...change, changedBy: caller };
    this.emitWithLogging(ORACLE_EVENTS.MIN_SOURCES_UPDATED, event);
    this.stateChanged("setMinSources");
  }

  setStalenessThreshold(caller: SourceId, stalenessThreshold: number): void {
    const change = this.admin.setStalenessThreshold(caller, stalenessThreshold);
    const event: ParameterUpdatedEvent = { ...change, changedBy: caller };
    this.emitWithLogging(ORACLE_EVENTS.STALENESS_THRESHOLD_UPDATED, event);
    this.stateChanged("setStalenessThreshold");
  }

  pauseSource(caller: SourceId, asset: Asset, source: SourceId): void {
    this.admin.pauseSource(caller, asset, source);
    const event: SourcePausedEvent = { asset, source, changedBy: caller };
    this.emitWithLogging(ORACLE_EVENTS.SOURCE_PAUSED, event);
    this.stateChanged("pauseSource");
  }

  transferOwnership(caller: SourceId, newOwner: SourceId): void {
    const previousOwner = this.admin.transferOwnership(caller, newOwner);
    const event: OwnershipTransferredEvent = { previousOwner, newOwner };
    this.emitWithLogging(ORACLE_EVENTS.OWNERSHIP_TRANSFERRED, event);
    this.stateChanged("transferOwnership");
  }

  getParameters(): OracleParametersView {
    return this.admin.getParameters();
  }

  private refreshAggregate(asset: Asset, height: number): void {
    try {
      const aggregate = this.aggregator.recompute(asset);
      const event: AggregateUpdatedEvent = { asset, ...aggregate };
      this.emitWithLogging(ORACLE_EVENTS.AGGREGATE_UPDATED, event);
    } catch (error) {
      if (!isOracleError(error)) {
        throw error;
      }
      this.logWarning(`Aggregate for ${asset} not updated: ${error.message}`, "submit");
      const event: AggregationSkippedEvent = { asset, reason: error.kind, message: error.message, height };
      this.emitWithLogging(ORACLE_EVENTS.AGGREGATION_SKIPPED, event);
    }
  }

  private stateChanged(operation: string, height = this.clock.currentHeight()): void {
    const event: StateChangedEvent = { operation, height };
    this.emit(ORACLE_EVENTS.STATE_CHANGED, event);
  }
}
