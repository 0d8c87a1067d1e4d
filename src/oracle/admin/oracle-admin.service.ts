import { Inject, Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { type OwnerCapability, requireOwner } from "../auth/owner-capability";
import type { HeightClock } from "../clock/height-clock";
import { OracleError } from "../errors/oracle.errors";
import { HEIGHT_CLOCK, OWNER_CAPABILITY } from "../oracle.constants";
import { OracleParameters } from "../parameters/oracle-parameters";
import { QuoteStore } from "../quotes/quote.store";
import type { Asset, OracleParametersView, SourceId } from "../types";

export interface ParameterChange {
  previous: number;
  current: number;
}

/**
 * Owner-gated parameter and quote administration
 */
@Injectable()
export class OracleAdminService extends BaseService {
  constructor(
    @Inject(OWNER_CAPABILITY) private readonly ownerCapability: OwnerCapability,
    private readonly parameters: OracleParameters,
    private readonly quotes: QuoteStore,
    @Inject(HEIGHT_CLOCK) private readonly clock: HeightClock
  ) {
    super();
  }

  setMinSources(caller: SourceId, minSources: number): ParameterChange {
    requireOwner(this.ownerCapability, caller, "set the minimum source count");
    const previous = this.parameters.minSources;
    this.parameters.updateConfig({ minSources });
    this.logCriticalOperation("setMinSources", { caller, previous, current: minSources });
    return { previous, current: minSources };
  }

  setStalenessThreshold(caller: SourceId, stalenessThreshold: number): ParameterChange {
    requireOwner(this.ownerCapability, caller, "set the staleness threshold");
    const previous = this.parameters.stalenessThreshold;
    this.parameters.updateConfig({ stalenessThreshold });
    this.logCriticalOperation("setStalenessThreshold", { caller, previous, current: stalenessThreshold });
    return { previous, current: stalenessThreshold };
  }

  /**
   * Marks one quote inactive. Price, weight and height are kept, and the
   * cached aggregate is left as it is until the next recomputation.
   */
  pauseSource(caller: SourceId, asset: Asset, source: SourceId): void {
    requireOwner(this.ownerCapability, caller, "pause sources");
    if (!this.quotes.deactivate(asset, source)) {
      throw OracleError.sourceNotFound(`No quote from ${source} for ${asset}`, { asset, source });
    }
    this.logCriticalOperation("pauseSource", { caller, asset, source });
  }

  /**
   * Returns the previous owner
   */
  transferOwnership(caller: SourceId, newOwner: SourceId): SourceId {
    requireOwner(this.ownerCapability, caller, "transfer ownership");
    const previousOwner = this.ownerCapability.currentOwner();
    if (newOwner === previousOwner) {
      throw OracleError.alreadyExists(`${newOwner} is already the owner`, { owner: newOwner });
    }
    this.ownerCapability.transferTo(newOwner);
    this.logCriticalOperation("transferOwnership", { previousOwner, newOwner });
    return previousOwner;
  }

  getParameters(): OracleParametersView {
    return {
      owner: this.ownerCapability.currentOwner(),
      minSources: this.parameters.minSources,
      stalenessThreshold: this.parameters.stalenessThreshold,
      height: this.clock.currentHeight(),
    };
  }
}
