import { Inject, Injectable, type OnModuleDestroy, type OnModuleInit } from "@nestjs/common";
import * as fs from "fs";
import * as path from "path";
import { BaseService } from "@/common/base/base.service";
import { AggregatePriceCache } from "../aggregation/aggregate-price.cache";
import { AuthorizationRegistry } from "../auth/authorization.registry";
import type { OwnerCapability } from "../auth/owner-capability";
import { OWNER_CAPABILITY, ORACLE_CONFIG } from "../oracle.constants";
import { OracleParameters } from "../parameters/oracle-parameters";
import { PriceOracleService } from "../price-oracle.service";
import { QuoteStore } from "../quotes/quote.store";
import { ORACLE_EVENTS, type OracleConfig, type OracleStateSnapshot, type StateChangedEvent } from "../types";
import { parseOracleStateSnapshot } from "./oracle-state.schema";

/**
 * Mirrors the oracle state to a JSON file. The snapshot is restored when the
 * module starts and rewritten after every mutating operation. Disabled when
 * no state file is configured.
 */
@Injectable()
export class OracleStatePersistence extends BaseService implements OnModuleInit, OnModuleDestroy {
  private readonly listener = (event: StateChangedEvent) => this.save(event);

  constructor(
    @Inject(ORACLE_CONFIG) private readonly oracleConfig: OracleConfig,
    @Inject(OWNER_CAPABILITY) private readonly ownerCapability: OwnerCapability,
    private readonly oracle: PriceOracleService,
    private readonly registry: AuthorizationRegistry,
    private readonly quotes: QuoteStore,
    private readonly cache: AggregatePriceCache,
    private readonly parameters: OracleParameters
  ) {
    super();
  }

  get enabled(): boolean {
    return this.oracleConfig.stateFile.length > 0;
  }

  onModuleInit(): void {
    if (!this.enabled) {
      this.logDebug("No state file configured, running in memory only");
      return;
    }

    const file = this.oracleConfig.stateFile;
    if (fs.existsSync(file)) {
      this.restore(parseOracleStateSnapshot(fs.readFileSync(file, "utf8")));
      this.logInitialization(`Restored oracle state from ${file}`);
    } else {
      this.logInitialization(`No snapshot at ${file}, starting from empty state`);
    }

    this.oracle.on(ORACLE_EVENTS.STATE_CHANGED, this.listener);
  }

  onModuleDestroy(): void {
    this.oracle.off(ORACLE_EVENTS.STATE_CHANGED, this.listener);
  }

  snapshot(): OracleStateSnapshot {
    return {
      version: 1,
      owner: this.ownerCapability.currentOwner(),
      minSources: this.parameters.minSources,
      stalenessThreshold: this.parameters.stalenessThreshold,
      sources: this.registry.listSources(),
      quotes: this.quotes.toRecords(),
      aggregates: this.cache.toRecords(),
    };
  }

  restore(snapshot: OracleStateSnapshot): void {
    this.parameters.updateConfig({
      minSources: snapshot.minSources,
      stalenessThreshold: snapshot.stalenessThreshold,
    });
    if (snapshot.owner !== this.ownerCapability.currentOwner()) {
      this.ownerCapability.transferTo(snapshot.owner);
    }
    this.registry.restore(snapshot.sources);
    this.quotes.restore(snapshot.quotes);
    this.cache.restore(snapshot.aggregates);
  }

  /**
   * Writes beside the target and renames over it, so a crash mid-write
   * leaves the previous snapshot intact.
   */
  save(event: StateChangedEvent): void {
    const file = this.oracleConfig.stateFile;
    const tempFile = `${file}.tmp`;

    try {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(tempFile, JSON.stringify(this.snapshot(), null, 2), "utf8");
      fs.renameSync(tempFile, file);
      this.logDebug(`Saved state after ${event.operation}`, "save", { height: event.height });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      // In-memory state stays authoritative; the next mutation writes again
      this.logError(err, "save", { file, operation: event.operation });
    }
  }
}
