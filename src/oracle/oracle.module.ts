import { Module } from "@nestjs/common";
import { ConfigModule } from "@/config/config.module";
import { ConfigService } from "@/config/config.service";
import { OracleAdminService } from "./admin/oracle-admin.service";
import { AggregatePriceCache } from "./aggregation/aggregate-price.cache";
import { WeightedAverageAggregator } from "./aggregation/weighted-average.aggregator";
import { AuthorizationRegistry } from "./auth/authorization.registry";
import { SingleOwnerCapability } from "./auth/owner-capability";
import { WallClockHeightClock } from "./clock/height-clock";
import { ConversionHelper } from "./conversion/conversion.helper";
import { HEIGHT_CLOCK, ORACLE_CONFIG, OWNER_CAPABILITY } from "./oracle.constants";
import { OracleParameters } from "./parameters/oracle-parameters";
import { PriceOracleService } from "./price-oracle.service";
import { QuoteStore } from "./quotes/quote.store";
import { StalenessGuard } from "./staleness/staleness.guard";
import { OracleStatePersistence } from "./state/oracle-state.persistence";
import type { OracleConfig } from "./types";

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: ORACLE_CONFIG,
      useFactory: (configService: ConfigService) => configService.getOracleConfig(),
      inject: [ConfigService],
    },
    {
      provide: HEIGHT_CLOCK,
      useFactory: (configService: ConfigService) => {
        const { genesisMs, blockIntervalMs } = configService.getClockConfig();
        return new WallClockHeightClock(genesisMs, blockIntervalMs);
      },
      inject: [ConfigService],
    },
    {
      provide: OWNER_CAPABILITY,
      useFactory: (config: OracleConfig) => new SingleOwnerCapability(config.owner),
      inject: [ORACLE_CONFIG],
    },
    OracleParameters,
    AuthorizationRegistry,
    QuoteStore,
    AggregatePriceCache,
    WeightedAverageAggregator,
    StalenessGuard,
    ConversionHelper,
    OracleAdminService,
    PriceOracleService,
    OracleStatePersistence,
  ],
  exports: [PriceOracleService, HEIGHT_CLOCK],
})
export class OracleModule {}
