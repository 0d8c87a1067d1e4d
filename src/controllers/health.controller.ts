import { Controller, Get } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { BaseController } from "@/common/base/base.controller";
import { PriceOracleService } from "@/oracle/price-oracle.service";
import { HealthResponse } from "./dto/health.dto";

@ApiTags("System Health")
@Controller()
export class HealthController extends BaseController {
  constructor(private readonly oracle: PriceOracleService) {
    super();
  }

  @Get("health")
  @ApiOperation({ summary: "Liveness check with the current clock height" })
  @ApiResponse({ status: 200, type: HealthResponse })
  getHealth(): HealthResponse {
    return {
      status: "healthy",
      height: this.oracle.getParameters().height,
      assets: this.oracle.listAssets().length,
      uptime: Math.floor(this.getUptime() / 1000),
      timestamp: Date.now(),
    };
  }
}
