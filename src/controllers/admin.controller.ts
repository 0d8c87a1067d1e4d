import { Body, Controller, Get, HttpCode, Param, Post, UseGuards } from "@nestjs/common";
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { BaseController } from "@/common/base/base.controller";
import { CALLER_HEADER, Caller } from "@/common/decorators/caller.decorator";
import { CallerIdentityGuard } from "@/common/guards/caller-identity.guard";
import { PriceOracleService } from "@/oracle/price-oracle.service";
import { ApiErrorResponseDto } from "./dto/common-error.dto";
import {
  AdminActionResponse,
  OracleParametersResponse,
  SetMinSourcesRequest,
  SetStalenessThresholdRequest,
  SourcesResponse,
  TransferOwnershipRequest,
} from "./dto/admin.dto";

const OK: AdminActionResponse = { ok: true };

@ApiTags("Oracle Administration")
@Controller("admin")
@UseGuards(CallerIdentityGuard)
@ApiHeader({ name: CALLER_HEADER, description: "Identity of the caller; must be the owner", required: true })
@ApiResponse({ status: 401, description: "Missing caller identity", type: ApiErrorResponseDto })
export class AdminController extends BaseController {
  constructor(private readonly oracle: PriceOracleService) {
    super();
  }

  @Post("sources/:source/authorize")
  @HttpCode(200)
  @ApiOperation({ summary: "Allow a source to submit prices" })
  @ApiResponse({ status: 200, type: AdminActionResponse })
  @ApiResponse({ status: 403, description: "Caller is not the owner", type: ApiErrorResponseDto })
  authorizeSource(@Caller() caller: string, @Param("source") source: string): AdminActionResponse {
    this.handleControllerOperation(() => this.oracle.authorizeSource(caller, source), "authorizeSource");
    return OK;
  }

  @Post("sources/:source/deauthorize")
  @HttpCode(200)
  @ApiOperation({ summary: "Revoke a source's permission to submit prices" })
  @ApiResponse({ status: 200, type: AdminActionResponse })
  @ApiResponse({ status: 403, description: "Caller is not the owner", type: ApiErrorResponseDto })
  deauthorizeSource(@Caller() caller: string, @Param("source") source: string): AdminActionResponse {
    this.handleControllerOperation(() => this.oracle.deauthorizeSource(caller, source), "deauthorizeSource");
    return OK;
  }

  @Post("min-sources")
  @HttpCode(200)
  @ApiOperation({ summary: "Set the minimum number of quotes an aggregation needs" })
  @ApiResponse({ status: 200, type: AdminActionResponse })
  @ApiResponse({ status: 400, description: "Not a positive integer", type: ApiErrorResponseDto })
  @ApiResponse({ status: 403, description: "Caller is not the owner", type: ApiErrorResponseDto })
  setMinSources(@Caller() caller: string, @Body() body: SetMinSourcesRequest): AdminActionResponse {
    this.handleControllerOperation(() => this.oracle.setMinSources(caller, body.minSources), "setMinSources");
    return OK;
  }

  @Post("staleness-threshold")
  @HttpCode(200)
  @ApiOperation({ summary: "Set the maximum age in blocks of a usable price" })
  @ApiResponse({ status: 200, type: AdminActionResponse })
  @ApiResponse({ status: 400, description: "Not a positive integer", type: ApiErrorResponseDto })
  @ApiResponse({ status: 403, description: "Caller is not the owner", type: ApiErrorResponseDto })
  setStalenessThreshold(@Caller() caller: string, @Body() body: SetStalenessThresholdRequest): AdminActionResponse {
    this.handleControllerOperation(
      () => this.oracle.setStalenessThreshold(caller, body.stalenessThreshold),
      "setStalenessThreshold"
    );
    return OK;
  }

  @Post("owner")
  @HttpCode(200)
  @ApiOperation({ summary: "Hand the owner role to another identity" })
  @ApiResponse({ status: 200, type: AdminActionResponse })
  @ApiResponse({ status: 403, description: "Caller is not the owner", type: ApiErrorResponseDto })
  @ApiResponse({ status: 409, description: "New owner already holds the role", type: ApiErrorResponseDto })
  transferOwnership(@Caller() caller: string, @Body() body: TransferOwnershipRequest): AdminActionResponse {
    this.handleControllerOperation(() => this.oracle.transferOwnership(caller, body.newOwner), "transferOwnership");
    return OK;
  }

  @Post("assets/:asset/sources/:source/pause")
  @HttpCode(200)
  @ApiOperation({
    summary: "Exclude one source's quote for an asset from future aggregations",
    description: "The quote is kept; the next submission from the source reactivates it",
  })
  @ApiResponse({ status: 200, type: AdminActionResponse })
  @ApiResponse({ status: 403, description: "Caller is not the owner", type: ApiErrorResponseDto })
  @ApiResponse({ status: 404, description: "No quote from the source for the asset", type: ApiErrorResponseDto })
  pauseSource(
    @Caller() caller: string,
    @Param("asset") asset: string,
    @Param("source") source: string
  ): AdminActionResponse {
    this.handleControllerOperation(() => this.oracle.pauseSource(caller, asset, source), "pauseSource");
    return OK;
  }

  @Get("parameters")
  @ApiOperation({ summary: "Current owner, parameters and clock height" })
  @ApiResponse({ status: 200, type: OracleParametersResponse })
  getParameters(): OracleParametersResponse {
    return this.oracle.getParameters();
  }

  @Get("sources")
  @ApiOperation({ summary: "Every registered source with its authorization flag, in registration order" })
  @ApiResponse({ status: 200, type: SourcesResponse })
  listSources(): SourcesResponse {
    return { sources: this.oracle.listSources() };
  }
}
