import { Body, Controller, Get, HttpCode, Param, Post, Query, UseGuards } from "@nestjs/common";
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { BaseController } from "@/common/base/base.controller";
import { CALLER_HEADER, Caller } from "@/common/decorators/caller.decorator";
import { CallerIdentityGuard } from "@/common/guards/caller-identity.guard";
import { PriceOracleService } from "@/oracle/price-oracle.service";
import { ApiErrorResponseDto } from "./dto/common-error.dto";
import {
  AuthorizationResponse,
  ConvertQuery,
  ConvertResponse,
  FreshnessResponse,
  PriceDataResponse,
  PriceResponse,
  SourceQuoteResponse,
  SubmitPriceRequest,
  SubmitPriceResponse,
} from "./dto/oracle.dto";

@ApiTags("Oracle")
@Controller("oracle")
export class OracleController extends BaseController {
  constructor(private readonly oracle: PriceOracleService) {
    super();
  }

  @Post("prices")
  @HttpCode(200)
  @UseGuards(CallerIdentityGuard)
  @ApiHeader({ name: CALLER_HEADER, description: "Identity of the reporting source", required: true })
  @ApiOperation({
    summary: "Submit a price quote",
    description: "Records the caller's quote for the asset and recomputes the asset's aggregate price",
  })
  @ApiResponse({ status: 200, type: SubmitPriceResponse })
  @ApiResponse({ status: 400, description: "Invalid price, weight or asset", type: ApiErrorResponseDto })
  @ApiResponse({ status: 401, description: "Missing caller identity", type: ApiErrorResponseDto })
  @ApiResponse({ status: 403, description: "Caller is not an authorized source", type: ApiErrorResponseDto })
  submitPrice(@Caller() caller: string, @Body() body: SubmitPriceRequest): SubmitPriceResponse {
    return this.handleControllerOperation(
      () => ({ asset: this.oracle.submit(caller, body.asset, BigInt(body.price), body.weight) }),
      "submitPrice"
    );
  }

  @Get("prices/:asset")
  @ApiOperation({ summary: "Get the aggregate price of an asset, rejecting stale values" })
  @ApiResponse({ status: 200, type: PriceResponse })
  @ApiResponse({ status: 404, description: "No aggregate for the asset", type: ApiErrorResponseDto })
  @ApiResponse({ status: 409, description: "Aggregate is stale", type: ApiErrorResponseDto })
  getPrice(@Param("asset") asset: string): PriceResponse {
    return this.handleControllerOperation(
      () => ({ asset, price: this.oracle.getPrice(asset).toString() }),
      "getPrice"
    );
  }

  @Get("prices/:asset/data")
  @ApiOperation({ summary: "Get the cached aggregate record without a staleness check" })
  @ApiResponse({ status: 200, type: PriceDataResponse })
  getPriceData(@Param("asset") asset: string): PriceDataResponse {
    return this.handleControllerOperation(() => {
      const aggregate = this.oracle.getPriceData(asset);
      return {
        asset,
        aggregate: aggregate && {
          price: aggregate.price.toString(),
          lastUpdateHeight: aggregate.lastUpdateHeight,
          sourceCount: aggregate.sourceCount,
        },
      };
    }, "getPriceData");
  }

  @Get("prices/:asset/sources/:source")
  @ApiOperation({ summary: "Get one source's latest quote for an asset" })
  @ApiResponse({ status: 200, type: SourceQuoteResponse })
  getSourceQuote(@Param("asset") asset: string, @Param("source") source: string): SourceQuoteResponse {
    return this.handleControllerOperation(() => {
      const quote = this.oracle.getSourceQuote(asset, source);
      return {
        asset,
        source,
        quote: quote && {
          price: quote.price.toString(),
          weight: quote.weight,
          height: quote.height,
          active: quote.active,
        },
      };
    }, "getSourceQuote");
  }

  @Get("prices/:asset/fresh")
  @ApiOperation({ summary: "Check whether the asset's aggregate is within the staleness threshold" })
  @ApiResponse({ status: 200, type: FreshnessResponse })
  isPriceFresh(@Param("asset") asset: string): FreshnessResponse {
    return this.handleControllerOperation(() => ({ asset, fresh: this.oracle.isPriceFresh(asset) }), "isPriceFresh");
  }

  @Get("convert")
  @ApiOperation({ summary: "Convert an amount between two assets through their aggregate prices" })
  @ApiResponse({ status: 200, type: ConvertResponse })
  @ApiResponse({ status: 400, description: "Negative amount", type: ApiErrorResponseDto })
  @ApiResponse({ status: 404, description: "No aggregate for one of the assets", type: ApiErrorResponseDto })
  @ApiResponse({ status: 409, description: "One of the aggregates is stale", type: ApiErrorResponseDto })
  convert(@Query() query: ConvertQuery): ConvertResponse {
    return this.handleControllerOperation(
      () => ({
        from: query.from,
        to: query.to,
        amount: query.amount,
        result: this.oracle.convert(query.from, query.to, BigInt(query.amount)).toString(),
      }),
      "convert"
    );
  }

  @Get("sources/:source/authorized")
  @ApiOperation({ summary: "Check whether a source may submit prices" })
  @ApiResponse({ status: 200, type: AuthorizationResponse })
  isAuthorized(@Param("source") source: string): AuthorizationResponse {
    return { source, authorized: this.oracle.isAuthorized(source) };
  }
}
