import { ApiProperty } from "@nestjs/swagger";
import { IsNumber, IsString, Matches } from "class-validator";

/** Unsigned decimal integer, as bigint values travel over HTTP */
export const UNSIGNED_INTEGER = /^[0-9]+$/;
/** Signed decimal integer; the sign is checked by the engine */
export const SIGNED_INTEGER = /^-?[0-9]+$/;

// Requests

export class SubmitPriceRequest {
  @ApiProperty({ description: "Asset identifier", example: "STX" })
  @IsString()
  asset!: string;

  @ApiProperty({ description: "Price in the asset's fixed-point unit, as a decimal string", example: "1850000" })
  @Matches(UNSIGNED_INTEGER, { message: "price must be a decimal integer string" })
  price!: string;

  @ApiProperty({ description: "Relative weight of this quote, integer in [1, 100]", example: 100 })
  @IsNumber()
  weight!: number;
}

export class ConvertQuery {
  @ApiProperty({ description: "Asset the amount is denominated in", example: "STX" })
  @IsString()
  from!: string;

  @ApiProperty({ description: "Asset to convert into", example: "USD" })
  @IsString()
  to!: string;

  @ApiProperty({ description: "Amount as a decimal integer string", example: "1000000" })
  @Matches(SIGNED_INTEGER, { message: "amount must be a decimal integer string" })
  amount!: string;
}

// Responses

export class SubmitPriceResponse {
  @ApiProperty({ example: "STX" })
  asset!: string;
}

export class PriceResponse {
  @ApiProperty({ example: "STX" })
  asset!: string;

  @ApiProperty({ description: "Aggregate price as a decimal string", example: "1850000" })
  price!: string;
}

export class AggregatePriceDto {
  @ApiProperty({ example: "1850000" })
  price!: string;

  @ApiProperty({ description: "Height of the last successful aggregation", example: 1042 })
  lastUpdateHeight!: number;

  @ApiProperty({ description: "Number of quotes in the last aggregation", example: 3 })
  sourceCount!: number;
}

export class PriceDataResponse {
  @ApiProperty({ example: "STX" })
  asset!: string;

  @ApiProperty({ type: AggregatePriceDto, nullable: true })
  aggregate!: AggregatePriceDto | null;
}

export class QuoteDto {
  @ApiProperty({ example: "1850000" })
  price!: string;

  @ApiProperty({ example: 100 })
  weight!: number;

  @ApiProperty({ example: 1042 })
  height!: number;

  @ApiProperty({ description: "False once the owner has paused this source for the asset", example: true })
  active!: boolean;
}

export class SourceQuoteResponse {
  @ApiProperty({ example: "STX" })
  asset!: string;

  @ApiProperty({ example: "reporter-1" })
  source!: string;

  @ApiProperty({ type: QuoteDto, nullable: true })
  quote!: QuoteDto | null;
}

export class FreshnessResponse {
  @ApiProperty({ example: "STX" })
  asset!: string;

  @ApiProperty({ example: true })
  fresh!: boolean;
}

export class ConvertResponse {
  @ApiProperty({ example: "STX" })
  from!: string;

  @ApiProperty({ example: "USD" })
  to!: string;

  @ApiProperty({ example: "1000000" })
  amount!: string;

  @ApiProperty({ description: "Converted amount, truncated", example: "1850000" })
  result!: string;
}

export class AuthorizationResponse {
  @ApiProperty({ example: "reporter-1" })
  source!: string;

  @ApiProperty({ example: true })
  authorized!: boolean;
}
