import { ApiProperty } from "@nestjs/swagger";
import { ApiErrorCodes } from "@/common/types/error-handling";

export class ApiErrorResponseDto {
  @ApiProperty({ description: "Success status (always false for errors)", example: false })
  success!: false;

  @ApiProperty({ description: "Error name", example: "STALE_PRICE" })
  error!: string;

  @ApiProperty({ description: "Numeric API error code", enum: ApiErrorCodes, example: ApiErrorCodes.STALE_PRICE })
  code!: ApiErrorCodes;

  @ApiProperty({
    description: "Human-readable error message",
    example: "Price for STX is stale: 121 blocks old (threshold 120)",
  })
  message!: string;

  @ApiProperty({ description: "Error timestamp", example: 1703123456789 })
  timestamp!: number;

  @ApiProperty({ description: "Request ID for tracing", example: "6f1c2f9e-2b1a-4d4e-9a55-0c3c5a1e7b21" })
  requestId!: string;

  @ApiProperty({
    description: "Error kind, stable oracle error code and failure context",
    additionalProperties: true,
    required: false,
    example: { kind: "StalePrice", oracleCode: 102, asset: "STX", age: 121, threshold: 120 },
  })
  details?: Record<string, unknown>;
}
