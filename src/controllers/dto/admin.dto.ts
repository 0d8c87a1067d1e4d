import { ApiProperty } from "@nestjs/swagger";
import { IsNotEmpty, IsNumber, IsString } from "class-validator";

// Requests

export class SetMinSourcesRequest {
  @ApiProperty({ description: "Minimum number of qualifying quotes per aggregation", example: 2 })
  @IsNumber()
  minSources!: number;
}

export class SetStalenessThresholdRequest {
  @ApiProperty({ description: "Maximum age in blocks of a usable price", example: 120 })
  @IsNumber()
  stalenessThreshold!: number;
}

export class TransferOwnershipRequest {
  @ApiProperty({ description: "Identity of the new owner", example: "governance" })
  @IsString()
  @IsNotEmpty()
  newOwner!: string;
}

// Responses

export class AdminActionResponse {
  @ApiProperty({ example: true })
  ok!: true;
}

export class OracleParametersResponse {
  @ApiProperty({ example: "owner" })
  owner!: string;

  @ApiProperty({ example: 1 })
  minSources!: number;

  @ApiProperty({ example: 120 })
  stalenessThreshold!: number;

  @ApiProperty({ description: "Current clock height", example: 1042 })
  height!: number;
}

export class RegisteredSourceDto {
  @ApiProperty({ example: "reporter-1" })
  source!: string;

  @ApiProperty({ example: true })
  authorized!: boolean;
}

export class SourcesResponse {
  @ApiProperty({ type: [RegisteredSourceDto] })
  sources!: RegisteredSourceDto[];
}
