import { ApiProperty } from "@nestjs/swagger";

export class HealthResponse {
  @ApiProperty({ enum: ["healthy"], example: "healthy" })
  status!: "healthy";

  @ApiProperty({ description: "Current clock height", example: 1042 })
  height!: number;

  @ApiProperty({ description: "Assets with a cached aggregate", example: 3 })
  assets!: number;

  @ApiProperty({ description: "Seconds since the service started", example: 3600 })
  uptime!: number;

  @ApiProperty({ example: 1703123456789 })
  timestamp!: number;
}
