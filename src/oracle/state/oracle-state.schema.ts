import { Type, plainToInstance } from "class-transformer";
import {
  Equals,
  IsArray,
  IsBoolean,
  IsInt,
  IsString,
  Matches,
  Max,
  Min,
  MinLength,
  ValidateNested,
  validateSync,
  type ValidationError,
} from "class-validator";
import type {
  AggregateRecord,
  OracleStateSnapshot,
  QuoteRecord,
  RegisteredSource,
} from "../types";
import { MAX_WEIGHT, MIN_WEIGHT } from "../oracle.constants";

const POSITIVE_INTEGER = /^[1-9][0-9]*$/;

class RegisteredSourceRecord implements RegisteredSource {
  @IsString()
  @MinLength(1)
  source!: string;

  @IsBoolean()
  authorized!: boolean;
}

class StoredQuoteRecord implements QuoteRecord {
  @IsString()
  @MinLength(1)
  asset!: string;

  @IsString()
  @MinLength(1)
  source!: string;

  @Matches(POSITIVE_INTEGER)
  price!: string;

  @IsInt()
  @Min(MIN_WEIGHT)
  @Max(MAX_WEIGHT)
  weight!: number;

  @IsInt()
  @Min(0)
  height!: number;

  @IsBoolean()
  active!: boolean;
}

class StoredAggregateRecord implements AggregateRecord {
  @IsString()
  @MinLength(1)
  asset!: string;

  @Matches(POSITIVE_INTEGER)
  price!: string;

  @IsInt()
  @Min(0)
  lastUpdateHeight!: number;

  @IsInt()
  @Min(1)
  sourceCount!: number;
}

class StoredOracleState implements OracleStateSnapshot {
  @Equals(1)
  version!: 1;

  @IsString()
  @MinLength(1)
  owner!: string;

  @IsInt()
  @Min(1)
  minSources!: number;

  @IsInt()
  @Min(1)
  stalenessThreshold!: number;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RegisteredSourceRecord)
  sources!: RegisteredSourceRecord[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => StoredQuoteRecord)
  quotes!: StoredQuoteRecord[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => StoredAggregateRecord)
  aggregates!: StoredAggregateRecord[];
}

function describeErrors(errors: ValidationError[], prefix = ""): string[] {
  return errors.flatMap(error => {
    const property = prefix ? `${prefix}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(message => `${property}: ${message}`);
    return [...own, ...describeErrors(error.children ?? [], property)];
  });
}

/**
 * Parses and validates a persisted snapshot. Throws with every violation
 * listed when the document does not match the layout.
 */
export function parseOracleStateSnapshot(json: string): OracleStateSnapshot {
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("Invalid oracle state snapshot: expected a JSON object");
  }

  const state = plainToInstance(StoredOracleState, parsed);
  const errors = validateSync(state, { forbidUnknownValues: false });
  if (errors.length > 0) {
    throw new Error(`Invalid oracle state snapshot: ${describeErrors(errors).join("; ")}`);
  }

  return state;
}
