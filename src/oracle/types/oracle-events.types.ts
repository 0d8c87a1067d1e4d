import type { AggregatePrice, Asset, SourceId } from "./oracle.types";
import type { OracleErrorKind } from "../errors/oracle.errors";

export const ORACLE_EVENTS = {
  PRICE_SUBMITTED: "price-submitted",
  AGGREGATE_UPDATED: "aggregate-updated",
  AGGREGATION_SKIPPED: "aggregation-skipped",
  SOURCE_AUTHORIZED: "source-authorized",
  SOURCE_DEAUTHORIZED: "source-deauthorized",
  SOURCE_PAUSED: "source-paused",
  MIN_SOURCES_UPDATED: "min-sources-updated",
  STALENESS_THRESHOLD_UPDATED: "staleness-threshold-updated",
  OWNERSHIP_TRANSFERRED: "ownership-transferred",
  STATE_CHANGED: "state-changed",
} as const;

export type OracleEventName = (typeof ORACLE_EVENTS)[keyof typeof ORACLE_EVENTS];

export interface PriceSubmittedEvent {
  source: SourceId;
  asset: Asset;
  price: bigint;
  weight: number;
  height: number;
}

export interface AggregateUpdatedEvent extends AggregatePrice {
  asset: Asset;
}

export interface AggregationSkippedEvent {
  asset: Asset;
  reason: OracleErrorKind;
  message: string;
  height: number;
}

export interface SourceChangedEvent {
  source: SourceId;
  changedBy: SourceId;
}

export interface SourcePausedEvent {
  asset: Asset;
  source: SourceId;
  changedBy: SourceId;
}

export interface ParameterUpdatedEvent {
  previous: number;
  current: number;
  changedBy: SourceId;
}

export interface OwnershipTransferredEvent {
  previousOwner: SourceId;
  newOwner: SourceId;
}

export interface StateChangedEvent {
  operation: string;
  height: number;
}
