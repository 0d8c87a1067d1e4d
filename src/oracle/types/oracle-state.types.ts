import type { Asset, RegisteredSource, SourceId } from "./oracle.types";

/**
 * Persisted layout: three tables plus the scalar parameters.
 * Prices are decimal strings so the snapshot survives JSON.
 */
export interface OracleStateSnapshot {
  version: 1;
  owner: SourceId;
  minSources: number;
  stalenessThreshold: number;
  sources: RegisteredSource[];
  quotes: QuoteRecord[];
  aggregates: AggregateRecord[];
}

export interface QuoteRecord {
  asset: Asset;
  source: SourceId;
  price: string;
  weight: number;
  height: number;
  active: boolean;
}

export interface AggregateRecord {
  asset: Asset;
  price: string;
  lastUpdateHeight: number;
  sourceCount: number;
}
