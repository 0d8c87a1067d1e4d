/**
 * Core oracle domain types
 */

/** Opaque, bounded-length identifier of a priced instrument, e.g. "STX" */
export type Asset = string;

/** Authenticated identity of a caller; reporters and the owner share this space */
export type SourceId = string;

/**
 * One source's latest submission for an asset. Exactly one per (asset, source).
 */
export interface Quote {
  price: bigint;
  /** Relative influence in the weighted average, 1..100 */
  weight: number;
  /** Clock height at which the quote was written */
  height: number;
  /** Cleared by the owner through pauseSource, set again by the next submission */
  active: boolean;
}

/**
 * The engine's current trusted price for an asset
 */
export interface AggregatePrice {
  price: bigint;
  lastUpdateHeight: number;
  sourceCount: number;
}

export interface RegisteredSource {
  source: SourceId;
  authorized: boolean;
}

/**
 * Static oracle configuration resolved at start-up
 */
export interface OracleConfig {
  owner: SourceId;
  minSources: number;
  stalenessThreshold: number;
  maxAssetLength: number;
  /** Snapshot file; persistence is disabled when empty */
  stateFile: string;
}

export interface OracleParametersView {
  owner: SourceId;
  minSources: number;
  stalenessThreshold: number;
  height: number;
}
