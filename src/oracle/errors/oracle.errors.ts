/**
 * Failure kinds raised by oracle operations. Every operation either
 * completes or throws one of these without having mutated any state.
 */
export enum OracleErrorKind {
  NotAuthorized = "NotAuthorized",
  InvalidPrice = "InvalidPrice",
  StalePrice = "StalePrice",
  SourceNotFound = "SourceNotFound",
  AlreadyExists = "AlreadyExists",
  InsufficientSources = "InsufficientSources",
  InvalidAsset = "InvalidAsset",
}

/**
 * Stable numeric codes, reported alongside the kind in API responses
 */
export const ORACLE_ERROR_CODES: Readonly<Record<OracleErrorKind, number>> = {
  [OracleErrorKind.NotAuthorized]: 100,
  [OracleErrorKind.InvalidPrice]: 101,
  [OracleErrorKind.StalePrice]: 102,
  [OracleErrorKind.SourceNotFound]: 103,
  [OracleErrorKind.AlreadyExists]: 104,
  [OracleErrorKind.InsufficientSources]: 105,
  [OracleErrorKind.InvalidAsset]: 106,
};

export class OracleError extends Error {
  readonly kind: OracleErrorKind;
  readonly code: number;
  readonly context: Record<string, unknown>;

  constructor(kind: OracleErrorKind, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = "OracleError";
    this.kind = kind;
    this.code = ORACLE_ERROR_CODES[kind];
    this.context = context;
  }

  static notAuthorized(caller: string, action: string): OracleError {
    return new OracleError(OracleErrorKind.NotAuthorized, `Caller "${caller}" is not authorized to ${action}`, {
      caller,
      action,
    });
  }

  static invalidPrice(message: string, context: Record<string, unknown> = {}): OracleError {
    return new OracleError(OracleErrorKind.InvalidPrice, message, context);
  }

  static invalidAsset(asset: string, maxLength: number): OracleError {
    return new OracleError(
      OracleErrorKind.InvalidAsset,
      `Asset identifier must be 1 to ${maxLength} characters, got ${asset.length}`,
      { asset, maxLength }
    );
  }

  static stalePrice(asset: string, age: number, threshold: number): OracleError {
    return new OracleError(
      OracleErrorKind.StalePrice,
      `Price for ${asset} is stale: ${age} blocks old (threshold ${threshold})`,
      { asset, age, threshold }
    );
  }

  static aheadOfClock(asset: string, recordedHeight: number, currentHeight: number): OracleError {
    return new OracleError(
      OracleErrorKind.StalePrice,
      `Price for ${asset} was recorded at height ${recordedHeight}, ahead of the current height ${currentHeight}`,
      { asset, recordedHeight, currentHeight }
    );
  }

  static sourceNotFound(message: string, context: Record<string, unknown> = {}): OracleError {
    return new OracleError(OracleErrorKind.SourceNotFound, message, context);
  }

  static insufficientSources(asset: string, available: number, required: number): OracleError {
    return new OracleError(
      OracleErrorKind.InsufficientSources,
      `Insufficient sources for ${asset}: ${available} < ${required}`,
      { asset, available, required }
    );
  }

  static alreadyExists(message: string, context: Record<string, unknown> = {}): OracleError {
    return new OracleError(OracleErrorKind.AlreadyExists, message, context);
  }
}

export function isOracleError(error: unknown): error is OracleError {
  return error instanceof OracleError;
}

export function isOracleErrorOfKind(error: unknown, kind: OracleErrorKind): error is OracleError {
  return isOracleError(error) && error.kind === kind;
}
