/**
 * Injection tokens and fixed bounds of the oracle
 */

export const ORACLE_CONFIG = "ORACLE_CONFIG";
export const HEIGHT_CLOCK = "HEIGHT_CLOCK";
export const OWNER_CAPABILITY = "OWNER_CAPABILITY";

export const MIN_WEIGHT = 1;
export const MAX_WEIGHT = 100;

export const DEFAULT_MIN_SOURCES = 1;
export const DEFAULT_STALENESS_THRESHOLD = 120;
export const DEFAULT_MAX_ASSET_LENGTH = 32;
