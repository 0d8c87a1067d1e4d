import { OracleError } from "../errors/oracle.errors";
import { MAX_WEIGHT, MIN_WEIGHT } from "../oracle.constants";
import type { Asset } from "../types";

export function validatePrice(price: bigint): void {
  if (price <= 0n) {
    throw OracleError.invalidPrice(`Price must be a positive integer, got ${price}`, { price: price.toString() });
  }
}

export function validateWeight(weight: number): void {
  if (!Number.isInteger(weight) || weight < MIN_WEIGHT || weight > MAX_WEIGHT) {
    throw OracleError.invalidPrice(`Weight must be an integer in [${MIN_WEIGHT}, ${MAX_WEIGHT}], got ${weight}`, {
      weight,
    });
  }
}

export function validateAsset(asset: Asset, maxLength: number): void {
  if (asset.length === 0 || asset.length > maxLength) {
    throw OracleError.invalidAsset(asset, maxLength);
  }
}

/**
 * Checks a submission in the order failures are reported: price, weight, asset
 */
export function validateSubmission(asset: Asset, price: bigint, weight: number, maxAssetLength: number): void {
  validatePrice(price);
  validateWeight(weight);
  validateAsset(asset, maxAssetLength);
}
