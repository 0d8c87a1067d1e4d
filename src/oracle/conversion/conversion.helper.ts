import { Injectable } from "@nestjs/common";
import { OracleError } from "../errors/oracle.errors";
import { StalenessGuard } from "../staleness/staleness.guard";
import type { Asset } from "../types";

/**
 * Cross-asset conversion through two guarded aggregate reads
 */
@Injectable()
export class ConversionHelper {
  constructor(private readonly stalenessGuard: StalenessGuard) {}

  /**
   * `amount * priceFrom / priceTo`, truncated. Stored prices are always
   * positive, so the divisor cannot be zero.
   */
  convert(assetFrom: Asset, assetTo: Asset, amount: bigint): bigint {
    if (amount < 0n) {
      throw OracleError.invalidPrice(`Amount must be a non-negative integer, got ${amount}`, {
        amount: amount.toString(),
      });
    }

    const priceFrom = this.stalenessGuard.getPrice(assetFrom);
    const priceTo = this.stalenessGuard.getPrice(assetTo);

    return (amount * priceFrom) / priceTo;
  }
}
