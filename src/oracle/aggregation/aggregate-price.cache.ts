import { Injectable } from "@nestjs/common";
import type { AggregatePrice, AggregateRecord, Asset } from "../types";

/**
 * Last computed aggregate per asset. Entries are created by the first
 * successful aggregation and only ever overwritten afterwards.
 */
@Injectable()
export class AggregatePriceCache {
  private readonly entries = new Map<Asset, AggregatePrice>();

  get(asset: Asset): AggregatePrice | undefined {
    const entry = this.entries.get(asset);
    return entry ? { ...entry } : undefined;
  }

  set(asset: Asset, aggregate: AggregatePrice): void {
    this.entries.set(asset, { ...aggregate });
  }

  assets(): Asset[] {
    return [...this.entries.keys()];
  }

  toRecords(): AggregateRecord[] {
    return [...this.entries].map(([asset, entry]) => ({
      asset,
      price: entry.price.toString(),
      lastUpdateHeight: entry.lastUpdateHeight,
      sourceCount: entry.sourceCount,
    }));
  }

  restore(records: readonly AggregateRecord[]): void {
    this.entries.clear();
    for (const record of records) {
      this.entries.set(record.asset, {
        price: BigInt(record.price),
        lastUpdateHeight: record.lastUpdateHeight,
        sourceCount: record.sourceCount,
      });
    }
  }
}
