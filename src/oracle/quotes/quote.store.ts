import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import type { Asset, Quote, QuoteRecord, SourceId } from "../types";

/**
 * Latest quote per (asset, source). Writes overwrite in place; no history.
 * Values handed out are copies so callers cannot bypass the store.
 */
@Injectable()
export class QuoteStore extends BaseService {
  private readonly quotes = new Map<Asset, Map<SourceId, Quote>>();

  get(asset: Asset, source: SourceId): Quote | undefined {
    const quote = this.quotes.get(asset)?.get(source);
    return quote ? { ...quote } : undefined;
  }

  put(asset: Asset, source: SourceId, quote: Quote): void {
    let bySource = this.quotes.get(asset);
    if (!bySource) {
      bySource = new Map();
      this.quotes.set(asset, bySource);
    }
    bySource.set(source, { ...quote });
  }

  /**
   * Clears the active flag, keeping price, weight and height.
   * Returns false when no quote exists for the pair.
   */
  deactivate(asset: Asset, source: SourceId): boolean {
    const quote = this.quotes.get(asset)?.get(source);
    if (!quote) {
      return false;
    }
    quote.active = false;
    return true;
  }

  assets(): Asset[] {
    return [...this.quotes.keys()];
  }

  toRecords(): QuoteRecord[] {
    const records: QuoteRecord[] = [];
    for (const [asset, bySource] of this.quotes) {
      for (const [source, quote] of bySource) {
        records.push({
          asset,
          source,
          price: quote.price.toString(),
          weight: quote.weight,
          height: quote.height,
          active: quote.active,
        });
      }
    }
    return records;
  }

  restore(records: readonly QuoteRecord[]): void {
    this.quotes.clear();
    for (const record of records) {
      this.put(record.asset, record.source, {
        price: BigInt(record.price),
        weight: record.weight,
        height: record.height,
        active: record.active,
      });
    }
  }
}
