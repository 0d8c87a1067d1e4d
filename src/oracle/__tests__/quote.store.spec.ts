import { QuoteStore } from "../quotes/quote.store";
import { REPORTER_A, REPORTER_B } from "@/__tests__/utils";

describe("QuoteStore", () => {
  let store: QuoteStore;

  beforeEach(() => {
    store = new QuoteStore();
  });

  it("keeps exactly one quote per asset and source", () => {
    store.put("STX", REPORTER_A, { price: 100n, weight: 10, height: 1, active: true });
    store.put("STX", REPORTER_A, { price: 200n, weight: 20, height: 2, active: true });
    store.put("STX", REPORTER_B, { price: 300n, weight: 30, height: 2, active: true });

    expect(store.toRecords()).toHaveLength(2);
    expect(store.get("STX", REPORTER_A)).toEqual({ price: 200n, weight: 20, height: 2, active: true });
  });

  it("returns undefined for a missing pair", () => {
    expect(store.get("STX", REPORTER_A)).toBeUndefined();
    expect(store.toRecords()).toEqual([]);
  });

  it("hands out copies", () => {
    store.put("STX", REPORTER_A, { price: 100n, weight: 10, height: 1, active: true });
    const copy = store.get("STX", REPORTER_A);
    if (copy) {
      copy.active = false;
    }

    expect(store.get("STX", REPORTER_A)?.active).toBe(true);
  });

  it("deactivates a quote without touching its values", () => {
    store.put("STX", REPORTER_A, { price: 100n, weight: 10, height: 7, active: true });

    expect(store.deactivate("STX", REPORTER_A)).toBe(true);
    expect(store.get("STX", REPORTER_A)).toEqual({ price: 100n, weight: 10, height: 7, active: false });
  });

  it("reports a missing quote when deactivating", () => {
    expect(store.deactivate("STX", REPORTER_A)).toBe(false);
  });

  it("converts to and from records with prices as decimal strings", () => {
    store.put("STX", REPORTER_A, { price: 1_850_000n, weight: 100, height: 5, active: false });
    const records = store.toRecords();

    expect(records).toEqual([
      { asset: "STX", source: REPORTER_A, price: "1850000", weight: 100, height: 5, active: false },
    ]);

    const restored = new QuoteStore();
    restored.restore(records);
    expect(restored.get("STX", REPORTER_A)).toEqual({ price: 1_850_000n, weight: 100, height: 5, active: false });
    expect(restored.assets()).toEqual(["STX"]);
  });
});
