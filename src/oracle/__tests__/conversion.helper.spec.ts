import { OracleErrorKind } from "../errors/oracle.errors";
import { createOracleFixture, type OracleFixture } from "@/__tests__/utils";

describe("ConversionHelper", () => {
  let fixture: OracleFixture;

  beforeEach(() => {
    fixture = createOracleFixture();
    fixture.cache.set("STX", { price: 1_850_000n, lastUpdateHeight: 0, sourceCount: 1 });
    fixture.cache.set("USD", { price: 1_000_000n, lastUpdateHeight: 0, sourceCount: 1 });
  });

  it("converts through both aggregate prices with truncation", () => {
    expect(fixture.conversion.convert("STX", "USD", 1_000_000n)).toBe(1_850_000n);
    expect(fixture.conversion.convert("USD", "STX", 1_000_000n)).toBe(540_540n);
    expect(fixture.conversion.convert("STX", "USD", 0n)).toBe(0n);
  });

  it("never returns more than the input after a round trip", () => {
    for (const amount of [1n, 7n, 999n, 1_000_000n, 123_456_789n]) {
      const there = fixture.conversion.convert("USD", "STX", amount);
      const back = fixture.conversion.convert("STX", "USD", there);
      expect(back <= amount).toBe(true);
    }
  });

  it("returns exactly the input after a round trip between equally priced assets", () => {
    fixture.cache.set("USDC", { price: 1_000_000n, lastUpdateHeight: 0, sourceCount: 1 });

    for (const amount of [0n, 1n, 7n, 999n, 123_456_789n]) {
      const there = fixture.conversion.convert("USD", "USDC", amount);
      expect(fixture.conversion.convert("USDC", "USD", there)).toBe(amount);
    }
  });

  it("rejects negative amounts with InvalidPrice", () => {
    expect(() => fixture.conversion.convert("STX", "USD", -1n)).toThrow(
      expect.objectContaining({ kind: OracleErrorKind.InvalidPrice, context: { amount: "-1" } })
    );
  });

  it("reports the source asset's failure first", () => {
    expect(() => fixture.conversion.convert("BTC", "ETH", 1n)).toThrow("No aggregate price for BTC");
    expect(() => fixture.conversion.convert("STX", "ETH", 1n)).toThrow("No aggregate price for ETH");
  });

  it("propagates staleness of either side", () => {
    fixture.cache.set("USD", { price: 1_000_000n, lastUpdateHeight: 50, sourceCount: 1 });
    fixture.clock.setHeight(121);

    expect(() => fixture.conversion.convert("USD", "STX", 1n)).toThrow(
      expect.objectContaining({ kind: OracleErrorKind.StalePrice, context: { asset: "STX", age: 121, threshold: 120 } })
    );
  });
});
