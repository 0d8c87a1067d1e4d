import { OracleErrorKind } from "../errors/oracle.errors";
import { validateAsset, validatePrice, validateSubmission, validateWeight } from "../quotes/quote.validation";

describe("quote validation", () => {
  describe("validatePrice", () => {
    it("accepts positive prices", () => {
      expect(() => validatePrice(1n)).not.toThrow();
    });

    it.each([0n, -1n])("rejects %p with InvalidPrice", price => {
      expect(() => validatePrice(price)).toThrow(expect.objectContaining({ kind: OracleErrorKind.InvalidPrice }));
    });
  });

  describe("validateWeight", () => {
    it.each([1, 50, 100])("accepts %p", weight => {
      expect(() => validateWeight(weight)).not.toThrow();
    });

    it.each([0, 101, -5, 2.5, Number.NaN])("rejects %p with InvalidPrice", weight => {
      expect(() => validateWeight(weight)).toThrow(expect.objectContaining({ kind: OracleErrorKind.InvalidPrice }));
    });
  });

  describe("validateAsset", () => {
    it("accepts identifiers up to the maximum length", () => {
      expect(() => validateAsset("A".repeat(32), 32)).not.toThrow();
    });

    it("rejects empty and overlong identifiers with InvalidAsset", () => {
      expect(() => validateAsset("", 32)).toThrow(expect.objectContaining({ kind: OracleErrorKind.InvalidAsset }));
      expect(() => validateAsset("A".repeat(33), 32)).toThrow("Asset identifier must be 1 to 32 characters, got 33");
    });
  });

  it("reports the price before the weight and the weight before the asset", () => {
    expect(() => validateSubmission("", 0n, 0, 32)).toThrow(
      expect.objectContaining({ kind: OracleErrorKind.InvalidPrice, context: { price: "0" } })
    );
    expect(() => validateSubmission("", 5n, 0, 32)).toThrow(
      expect.objectContaining({ kind: OracleErrorKind.InvalidPrice, context: { weight: 0 } })
    );
    expect(() => validateSubmission("", 5n, 1, 32)).toThrow(
      expect.objectContaining({ kind: OracleErrorKind.InvalidAsset })
    );
  });
});
