import { OracleErrorKind } from "../errors/oracle.errors";
import { OracleParameters } from "../parameters/oracle-parameters";
import { TestDataBuilder } from "@/__tests__/utils";

describe("OracleParameters", () => {
  it("starts from the configured values", () => {
    const parameters = new OracleParameters(
      TestDataBuilder.createOracleConfig({ minSources: 3, stalenessThreshold: 60 })
    );

    expect(parameters.minSources).toBe(3);
    expect(parameters.stalenessThreshold).toBe(60);
    expect(parameters.getConfig()).toEqual({ minSources: 3, stalenessThreshold: 60 });
  });

  it("refuses to start from invalid values", () => {
    expect(() => new OracleParameters(TestDataBuilder.createOracleConfig({ minSources: 0 }))).toThrow(
      expect.objectContaining({ kind: OracleErrorKind.InvalidPrice })
    );
  });

  it.each([
    [{ minSources: 0 }],
    [{ minSources: 1.5 }],
    [{ stalenessThreshold: 0 }],
    [{ stalenessThreshold: -10 }],
  ])("rejects %p and keeps the previous values", update => {
    const parameters = new OracleParameters(TestDataBuilder.createOracleConfig());

    expect(() => parameters.updateConfig(update)).toThrow(
      expect.objectContaining({ kind: OracleErrorKind.InvalidPrice })
    );
    expect(parameters.getConfig()).toEqual({ minSources: 1, stalenessThreshold: 120 });
  });

  it("applies a partial update", () => {
    const parameters = new OracleParameters(TestDataBuilder.createOracleConfig());
    parameters.updateConfig({ stalenessThreshold: 10 });

    expect(parameters.getConfig()).toEqual({ minSources: 1, stalenessThreshold: 10 });
  });
});
