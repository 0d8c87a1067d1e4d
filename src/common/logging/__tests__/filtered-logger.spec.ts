import { ConsoleLogger } from "@nestjs/common";
import { enabledLogLevels, isLogLevel, shouldLog } from "@/common/types/logging";
import { FilteredLogger } from "../filtered-logger";

describe("log level filtering", () => {
  it("orders levels from most to least severe", () => {
    expect(shouldLog("error", "warn")).toBe(true);
    expect(shouldLog("warn", "warn")).toBe(true);
    expect(shouldLog("debug", "warn")).toBe(false);
  });

  it("lists the levels a threshold enables", () => {
    expect(enabledLogLevels("log")).toEqual(["fatal", "error", "warn", "log"]);
    expect(enabledLogLevels("fatal")).toEqual(["fatal"]);
  });

  it("recognises level names", () => {
    expect(isLogLevel("verbose")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
  });
});

describe("FilteredLogger", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("forwards messages at or above the threshold", () => {
    const warn = jest.spyOn(ConsoleLogger.prototype, "warn").mockImplementation(() => undefined);
    const logger = new FilteredLogger("Bootstrap", "warn");

    logger.warn("ORACLE_STATE_FILE is not set");

    expect(warn).toHaveBeenCalledWith("ORACLE_STATE_FILE is not set");
  });

  it("drops messages below the threshold", () => {
    const debug = jest.spyOn(ConsoleLogger.prototype, "debug").mockImplementation(() => undefined);
    const log = jest.spyOn(ConsoleLogger.prototype, "log").mockImplementation(() => undefined);
    const logger = new FilteredLogger("Bootstrap", "warn");

    logger.debug("aggregation details");
    logger.log("listening");

    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
  });
});
