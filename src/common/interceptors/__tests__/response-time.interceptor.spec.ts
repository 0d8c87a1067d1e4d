import type { CallHandler } from "@nestjs/common";
import { ExecutionContextHost } from "@nestjs/core/helpers/execution-context-host";
import { lastValueFrom, of, throwError } from "rxjs";
import { ResponseTimeInterceptor } from "../response-time.interceptor";

describe("ResponseTimeInterceptor", () => {
  let interceptor: ResponseTimeInterceptor;
  let setHeader: jest.Mock;
  let context: ExecutionContextHost;

  beforeEach(() => {
    interceptor = new ResponseTimeInterceptor();
    setHeader = jest.fn();
    context = new ExecutionContextHost([
      { method: "GET", url: "/oracle/prices/STX" },
      { statusCode: 200, setHeader },
    ]);
  });

  it("passes the handler result through and sets the timing header", async () => {
    const handler: CallHandler = { handle: () => of({ asset: "STX", price: "1850000" }) };

    await expect(lastValueFrom(interceptor.intercept(context, handler))).resolves.toEqual({
      asset: "STX",
      price: "1850000",
    });
    expect(setHeader).toHaveBeenCalledWith("X-Response-Time", expect.stringMatching(/^\d+ms$/));
  });

  it("sets the timing header on failure and rethrows", async () => {
    const handler: CallHandler = { handle: () => throwError(() => new Error("stale")) };

    await expect(lastValueFrom(interceptor.intercept(context, handler))).rejects.toThrow("stale");
    expect(setHeader).toHaveBeenCalledWith("X-Response-Time", expect.stringMatching(/^\d+ms$/));
  });
});
