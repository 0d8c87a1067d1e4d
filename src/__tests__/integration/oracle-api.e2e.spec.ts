import request from "supertest";
import type { INestApplication } from "@nestjs/common";
import type { ManualHeightClock } from "@/oracle/clock/height-clock";
import { createTestApp, OUTSIDER, OWNER, REPORTER_A, REPORTER_B } from "../utils";

const CALLER = "x-oracle-caller";

describe("Oracle API (e2e)", () => {
  let app: INestApplication;
  let clock: ManualHeightClock;

  beforeEach(async () => {
    ({ app, clock } = await createTestApp({}, 100));
  });

  afterEach(async () => {
    await app.close();
  });

  const authorize = (source: string) =>
    request(app.getHttpServer()).post(`/admin/sources/${source}/authorize`).set(CALLER, OWNER).expect(200);

  const submit = (caller: string, asset: string, price: string, weight: number) =>
    request(app.getHttpServer()).post("/oracle/prices").set(CALLER, caller).send({ asset, price, weight });

  describe("price flow", () => {
    beforeEach(async () => {
      await authorize(REPORTER_A);
      await authorize(REPORTER_B);
    });

    it("aggregates quotes from two sources by weight", async () => {
      await submit(REPORTER_A, "STX", "1800000", 60).expect(200, { asset: "STX" });
      await submit(REPORTER_B, "STX", "1900000", 40).expect(200, { asset: "STX" });

      await request(app.getHttpServer()).get("/oracle/prices/STX").expect(200, { asset: "STX", price: "1840000" });
      await request(app.getHttpServer())
        .get("/oracle/prices/STX/data")
        .expect(200, { asset: "STX", aggregate: { price: "1840000", lastUpdateHeight: 100, sourceCount: 2 } });
      await request(app.getHttpServer())
        .get(`/oracle/prices/STX/sources/${REPORTER_B}`)
        .expect(200, {
          asset: "STX",
          source: REPORTER_B,
          quote: { price: "1900000", weight: 40, height: 100, active: true },
        });
    });

    it("returns null records for unknown assets", async () => {
      await request(app.getHttpServer()).get("/oracle/prices/BTC/data").expect(200, { asset: "BTC", aggregate: null });
      await request(app.getHttpServer())
        .get(`/oracle/prices/BTC/sources/${REPORTER_A}`)
        .expect(200, { asset: "BTC", source: REPORTER_A, quote: null });
    });

    it("rejects a stale aggregate with 409", async () => {
      await submit(REPORTER_A, "STX", "1800000", 60).expect(200);
      clock.advance(121);

      const response = await request(app.getHttpServer()).get("/oracle/prices/STX").expect(409);

      expect(response.body).toMatchObject({
        success: false,
        error: "STALE_PRICE",
        code: 4091,
        message: "Price for STX is stale: 121 blocks old (threshold 120)",
        details: { kind: "StalePrice", asset: "STX", age: 121, threshold: 120 },
      });
      await request(app.getHttpServer()).get("/oracle/prices/STX/fresh").expect(200, { asset: "STX", fresh: false });
    });

    it("answers 404 for an asset without an aggregate", async () => {
      const response = await request(app.getHttpServer()).get("/oracle/prices/BTC").expect(404);

      expect(response.body).toMatchObject({
        error: "SOURCE_NOT_FOUND",
        message: "No aggregate price for BTC",
      });
    });

    it("converts between two fresh aggregates", async () => {
      await submit(REPORTER_A, "STX", "1800000", 60).expect(200);
      await submit(REPORTER_B, "STX", "1900000", 40).expect(200);
      await submit(REPORTER_A, "USD", "1000000", 50).expect(200);

      await request(app.getHttpServer())
        .get("/oracle/convert")
        .query({ from: "STX", to: "USD", amount: "2000000" })
        .expect(200, { from: "STX", to: "USD", amount: "2000000", result: "3680000" });
    });

    it("reports a negative conversion amount as an invalid price", async () => {
      await submit(REPORTER_A, "STX", "1800000", 60).expect(200);

      const response = await request(app.getHttpServer())
        .get("/oracle/convert")
        .query({ from: "STX", to: "STX", amount: "-5" })
        .expect(400);

      expect(response.body).toMatchObject({ error: "INVALID_PRICE", details: { kind: "InvalidPrice" } });
    });

    it("rejects a zero price from the engine", async () => {
      const response = await submit(REPORTER_A, "STX", "0", 60).expect(400);

      expect(response.body).toMatchObject({
        error: "INVALID_PRICE",
        code: 4001,
        message: "Price must be a positive integer, got 0",
      });
      await request(app.getHttpServer()).get("/oracle/prices/STX/data").expect(200, { asset: "STX", aggregate: null });
    });
  });

  describe("caller identity", () => {
    it("requires the caller header to submit", async () => {
      const response = await request(app.getHttpServer())
        .post("/oracle/prices")
        .set("x-request-id", "req-missing-caller")
        .send({ asset: "STX", price: "1", weight: 1 })
        .expect(401);

      expect(response.body).toMatchObject({
        success: false,
        code: 4011,
        message: "Missing caller identity header: x-oracle-caller",
        requestId: "req-missing-caller",
      });
    });

    it("rejects submissions from unauthorized sources", async () => {
      const response = await request(app.getHttpServer())
        .post("/oracle/prices")
        .set(CALLER, OUTSIDER)
        .set("x-request-id", "req-outsider")
        .send({ asset: "STX", price: "1800000", weight: 50 })
        .expect(403);

      expect(response.headers["x-request-id"]).toBe("req-outsider");
      expect(response.body).toMatchObject({
        error: "NOT_AUTHORIZED",
        message: `Caller "${OUTSIDER}" is not authorized to submit prices`,
        requestId: "req-outsider",
      });
    });

    it("reports whether a source is authorized", async () => {
      await authorize(REPORTER_A);

      await request(app.getHttpServer())
        .get(`/oracle/sources/${REPORTER_A}/authorized`)
        .expect(200, { source: REPORTER_A, authorized: true });
      await request(app.getHttpServer())
        .get(`/oracle/sources/${OUTSIDER}/authorized`)
        .expect(200, { source: OUTSIDER, authorized: false });
    });
  });

  describe("request validation", () => {
    it("wraps malformed bodies in the error envelope", async () => {
      const response = await submit(REPORTER_A, "STX", "1.5", 60).expect(400);

      expect(response.body).toMatchObject({
        success: false,
        error: "VALIDATION_FAILED",
        code: 4000,
        message: "Request validation failed",
        details: { violations: ["price must be a decimal integer string"] },
      });
    });

    it("rejects unknown properties", async () => {
      const response = await request(app.getHttpServer())
        .post("/oracle/prices")
        .set(CALLER, REPORTER_A)
        .send({ asset: "STX", price: "1", weight: 1, source: REPORTER_B })
        .expect(400);

      expect(response.body.details).toEqual({ violations: ["property source should not exist"] });
    });

    it("sets the security and timing headers", async () => {
      const failed = await request(app.getHttpServer()).get("/oracle/prices/BTC").expect(404);
      expect(failed.headers["x-content-type-options"]).toBe("nosniff");
      expect(failed.headers["x-frame-options"]).toBe("DENY");

      const ok = await request(app.getHttpServer()).get("/health").expect(200);
      expect(ok.headers["x-response-time"]).toMatch(/^\d+ms$/);
    });
  });

  describe("administration", () => {
    it("lets the owner change parameters", async () => {
      await request(app.getHttpServer())
        .post("/admin/min-sources")
        .set(CALLER, OWNER)
        .send({ minSources: 3 })
        .expect(200, { ok: true });
      await request(app.getHttpServer())
        .post("/admin/staleness-threshold")
        .set(CALLER, OWNER)
        .send({ stalenessThreshold: 30 })
        .expect(200, { ok: true });

      await request(app.getHttpServer())
        .get("/admin/parameters")
        .set(CALLER, OUTSIDER)
        .expect(200, { owner: OWNER, minSources: 3, stalenessThreshold: 30, height: 100 });
    });

    it("refuses parameter changes from anyone else", async () => {
      const response = await request(app.getHttpServer())
        .post("/admin/min-sources")
        .set(CALLER, REPORTER_A)
        .send({ minSources: 3 })
        .expect(403);

      expect(response.body).toMatchObject({ error: "NOT_AUTHORIZED" });
    });

    it("rejects a zero minimum", async () => {
      await request(app.getHttpServer())
        .post("/admin/min-sources")
        .set(CALLER, OWNER)
        .send({ minSources: 0 })
        .expect(400);
    });

    it("lists registered sources in registration order", async () => {
      await authorize(REPORTER_B);
      await authorize(REPORTER_A);
      await request(app.getHttpServer()).post(`/admin/sources/${REPORTER_B}/deauthorize`).set(CALLER, OWNER).expect(200);

      await request(app.getHttpServer())
        .get("/admin/sources")
        .set(CALLER, OWNER)
        .expect(200, {
          sources: [
            { source: REPORTER_B, authorized: false },
            { source: REPORTER_A, authorized: true },
          ],
        });
    });

    it("pauses a quote so it no longer counts", async () => {
      await authorize(REPORTER_A);
      await authorize(REPORTER_B);
      await submit(REPORTER_A, "STX", "1800000", 60).expect(200);
      await submit(REPORTER_B, "STX", "1900000", 40).expect(200);

      await request(app.getHttpServer())
        .post(`/admin/assets/STX/sources/${REPORTER_B}/pause`)
        .set(CALLER, OWNER)
        .expect(200, { ok: true });
      await submit(REPORTER_A, "STX", "1800000", 60).expect(200);

      await request(app.getHttpServer()).get("/oracle/prices/STX").expect(200, { asset: "STX", price: "1800000" });
    });

    it("hands ownership over", async () => {
      await request(app.getHttpServer())
        .post("/admin/owner")
        .set(CALLER, OWNER)
        .send({ newOwner: "governance" })
        .expect(200, { ok: true });

      await request(app.getHttpServer()).post(`/admin/sources/${REPORTER_A}/authorize`).set(CALLER, OWNER).expect(403);
      await request(app.getHttpServer())
        .post(`/admin/sources/${REPORTER_A}/authorize`)
        .set(CALLER, "governance")
        .expect(200);
    });
  });

  it("reports health with the clock height", async () => {
    await request(app.getHttpServer()).post(`/admin/sources/${REPORTER_A}/authorize`).set(CALLER, OWNER);
    await submit(REPORTER_A, "STX", "1800000", 60).expect(200);

    const response = await request(app.getHttpServer()).get("/health").expect(200);

    expect(response.body).toMatchObject({ status: "healthy", height: 100, assets: 1 });
  });
});
