// backend/services/phone-address/test/storeUnavailable.spec.ts
import { describe, it, expect } from "vitest";
import { buildTestApp, unreachableStore } from "./helpers/app";
import { expectOK, expectStatus } from "./helpers/http";

const BASE = "/api/v1/phone-addresses";

describe("store unavailable", () => {
  const { agent } = buildTestApp({ store: unreachableStore() });

  it.each([
    ["GET", () => agent.get(`${BASE}/555-0200`)],
    ["POST", () => agent.post(BASE).send({ phone: "555-0200", address: "A" })],
    ["PUT", () => agent.put(`${BASE}/555-0200`).send({ address: "A" })],
    ["DELETE", () => agent.delete(`${BASE}/555-0200`)],
  ])("%s → 503 STORE_UNAVAILABLE", async (_method, send) => {
    const res = await expectStatus(send(), 503);
    expect(res.body).toMatchObject({
      status: 503,
      code: "STORE_UNAVAILABLE",
      detail: "Storage backend is unavailable",
    });
    expect(JSON.stringify(res.body)).not.toContain("ECONNREFUSED");
  });

  it("validation still runs before the store is touched", async () => {
    await expectStatus(agent.post(BASE).send({ phone: "1", address: "A" }), 422);
  });

  it("/health reports degraded with 200", async () => {
    const res = await expectOK(agent.get("/health"));
    expect(res.body.status).toBe("degraded");
    expect(res.body.redis).toBe("unavailable");
  });

  it("/readyz → 503, /healthz stays live", async () => {
    const ready = await expectStatus(agent.get("/readyz"), 503);
    expect(ready.body).toMatchObject({ ok: false, redis: "unavailable" });

    const live = await expectOK(agent.get("/healthz"));
    expect(live.body.ok).toBe(true);
  });
});
