import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createFixedClock } from "@embedded-uw/shared";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { routeRequest } from "../src/api/server.js";
import { createUnderwriter, type Underwriter } from "../src/app.js";
import { ConfigRegistry } from "../src/snapshot/configSnapshot.js";
import { sequentialIds, snapshot, testLogger } from "./fixtures.js";

const SHOPFRONT = "Bearer test-token-shopfront";
const PAYLATER = "Bearer test-token-paylater";

const shippingBody = {
  product_code: "shipping",
  declared_value: 65_000,
  item_category: "electronics",
  destination_state: "CA",
  destination_risk: "medium",
  service_level: "ground",
};

const ppiBody = {
  product_code: "ppi",
  order_value: 100_000,
  term_months: 12,
  job_category: "full_time",
  state: "GA",
  age: 30,
  tenure_months: 24,
};

const policyholder = { name: "Sam Doe", email: "sam@example.com" };

let dir: string;
let uw: Underwriter;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "uw-api-"));
  uw = createUnderwriter({
    config: new ConfigRegistry(() => snapshot()),
    auditPath: path.join(dir, "audit.jsonl"),
    clock: createFixedClock("2024-06-15T12:00:00.000Z"),
    log: testLogger(),
    quoteTtlMinutes: 30,
    simMaxScenarios: 5_000,
    simPartitionSize: 250,
    newId: sequentialIds(),
  });
});

afterEach(() => {
  uw.detach();
  fs.rmSync(dir, { recursive: true, force: true });
});

function post(url: string, body: unknown, authorization?: string) {
  return routeRequest(uw, { method: "POST", url, body, authorization });
}

function get(url: string, authorization?: string) {
  return routeRequest(uw, { method: "GET", url, authorization });
}

describe("routeRequest", () => {
  it("answers health checks", async () => {
    expect(await get("/api/health")).toEqual({ status: 200, body: { ok: true, ts: "2024-06-15T12:00:00.000Z" } });
  });

  it("requires a bearer token for partner endpoints", async () => {
    const res = await post("/v1/quotes", shippingBody);
    expect(res.status).toBe(401);
    expect(res.body).toEqual({
      error: { code: "UNAUTHORIZED", message: "Missing or invalid bearer token", details: {} },
    });
    expect((await post("/v1/quotes", shippingBody, "Bearer wrong")).status).toBe(401);
  });

  it("quotes, binds and reads back a policy", async () => {
    const quote = await post("/v1/quotes", shippingBody, SHOPFRONT);
    expect(quote.status).toBe(201);
    expect(quote.body).toMatchObject({
      quote_id: "q_1",
      product_code: "shipping",
      premium_cents: 62_162,
      price_breakdown: { base_premium_cents: 41_113, risk_adjusted_premium_cents: 57_558, total_premium_cents: 62_162 },
      risk_band: "E",
      risk_multiplier: 1.4,
      carrier_suggestion: "c_atlas",
      compliance: { decision: "allow", rules_applied: ["shipping_terms"], version: "1.3.0" },
      expires_at: "2024-06-15T12:30:00.000Z",
    });

    const bound = await post("/v1/bindings", { quote_id: "q_1", policyholder }, SHOPFRONT);
    expect(bound).toEqual({
      status: 201,
      body: {
        policy_id: "pol_1",
        status: "active",
        premium_total_cents: 62_162,
        carrier_id: "c_atlas",
        effective_date: "2024-06-15",
      },
    });

    const policy = await get("/v1/policies/pol_1", SHOPFRONT);
    expect(policy.status).toBe(200);
    expect(policy.body).toMatchObject({ quote_id: "q_1", risk_band: "E", risk_multiplier: 1.4, ledger_total_cents: 62_162 });
    expect((await get("/v1/policies/pol_9", SHOPFRONT)).status).toBe(404);

    expect(uw.state).toMatchObject({ quotesIssued: 1, policiesBound: 1, writtenPremiumCents: 62_162 });
  });

  it("rejects a malformed body with the failing fields", async () => {
    const res = await post("/v1/quotes", { ...shippingBody, declared_value: -5 }, SHOPFRONT);
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      error: { code: "VALIDATION_ERROR", details: { issues: [{ path: "declared_value" }] } },
    });
  });

  it("rejects products the partner is not enabled for", async () => {
    const res = await post("/v1/quotes", shippingBody, PAYLATER);
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { code: "VALIDATION_ERROR", details: { field: "product_code" } } });
  });

  it("rejects ppi terms beyond the longest rated term", async () => {
    const res = await post("/v1/quotes", { ...ppiBody, state: "CA", term_months: 30 }, PAYLATER);
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { code: "VALIDATION_ERROR", details: { field: "termMonths" } } });
  });

  it("maps a missing carrier to 422", async () => {
    const res = await post("/v1/quotes", { ...shippingBody, destination_state: "HI" }, SHOPFRONT);
    expect(res.status).toBe(422);
    expect(res.body).toMatchObject({ error: { code: "NO_CARRIER_AVAILABLE" } });
  });

  it("reports the blocking rules when binding is refused", async () => {
    await post("/v1/quotes", ppiBody, PAYLATER);
    const res = await post("/v1/bindings", { quote_id: "q_1", policyholder }, PAYLATER);
    expect(res.status).toBe(422);
    expect(res.body).toMatchObject({
      error: { code: "COMPLIANCE_BLOCKED", details: { ruleIds: ["ppi_ga_block", "ban_ppi_states"], version: "1.3.0" } },
    });
    expect(uw.state.bindsBlocked).toBe(1);

    const audit = await get("/api/audit?lines=2");
    expect(audit.body).toMatchObject({
      lines: 2,
      items: [
        { type: "compliance_block", quoteId: "q_1", ruleIds: ["ppi_ga_block", "ban_ppi_states"] },
        { type: "error", error: { code: "COMPLIANCE_BLOCKED" } },
      ],
    });
  });

  it("maps unknown and spent quotes to 404 and 409", async () => {
    expect((await post("/v1/bindings", { quote_id: "q_404", policyholder }, SHOPFRONT)).status).toBe(404);
    await post("/v1/quotes", shippingBody, SHOPFRONT);
    await post("/v1/bindings", { quote_id: "q_1", policyholder }, SHOPFRONT);
    const again = await post("/v1/bindings", { quote_id: "q_1", policyholder }, SHOPFRONT);
    expect(again.status).toBe(409);
    expect(again.body).toMatchObject({ error: { code: "QUOTE_EXPIRED", details: { status: "bound" } } });
  });

  it("simulates the bound book", async () => {
    await post("/v1/quotes", shippingBody, SHOPFRONT);
    await post("/v1/bindings", { quote_id: "q_1", policyholder }, SHOPFRONT);
    const res = await post("/v1/portfolio/simulate", {
      as_of_month: "2024-06",
      scenario_count: 500,
      retention_grid: [10_000, 50_000],
      reinsurance_params: { rate_on_line: 0.1, load: 0.2 },
      seed: 7,
    }, SHOPFRONT);

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ as_of_month: "2024-06", scenario_count: 500, seed: 7, active_policies: 1 });
    expect(uw.state.simulationsRun).toBe(1);
    expect(uw.state.lastSimulation?.seed).toBe(7);
  });

  it("refuses simulations above the configured scenario bound", async () => {
    const res = await post("/v1/portfolio/simulate", {
      as_of_month: "2024-06",
      scenario_count: 5_001,
      retention_grid: [10_000],
      reinsurance_params: { rate_on_line: 0.1, load: 0.2 },
    }, SHOPFRONT);
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { code: "VALIDATION_ERROR", details: { field: "scenarioCount" } } });
  });

  it("answers 404 for unknown routes", async () => {
    expect((await get("/nope")).status).toBe(404);
    expect((await routeRequest(uw, { method: "DELETE", url: "/v1/quotes" })).status).toBe(404);
  });
});
