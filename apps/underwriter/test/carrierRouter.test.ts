import type { Carrier } from "@embedded-uw/shared";
import { describe, expect, it } from "vitest";
import { NoCarrierAvailableError } from "../src/errors/errors.js";
import { checkAppetite, expectedMarginCents, routeToCarrier } from "../src/routing/carrierRouter.js";
import { ppiRequest, seedData, shippingRequest } from "./fixtures.js";

const carriers = seedData().carriers;

function carrier(id: string, overrides: Partial<Carrier> = {}): Carrier {
  return {
    id,
    name: id,
    appetite: { shipping: { states: ["CA"], categories: ["electronics"] } },
    capacityCents: 1_000_000,
    costs: { expectedLossRatio: 0.5, expenseRatio: 0.1, fixedCostCents: 0 },
    ...overrides,
  };
}

const workedExample = {
  request: shippingRequest(),
  premiumCents: 62_162,
  riskBand: "E" as const,
  riskMultiplier: 1.4,
};

describe("routeToCarrier", () => {
  it("routes the $650 electronics shipment to c_atlas", () => {
    const decision = routeToCarrier(workedExample, carriers);
    expect(decision.carrierId).toBe("c_atlas");
    expect(decision.marginCents).toBe(11_189);
    expect(decision.rationale).toBe(
      "Selected c_atlas with margin $111.89 (premium: $621.62, capacity: $500000.00)"
    );
    expect(decision.evaluations.map((e) => [e.carrierId, e.eligible, e.marginCents])).toEqual([
      ["c_atlas", true, 11_189],
      ["c_harbor", true, 6_066],
      ["c_meridian", false, 12_332],
    ]);
    expect(decision.evaluations[2]?.reason).toBe("does not write shipping");
  });

  it("raises NoCarrierAvailableError with per-carrier reasons", () => {
    const input = { ...workedExample, request: shippingRequest({ destinationState: "HI" }) };
    expect(() => routeToCarrier(input, carriers)).toThrow(NoCarrierAvailableError);
    try {
      routeToCarrier(input, carriers);
    } catch (err) {
      if (!(err instanceof NoCarrierAvailableError)) throw err;
      expect(err.reasons).toEqual({
        c_atlas: "state HI outside appetite",
        c_harbor: "state HI outside appetite",
        c_meridian: "does not write shipping",
      });
    }
  });

  it("breaks margin ties toward the lowest carrier id", () => {
    const decision = routeToCarrier(workedExample, [carrier("c_b"), carrier("c_a")]);
    expect(decision.carrierId).toBe("c_a");
  });

  it("skips carriers without remaining capacity", () => {
    const decision = routeToCarrier({ ...workedExample, remainingCapacityCents: { c_atlas: 100 } }, carriers);
    expect(decision.carrierId).toBe("c_harbor");
    expect(decision.evaluations[0]?.reason).toBe("remaining capacity 100 below premium 62162");
  });

  it("routes a ppi order in California to the higher-margin c_atlas", () => {
    const decision = routeToCarrier(
      { request: ppiRequest(), premiumCents: 882, riskBand: "B", riskMultiplier: 1.05 },
      carriers
    );
    expect(decision.carrierId).toBe("c_atlas");
    expect(decision.marginCents).toBe(329);
  });

  it("falls back to c_meridian for a Georgia ppi order", () => {
    const decision = routeToCarrier(
      { request: ppiRequest({ state: "GA" }), premiumCents: 882, riskBand: "B", riskMultiplier: 1.05 },
      carriers
    );
    expect(decision.carrierId).toBe("c_meridian");
    expect(decision.marginCents).toBe(231);
  });
});

describe("checkAppetite", () => {
  const atlas = carriers.find((c) => c.id === "c_atlas");
  if (!atlas) throw new Error("c_atlas missing from seed data");

  it("declines bands above the carrier's maximum", () => {
    expect(checkAppetite(atlas, ppiRequest(), "E")).toEqual({ ok: false, reason: "risk band E exceeds max D" });
  });

  it("declines ppi requests without a state", () => {
    expect(checkAppetite(atlas, ppiRequest({ state: undefined }), "A")).toEqual({
      ok: false,
      reason: "state (none) outside appetite",
    });
  });

  it("declines terms beyond the carrier's limit", () => {
    expect(checkAppetite(atlas, ppiRequest({ termMonths: 30 }), "A")).toEqual({
      ok: false,
      reason: "term 30 months exceeds max 24",
    });
  });
});

describe("expectedMarginCents", () => {
  it("subtracts risk-scaled losses, expenses and fixed cost", () => {
    const c = carrier("c_x", { costs: { expectedLossRatio: 0.6, expenseRatio: 0.06, fixedCostCents: 150 } });
    expect(expectedMarginCents(c, 62_162, 1.4)).toBe(6_066);
  });
});
