import { describe, expect, it } from "vitest";
import { RateNotFoundError, ValidationError } from "../src/errors/errors.js";
import { priceQuote, termMultiplier } from "../src/pricing/pricingEngine.js";
import { scoreRisk } from "../src/risk/riskScorer.js";
import { money, roundHalfUpCents } from "../src/util/money.js";
import { ppiRequest, seedData, shippingRequest } from "./fixtures.js";

const curves = seedData().rateCurves;
const shopfront = { partnerId: "ptnr_shopfront", markupPct: 0.08 };

describe("priceQuote", () => {
  it("prices the $650 electronics shipment", () => {
    const req = shippingRequest();
    const price = priceQuote(scoreRisk(req), req, shopfront, curves);
    expect(price.basePremiumExactCents).toBe("41112.5");
    expect(price.basePremiumCents).toBe(41113);
    expect(price.riskMultiplier).toBe(1.4);
    expect(price.riskAdjustedPremiumCents).toBe(57558);
    expect(price.totalPremiumCents).toBe(62162);
  });

  it("rounds the total from the unrounded base", () => {
    const req = shippingRequest();
    const price = priceQuote(scoreRisk(req), req, shopfront, curves);
    const expected = roundHalfUpCents(
      money(price.basePremiumExactCents).mul(price.riskMultiplier).mul(money(1).plus(price.partnerMarkupPct))
    );
    expect(price.totalPremiumCents).toBe(expected);
  });

  it("holds the premium identity across the rate tables and markups", () => {
    const markups = [0, 0.08, 0.12, 0.35];
    const requests = [
      ...["standard", "apparel", "home_goods", "electronics", "electronics_high_value", "jewelry_high_value"].flatMap(
        (itemCategory) =>
          (["low", "medium", "high"] as const).flatMap((destinationRisk) =>
            (["ground", "expedited", "overnight"] as const).flatMap((serviceLevel) =>
              [1_999, 65_000, 250_001].map((declaredValueCents) =>
                shippingRequest({ itemCategory, destinationRisk, serviceLevel, declaredValueCents })
              )
            )
          )
      ),
      ...[1, 6, 7, 12, 13, 18, 19, 24].flatMap((termMonths) =>
        ["full_time", "part_time", "retired", "contract", "self_employed"].flatMap((jobCategory) =>
          [15_000, 100_001, 733_333].map((orderValueCents) => ppiRequest({ termMonths, jobCategory, orderValueCents }))
        )
      ),
    ];

    for (const req of requests) {
      const risk = scoreRisk(req);
      for (const markupPct of markups) {
        const price = priceQuote(risk, req, { partnerId: req.partnerId, markupPct }, curves);
        const exact = money(price.basePremiumExactCents);
        expect(price.basePremiumCents).toBe(roundHalfUpCents(exact));
        expect(price.riskAdjustedPremiumCents).toBe(roundHalfUpCents(exact.mul(risk.riskMultiplier)));
        expect(price.totalPremiumCents).toBe(
          roundHalfUpCents(exact.mul(risk.riskMultiplier).mul(money(1).plus(markupPct)))
        );
      }
    }
  });

  it("prices a 12-month ppi order", () => {
    const req = ppiRequest();
    const price = priceQuote(scoreRisk(req), req, { partnerId: "ptnr_paylater", markupPct: 0.12 }, curves);
    expect(price.basePremiumCents).toBe(750);
    expect(price.riskAdjustedPremiumCents).toBe(788);
    expect(price.totalPremiumCents).toBe(882);
    expect(price.factors).toEqual({ baseRate: 0.0075, term: 1, job: 1 });
  });

  it("never lowers the total as the insured value grows", () => {
    const totals = [10_000, 50_000, 65_000, 120_000, 500_000, 2_000_000].map((declaredValueCents) => {
      const req = shippingRequest({ declaredValueCents });
      return priceQuote(scoreRisk(req), req, shopfront, curves).totalPremiumCents;
    });
    for (let i = 1; i < totals.length; i++) expect(totals[i]).toBeGreaterThanOrEqual(totals[i - 1]);

    const ppiTotals = [20_000, 100_000, 400_000].map((orderValueCents) => {
      const req = ppiRequest({ orderValueCents });
      return priceQuote(scoreRisk(req), req, { partnerId: "ptnr_paylater", markupPct: 0.12 }, curves).totalPremiumCents;
    });
    for (let i = 1; i < ppiTotals.length; i++) expect(ppiTotals[i]).toBeGreaterThanOrEqual(ppiTotals[i - 1]);
  });

  it("fails when a curve entry is missing", () => {
    const req = shippingRequest();
    const risk = scoreRisk(req);
    expect(() => priceQuote(risk, { ...req, itemCategory: "furniture" }, shopfront, curves)).toThrow(RateNotFoundError);
    expect(() => priceQuote(risk, req, shopfront, {})).toThrow(RateNotFoundError);
  });

  it("fails for a term beyond the last bucket", () => {
    const risk = scoreRisk(ppiRequest());
    expect(() => priceQuote(risk, ppiRequest({ termMonths: 30 }), shopfront, curves)).toThrow(RateNotFoundError);
  });

  it("rejects a markup outside [0, 1)", () => {
    const req = shippingRequest();
    expect(() => priceQuote(scoreRisk(req), req, { partnerId: "p", markupPct: 1 }, curves)).toThrow(ValidationError);
  });

  it("rejects a value too small to carry a premium", () => {
    const req = shippingRequest({ declaredValueCents: 1, itemCategory: "apparel", destinationRisk: "low" });
    expect(() => priceQuote(scoreRisk(req), req, shopfront, curves)).toThrow(ValidationError);
  });
});

describe("termMultiplier", () => {
  it("picks the smallest bucket covering the term", () => {
    const ppi = curves.ppi;
    if (!ppi) throw new Error("seed data has no ppi curve");
    expect([1, 6, 7, 12, 13, 24].map((t) => termMultiplier(ppi, t))).toEqual([0.9, 0.9, 1, 1, 1.1, 1.25]);
  });
});
