import type {
  PartnerTerms,
  PpiQuoteRequest,
  PpiRateCurve,
  PriceBreakdown,
  QuoteRequest,
  RateCurves,
  RiskAssessment,
  ShippingQuoteRequest,
  ShippingRateCurve,
} from "@embedded-uw/shared";
import { RateNotFoundError, ValidationError } from "../errors/errors.js";
import { money, roundHalfUpCents, type MoneyValue } from "../util/money.js";

type CurveResult = { base: MoneyValue; factors: Record<string, number> };

function rate(table: Readonly<Record<string, number>>, key: string, product: string, dimension: string): number {
  const value = table[key];
  if (value === undefined) throw new RateNotFoundError(product, dimension, key);
  return value;
}

function shippingBase(req: ShippingQuoteRequest, curve: ShippingRateCurve | undefined): CurveResult {
  if (!curve) throw new RateNotFoundError("shipping", "base");
  const factors = {
    baseRate: curve.baseRate,
    category: rate(curve.category, req.itemCategory, "shipping", "category"),
    destination: rate(curve.destination, req.destinationRisk, "shipping", "destination"),
    service: rate(curve.service, req.serviceLevel, "shipping", "service"),
  };
  const base = money(req.declaredValueCents)
    .mul(factors.baseRate)
    .mul(factors.category)
    .mul(factors.destination)
    .mul(factors.service);
  return { base, factors };
}

/** Smallest bucket whose `maxMonths` covers the term. */
export function termMultiplier(curve: PpiRateCurve, termMonths: number): number {
  const bucket = [...curve.termBuckets]
    .sort((a, b) => a.maxMonths - b.maxMonths)
    .find((b) => termMonths <= b.maxMonths);
  if (!bucket) throw new RateNotFoundError("ppi", "term", String(termMonths));
  return bucket.multiplier;
}

function ppiBase(req: PpiQuoteRequest, curve: PpiRateCurve | undefined): CurveResult {
  if (!curve) throw new RateNotFoundError("ppi", "base");
  const factors = {
    baseRate: curve.baseRate,
    term: termMultiplier(curve, req.termMonths),
    job: rate(curve.job, req.jobCategory, "ppi", "job"),
  };
  const base = money(req.orderValueCents).mul(factors.baseRate).mul(factors.term).mul(factors.job);
  return { base, factors };
}

/**
 * Premium for a scored request.
 *
 * Composition order is fixed: curve base → × risk multiplier → × (1 + markup),
 * carried in exact decimal arithmetic and rounded half up to cents once per
 * reported figure. The total is always rounded from the unrounded base.
 */
export function priceQuote(
  risk: RiskAssessment,
  request: QuoteRequest,
  terms: PartnerTerms,
  curves: RateCurves
): PriceBreakdown {
  if (!(terms.markupPct >= 0 && terms.markupPct < 1)) {
    throw new ValidationError(`Partner markup ${terms.markupPct} outside [0, 1)`, "markupPct");
  }
  const { base, factors } = request.productCode === "shipping"
    ? shippingBase(request, curves.shipping)
    : ppiBase(request, curves.ppi);

  const riskAdjusted = base.mul(risk.riskMultiplier);
  const total = riskAdjusted.mul(money(1).plus(terms.markupPct));

  const basePremiumCents = roundHalfUpCents(base);
  if (basePremiumCents < 1) {
    throw new ValidationError("Insured value too small to produce a premium", "value");
  }

  return {
    basePremiumExactCents: base.toString(),
    basePremiumCents,
    riskMultiplier: risk.riskMultiplier,
    riskAdjustedPremiumCents: roundHalfUpCents(riskAdjusted),
    partnerMarkupPct: terms.markupPct,
    totalPremiumCents: roundHalfUpCents(total),
    factors,
  };
}
