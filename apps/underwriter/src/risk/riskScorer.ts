import type {
  PpiQuoteRequest,
  QuoteRequest,
  RiskAssessment,
  RiskBand,
  ShippingQuoteRequest,
} from "@embedded-uw/shared";
import { ValidationError } from "../errors/errors.js";
import { isUsState } from "../util/states.js";

export const DESTINATION_RISK_WEIGHT: Readonly<Record<string, number>> = { low: 0, medium: 0.5, high: 1.0 };
export const SERVICE_LEVEL_WEIGHT: Readonly<Record<string, number>> = { ground: 0.2, expedited: 0.1, overnight: 0 };
export const ITEM_CATEGORY_WEIGHT: Readonly<Record<string, number>> = {
  standard: 0,
  apparel: 0,
  home_goods: 0,
  electronics: 0,
  electronics_high_value: 0.3,
  jewelry_high_value: 0.3,
};
export const JOB_CATEGORY_WEIGHT: Readonly<Record<string, number>> = {
  full_time: 0,
  retired: 0.1,
  part_time: 0.2,
  contract: 0.3,
  self_employed: 0.3,
};

// Raw scores run 0..2; the score is raw / RAW_SCALE clamped to [0, 1].
const RAW_SCALE = 2;

// Upper (exclusive) score bound per band; E takes the rest.
const BAND_THRESHOLDS: ReadonlyArray<[RiskBand, number]> = [
  ["A", 0.2],
  ["B", 0.4],
  ["C", 0.6],
  ["D", 0.8],
];

export const BAND_MULTIPLIER: Readonly<Record<RiskBand, number>> = {
  A: 1.0,
  B: 1.05,
  C: 1.1,
  D: 1.25,
  E: 1.4,
};

export const MAX_TERM_MONTHS = 24;

function clamp01(n: number) {
  return Math.max(0, Math.min(1, n));
}

function round4(n: number) {
  return Math.round(n * 10_000) / 10_000;
}

function lookup(table: Readonly<Record<string, number>>, key: string, field: string): number {
  const weight = table[key];
  if (weight === undefined) throw new ValidationError(`Unknown ${field} '${key}'`, field);
  return weight;
}

function requirePositiveCents(value: number, field: string) {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive integer amount of cents`, field);
  }
}

function requireState(code: string, field: string) {
  if (!isUsState(code)) throw new ValidationError(`Unknown state code '${code}'`, field);
}

export function bandForScore(score: number): RiskBand {
  for (const [band, upper] of BAND_THRESHOLDS) {
    if (score < upper) return band;
  }
  return "E";
}

function scoreShipping(req: ShippingQuoteRequest): Record<string, number> {
  requirePositiveCents(req.declaredValueCents, "declaredValueCents");
  requireState(req.destinationState, "destinationState");
  return {
    declaredValue: 0.02 * (req.declaredValueCents / 1000),
    destinationRisk: lookup(DESTINATION_RISK_WEIGHT, req.destinationRisk, "destinationRisk"),
    serviceLevel: lookup(SERVICE_LEVEL_WEIGHT, req.serviceLevel, "serviceLevel"),
    itemCategory: lookup(ITEM_CATEGORY_WEIGHT, req.itemCategory, "itemCategory"),
  };
}

function scorePpi(req: PpiQuoteRequest): Record<string, number> {
  requirePositiveCents(req.orderValueCents, "orderValueCents");
  if (!Number.isInteger(req.termMonths) || req.termMonths < 1 || req.termMonths > MAX_TERM_MONTHS) {
    throw new ValidationError(`termMonths must be an integer between 1 and ${MAX_TERM_MONTHS}`, "termMonths");
  }
  if (req.state !== undefined) requireState(req.state, "state");
  if (req.age !== undefined && (!Number.isInteger(req.age) || req.age < 18 || req.age > 120)) {
    throw new ValidationError("age must be an integer between 18 and 120", "age");
  }
  if (req.tenureMonths !== undefined && (!Number.isInteger(req.tenureMonths) || req.tenureMonths < 0)) {
    throw new ValidationError("tenureMonths must be a non-negative integer", "tenureMonths");
  }
  return {
    orderValue: 0.02 * (req.orderValueCents / 10_000),
    term: 0.1 * (req.termMonths / 6),
    jobCategory: lookup(JOB_CATEGORY_WEIGHT, req.jobCategory, "jobCategory"),
    youngApplicant: req.age !== undefined && req.age < 25 ? 0.3 : 0,
    shortTenure: req.tenureMonths !== undefined && req.tenureMonths < 6 ? 0.3 : 0,
  };
}

/**
 * Deterministic risk score for a quote request.
 *
 * Each product sums fixed weighted factors into a raw score; the raw score is
 * normalised into [0, 1] and mapped onto bands A..E. Nothing outside the
 * request is read, so equal requests always score equally.
 */
export function scoreRisk(request: QuoteRequest): RiskAssessment {
  const factors = request.productCode === "shipping" ? scoreShipping(request) : scorePpi(request);
  const raw = Object.values(factors).reduce((a, b) => a + b, 0);
  const score = round4(clamp01(raw / RAW_SCALE));
  const band = bandForScore(score);
  return {
    productCode: request.productCode,
    score,
    band,
    riskMultiplier: BAND_MULTIPLIER[band],
    factors,
  };
}
