import type {
  Carrier,
  CarrierEvaluation,
  QuoteRequest,
  RiskBand,
  RoutingDecision,
} from "@embedded-uw/shared";
import { NoCarrierAvailableError } from "../errors/errors.js";
import { formatCents, money, roundHalfUpCents } from "../util/money.js";

export type RoutingInput = {
  request: QuoteRequest;
  premiumCents: number;
  riskBand: RiskBand;
  riskMultiplier: number;
  /** Remaining capacity per carrier id; carriers absent here use their full capacity. */
  remainingCapacityCents?: Readonly<Record<string, number>>;
};

type AppetiteCheck = { ok: true } | { ok: false; reason: string };

const BAND_ORDER: Record<RiskBand, number> = { A: 1, B: 2, C: 3, D: 4, E: 5 };

function ok(): AppetiteCheck {
  return { ok: true };
}

function fail(reason: string): AppetiteCheck {
  return { ok: false, reason };
}

function checkBand(band: RiskBand, max: RiskBand | undefined): AppetiteCheck {
  if (max && BAND_ORDER[band] > BAND_ORDER[max]) return fail(`risk band ${band} exceeds max ${max}`);
  return ok();
}

/**
 * Appetite check for one carrier. Returns the first reason the carrier
 * declines, in the order: product, state, category, limits, band.
 */
export function checkAppetite(carrier: Carrier, request: QuoteRequest, band: RiskBand): AppetiteCheck {
  if (request.productCode === "shipping") {
    const a = carrier.appetite.shipping;
    if (!a) return fail("does not write shipping");
    if (!a.states.includes(request.destinationState)) return fail(`state ${request.destinationState} outside appetite`);
    if (!a.categories.includes(request.itemCategory)) return fail(`category ${request.itemCategory} outside appetite`);
    if (a.maxDeclaredValueCents !== undefined && request.declaredValueCents > a.maxDeclaredValueCents) {
      return fail(`declared value ${request.declaredValueCents} exceeds max ${a.maxDeclaredValueCents}`);
    }
    return checkBand(band, a.maxRiskBand);
  }

  const a = carrier.appetite.ppi;
  if (!a) return fail("does not write ppi");
  if (request.state === undefined || !a.states.includes(request.state)) {
    return fail(`state ${request.state ?? "(none)"} outside appetite`);
  }
  if (!a.jobCategories.includes(request.jobCategory)) return fail(`job category ${request.jobCategory} outside appetite`);
  if (a.maxTermMonths !== undefined && request.termMonths > a.maxTermMonths) {
    return fail(`term ${request.termMonths} months exceeds max ${a.maxTermMonths}`);
  }
  if (a.maxOrderValueCents !== undefined && request.orderValueCents > a.maxOrderValueCents) {
    return fail(`order value ${request.orderValueCents} exceeds max ${a.maxOrderValueCents}`);
  }
  return checkBand(band, a.maxRiskBand);
}

/**
 * Expected underwriting margin in cents: premium less risk-scaled expected
 * losses, proportional expenses and the carrier's fixed cost per policy.
 */
export function expectedMarginCents(carrier: Carrier, premiumCents: number, riskMultiplier: number): number {
  const { expectedLossRatio, expenseRatio, fixedCostCents } = carrier.costs;
  const retained = money(1).minus(money(expectedLossRatio).mul(riskMultiplier)).minus(expenseRatio);
  return roundHalfUpCents(money(premiumCents).mul(retained).minus(fixedCostCents));
}

export function evaluateCarriers(input: RoutingInput, carriers: readonly Carrier[]): CarrierEvaluation[] {
  return [...carriers]
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    .map((carrier) => {
      const remaining = input.remainingCapacityCents?.[carrier.id] ?? carrier.capacityCents;
      const marginCents = expectedMarginCents(carrier, input.premiumCents, input.riskMultiplier);
      const appetite = checkAppetite(carrier, input.request, input.riskBand);
      const base = { carrierId: carrier.id, marginCents, remainingCapacityCents: remaining };
      if (!appetite.ok) return { ...base, eligible: false, reason: appetite.reason };
      if (remaining < input.premiumCents) {
        return { ...base, eligible: false, reason: `remaining capacity ${remaining} below premium ${input.premiumCents}` };
      }
      return { ...base, eligible: true, reason: "meets appetite and capacity" };
    });
}

/**
 * Pick the eligible carrier with the highest expected margin; ties go to the
 * lowest carrier id. Capacity is only read here, binding consumes it.
 */
export function routeToCarrier(input: RoutingInput, carriers: readonly Carrier[]): RoutingDecision {
  const evaluations = evaluateCarriers(input, carriers);
  const eligible = evaluations.filter((e) => e.eligible);

  if (!eligible.length) {
    const reasons = Object.fromEntries(evaluations.map((e) => [e.carrierId, e.reason]));
    throw new NoCarrierAvailableError(
      `No eligible carrier for ${input.request.productCode} quote`,
      reasons
    );
  }

  // evaluations are id-ascending, so a strict comparison keeps the lowest id on ties
  const selected = eligible.reduce((best, e) => (e.marginCents > best.marginCents ? e : best));

  const rationale =
    `Selected ${selected.carrierId} with margin ${formatCents(selected.marginCents)} ` +
    `(premium: ${formatCents(input.premiumCents)}, capacity: ${formatCents(selected.remainingCapacityCents)})`;

  return {
    carrierId: selected.carrierId,
    marginCents: selected.marginCents,
    rationale,
    evaluations,
  };
}
