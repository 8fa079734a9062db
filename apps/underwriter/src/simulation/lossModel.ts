import type { PolicyExposure, RiskBand } from "@embedded-uw/shared";
import { monthIndex } from "../util/time.js";
import type { Rng } from "./random.js";

/** Probability that a policy produces a claim in the simulated month. */
export const CLAIM_PROBABILITY: Readonly<Record<RiskBand, number>> = {
  A: 0.01,
  B: 0.02,
  C: 0.035,
  D: 0.05,
  E: 0.08,
};

// Pareto severity as a fraction of coverage: scale 0.1, shape 1.5.
export const SEVERITY_SCALE = 0.1;
export const SEVERITY_SHAPE = 1.5;

/** Active policies as of `asOfMonth`, ordered by policy id. */
export function activeExposures(book: readonly PolicyExposure[], asOfMonth: string): PolicyExposure[] {
  const asOf = monthIndex(asOfMonth);
  return book
    .filter((p) => {
      if (p.status !== "active") return false;
      const start = monthIndex(p.effectiveDate);
      return start <= asOf && asOf <= start + p.termMonths - 1;
    })
    .sort((a, b) => (a.policyId < b.policyId ? -1 : a.policyId > b.policyId ? 1 : 0));
}

/**
 * Loss of one policy in cents: zero unless a claim occurs, otherwise a Pareto
 * fraction of coverage capped at the coverage amount.
 */
export function drawPolicyLoss(policy: PolicyExposure, rng: Rng): number {
  if (rng() >= CLAIM_PROBABILITY[policy.riskBand]) return 0;
  // 1 - u lies in (0, 1], keeping the inverse CDF finite
  const fraction = SEVERITY_SCALE * Math.pow(1 - rng(), -1 / SEVERITY_SHAPE);
  return Math.min(policy.coverageCents, fraction * policy.coverageCents);
}
