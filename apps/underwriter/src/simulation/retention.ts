import type {
  ReinsuranceParams,
  RetentionRecommendation,
  RetentionRow,
  SensitivityAnalysis,
  SensitivityPoint,
} from "@embedded-uw/shared";
import { ValidationError } from "../errors/errors.js";
import { formatCents, roundHalfUpCents } from "../util/money.js";

export const RATE_ON_LINE_VARIATIONS = [0.05, 0.1, 0.15, 0.2];
export const LOAD_VARIATIONS = [0.1, 0.2, 0.3, 0.4];

/** One row per grid entry, in grid order. Money is rounded to cents per row. */
export function retentionTable(
  losses: ArrayLike<number>,
  grid: readonly number[],
  params: ReinsuranceParams
): RetentionRow[] {
  const n = losses.length;
  return grid.map((retention) => {
    let total = 0;
    let ceded = 0;
    let retained = 0;
    for (let i = 0; i < n; i++) {
      const loss = losses[i] ?? 0;
      total += loss;
      ceded += Math.max(0, loss - retention);
      retained += Math.min(loss, retention);
    }
    const expectedCeded = n ? ceded / n : 0;
    const reinsurancePremium = expectedCeded * params.rateOnLine * (1 + params.load);
    return {
      retention,
      expectedLoss: roundHalfUpCents(n ? total / n : 0),
      expectedCeded: roundHalfUpCents(expectedCeded),
      reinsurancePremium: roundHalfUpCents(reinsurancePremium),
      expectedNet: roundHalfUpCents((n ? retained / n : 0) + reinsurancePremium),
    };
  });
}

/** Minimum expected net; ties go to the smallest retention. */
export function recommendRetention(table: readonly RetentionRow[]): RetentionRecommendation {
  const first = table[0];
  if (!first) throw new ValidationError("retention grid must not be empty", "retentionGrid");
  const best = table.reduce((acc, row) => {
    if (row.expectedNet < acc.expectedNet) return row;
    if (row.expectedNet === acc.expectedNet && row.retention < acc.retention) return row;
    return acc;
  }, first);
  return {
    ...best,
    rationale: `Minimum expected net cost of ${formatCents(best.expectedNet)} at retention ${formatCents(best.retention)}`,
  };
}

function sweep(
  losses: ArrayLike<number>,
  grid: readonly number[],
  values: readonly number[],
  apply: (value: number) => ReinsuranceParams
): SensitivityPoint[] {
  return values.map((value) => {
    const rec = recommendRetention(retentionTable(losses, grid, apply(value)));
    return { value, recommendedRetention: rec.retention, expectedNet: rec.expectedNet };
  });
}

/** Recommended retention under alternative rate-on-line and load assumptions. */
export function analyzeSensitivity(
  losses: ArrayLike<number>,
  grid: readonly number[],
  params: ReinsuranceParams
): SensitivityAnalysis {
  return {
    rateOnLine: sweep(losses, grid, RATE_ON_LINE_VARIATIONS, (rateOnLine) => ({ ...params, rateOnLine })),
    load: sweep(losses, grid, LOAD_VARIATIONS, (load) => ({ ...params, load })),
    scenarioCount: losses.length,
    retentionLevelsTested: grid.length,
  };
}
