import type { LossStatistics } from "@embedded-uw/shared";
import { roundHalfUpCents } from "../util/money.js";

/** Percentile of ascending values, linear between order statistics. */
export function percentile(sorted: ArrayLike<number>, p: number): number {
  const n = sorted.length;
  if (n === 0) return 0;
  const h = (n - 1) * p;
  const lo = Math.floor(h);
  const hi = Math.ceil(h);
  const a = sorted[lo] ?? 0;
  const b = sorted[hi] ?? a;
  return a + (h - lo) * (b - a);
}

export function mean(values: ArrayLike<number>): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < values.length; i++) sum += values[i] ?? 0;
  return sum / values.length;
}

/** Mean of losses at or above the threshold. */
export function tailMean(sorted: ArrayLike<number>, threshold: number): number {
  let sum = 0;
  let count = 0;
  for (let i = 0; i < sorted.length; i++) {
    const v = sorted[i] ?? 0;
    if (v >= threshold) {
      sum += v;
      count++;
    }
  }
  return count ? sum / count : threshold;
}

export function describeLosses(sorted: ArrayLike<number>): LossStatistics {
  const n = sorted.length;
  const m = mean(sorted);
  let squares = 0;
  for (let i = 0; i < n; i++) squares += ((sorted[i] ?? 0) - m) ** 2;
  return {
    mean: roundHalfUpCents(m),
    median: roundHalfUpCents(percentile(sorted, 0.5)),
    stdDev: roundHalfUpCents(n > 1 ? Math.sqrt(squares / (n - 1)) : 0),
    min: roundHalfUpCents(n ? sorted[0] ?? 0 : 0),
    max: roundHalfUpCents(n ? sorted[n - 1] ?? 0 : 0),
  };
}
