import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors/errors.js";
import { analyzeSensitivity, recommendRetention, retentionTable } from "../src/simulation/retention.js";
import { describeLosses, percentile, tailMean } from "../src/simulation/statistics.js";

const losses = [0, 100, 200, 700];
const params = { rateOnLine: 0.1, load: 0.2 };

describe("retentionTable", () => {
  it("computes each row in grid order", () => {
    expect(retentionTable(losses, [1000, 150], params)).toEqual([
      { retention: 1000, expectedLoss: 250, expectedCeded: 0, reinsurancePremium: 0, expectedNet: 250 },
      { retention: 150, expectedLoss: 250, expectedCeded: 150, reinsurancePremium: 18, expectedNet: 118 },
    ]);
  });
});

describe("recommendRetention", () => {
  it("picks the minimum expected net with a fixed rationale", () => {
    const rec = recommendRetention(retentionTable(losses, [1000, 150], params));
    expect(rec.retention).toBe(150);
    expect(rec.rationale).toBe("Minimum expected net cost of $1.18 at retention $1.50");
  });

  it("breaks ties toward the smallest retention", () => {
    const rec = recommendRetention(retentionTable([0, 0], [100_000, 50_000, 75_000], params));
    expect(rec.retention).toBe(50_000);
    expect(rec.rationale).toBe("Minimum expected net cost of $0.00 at retention $500.00");
  });

  it("rejects an empty grid", () => {
    expect(() => recommendRetention([])).toThrow(ValidationError);
  });
});

describe("analyzeSensitivity", () => {
  it("re-optimises under each rate-on-line and load variation", () => {
    const result = analyzeSensitivity(losses, [150, 1000], params);
    expect(result.rateOnLine).toEqual([
      { value: 0.05, recommendedRetention: 150, expectedNet: 109 },
      { value: 0.1, recommendedRetention: 150, expectedNet: 118 },
      { value: 0.15, recommendedRetention: 150, expectedNet: 127 },
      { value: 0.2, recommendedRetention: 150, expectedNet: 136 },
    ]);
    expect(result.load.map((p) => p.expectedNet)).toEqual([117, 118, 120, 121]);
    expect(result.scenarioCount).toBe(4);
    expect(result.retentionLevelsTested).toBe(2);
  });
});

describe("loss statistics", () => {
  it("interpolates percentiles between order statistics", () => {
    expect(percentile(losses, 0.5)).toBe(150);
    expect(percentile(losses, 0.95)).toBeCloseTo(625, 9);
    expect(percentile([], 0.99)).toBe(0);
  });

  it("averages the tail at or above a threshold", () => {
    expect(tailMean(losses, 200)).toBe(450);
    expect(tailMean(losses, 800)).toBe(800);
  });

  it("describes the distribution in cents", () => {
    expect(describeLosses(losses)).toEqual({ mean: 250, median: 150, stdDev: 311, min: 0, max: 700 });
  });
});
