import {
  Effect,
  isYearMonth,
  type Clock,
  type Logger,
  type PolicyExposure,
  type PortfolioResult,
  type SimulationRequest,
} from "@embedded-uw/shared";
import type { Bus } from "../bus/bus.js";
import { ValidationError } from "../errors/errors.js";
import { roundHalfUpCents } from "../util/money.js";
import { activeExposures, drawPolicyLoss } from "./lossModel.js";
import { deriveSeed, isSeed, mulberry32, randomSeed } from "./random.js";
import { analyzeSensitivity, recommendRetention, retentionTable } from "./retention.js";
import { describeLosses, percentile, tailMean } from "./statistics.js";

export type SimulatorEnv = {
  clock: Clock;
  log: Logger;
  bus?: Bus;
  maxScenarios: number;
  partitionSize: number;
};

/**
 * Portfolio loss of scenarios `[start, end)` written into `out`. Scenario `i`
 * draws only from its own stream, policies in the order given.
 */
export function computeScenarioLosses(
  policies: readonly PolicyExposure[],
  seed: number,
  start: number,
  end: number,
  out: Float64Array
) {
  for (let i = start; i < end; i++) {
    const rng = mulberry32(deriveSeed(seed, i));
    let loss = 0;
    for (const policy of policies) loss += drawPolicyLoss(policy, rng);
    out[i] = loss;
  }
}

function validate(req: SimulationRequest, maxScenarios: number) {
  if (!isYearMonth(req.asOfMonth)) throw new ValidationError("asOfMonth must be YYYY-MM", "asOfMonth");
  if (!Number.isInteger(req.scenarioCount) || req.scenarioCount < 1 || req.scenarioCount > maxScenarios) {
    throw new ValidationError(`scenarioCount must be an integer between 1 and ${maxScenarios}`, "scenarioCount");
  }
  if (!req.retentionGrid.length || req.retentionGrid.some((r) => !Number.isFinite(r) || r < 0)) {
    throw new ValidationError("retentionGrid must hold at least one non-negative amount", "retentionGrid");
  }
  const { rateOnLine, load } = req.reinsuranceParams;
  if (!(rateOnLine > 0 && rateOnLine <= 1)) throw new ValidationError("rateOnLine must be in (0, 1]", "rateOnLine");
  if (!(load >= 0 && load <= 1)) throw new ValidationError("load must be in [0, 1]", "load");
  if (req.seed !== undefined && !isSeed(req.seed)) {
    throw new ValidationError("seed must be an unsigned 32-bit integer", "seed");
  }
}

/** Aggregate a finished loss vector into the reported result. */
export function summarizeLosses(
  losses: Float64Array,
  req: SimulationRequest,
  seed: number,
  activePolicies: number
): PortfolioResult {
  const sorted = Float64Array.from(losses).sort();
  const var95 = percentile(sorted, 0.95);
  const var99 = percentile(sorted, 0.99);
  const table = retentionTable(losses, req.retentionGrid, req.reinsuranceParams);

  return {
    asOfMonth: req.asOfMonth,
    scenarioCount: losses.length,
    seed,
    activePolicies,
    var95: roundHalfUpCents(var95),
    var99: roundHalfUpCents(var99),
    tailvar99: roundHalfUpCents(tailMean(sorted, var99)),
    retentionTable: table,
    recommended: recommendRetention(table),
    statistics: describeLosses(sorted),
    ...(req.includeSensitivity
      ? { sensitivity: analyzeSensitivity(losses, req.retentionGrid, req.reinsuranceParams) }
      : {}),
  };
}

/**
 * Monte Carlo run over the active part of the policy book.
 *
 * Scenarios run in partitions of `env.partitionSize`, yielding to the event
 * loop between partitions; an aborted signal stops the run with
 * `CancelledError`. The result depends only on the request and seed.
 */
export function simulatePortfolio(req: SimulationRequest): Effect<SimulatorEnv, PortfolioResult> {
  return async (env, signal) => {
    validate(req, env.maxScenarios);
    const startedAt = env.clock.nowMs();
    const seed = req.seed ?? randomSeed();
    const policies = activeExposures(req.policyBook, req.asOfMonth);
    env.log.info(`[sim] start asOf=${req.asOfMonth} scenarios=${req.scenarioCount} policies=${policies.length} seed=${seed}`);

    const losses = new Float64Array(req.scenarioCount);
    const step = Math.max(1, Math.floor(env.partitionSize));
    for (let start = 0; start < req.scenarioCount; start += step) {
      computeScenarioLosses(policies, seed, start, Math.min(start + step, req.scenarioCount), losses);
      await Effect.sleep<SimulatorEnv>(0)(env, signal);
    }

    const result = summarizeLosses(losses, req, seed, policies.length);
    const durationMs = env.clock.nowMs() - startedAt;
    env.log.info(`[sim] done var99=${result.var99} recommended=${result.recommended.retention} in ${durationMs}ms`);
    env.bus?.publish("SIMULATIONS", {
      asOfMonth: result.asOfMonth,
      scenarioCount: result.scenarioCount,
      seed,
      activePolicies: result.activePolicies,
      var99: result.var99,
      recommendedRetention: result.recommended.retention,
      durationMs,
    });
    return result;
  };
}
