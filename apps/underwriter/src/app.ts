import { createRuntime, type Clock, type Logger } from "@embedded-uw/shared";
import type { ApiDeps } from "./api/server.js";
import { AuditLog } from "./audit/auditLog.js";
import { InMemoryBus } from "./bus/inMemoryBus.js";
import { attachAuditTrail } from "./bus/subscribers.js";
import { QuotePipeline } from "./orchestrator/quotePipeline.js";
import type { SimulatorEnv } from "./simulation/portfolioSimulator.js";
import type { ConfigRegistry } from "./snapshot/configSnapshot.js";
import { createRuntimeState, updateRuntimeState } from "./state/runtimeState.js";
import { CapacityLedger } from "./store/capacityLedger.js";
import { PolicyStore } from "./store/policyStore.js";
import { QuoteStore } from "./store/quoteStore.js";

export type UnderwriterOptions = {
  config: ConfigRegistry;
  auditPath: string;
  clock: Clock;
  log: Logger;
  quoteTtlMinutes: number;
  simMaxScenarios: number;
  simPartitionSize: number;
  newId?: (kind: "quote" | "policy") => string;
};

export type Underwriter = ApiDeps & {
  bus: InMemoryBus;
  /** Re-read configuration and record the new snapshot in runtime state. */
  reloadConfig: () => void;
  detach: () => void;
};

/** Wire stores, pipeline, simulator runtime and the audit trail together. */
export function createUnderwriter(opts: UnderwriterOptions): Underwriter {
  const { config, clock, log } = opts;
  const bus = new InMemoryBus();
  const audit = new AuditLog(opts.auditPath, clock.nowIso);
  const state = createRuntimeState(clock.nowIso());
  const detach = attachAuditTrail(bus, audit, state, clock);

  const recordSnapshot = () =>
    updateRuntimeState(state, {
      configLoadedAt: config.current.loadedAt,
      rulesVersion: config.current.ruleSet.version,
    }, clock.nowIso());
  recordSnapshot();

  const pipeline = new QuotePipeline({
    config,
    quotes: new QuoteStore(),
    policies: new PolicyStore(),
    capacity: new CapacityLedger(),
    bus,
    clock,
    log,
    quoteTtlMinutes: opts.quoteTtlMinutes,
    newId: opts.newId,
  });

  const simulator = createRuntime<SimulatorEnv>({
    clock,
    log,
    bus,
    maxScenarios: opts.simMaxScenarios,
    partitionSize: opts.simPartitionSize,
  });

  return {
    pipeline,
    config,
    audit,
    state,
    clock,
    log,
    simulator,
    bus,
    reloadConfig: () => {
      config.reload();
      recordSnapshot();
    },
    detach,
  };
}
