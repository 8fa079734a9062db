import type { SimulationEvent } from "../bus/bus.js";

export type RuntimeState = {
  ok: boolean;
  serverTime: string;
  configLoadedAt?: string;
  rulesVersion?: string;
  quotesIssued: number;
  policiesBound: number;
  bindsBlocked: number;
  simulationsRun: number;
  writtenPremiumCents: number;
  lastQuoteAt?: string;
  lastPolicyAt?: string;
  lastSimulation?: SimulationEvent;
};

export function createRuntimeState(now: string): RuntimeState {
  return {
    ok: true,
    serverTime: now,
    quotesIssued: 0,
    policiesBound: 0,
    bindsBlocked: 0,
    simulationsRun: 0,
    writtenPremiumCents: 0,
  };
}

export function updateRuntimeState(state: RuntimeState, patch: Partial<RuntimeState>, now: string) {
  Object.assign(state, patch, { serverTime: now, ok: true });
}
