import type { Clock } from "@embedded-uw/shared";
import type { AuditLog } from "../audit/auditLog.js";
import { updateRuntimeState, type RuntimeState } from "../state/runtimeState.js";
import type { Bus } from "./bus.js";

/** Feed every bus event into the audit log and the runtime counters. */
export function attachAuditTrail(bus: Bus, audit: AuditLog, state: RuntimeState, clock: Clock): () => void {
  const unsubscribers = [
    bus.subscribe("QUOTES", (quote) => {
      audit.quote(quote);
      updateRuntimeState(state, { quotesIssued: state.quotesIssued + 1, lastQuoteAt: quote.createdAt }, clock.nowIso());
    }),
    bus.subscribe("POLICIES", (event) => {
      if (event.type === "blocked") {
        audit.complianceBlock(event.quoteId, event.ruleIds, event.rulesVersion);
        updateRuntimeState(state, { bindsBlocked: state.bindsBlocked + 1 }, clock.nowIso());
        return;
      }
      audit.policy(event.policy);
      updateRuntimeState(state, {
        policiesBound: state.policiesBound + 1,
        writtenPremiumCents: state.writtenPremiumCents + event.policy.premiumTotalCents,
        lastPolicyAt: event.policy.createdAt,
      }, clock.nowIso());
    }),
    bus.subscribe("SIMULATIONS", (summary) => {
      audit.simulation(summary);
      updateRuntimeState(state, { simulationsRun: state.simulationsRun + 1, lastSimulation: summary }, clock.nowIso());
    }),
  ];
  return () => unsubscribers.forEach((u) => u());
}
