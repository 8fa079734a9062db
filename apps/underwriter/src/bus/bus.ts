import type { Policy, Quote } from "@embedded-uw/shared";

export type PolicyEvent =
  | { type: "bound"; policy: Policy }
  | { type: "blocked"; quoteId: string; ruleIds: string[]; rulesVersion: string };

export type SimulationEvent = {
  asOfMonth: string;
  scenarioCount: number;
  seed: number;
  activePolicies: number;
  var99: number;
  recommendedRetention: number;
  durationMs: number;
};

export type TopicPayloads = {
  QUOTES: Quote;
  POLICIES: PolicyEvent;
  SIMULATIONS: SimulationEvent;
};

export type Topic = keyof TopicPayloads;

export interface Bus {
  publish<K extends Topic>(topic: K, payload: TopicPayloads[K]): void;
  subscribe<K extends Topic>(topic: K, handler: (payload: TopicPayloads[K]) => void): () => void;
}
