import fs from "node:fs";
import {
  complianceRuleSetSchema,
  seedDataSchema,
  type Logger,
  type PpiQuoteRequest,
  type ShippingQuoteRequest,
} from "@embedded-uw/shared";
import { vi } from "vitest";
import { buildConfigSnapshot, type ConfigSnapshot } from "../src/snapshot/configSnapshot.js";

function readConfig(name: string): unknown {
  return JSON.parse(fs.readFileSync(new URL(`../config/${name}`, import.meta.url), "utf-8"));
}

export function seedData() {
  return seedDataSchema.parse(readConfig("seed.json"));
}

export function ruleSet() {
  return complianceRuleSetSchema.parse(readConfig("compliance-rules.json"));
}

export const LOADED_AT = "2024-06-15T12:00:00.000Z";

export function snapshot(seed: unknown = seedData(), rules: unknown = ruleSet()): ConfigSnapshot {
  return buildConfigSnapshot(seed, rules, LOADED_AT);
}

export function testLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** $650 of electronics, ground, to a medium-risk California address. */
export function shippingRequest(overrides: Partial<ShippingQuoteRequest> = {}): ShippingQuoteRequest {
  return {
    productCode: "shipping",
    partnerId: "ptnr_shopfront",
    declaredValueCents: 65_000,
    itemCategory: "electronics",
    destinationState: "CA",
    destinationRisk: "medium",
    serviceLevel: "ground",
    ...overrides,
  };
}

/** $1,000 order over 12 months for a full-time employee in California. */
export function ppiRequest(overrides: Partial<PpiQuoteRequest> = {}): PpiQuoteRequest {
  return {
    productCode: "ppi",
    partnerId: "ptnr_paylater",
    orderValueCents: 100_000,
    termMonths: 12,
    jobCategory: "full_time",
    state: "CA",
    age: 30,
    tenureMonths: 24,
    ...overrides,
  };
}

export function sequentialIds() {
  const counters = { quote: 0, policy: 0 };
  return (kind: "quote" | "policy") => {
    counters[kind] += 1;
    return `${kind === "quote" ? "q" : "pol"}_${counters[kind]}`;
  };
}
