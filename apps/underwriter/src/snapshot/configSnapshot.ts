import fs from "node:fs";
import {
  complianceRuleSetSchema,
  seedDataSchema,
  type Carrier,
  type ComplianceRuleSet,
  type Logger,
  type Partner,
  type RateCurves,
} from "@embedded-uw/shared";
import type { ZodError } from "zod";
import { ValidationError } from "../errors/errors.js";
import { deepFreeze } from "../util/freeze.js";

export type ConfigSnapshot = Readonly<{
  loadedAt: string;
  partners: ReadonlyMap<string, Partner>;
  carriers: readonly Carrier[];
  rateCurves: RateCurves;
  ruleSet: ComplianceRuleSet;
}>;

export type ConfigPaths = {
  seedDataPath: string;
  complianceRulesPath: string;
};

function issueSummary(err: ZodError, document: string): string {
  const first = err.issues[0];
  const where = first?.path.length ? first.path.join(".") : "(root)";
  return `Invalid ${document} at ${where}: ${first?.message ?? "unknown issue"}`;
}

/** Validate raw seed data and rule set documents into one immutable snapshot. */
export function buildConfigSnapshot(seedData: unknown, ruleSet: unknown, loadedAt: string): ConfigSnapshot {
  const seed = seedDataSchema.safeParse(seedData);
  if (!seed.success) throw new ValidationError(issueSummary(seed.error, "seed data"), "seedData");
  const rules = complianceRuleSetSchema.safeParse(ruleSet);
  if (!rules.success) throw new ValidationError(issueSummary(rules.error, "compliance rule set"), "ruleSet");

  const partners = new Map<string, Partner>();
  for (const p of seed.data.partners) {
    if (partners.has(p.id)) throw new ValidationError(`Duplicate partner id ${p.id}`, "seedData");
    partners.set(p.id, deepFreeze(p));
  }
  const carrierIds = new Set(seed.data.carriers.map((c) => c.id));
  if (carrierIds.size !== seed.data.carriers.length) {
    throw new ValidationError("Duplicate carrier id in seed data", "seedData");
  }

  return Object.freeze({
    loadedAt,
    partners,
    carriers: deepFreeze(seed.data.carriers),
    rateCurves: deepFreeze(seed.data.rateCurves),
    ruleSet: deepFreeze(rules.data),
  });
}

function readJson(path: string): unknown {
  return JSON.parse(fs.readFileSync(path, "utf-8"));
}

export function loadConfigSnapshot(paths: ConfigPaths, loadedAt: string): ConfigSnapshot {
  return buildConfigSnapshot(readJson(paths.seedDataPath), readJson(paths.complianceRulesPath), loadedAt);
}

export function findPartnerByToken(snapshot: ConfigSnapshot, token: string): Partner | undefined {
  for (const partner of snapshot.partners.values()) {
    if (partner.apiToken === token) return partner;
  }
  return undefined;
}

/**
 * Holds the current snapshot. Callers read `current` once per operation, so
 * a reload never changes the configuration underneath a running quote.
 */
export class ConfigRegistry {
  private snapshot: ConfigSnapshot;

  constructor(private readonly load: () => ConfigSnapshot, private readonly log?: Logger) {
    this.snapshot = load();
  }

  get current(): ConfigSnapshot {
    return this.snapshot;
  }

  /** A failed load leaves the previous snapshot in place and rethrows. */
  reload(): ConfigSnapshot {
    const next = this.load();
    this.snapshot = next;
    this.log?.info("[config] reloaded", {
      partners: next.partners.size,
      carriers: next.carriers.length,
      rulesVersion: next.ruleSet.version,
    });
    return next;
  }
}
