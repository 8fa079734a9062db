import "dotenv/config";
import { fileURLToPath } from "node:url";
import { isLogLevel, type LogLevel } from "@embedded-uw/shared";

const defaultPath = (name: string) => fileURLToPath(new URL(`../config/${name}`, import.meta.url));

const logLevel = (process.env.LOG_LEVEL ?? "info").toLowerCase();

export const CONFIG = {
  apiPort: Number(process.env.API_PORT ?? 3001),
  auditPath: process.env.AUDIT_PATH ?? "./audit.jsonl",

  // Configuration documents (partners, carriers, rate curves / compliance rules)
  seedDataPath: process.env.SEED_DATA_PATH ?? defaultPath("seed.json"),
  complianceRulesPath: process.env.COMPLIANCE_RULES_PATH ?? defaultPath("compliance-rules.json"),

  quoteTtlMinutes: Number(process.env.QUOTE_TTL_MINUTES ?? 30),

  // Monte Carlo bounds
  simMaxScenarios: Number(process.env.SIM_MAX_SCENARIOS ?? 50_000),
  simPartitionSize: Number(process.env.SIM_PARTITION_SIZE ?? 1_000),

  logLevel: (isLogLevel(logLevel) ? logLevel : "info") satisfies LogLevel,
};
