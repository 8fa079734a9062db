import fs from "node:fs";

const STATES_PATH = new URL("../../config/us-states.json", import.meta.url);

const raw: unknown = JSON.parse(fs.readFileSync(STATES_PATH, "utf-8"));

const US_STATES: ReadonlySet<string> = new Set(
  Array.isArray(raw) ? raw.filter((s): s is string => typeof s === "string") : []
);

export function isUsState(code: string): boolean {
  return US_STATES.has(code);
}
