import fs from "node:fs";
import type { Policy, Quote } from "@embedded-uw/shared";
import type { SimulationEvent } from "../bus/bus.js";
import { isUnderwritingError } from "../errors/errors.js";
import { nowIso } from "../util/time.js";

export class AuditLog {
  constructor(private path: string, private now: () => string = nowIso) {}

  append(obj: Record<string, unknown>) {
    const line = JSON.stringify({ ts: this.now(), ...obj });
    fs.appendFileSync(this.path, line + "\n", "utf-8");
  }

  quote(quote: Quote) {
    this.append({
      type: "quote",
      quoteId: quote.id,
      partnerId: quote.partnerId,
      productCode: quote.productCode,
      band: quote.risk.band,
      totalPremiumCents: quote.price.totalPremiumCents,
      carrierId: quote.carrierId,
      routing: quote.routing,
      compliance: quote.compliance,
    });
  }

  policy(policy: Policy) {
    this.append({ type: "policy", policy });
  }

  complianceBlock(quoteId: string, ruleIds: string[], rulesVersion: string) {
    this.append({ type: "compliance_block", quoteId, ruleIds, rulesVersion });
  }

  simulation(summary: SimulationEvent) {
    this.append({ type: "simulation", ...summary });
  }

  error(err: unknown) {
    if (isUnderwritingError(err)) this.append({ type: "error", error: err.toJSON() });
    else this.append({ type: "error", error: String(err) });
  }

  /** Last `maxLines` entries; unparseable lines come back as `parse_error`. */
  tail(maxLines = 200): unknown[] {
    if (!fs.existsSync(this.path)) return [];
    const txt = fs.readFileSync(this.path, "utf-8").trim();
    if (!txt) return [];
    return txt.split("\n").slice(-maxLines).map((l) => {
      try {
        const parsed: unknown = JSON.parse(l);
        return parsed;
      } catch {
        return { type: "parse_error", raw: l };
      }
    });
  }
}
