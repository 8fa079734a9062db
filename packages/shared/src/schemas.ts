import { z } from "zod";
import type { Policyholder, QuoteRequest, SimulationRequest } from "./types.js";

export function isYearMonth(s: unknown): s is string {
  if (typeof s !== "string") return false;
  const m = /^(\d{4})-(\d{2})$/.exec(s);
  return m !== null && Number(m[2]) >= 1 && Number(m[2]) <= 12;
}

const productCode = z.enum(["shipping", "ppi"]);
const riskBand = z.enum(["A", "B", "C", "D", "E"]);
const cents = z.number().int().nonnegative();
const stateCode = z.string().regex(/^[A-Z]{2}$/, "expected a two-letter state code");
const multiplierTable = z.record(z.string(), z.number().positive());

// ---- configuration documents ----

export const partnerSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  products: z.array(productCode).min(1),
  markupPct: z.number().min(0).lt(1),
  apiToken: z.string().min(1),
});

export const carrierSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  appetite: z.object({
    shipping: z.object({
      states: z.array(stateCode),
      categories: z.array(z.string()),
      maxDeclaredValueCents: cents.optional(),
      maxRiskBand: riskBand.optional(),
    }).optional(),
    ppi: z.object({
      states: z.array(stateCode),
      jobCategories: z.array(z.string()),
      maxTermMonths: z.number().int().positive().optional(),
      maxOrderValueCents: cents.optional(),
      maxRiskBand: riskBand.optional(),
    }).optional(),
  }),
  capacityCents: cents,
  costs: z.object({
    expectedLossRatio: z.number().min(0),
    expenseRatio: z.number().min(0).lt(1),
    fixedCostCents: cents,
  }),
});

export const rateCurvesSchema = z.object({
  shipping: z.object({
    baseRate: z.number().positive(),
    category: multiplierTable,
    destination: multiplierTable,
    service: multiplierTable,
  }).optional(),
  ppi: z.object({
    baseRate: z.number().positive(),
    termBuckets: z.array(z.object({
      maxMonths: z.number().int().positive(),
      multiplier: z.number().positive(),
    })).min(1),
    job: multiplierTable,
  }).optional(),
});

export const seedDataSchema = z.object({
  partners: z.array(partnerSchema),
  carriers: z.array(carrierSchema),
  rateCurves: rateCurvesSchema,
});

const attributeValue = z.union([z.string(), z.number(), z.boolean()]);

export const conditionSchema = z.union([
  z.object({ op: z.enum(["eq", "neq"]), attr: z.string().min(1), value: attributeValue }),
  z.object({ op: z.enum(["in", "not_in"]), attr: z.string().min(1), values: z.array(attributeValue) }),
  z.object({ op: z.enum(["lt", "lte", "gt", "gte"]), attr: z.string().min(1), value: z.number() }),
]);

export const complianceRuleSetSchema = z.object({
  version: z.string().min(1),
  rules: z.array(z.object({
    id: z.string().min(1),
    appliesTo: z.union([productCode, z.literal("*")]),
    when: z.array(conditionSchema).default([]),
    action: z.enum(["block", "disclose"]),
    message: z.string(),
  })).superRefine((rules, ctx) => {
    const seen = new Set<string>();
    rules.forEach((r, i) => {
      if (seen.has(r.id)) ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, "id"], message: `duplicate rule id ${r.id}` });
      seen.add(r.id);
    });
  }),
});

// ---- wire requests (snake_case) ----

const shippingQuoteBody = z.object({
  product_code: z.literal("shipping"),
  declared_value: cents,
  item_category: z.string().min(1),
  destination_state: z.string().min(1),
  destination_risk: z.enum(["low", "medium", "high"]),
  service_level: z.enum(["ground", "expedited", "overnight"]),
});

const ppiQuoteBody = z.object({
  product_code: z.literal("ppi"),
  order_value: cents,
  term_months: z.number().int(),
  job_category: z.string().min(1),
  state: z.string().min(1).optional(),
  age: z.number().int().optional(),
  tenure_months: z.number().int().optional(),
});

export const quoteBodySchema = z.discriminatedUnion("product_code", [shippingQuoteBody, ppiQuoteBody]);

export type QuoteBody = z.infer<typeof quoteBodySchema>;

export function toQuoteRequest(body: QuoteBody, partnerId: string): QuoteRequest {
  if (body.product_code === "shipping") {
    return {
      productCode: "shipping",
      partnerId,
      declaredValueCents: body.declared_value,
      itemCategory: body.item_category,
      destinationState: body.destination_state,
      destinationRisk: body.destination_risk,
      serviceLevel: body.service_level,
    };
  }
  return {
    productCode: "ppi",
    partnerId,
    orderValueCents: body.order_value,
    termMonths: body.term_months,
    jobCategory: body.job_category,
    state: body.state,
    age: body.age,
    tenureMonths: body.tenure_months,
  };
}

export const bindBodySchema = z.object({
  quote_id: z.string().min(1),
  policyholder: z.object({
    name: z.string().min(1),
    email: z.string().email(),
    state: z.string().min(1).optional(),
    age: z.number().int().optional(),
    tenure_months: z.number().int().optional(),
  }),
});

export type BindBody = z.infer<typeof bindBodySchema>;

export function toPolicyholder(body: BindBody["policyholder"]): Policyholder {
  return {
    name: body.name,
    email: body.email,
    state: body.state,
    age: body.age,
    tenureMonths: body.tenure_months,
  };
}

export const simulateBodySchema = z.object({
  as_of_month: z.string().refine(isYearMonth, "expected YYYY-MM"),
  scenario_count: z.number().int().positive(),
  retention_grid: z.array(z.number().positive()).min(1),
  reinsurance_params: z.object({
    rate_on_line: z.number().gt(0).max(1),
    load: z.number().min(0).max(1),
  }),
  seed: z.number().int().nonnegative().max(0xffff_ffff).optional(),
  include_sensitivity: z.boolean().optional(),
});

export type SimulateBody = z.infer<typeof simulateBodySchema>;

export function toSimulationRequest(body: SimulateBody, policyBook: SimulationRequest["policyBook"]): SimulationRequest {
  return {
    asOfMonth: body.as_of_month,
    scenarioCount: body.scenario_count,
    retentionGrid: body.retention_grid,
    reinsuranceParams: { rateOnLine: body.reinsurance_params.rate_on_line, load: body.reinsurance_params.load },
    policyBook,
    seed: body.seed,
    includeSensitivity: body.include_sensitivity,
  };
}
