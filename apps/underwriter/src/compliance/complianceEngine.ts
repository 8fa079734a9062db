import type {
  AttributeValue,
  ComplianceContext,
  ComplianceDecision,
  ComplianceRuleSet,
  Policyholder,
  QuoteRequest,
} from "@embedded-uw/shared";
import { matchAll } from "./predicates.js";

/**
 * Evaluate every rule of the set, in order, against the context.
 *
 * - `disclose` rules add their message and id
 * - `block` rules add their id and force `block`
 *
 * Evaluation never stops early so the audit trail lists every triggered rule.
 */
export function evaluateCompliance(context: ComplianceContext, ruleSet: ComplianceRuleSet): ComplianceDecision {
  const attrs = { ...context.attributes, product_code: context.productCode };
  const disclosures: string[] = [];
  const rulesApplied: string[] = [];
  const blockingRuleIds: string[] = [];

  for (const rule of ruleSet.rules) {
    if (rule.appliesTo !== "*" && rule.appliesTo !== context.productCode) continue;
    if (!matchAll(rule.when, attrs)) continue;

    rulesApplied.push(rule.id);
    if (rule.action === "block") blockingRuleIds.push(rule.id);
    else disclosures.push(rule.message);
  }

  return {
    decision: blockingRuleIds.length ? "block" : "allow",
    disclosures,
    rulesApplied,
    blockingRuleIds,
    version: ruleSet.version,
  };
}

function requestAttributes(req: QuoteRequest): Record<string, AttributeValue | undefined> {
  if (req.productCode === "shipping") {
    return {
      partner_id: req.partnerId,
      declared_value: req.declaredValueCents,
      item_category: req.itemCategory,
      state: req.destinationState,
      destination_state: req.destinationState,
      destination_risk: req.destinationRisk,
      service_level: req.serviceLevel,
    };
  }
  return {
    partner_id: req.partnerId,
    order_value: req.orderValueCents,
    term_months: req.termMonths,
    job_category: req.jobCategory,
    state: req.state,
    age: req.age,
    tenure_months: req.tenureMonths,
  };
}

/**
 * Rule attribute names are snake_case. Policyholder attributes, when given,
 * take precedence over what the quote request carried.
 */
export function buildComplianceContext(request: QuoteRequest, policyholder?: Policyholder): ComplianceContext {
  const attributes = requestAttributes(request);
  if (policyholder) {
    const overrides: Record<string, AttributeValue | undefined> = {
      state: policyholder.state,
      age: policyholder.age,
      tenure_months: policyholder.tenureMonths,
    };
    for (const [key, value] of Object.entries(overrides)) {
      if (value !== undefined) attributes[key] = value;
    }
  }
  return { productCode: request.productCode, attributes };
}
