import type { Policy, PortfolioResult, Quote, RetentionRow } from "@embedded-uw/shared";
import type { PolicyView } from "../orchestrator/quotePipeline.js";
import { BAND_MULTIPLIER } from "../risk/riskScorer.js";

// Wire responses are snake_case, like the request bodies.

export function toQuoteResponse(q: Quote) {
  return {
    quote_id: q.id,
    product_code: q.productCode,
    premium_cents: q.price.totalPremiumCents,
    price_breakdown: {
      base_premium_cents: q.price.basePremiumCents,
      risk_adjusted_premium_cents: q.price.riskAdjustedPremiumCents,
      risk_multiplier: q.price.riskMultiplier,
      partner_markup_pct: q.price.partnerMarkupPct,
      total_premium_cents: q.price.totalPremiumCents,
    },
    risk_score: q.risk.score,
    risk_band: q.risk.band,
    risk_multiplier: q.risk.riskMultiplier,
    carrier_suggestion: q.carrierId,
    router_rationale: q.routerRationale,
    carrier_evaluations: q.routing.map((e) => ({
      carrier_id: e.carrierId,
      eligible: e.eligible,
      reason: e.reason,
      margin_cents: e.marginCents,
    })),
    compliance: {
      decision: q.compliance.decision,
      disclosures: q.compliance.disclosures,
      rules_applied: q.compliance.rulesApplied,
      version: q.compliance.version,
    },
    expires_at: q.expiresAt,
  };
}

export function toBindingResponse(p: Policy) {
  return {
    policy_id: p.id,
    status: p.status,
    premium_total_cents: p.premiumTotalCents,
    carrier_id: p.carrierId,
    effective_date: p.effectiveDate,
  };
}

export function toPolicyResponse(p: PolicyView) {
  return {
    policy_id: p.id,
    quote_id: p.quoteId,
    product_code: p.productCode,
    carrier_id: p.carrierId,
    premium_total_cents: p.premiumTotalCents,
    status: p.status,
    effective_date: p.effectiveDate,
    policyholder: {
      name: p.policyholder.name,
      email: p.policyholder.email,
      state: p.policyholder.state,
      age: p.policyholder.age,
      tenure_months: p.policyholder.tenureMonths,
    },
    risk_band: p.riskBand,
    risk_multiplier: BAND_MULTIPLIER[p.riskBand],
    compliance_disclosures: p.disclosures,
    ledger_total_cents: p.writtenPremiumCents,
  };
}

function row(r: RetentionRow) {
  return {
    retention: r.retention,
    expected_loss: r.expectedLoss,
    expected_ceded: r.expectedCeded,
    reinsurance_premium: r.reinsurancePremium,
    expected_net: r.expectedNet,
  };
}

export function toSimulationResponse(r: PortfolioResult) {
  return {
    as_of_month: r.asOfMonth,
    scenario_count: r.scenarioCount,
    seed: r.seed,
    active_policies: r.activePolicies,
    var95: r.var95,
    var99: r.var99,
    tailvar99: r.tailvar99,
    retention_table: r.retentionTable.map(row),
    recommended: { ...row(r.recommended), rationale: r.recommended.rationale },
    scenario_statistics: {
      mean: r.statistics.mean,
      median: r.statistics.median,
      std_dev: r.statistics.stdDev,
      min: r.statistics.min,
      max: r.statistics.max,
    },
    sensitivity: r.sensitivity && {
      rate_on_line: r.sensitivity.rateOnLine.map((s) => ({
        rate_on_line: s.value,
        recommended_retention: s.recommendedRetention,
        expected_net: s.expectedNet,
      })),
      load: r.sensitivity.load.map((s) => ({
        load: s.value,
        recommended_retention: s.recommendedRetention,
        expected_net: s.expectedNet,
      })),
      retention_levels_tested: r.sensitivity.retentionLevelsTested,
    },
  };
}
