import type {
  Clock,
  Logger,
  Policy,
  PolicyExposure,
  Policyholder,
  Quote,
  QuoteRequest,
} from "@embedded-uw/shared";
import { v4 as uuidv4 } from "uuid";
import type { Bus } from "../bus/bus.js";
import { buildComplianceContext, evaluateCompliance } from "../compliance/complianceEngine.js";
import {
  ComplianceBlockedError,
  NoCarrierAvailableError,
  QuoteExpiredError,
  QuoteNotFoundError,
  ValidationError,
} from "../errors/errors.js";
import { priceQuote } from "../pricing/pricingEngine.js";
import { scoreRisk } from "../risk/riskScorer.js";
import { routeToCarrier } from "../routing/carrierRouter.js";
import type { ConfigRegistry } from "../snapshot/configSnapshot.js";
import type { CapacityLedger } from "../store/capacityLedger.js";
import { KeyedLock } from "../store/keyedLock.js";
import type { PolicyStore } from "../store/policyStore.js";
import type { QuoteStore } from "../store/quoteStore.js";
import { deepFreeze } from "../util/freeze.js";
import { isUsState } from "../util/states.js";
import { addMinutes, isoDate, monthIndex } from "../util/time.js";

// Transit cover runs for the shipping month.
const SHIPPING_TERM_MONTHS = 1;

export type PipelineEnv = {
  config: ConfigRegistry;
  quotes: QuoteStore;
  policies: PolicyStore;
  capacity: CapacityLedger;
  bus: Bus;
  clock: Clock;
  log: Logger;
  quoteTtlMinutes: number;
  newId?: (kind: "quote" | "policy") => string;
};

export type PolicyView = Policy & { writtenPremiumCents: number };

function defaultId(kind: "quote" | "policy"): string {
  return `${kind === "quote" ? "q" : "pol"}_${uuidv4()}`;
}

function validatePolicyholder(p: Policyholder) {
  if (p.state !== undefined && !isUsState(p.state)) {
    throw new ValidationError(`Unknown state code '${p.state}'`, "policyholder.state");
  }
  if (p.age !== undefined && (!Number.isInteger(p.age) || p.age < 18 || p.age > 120)) {
    throw new ValidationError("age must be an integer between 18 and 120", "policyholder.age");
  }
  if (p.tenureMonths !== undefined && (!Number.isInteger(p.tenureMonths) || p.tenureMonths < 0)) {
    throw new ValidationError("tenureMonths must be a non-negative integer", "policyholder.tenureMonths");
  }
}

/**
 * Quote → bind flow.
 *
 * `quote` scores, prices, routes and screens a request against one config
 * snapshot and stores the result. `bind` re-screens with policyholder data,
 * consumes carrier capacity and writes the policy plus its ledger entry.
 * Binds on the same quote id run one at a time.
 */
export class QuotePipeline {
  private bindLock = new KeyedLock();
  private newId: (kind: "quote" | "policy") => string;

  constructor(private env: PipelineEnv) {
    this.newId = env.newId ?? defaultId;
  }

  /** The returned quote is deep-frozen and holds its own copy of the request. */
  quote(input: QuoteRequest): Quote {
    const request = structuredClone(input);
    const snapshot = this.env.config.current;

    const partner = snapshot.partners.get(request.partnerId);
    if (!partner) throw new ValidationError(`Unknown partner ${request.partnerId}`, "partnerId");
    if (!partner.products.includes(request.productCode)) {
      throw new ValidationError(`Partner ${partner.id} is not enabled for ${request.productCode}`, "product_code");
    }

    const risk = scoreRisk(request);
    const price = priceQuote(risk, request, { partnerId: partner.id, markupPct: partner.markupPct }, snapshot.rateCurves);
    const routing = routeToCarrier(
      {
        request,
        premiumCents: price.totalPremiumCents,
        riskBand: risk.band,
        riskMultiplier: risk.riskMultiplier,
        remainingCapacityCents: this.env.capacity.remainingByCarrier(snapshot.carriers),
      },
      snapshot.carriers
    );
    const compliance = evaluateCompliance(buildComplianceContext(request), snapshot.ruleSet);

    const createdAt = this.env.clock.nowIso();
    const quote: Quote = deepFreeze({
      id: this.newId("quote"),
      partnerId: partner.id,
      productCode: request.productCode,
      request,
      risk,
      price,
      carrierId: routing.carrierId,
      routerRationale: routing.rationale,
      routing: routing.evaluations,
      compliance,
      coverageCents: request.productCode === "shipping" ? request.declaredValueCents : request.orderValueCents,
      termMonths: request.productCode === "shipping" ? SHIPPING_TERM_MONTHS : request.termMonths,
      createdAt,
      expiresAt: addMinutes(createdAt, this.env.quoteTtlMinutes),
    });

    this.env.quotes.put(quote);
    if (compliance.decision === "block") {
      this.env.log.warn(`[quote] ${quote.id} screened as blocked`, { rules: compliance.blockingRuleIds });
    }
    this.env.log.info(`[quote] ${quote.id} ${quote.productCode} band=${risk.band} total=${price.totalPremiumCents} carrier=${quote.carrierId}`);
    this.env.bus.publish("QUOTES", quote);
    return quote;
  }

  /** With `partnerId`, a quote issued to another partner is reported as not found. */
  bind(quoteId: string, policyholder: Policyholder, partnerId?: string): Promise<Policy> {
    return this.bindLock.run(quoteId, async () => this.bindNow(quoteId, policyholder, partnerId));
  }

  private bindNow(quoteId: string, policyholder: Policyholder, partnerId: string | undefined): Policy {
    const record = this.env.quotes.get(quoteId);
    if (!record || (partnerId !== undefined && record.quote.partnerId !== partnerId)) {
      throw new QuoteNotFoundError(quoteId);
    }
    if (record.status !== "quoted") throw new QuoteExpiredError(quoteId, record.status);

    const { quote } = record;
    const now = this.env.clock.nowIso();
    if (Date.parse(now) >= Date.parse(quote.expiresAt)) {
      this.env.quotes.setStatus(quoteId, "expired");
      this.env.log.info(`[bind] ${quoteId} expired at ${quote.expiresAt}`);
      throw new QuoteExpiredError(quoteId, "expired");
    }

    validatePolicyholder(policyholder);
    const snapshot = this.env.config.current;

    const compliance = evaluateCompliance(buildComplianceContext(quote.request, policyholder), snapshot.ruleSet);
    if (compliance.decision === "block") {
      this.env.log.warn(`[bind] ${quoteId} blocked by compliance`, { rules: compliance.blockingRuleIds });
      this.env.bus.publish("POLICIES", {
        type: "blocked",
        quoteId,
        ruleIds: compliance.blockingRuleIds,
        rulesVersion: compliance.version,
      });
      throw new ComplianceBlockedError(compliance.blockingRuleIds, compliance.version);
    }

    const carrier = snapshot.carriers.find((c) => c.id === quote.carrierId);
    if (!carrier) {
      throw new NoCarrierAvailableError(`Carrier ${quote.carrierId} is no longer configured`, {
        [quote.carrierId]: "not in current carrier table",
      });
    }
    const premium = quote.price.totalPremiumCents;
    const remaining = this.env.capacity.remainingCents(carrier);
    if (remaining < premium) {
      throw new NoCarrierAvailableError(`Carrier ${carrier.id} has insufficient capacity to bind`, {
        [carrier.id]: `remaining capacity ${remaining} below premium ${premium}`,
      });
    }
    this.env.capacity.consume(carrier, premium);

    const policy: Policy = deepFreeze({
      id: this.newId("policy"),
      quoteId,
      productCode: quote.productCode,
      carrierId: carrier.id,
      policyholder: structuredClone(policyholder),
      status: "active",
      premiumTotalCents: premium,
      coverageCents: quote.coverageCents,
      riskBand: quote.risk.band,
      termMonths: quote.termMonths,
      effectiveDate: isoDate(now),
      disclosures: compliance.disclosures,
      createdAt: now,
    });
    this.env.policies.add(policy, { policyId: policy.id, writtenPremiumCents: premium, writtenAt: now });
    this.env.quotes.setStatus(quoteId, "bound");

    this.env.log.info(`[bind] ${quoteId} → ${policy.id} carrier=${carrier.id} premium=${premium}`);
    this.env.bus.publish("POLICIES", { type: "bound", policy });
    return policy;
  }

  getPolicy(id: string): PolicyView | undefined {
    const policy = this.env.policies.get(id);
    if (!policy) return undefined;
    return { ...policy, writtenPremiumCents: this.env.policies.writtenPremiumCents(id) };
  }

  /** Exposures of every policy written on or before `asOfMonth`, ordered by policy id. */
  policyBook(asOfMonth: string): PolicyExposure[] {
    const cutoff = monthIndex(asOfMonth);
    return this.env.policies
      .all()
      .filter((p) => monthIndex(p.effectiveDate) <= cutoff)
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map((p) => ({
        policyId: p.id,
        productCode: p.productCode,
        premiumCents: p.premiumTotalCents,
        coverageCents: p.coverageCents,
        riskBand: p.riskBand,
        status: p.status,
        effectiveDate: p.effectiveDate,
        termMonths: p.termMonths,
      }));
  }
}
