export type ProductCode = "shipping" | "ppi";

export type RiskBand = "A" | "B" | "C" | "D" | "E";

export type DestinationRisk = "low" | "medium" | "high";

export type ServiceLevel = "ground" | "expedited" | "overnight";

export type ShippingQuoteRequest = {
  productCode: "shipping";
  partnerId: string;
  declaredValueCents: number;
  itemCategory: string;
  destinationState: string;     // two-letter US state code
  destinationRisk: DestinationRisk;
  serviceLevel: ServiceLevel;
};

export type PpiQuoteRequest = {
  productCode: "ppi";
  partnerId: string;
  orderValueCents: number;
  termMonths: number;
  jobCategory: string;
  state?: string;
  age?: number;
  tenureMonths?: number;
};

export type QuoteRequest = ShippingQuoteRequest | PpiQuoteRequest;

export type RiskAssessment = {
  productCode: ProductCode;
  score: number;                // 0..1, 4 decimal places
  band: RiskBand;
  riskMultiplier: number;       // >= 1
  factors: Record<string, number>;
};

export type PartnerTerms = {
  partnerId: string;
  markupPct: number;            // 0 <= p < 1
};

export type PriceBreakdown = {
  basePremiumExactCents: string;  // decimal string, unrounded curve output
  /** Display value only; premium identities are computed from `basePremiumExactCents`. */
  basePremiumCents: number;
  riskMultiplier: number;
  riskAdjustedPremiumCents: number;
  partnerMarkupPct: number;
  totalPremiumCents: number;
  factors: Record<string, number>;
};

export type Partner = {
  id: string;
  name: string;
  products: ProductCode[];
  markupPct: number;
  apiToken: string;
};

export type ShippingAppetite = {
  states: string[];
  categories: string[];
  maxDeclaredValueCents?: number;
  maxRiskBand?: RiskBand;
};

export type PpiAppetite = {
  states: string[];
  jobCategories: string[];
  maxTermMonths?: number;
  maxOrderValueCents?: number;
  maxRiskBand?: RiskBand;
};

export type CarrierAppetite = {
  shipping?: ShippingAppetite;
  ppi?: PpiAppetite;
};

export type CarrierCostStructure = {
  expectedLossRatio: number;    // fraction of premium, scaled by risk multiplier
  expenseRatio: number;
  fixedCostCents: number;
};

export type Carrier = {
  id: string;
  name: string;
  appetite: CarrierAppetite;
  capacityCents: number;
  costs: CarrierCostStructure;
};

export type ShippingRateCurve = {
  baseRate: number;             // fraction of declared value
  category: Record<string, number>;
  destination: Record<string, number>;
  service: Record<string, number>;
};

export type TermBucket = {
  maxMonths: number;
  multiplier: number;
};

export type PpiRateCurve = {
  baseRate: number;             // fraction of order value
  termBuckets: TermBucket[];    // ascending by maxMonths
  job: Record<string, number>;
};

export type RateCurves = {
  shipping?: ShippingRateCurve;
  ppi?: PpiRateCurve;
};

export type AttributeValue = string | number | boolean;

export type ComparisonOp = "lt" | "lte" | "gt" | "gte";

export type Condition =
  | { op: "eq"; attr: string; value: AttributeValue }
  | { op: "neq"; attr: string; value: AttributeValue }
  | { op: "in"; attr: string; values: AttributeValue[] }
  | { op: "not_in"; attr: string; values: AttributeValue[] }
  | { op: ComparisonOp; attr: string; value: number };

export type ComplianceAction = "block" | "disclose";

export type ComplianceRule = {
  id: string;
  appliesTo: ProductCode | "*";
  when: Condition[];            // AND; empty list always matches
  action: ComplianceAction;
  message: string;
};

export type ComplianceRuleSet = {
  version: string;
  rules: ComplianceRule[];
};

export type ComplianceContext = {
  productCode: ProductCode;
  attributes: Record<string, AttributeValue | undefined>;
};

export type ComplianceDecision = {
  decision: "allow" | "block";
  disclosures: string[];
  rulesApplied: string[];
  blockingRuleIds: string[];
  version: string;
};

export type CarrierEvaluation = {
  carrierId: string;
  eligible: boolean;
  reason: string;
  marginCents: number;
  remainingCapacityCents: number;
};

export type RoutingDecision = {
  carrierId: string;
  marginCents: number;
  rationale: string;
  evaluations: CarrierEvaluation[];
};

export type QuoteStatus = "quoted" | "expired" | "bound";

export type Quote = {
  id: string;
  partnerId: string;
  productCode: ProductCode;
  request: QuoteRequest;
  risk: RiskAssessment;
  price: PriceBreakdown;
  carrierId: string;
  routerRationale: string;
  routing: CarrierEvaluation[];
  compliance: ComplianceDecision;
  coverageCents: number;
  termMonths: number;
  createdAt: string;            // ISO
  expiresAt: string;            // ISO
};

export type Policyholder = {
  name: string;
  email: string;
  state?: string;
  age?: number;
  tenureMonths?: number;
};

export type PolicyStatus = "active" | "cancelled";

export type Policy = {
  id: string;
  quoteId: string;
  productCode: ProductCode;
  carrierId: string;
  policyholder: Policyholder;
  status: PolicyStatus;
  premiumTotalCents: number;
  coverageCents: number;
  riskBand: RiskBand;
  termMonths: number;
  effectiveDate: string;        // YYYY-MM-DD
  disclosures: string[];
  createdAt: string;
};

export type LedgerEntry = {
  policyId: string;
  writtenPremiumCents: number;
  writtenAt: string;
};

export type PolicyExposure = {
  policyId: string;
  productCode: ProductCode;
  premiumCents: number;
  coverageCents: number;
  riskBand: RiskBand;
  status: PolicyStatus;
  effectiveDate: string;        // YYYY-MM-DD
  termMonths: number;
};

export type ReinsuranceParams = {
  rateOnLine: number;           // 0 < rol <= 1
  load: number;                 // 0 <= load <= 1
};

export type SimulationRequest = {
  asOfMonth: string;            // YYYY-MM
  scenarioCount: number;
  retentionGrid: number[];      // cents
  reinsuranceParams: ReinsuranceParams;
  policyBook: PolicyExposure[];
  seed?: number;                // uint32; generated and logged when absent
  includeSensitivity?: boolean;
};

export type RetentionRow = {
  retention: number;
  expectedLoss: number;
  expectedCeded: number;
  reinsurancePremium: number;
  expectedNet: number;
};

export type RetentionRecommendation = RetentionRow & {
  rationale: string;
};

export type LossStatistics = {
  mean: number;
  median: number;
  stdDev: number;
  min: number;
  max: number;
};

export type SensitivityPoint = {
  value: number;
  recommendedRetention: number;
  expectedNet: number;
};

export type SensitivityAnalysis = {
  rateOnLine: SensitivityPoint[];
  load: SensitivityPoint[];
  scenarioCount: number;
  retentionLevelsTested: number;
};

export type PortfolioResult = {
  asOfMonth: string;
  scenarioCount: number;
  seed: number;
  activePolicies: number;
  var95: number;
  var99: number;
  tailvar99: number;
  retentionTable: RetentionRow[];
  recommended: RetentionRecommendation;
  statistics: LossStatistics;
  sensitivity?: SensitivityAnalysis;
};
