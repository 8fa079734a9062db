import type { LedgerEntry, Policy } from "@embedded-uw/shared";

/** Bound policies plus the written-premium ledger, one entry per bind. */
export class PolicyStore {
  private policies = new Map<string, Policy>();
  private ledger: LedgerEntry[] = [];

  add(policy: Policy, entry: LedgerEntry) {
    this.policies.set(policy.id, policy);
    this.ledger.push(entry);
  }

  get(id: string): Policy | undefined {
    return this.policies.get(id);
  }

  all(): Policy[] {
    return [...this.policies.values()];
  }

  writtenPremiumCents(policyId: string): number {
    return this.ledger
      .filter((e) => e.policyId === policyId)
      .reduce((sum, e) => sum + e.writtenPremiumCents, 0);
  }
}
