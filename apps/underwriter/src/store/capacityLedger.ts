import type { Carrier } from "@embedded-uw/shared";
import { InvariantViolationError } from "../errors/errors.js";

/**
 * Capacity consumed per carrier. Remaining capacity is derived from the
 * carrier record of the current snapshot, so a reload that raises or lowers
 * a carrier's capacity applies to what is already written.
 */
export class CapacityLedger {
  private consumed = new Map<string, number>();

  consumedCents(carrierId: string): number {
    return this.consumed.get(carrierId) ?? 0;
  }

  remainingCents(carrier: Carrier): number {
    return carrier.capacityCents - this.consumedCents(carrier.id);
  }

  remainingByCarrier(carriers: readonly Carrier[]): Record<string, number> {
    return Object.fromEntries(carriers.map((c) => [c.id, this.remainingCents(c)]));
  }

  consume(carrier: Carrier, cents: number) {
    if (!Number.isSafeInteger(cents) || cents < 0) {
      throw new InvariantViolationError(`Capacity consumption must be non-negative cents, got ${cents}`);
    }
    const remaining = this.remainingCents(carrier) - cents;
    if (remaining < 0) {
      throw new InvariantViolationError(`Capacity for ${carrier.id} would go negative (${remaining})`, {
        carrierId: carrier.id,
        remaining,
      });
    }
    this.consumed.set(carrier.id, this.consumedCents(carrier.id) + cents);
  }
}
