import type { Quote, QuoteStatus } from "@embedded-uw/shared";

export type QuoteRecord = {
  quote: Quote;
  status: QuoteStatus;
};

export class QuoteStore {
  private records = new Map<string, QuoteRecord>();

  put(quote: Quote): QuoteRecord {
    const record = { quote, status: "quoted" as const };
    this.records.set(quote.id, record);
    return record;
  }

  get(id: string): QuoteRecord | undefined {
    return this.records.get(id);
  }

  setStatus(id: string, status: QuoteStatus) {
    const record = this.records.get(id);
    if (record) this.records.set(id, { ...record, status });
  }

  get size(): number {
    return this.records.size;
  }
}
