import type { ClockPort } from "../infra/clock.js";
import type { ProcessedPaymentStorePort } from "../ports/processed-payments.js";

/**
 * Dedupes fulfillment execution. Independent of the ledger because balance
 * payments and recovered orders never have a ledger row.
 */
export class FulfillmentGuard {
  constructor(
    private readonly store: ProcessedPaymentStorePort,
    private readonly clock: ClockPort,
  ) {}

  async claim(paymentId: string): Promise<boolean> {
    const id = paymentId.trim();
    if (id.length === 0) {
      return false;
    }
    return this.store.insertIfAbsent(id, this.clock.nowIso());
  }

  async isClaimed(paymentId: string): Promise<boolean> {
    const id = paymentId.trim();
    return id.length > 0 && this.store.has(id);
  }
}
