import type { ProcessedPaymentStorePort } from "../../ports/processed-payments.js";

export class InMemoryProcessedPaymentStore implements ProcessedPaymentStorePort {
  private readonly processed = new Map<string, string>();

  async insertIfAbsent(paymentId: string, processedAt: string): Promise<boolean> {
    if (this.processed.has(paymentId)) {
      return false;
    }
    this.processed.set(paymentId, processedAt);
    return true;
  }

  async has(paymentId: string): Promise<boolean> {
    return this.processed.has(paymentId);
  }
}
