export interface ProcessedPaymentStorePort {
  /** Atomic insert-if-absent; true only for the first caller. */
  insertIfAbsent(paymentId: string, processedAt: string): Promise<boolean>;
  has(paymentId: string): Promise<boolean>;
}
