import type { FulfillmentMetadata } from "../domain/metadata.js";
import type { PendingTransactionRecord } from "../domain/types.js";

export interface UpsertPendingInput {
  paymentId: string;
  ownerId: number;
  amount: number;
  currency: string;
  metadata: FulfillmentMetadata;
  now: string;
}

export type UpsertPendingResult = "created" | "refreshed" | "rejected_paid";

/** Handle on an open exclusive ledger transaction. */
export interface PendingLedgerTransaction {
  /** Reads a pending row and holds its lock until the transaction ends. */
  selectPendingForUpdate(paymentId: string): Promise<PendingTransactionRecord | null>;
  /** Conditional `pending -> paid`; resolves to the number of affected rows. */
  markPaid(paymentId: string, now: string): Promise<number>;
}

export type LedgerTransactionOutcome<TValue> =
  | { commit: true; value: TValue }
  | { commit: false; value: TValue };

export interface PendingLedgerPort {
  upsertPending(input: UpsertPendingInput): Promise<UpsertPendingResult>;
  getByPaymentId(paymentId: string): Promise<PendingTransactionRecord | null>;
  findLatestPendingForOwner(ownerId: number): Promise<PendingTransactionRecord | null>;
  /**
   * Runs `work` inside one exclusive transaction. Commits when the outcome asks
   * for it, rolls back otherwise and whenever `work` throws.
   */
  runExclusive<TValue>(
    work: (tx: PendingLedgerTransaction) => Promise<LedgerTransactionOutcome<TValue>>,
  ): Promise<TValue>;
}
