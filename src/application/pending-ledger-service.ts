import { parseFulfillmentMetadata, type FulfillmentMetadata } from "../domain/metadata.js";
import type { LedgerStatus, PendingTransactionRecord } from "../domain/types.js";
import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import type { PendingLedgerPort } from "../ports/pending-ledger.js";

export interface IntentInput {
  paymentId: string;
  ownerId: number;
  amount: number;
  currency: string;
  metadata: unknown;
}

export type IntentWriteOutcome = "created" | "refreshed" | "rejected_paid" | "rejected_blank_id" | "failed";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export class PendingLedgerService {
  constructor(
    private readonly ledger: PendingLedgerPort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
  ) {}

  /**
   * Inserts the intent or refreshes it while still pending. The row-level fields
   * override whatever the metadata document claims about them.
   */
  async writeIntent(input: IntentInput): Promise<IntentWriteOutcome> {
    const paymentId = input.paymentId.trim();
    if (paymentId.length === 0) {
      return "rejected_blank_id";
    }
    const currency = input.currency.toUpperCase();
    const metadata = parseFulfillmentMetadata(
      isObject(input.metadata)
        ? {
            ...input.metadata,
            payment_id: paymentId,
            owner_id: input.ownerId,
            amount: input.amount,
            currency,
          }
        : input.metadata,
    );

    try {
      const result = await this.ledger.upsertPending({
        paymentId,
        ownerId: input.ownerId,
        amount: input.amount,
        currency,
        metadata,
        now: this.clock.nowIso(),
      });
      if (result === "rejected_paid") {
        this.logger.warn({ paymentId }, "refusing to refresh an intent that is already paid");
      }
      return result;
    } catch (error) {
      this.logger.error({ err: error, paymentId }, "failed to store payment intent");
      return "failed";
    }
  }

  async createOrRefreshIntent(input: IntentInput): Promise<boolean> {
    const outcome = await this.writeIntent(input);
    return outcome === "created" || outcome === "refreshed";
  }

  async peekMetadata(paymentId: string): Promise<FulfillmentMetadata | null> {
    const row = await this.ledger.getByPaymentId(paymentId);
    return row && row.status === "pending" ? row.metadata : null;
  }

  async getStatus(paymentId: string): Promise<LedgerStatus | null> {
    const row = await this.ledger.getByPaymentId(paymentId);
    return row ? row.status : null;
  }

  async getIntent(paymentId: string): Promise<PendingTransactionRecord | null> {
    return this.ledger.getByPaymentId(paymentId);
  }

  async mostRecentPendingFor(ownerId: number): Promise<PendingTransactionRecord | null> {
    return this.ledger.findLatestPendingForOwner(ownerId);
  }
}
