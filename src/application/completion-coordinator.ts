import { LedgerContentionError } from "../domain/ledger-errors.js";
import type { FulfillmentMetadata } from "../domain/metadata.js";
import { AppError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import { defaultSleep, withRetry, type RetryPolicy, type SleepFn } from "../infra/retry.js";
import type { PendingLedgerPort } from "../ports/pending-ledger.js";

export class CompletionCoordinator {
  constructor(
    private readonly ledger: PendingLedgerPort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly retryPolicy: RetryPolicy,
    private readonly sleep: SleepFn = defaultSleep,
  ) {}

  /**
   * Flips `pending -> paid` inside one exclusive transaction and returns the
   * metadata as it stood before the flip. Exactly one caller per payment id
   * gets a non-null result.
   */
  async completeIfPending(paymentId: string): Promise<FulfillmentMetadata | null> {
    const id = paymentId.trim();
    if (id.length === 0) {
      return null;
    }

    try {
      return await withRetry(
        (attempt) => {
          if (attempt > 1) {
            this.logger.debug({ paymentId: id, attempt }, "retrying ledger completion after contention");
          }
          return this.ledger.runExclusive<FulfillmentMetadata | null>(async (tx) => {
            const row = await tx.selectPendingForUpdate(id);
            if (!row) {
              return { commit: false, value: null };
            }
            const affected = await tx.markPaid(id, this.clock.nowIso());
            if (affected !== 1) {
              return { commit: false, value: null };
            }
            return { commit: true, value: row.metadata };
          });
        },
        this.retryPolicy,
        (error) => error instanceof LedgerContentionError,
        this.sleep,
      );
    } catch (error) {
      if (error instanceof LedgerContentionError) {
        this.logger.warn({ paymentId: id, sqlState: error.sqlState }, "ledger contention persisted after retries");
        throw new AppError(503, "ledger_contention", "Ledger is busy. Retry later.");
      }
      throw error;
    }
  }
}
