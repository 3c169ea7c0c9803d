import type { PendingTransactionRecord } from "../../domain/types.js";
import type {
  LedgerTransactionOutcome,
  PendingLedgerPort,
  PendingLedgerTransaction,
  UpsertPendingInput,
  UpsertPendingResult,
} from "../../ports/pending-ledger.js";
import { KeyedLock } from "./keyed-lock.js";

const LEDGER_LOCK_KEY = "ledger";

/**
 * Writes made inside `runExclusive` are staged and only reach the committed
 * rows on commit, so a throwing transaction leaves nothing behind.
 */
export class InMemoryPendingLedger implements PendingLedgerPort {
  private readonly rows = new Map<string, PendingTransactionRecord>();
  private readonly lock = new KeyedLock();

  async upsertPending(input: UpsertPendingInput): Promise<UpsertPendingResult> {
    return this.lock.run(LEDGER_LOCK_KEY, async () => {
      const existing = this.rows.get(input.paymentId);
      if (existing && existing.status !== "pending") {
        return "rejected_paid";
      }
      this.rows.set(input.paymentId, {
        payment_id: input.paymentId,
        owner_id: input.ownerId,
        amount: input.amount,
        currency: input.currency,
        metadata: input.metadata,
        status: "pending",
        created_at: existing?.created_at ?? input.now,
        updated_at: input.now,
      });
      return existing ? "refreshed" : "created";
    });
  }

  async getByPaymentId(paymentId: string): Promise<PendingTransactionRecord | null> {
    const row = this.rows.get(paymentId);
    return row ? { ...row } : null;
  }

  async findLatestPendingForOwner(ownerId: number): Promise<PendingTransactionRecord | null> {
    const candidates = [...this.rows.values()]
      .filter((row) => row.owner_id === ownerId && row.status === "pending")
      .sort((a, b) => {
        const byUpdatedAt = b.updated_at.localeCompare(a.updated_at);
        if (byUpdatedAt !== 0) {
          return byUpdatedAt;
        }
        return b.created_at.localeCompare(a.created_at);
      });
    const latest = candidates[0];
    return latest ? { ...latest } : null;
  }

  async runExclusive<TValue>(
    work: (tx: PendingLedgerTransaction) => Promise<LedgerTransactionOutcome<TValue>>,
  ): Promise<TValue> {
    return this.lock.run(LEDGER_LOCK_KEY, async () => {
      const staged = new Map<string, PendingTransactionRecord>();
      const readRow = (paymentId: string) => staged.get(paymentId) ?? this.rows.get(paymentId);

      const tx: PendingLedgerTransaction = {
        selectPendingForUpdate: async (paymentId) => {
          const row = readRow(paymentId);
          return row && row.status === "pending" ? { ...row } : null;
        },
        markPaid: async (paymentId, now) => {
          const row = readRow(paymentId);
          if (!row || row.status !== "pending") {
            return 0;
          }
          staged.set(paymentId, { ...row, status: "paid", updated_at: now });
          return 1;
        },
      };

      const outcome = await work(tx);
      if (outcome.commit) {
        for (const [paymentId, row] of staged) {
          this.rows.set(paymentId, row);
        }
      }
      return outcome.value;
    });
  }
}
