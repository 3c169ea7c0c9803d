import type { Pool, PoolClient } from "pg";
import { parseFulfillmentMetadata } from "../../domain/metadata.js";
import type { LedgerStatus, PendingTransactionRecord } from "../../domain/types.js";
import { AppError } from "../../infra/app-error.js";
import type {
  LedgerTransactionOutcome,
  PendingLedgerPort,
  PendingLedgerTransaction,
  UpsertPendingInput,
  UpsertPendingResult,
} from "../../ports/pending-ledger.js";
import { asContentionError, mapTimestamp, toNumber } from "./mapping.js";

interface PendingRow {
  payment_id: string;
  owner_id: unknown;
  amount: unknown;
  currency: string;
  metadata: unknown;
  status: string;
  created_at: unknown;
  updated_at: unknown;
}

const PENDING_COLUMNS = "payment_id, owner_id, amount, currency, metadata, status, created_at, updated_at";

interface PostgresPendingLedgerOptions {
  lockTimeoutMs: number;
}

function mapStatus(value: string): LedgerStatus {
  if (value === "pending" || value === "paid") {
    return value;
  }
  throw new AppError(500, "persistence_mapping_error", `Unknown ledger status '${value}'.`);
}

function mapRow(row: PendingRow): PendingTransactionRecord {
  return {
    payment_id: row.payment_id,
    owner_id: toNumber(row.owner_id, "owner_id"),
    amount: toNumber(row.amount, "amount"),
    currency: row.currency,
    metadata: parseFulfillmentMetadata(row.metadata),
    status: mapStatus(row.status),
    created_at: mapTimestamp(row.created_at),
    updated_at: mapTimestamp(row.updated_at),
  };
}

export class PostgresPendingLedger implements PendingLedgerPort {
  constructor(
    private readonly pool: Pool,
    private readonly options: PostgresPendingLedgerOptions = { lockTimeoutMs: 2000 },
  ) {}

  async upsertPending(input: UpsertPendingInput): Promise<UpsertPendingResult> {
    // xmax = 0 only on a freshly inserted tuple.
    const result = await this.pool.query<{ inserted: boolean }>(
      `
        INSERT INTO fl_pending_transactions (
          payment_id, owner_id, amount, currency, metadata, status, created_at, updated_at
        )
        VALUES ($1, $2::bigint, $3::bigint, $4, $5::jsonb, 'pending', $6::timestamptz, $6::timestamptz)
        ON CONFLICT (payment_id) DO UPDATE
        SET owner_id = EXCLUDED.owner_id,
            amount = EXCLUDED.amount,
            currency = EXCLUDED.currency,
            metadata = EXCLUDED.metadata,
            updated_at = EXCLUDED.updated_at
        WHERE fl_pending_transactions.status = 'pending'
        RETURNING (xmax = 0) AS inserted
      `,
      [input.paymentId, input.ownerId, input.amount, input.currency, JSON.stringify(input.metadata), input.now],
    );
    const row = result.rows[0];
    if (!row) {
      return "rejected_paid";
    }
    return row.inserted ? "created" : "refreshed";
  }

  async getByPaymentId(paymentId: string): Promise<PendingTransactionRecord | null> {
    const result = await this.pool.query<PendingRow>(
      `SELECT ${PENDING_COLUMNS} FROM fl_pending_transactions WHERE payment_id = $1`,
      [paymentId],
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async findLatestPendingForOwner(ownerId: number): Promise<PendingTransactionRecord | null> {
    const result = await this.pool.query<PendingRow>(
      `
        SELECT ${PENDING_COLUMNS}
        FROM fl_pending_transactions
        WHERE owner_id = $1::bigint
          AND status = 'pending'
        ORDER BY updated_at DESC, created_at DESC
        LIMIT 1
      `,
      [ownerId],
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async runExclusive<TValue>(
    work: (tx: PendingLedgerTransaction) => Promise<LedgerTransactionOutcome<TValue>>,
  ): Promise<TValue> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      try {
        await client.query(`SET LOCAL lock_timeout = '${Math.max(1, Math.trunc(this.options.lockTimeoutMs))}ms'`);
        const outcome = await work(this.transactionOn(client));
        await client.query(outcome.commit ? "COMMIT" : "ROLLBACK");
        return outcome.value;
      } catch (error) {
        await client.query("ROLLBACK");
        throw asContentionError(error);
      }
    } finally {
      client.release();
    }
  }

  private transactionOn(client: PoolClient): PendingLedgerTransaction {
    return {
      selectPendingForUpdate: async (paymentId) => {
        const result = await client.query<PendingRow>(
          `
            SELECT ${PENDING_COLUMNS}
            FROM fl_pending_transactions
            WHERE payment_id = $1
              AND status = 'pending'
            FOR UPDATE
          `,
          [paymentId],
        );
        const row = result.rows[0];
        return row ? mapRow(row) : null;
      },
      markPaid: async (paymentId, now) => {
        const result = await client.query(
          `
            UPDATE fl_pending_transactions
            SET status = 'paid', updated_at = $2::timestamptz
            WHERE payment_id = $1
              AND status = 'pending'
          `,
          [paymentId, now],
        );
        return result.rowCount ?? 0;
      },
    };
  }
}
