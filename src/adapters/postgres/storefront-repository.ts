import type { Pool, PoolClient } from "pg";
import type {
  AccountRecord,
  PartnerCommissionRecord,
  PendingGiftRecord,
  PlanRecord,
  TransactionKind,
  TransactionLogEntry,
} from "../../domain/types.js";
import { AppError } from "../../infra/app-error.js";
import type {
  PromoRedemptionInput,
  PromoRedemptionResult,
  StorefrontRepositoryPort,
} from "../../ports/storefront-repository.js";
import { mapNullableTimestamp, mapTimestamp, toNullableNumber, toNumber } from "./mapping.js";

const TRANSACTION_KINDS: readonly TransactionKind[] = ["purchase", "top_up", "refund", "referral_reward"];

function mapTransactionKind(value: string): TransactionKind {
  const kind = TRANSACTION_KINDS.find((candidate) => candidate === value);
  if (!kind) {
    throw new AppError(500, "persistence_mapping_error", `Unknown transaction kind '${value}'.`);
  }
  return kind;
}

export class PostgresStorefrontRepository implements StorefrontRepositoryPort {
  constructor(private readonly pool: Pool) {}

  async getAccount(ownerId: number): Promise<AccountRecord | null> {
    const result = await this.pool.query<{
      owner_id: unknown;
      referrer_id: unknown;
      balance: unknown;
      referral_balance: unknown;
      trial_used: boolean;
      total_spent: unknown;
      keys_purchased: unknown;
    }>(
      `
        SELECT owner_id, referrer_id, balance, referral_balance, trial_used, total_spent, keys_purchased
        FROM fl_accounts
        WHERE owner_id = $1::bigint
      `,
      [ownerId],
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      owner_id: toNumber(row.owner_id, "owner_id"),
      referrer_id: toNullableNumber(row.referrer_id, "referrer_id"),
      balance: toNumber(row.balance, "balance"),
      referral_balance: toNumber(row.referral_balance, "referral_balance"),
      trial_used: row.trial_used,
      total_spent: toNumber(row.total_spent, "total_spent"),
      keys_purchased: toNumber(row.keys_purchased, "keys_purchased"),
    };
  }

  async adjustBalance(ownerId: number, delta: number): Promise<number> {
    const result = await this.pool.query<{ balance: unknown }>(
      `
        INSERT INTO fl_accounts (owner_id, balance)
        VALUES ($1::bigint, $2::bigint)
        ON CONFLICT (owner_id) DO UPDATE
        SET balance = fl_accounts.balance + EXCLUDED.balance
        RETURNING balance
      `,
      [ownerId, delta],
    );
    return toNumber(result.rows[0]?.balance, "balance");
  }

  async debitBalanceIfSufficient(ownerId: number, amount: number): Promise<boolean> {
    const result = await this.pool.query(
      `
        UPDATE fl_accounts
        SET balance = balance - $2::bigint
        WHERE owner_id = $1::bigint
          AND balance >= $2::bigint
      `,
      [ownerId, amount],
    );
    return (result.rowCount ?? 0) === 1;
  }

  async creditReferralBalance(ownerId: number, amount: number): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO fl_accounts (owner_id, balance, referral_balance)
        VALUES ($1::bigint, $2::bigint, $2::bigint)
        ON CONFLICT (owner_id) DO UPDATE
        SET balance = fl_accounts.balance + EXCLUDED.balance,
            referral_balance = fl_accounts.referral_balance + EXCLUDED.referral_balance
      `,
      [ownerId, amount],
    );
  }

  async recordPurchase(ownerId: number, amount: number): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO fl_accounts (owner_id, total_spent, keys_purchased)
        VALUES ($1::bigint, $2::bigint, 1)
        ON CONFLICT (owner_id) DO UPDATE
        SET total_spent = fl_accounts.total_spent + EXCLUDED.total_spent,
            keys_purchased = fl_accounts.keys_purchased + 1
      `,
      [ownerId, amount],
    );
  }

  async markTrialUsed(ownerId: number): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO fl_accounts (owner_id, trial_used)
        VALUES ($1::bigint, TRUE)
        ON CONFLICT (owner_id) DO UPDATE SET trial_used = TRUE
      `,
      [ownerId],
    );
  }

  async logTransaction(entry: TransactionLogEntry): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO fl_transactions (id, owner_id, payment_id, kind, amount, currency, payment_method, created_at)
        VALUES ($1, $2::bigint, $3, $4, $5::bigint, $6, $7, $8::timestamptz)
      `,
      [
        entry.id,
        entry.owner_id,
        entry.payment_id,
        entry.kind,
        entry.amount,
        entry.currency,
        entry.payment_method,
        entry.created_at,
      ],
    );
  }

  async listTransactions(ownerId: number): Promise<TransactionLogEntry[]> {
    const result = await this.pool.query<{
      id: string;
      owner_id: unknown;
      payment_id: string;
      kind: string;
      amount: unknown;
      currency: string;
      payment_method: string;
      created_at: unknown;
    }>(
      `
        SELECT id, owner_id, payment_id, kind, amount, currency, payment_method, created_at
        FROM fl_transactions
        WHERE owner_id = $1::bigint
        ORDER BY created_at ASC, id ASC
      `,
      [ownerId],
    );
    return result.rows.map((row) => ({
      id: row.id,
      owner_id: toNumber(row.owner_id, "owner_id"),
      payment_id: row.payment_id,
      kind: mapTransactionKind(row.kind),
      amount: toNumber(row.amount, "amount"),
      currency: row.currency,
      payment_method: row.payment_method,
      created_at: mapTimestamp(row.created_at),
    }));
  }

  async getPlan(planId: string): Promise<PlanRecord | null> {
    const result = await this.pool.query<{
      plan_id: string;
      host_name: string;
      name: string;
      months: unknown;
      duration_days: unknown;
      price: unknown;
      traffic_limit_bytes: unknown;
      device_limit: unknown;
      active: boolean;
    }>(
      `
        SELECT plan_id, host_name, name, months, duration_days, price, traffic_limit_bytes, device_limit, active
        FROM fl_plans
        WHERE plan_id = $1
      `,
      [planId],
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      plan_id: row.plan_id,
      host_name: row.host_name,
      name: row.name,
      months: toNullableNumber(row.months, "months"),
      duration_days: toNullableNumber(row.duration_days, "duration_days"),
      price: toNumber(row.price, "price"),
      traffic_limit_bytes: toNullableNumber(row.traffic_limit_bytes, "traffic_limit_bytes"),
      device_limit: toNullableNumber(row.device_limit, "device_limit"),
      active: row.active,
    };
  }

  async redeemPromo(input: PromoRedemptionInput): Promise<PromoRedemptionResult> {
    const code = input.code.toUpperCase();
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      try {
        const result = await this.redeemWithin(client, code, input);
        await client.query("COMMIT");
        return result;
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      }
    } finally {
      client.release();
    }
  }

  async insertCommissionIfAbsent(record: PartnerCommissionRecord): Promise<boolean> {
    const result = await this.pool.query(
      `
        INSERT INTO fl_partner_commissions (
          instance_id, payment_id, owner_id, amount, percent, commission, payment_method, created_at
        )
        VALUES ($1, $2, $3::bigint, $4::bigint, $5::numeric, $6::bigint, $7, $8::timestamptz)
        ON CONFLICT (instance_id, payment_id) DO NOTHING
      `,
      [
        record.instance_id,
        record.payment_id,
        record.owner_id,
        record.amount,
        record.percent,
        record.commission,
        record.payment_method,
        record.created_at,
      ],
    );
    return (result.rowCount ?? 0) === 1;
  }

  async listCommissions(instanceId: string): Promise<PartnerCommissionRecord[]> {
    const result = await this.pool.query<{
      instance_id: string;
      payment_id: string;
      owner_id: unknown;
      amount: unknown;
      percent: unknown;
      commission: unknown;
      payment_method: string;
      created_at: unknown;
    }>(
      `
        SELECT instance_id, payment_id, owner_id, amount, percent, commission, payment_method, created_at
        FROM fl_partner_commissions
        WHERE instance_id = $1
        ORDER BY created_at ASC
      `,
      [instanceId],
    );
    return result.rows.map((row) => ({
      instance_id: row.instance_id,
      payment_id: row.payment_id,
      owner_id: toNumber(row.owner_id, "owner_id"),
      amount: toNumber(row.amount, "amount"),
      percent: toNumber(row.percent, "percent"),
      commission: toNumber(row.commission, "commission"),
      payment_method: row.payment_method,
      created_at: mapTimestamp(row.created_at),
    }));
  }

  async savePendingGift(gift: PendingGiftRecord): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO fl_pending_gifts (payment_id, owner_id, plan_id, host_name, days, created_at)
        VALUES ($1, $2::bigint, $3, $4, $5::integer, $6::timestamptz)
        ON CONFLICT (payment_id) DO NOTHING
      `,
      [gift.payment_id, gift.owner_id, gift.plan_id, gift.host_name, gift.days, gift.created_at],
    );
  }

  async getPendingGift(paymentId: string): Promise<PendingGiftRecord | null> {
    const gifts = await this.queryGifts("WHERE payment_id = $1", [paymentId]);
    return gifts[0] ?? null;
  }

  async deletePendingGift(paymentId: string): Promise<boolean> {
    const result = await this.pool.query("DELETE FROM fl_pending_gifts WHERE payment_id = $1", [paymentId]);
    return (result.rowCount ?? 0) === 1;
  }

  async listPendingGifts(ownerId: number): Promise<PendingGiftRecord[]> {
    return this.queryGifts("WHERE owner_id = $1::bigint", [ownerId]);
  }

  async loadSettings(): Promise<Record<string, string>> {
    const result = await this.pool.query<{ key: string; value: string }>("SELECT key, value FROM fl_settings");
    return Object.fromEntries(result.rows.map((row) => [row.key, row.value]));
  }

  private async queryGifts(where: string, params: unknown[]): Promise<PendingGiftRecord[]> {
    const result = await this.pool.query<{
      payment_id: string;
      owner_id: unknown;
      plan_id: string;
      host_name: string;
      days: unknown;
      created_at: unknown;
    }>(
      `
        SELECT payment_id, owner_id, plan_id, host_name, days, created_at
        FROM fl_pending_gifts
        ${where}
        ORDER BY created_at ASC
      `,
      params,
    );
    return result.rows.map((row) => ({
      payment_id: row.payment_id,
      owner_id: toNumber(row.owner_id, "owner_id"),
      plan_id: row.plan_id,
      host_name: row.host_name,
      days: toNumber(row.days, "days"),
      created_at: mapTimestamp(row.created_at),
    }));
  }

  private async redeemWithin(
    client: PoolClient,
    code: string,
    input: PromoRedemptionInput,
  ): Promise<PromoRedemptionResult> {
    const promoResult = await client.query<{
      usage_limit_total: unknown;
      used_total: unknown;
      valid_until: unknown;
      active: boolean;
    }>(
      `
        SELECT usage_limit_total, used_total, valid_until, active
        FROM fl_promo_codes
        WHERE code = $1
        FOR UPDATE
      `,
      [code],
    );
    const promo = promoResult.rows[0];
    if (!promo) {
      return { outcome: "not_found", deactivated: false };
    }

    const usage = await client.query("SELECT 1 FROM fl_promo_usages WHERE order_id = $1", [input.orderId]);
    if (usage.rows.length > 0) {
      return { outcome: "already_redeemed", deactivated: false };
    }

    const deactivate = async (): Promise<boolean> => {
      if (!promo.active) {
        return false;
      }
      await client.query("UPDATE fl_promo_codes SET active = FALSE WHERE code = $1", [code]);
      return true;
    };

    const validUntil = mapNullableTimestamp(promo.valid_until);
    if (validUntil !== null && Date.parse(validUntil) < Date.parse(input.now)) {
      return { outcome: "expired", deactivated: await deactivate() };
    }
    const limit = toNullableNumber(promo.usage_limit_total, "usage_limit_total");
    const used = toNumber(promo.used_total, "used_total");
    if (!promo.active || (limit !== null && used >= limit)) {
      return { outcome: "exhausted", deactivated: await deactivate() };
    }

    const reachedLimit = limit !== null && used + 1 >= limit;
    await client.query(
      `
        UPDATE fl_promo_codes
        SET used_total = used_total + 1,
            active = CASE WHEN $2::boolean THEN FALSE ELSE active END
        WHERE code = $1
      `,
      [code, reachedLimit],
    );
    await client.query(
      `
        INSERT INTO fl_promo_usages (order_id, code, owner_id, used_at)
        VALUES ($1, $2, $3::bigint, $4::timestamptz)
      `,
      [input.orderId, code, input.ownerId, input.now],
    );
    return { outcome: "redeemed", deactivated: reachedLimit };
  }
}
