import type {
  AccountRecord,
  PartnerCommissionRecord,
  PendingGiftRecord,
  PlanRecord,
  PromoRedemptionOutcome,
  TransactionLogEntry,
} from "../domain/types.js";

export interface PromoRedemptionInput {
  code: string;
  orderId: string;
  ownerId: number;
  now: string;
}

export interface PromoRedemptionResult {
  outcome: PromoRedemptionOutcome;
  deactivated: boolean;
}

export interface StorefrontRepositoryPort {
  getAccount(ownerId: number): Promise<AccountRecord | null>;
  /** Adds `delta` (may be negative) and returns the new balance. */
  adjustBalance(ownerId: number, delta: number): Promise<number>;
  /** Atomic conditional debit; false when the balance is lower than `amount`. */
  debitBalanceIfSufficient(ownerId: number, amount: number): Promise<boolean>;
  creditReferralBalance(ownerId: number, amount: number): Promise<void>;
  recordPurchase(ownerId: number, amount: number): Promise<void>;
  markTrialUsed(ownerId: number): Promise<void>;
  logTransaction(entry: TransactionLogEntry): Promise<void>;
  listTransactions(ownerId: number): Promise<TransactionLogEntry[]>;
  getPlan(planId: string): Promise<PlanRecord | null>;
  redeemPromo(input: PromoRedemptionInput): Promise<PromoRedemptionResult>;
  /** Insert-if-absent keyed by `(instance_id, payment_id)`. */
  insertCommissionIfAbsent(record: PartnerCommissionRecord): Promise<boolean>;
  listCommissions(instanceId: string): Promise<PartnerCommissionRecord[]>;
  savePendingGift(gift: PendingGiftRecord): Promise<void>;
  getPendingGift(paymentId: string): Promise<PendingGiftRecord | null>;
  deletePendingGift(paymentId: string): Promise<boolean>;
  listPendingGifts(ownerId: number): Promise<PendingGiftRecord[]>;
  loadSettings(): Promise<Record<string, string>>;
}
