import type { FulfillmentAction, FulfillmentMetadata } from "./metadata.js";

export type LedgerStatus = "pending" | "paid";

export interface PendingTransactionRecord {
  payment_id: string;
  owner_id: number;
  amount: number;
  currency: string;
  metadata: FulfillmentMetadata;
  status: LedgerStatus;
  created_at: string;
  updated_at: string;
}

export type CredentialOriginKind = "trial" | "purchase" | "extend" | "gift";

export interface CredentialOrigin {
  kind: CredentialOriginKind;
  plan_id: string | null;
  plan_name: string | null;
  days: number;
  label: string;
}

export interface CredentialRecord {
  credential_id: string;
  owner_id: number;
  provider_host: string;
  remote_uuid: string;
  unique_identity: string;
  expires_at: string;
  missing_since: string | null;
  origin: CredentialOrigin;
  connection_info: string | null;
  created_at: string;
  updated_at: string;
}

export interface AccountRecord {
  owner_id: number;
  referrer_id: number | null;
  balance: number;
  referral_balance: number;
  trial_used: boolean;
  total_spent: number;
  keys_purchased: number;
}

export type TransactionKind = "purchase" | "top_up" | "refund" | "referral_reward";

export interface TransactionLogEntry {
  id: string;
  owner_id: number;
  payment_id: string;
  kind: TransactionKind;
  amount: number;
  currency: string;
  payment_method: string;
  created_at: string;
}

export interface PlanRecord {
  plan_id: string;
  host_name: string;
  name: string;
  months: number | null;
  duration_days: number | null;
  price: number;
  traffic_limit_bytes: number | null;
  device_limit: number | null;
  active: boolean;
}

export interface PromoCodeRecord {
  code: string;
  usage_limit_total: number | null;
  used_total: number;
  valid_until: string | null;
  active: boolean;
}

export type PromoRedemptionOutcome = "redeemed" | "exhausted" | "expired" | "not_found" | "already_redeemed";

export interface PartnerCommissionRecord {
  instance_id: string;
  payment_id: string;
  owner_id: number;
  amount: number;
  percent: number;
  commission: number;
  payment_method: string;
  created_at: string;
}

export interface PendingGiftRecord {
  payment_id: string;
  owner_id: number;
  plan_id: string;
  host_name: string;
  days: number;
  created_at: string;
}

export type ReferralScheme = "percent_of_price" | "fixed_per_purchase" | "fixed_at_start";

export interface FulfillmentSettings {
  readonly referralScheme: ReferralScheme;
  readonly referralPercent: number;
  readonly referralFixedAmount: number;
  readonly franchisePercent: number;
  readonly trialDays: number;
}

export type SideEffectName =
  | "provision_credential"
  | "save_credential"
  | "credit_balance"
  | "debit_balance"
  | "refund_balance"
  | "log_transaction"
  | "record_purchase"
  | "mark_trial_used"
  | "referral_reward"
  | "promo_redemption"
  | "partner_commission"
  | "save_pending_gift"
  | "notify_payer"
  | "notify_operators"
  | "delete_prompt_message";

export type SideEffectStatus = "applied" | "skipped" | "failed";

export interface SideEffectResult {
  effect: SideEffectName;
  status: SideEffectStatus;
  detail?: string;
}

export type FulfillmentOutcome =
  | "fulfilled"
  | "gift_pending"
  | "provisioning_failed"
  | "insufficient_balance"
  | "duplicate";

export interface FulfillmentReport {
  payment_id: string;
  owner_id: number;
  action: FulfillmentAction;
  outcome: FulfillmentOutcome;
  effects: SideEffectResult[];
  credential_id?: string;
  error_code?: string;
  promo_outcome?: PromoRedemptionOutcome;
}

export interface GiftCompletionResult {
  payment_id: string;
  status: "delivered" | "provisioning_failed";
  credential_id?: string;
  error_code?: string;
}

/** Client attributes as the panel reports them. */
export interface RemoteCredentialState {
  remoteUuid: string;
  expiresAt: string;
  connectionInfo: string | null;
}

export type ExistenceCheck =
  | ({ state: "present" } & RemoteCredentialState)
  | { state: "absent" }
  | { state: "unknown" };

export interface ReconciliationSummary {
  checked: number;
  present: number;
  synced: number;
  marked_missing: number;
  still_missing: number;
  cleared: number;
  deleted: number;
  delete_skipped: number;
  unknown: number;
  failed: number;
}

interface EventEnvelope<TType extends string, TData> {
  id: string;
  source: string;
  event_version: string;
  type: TType;
  occurred_at: string;
  data: TData;
}

export type FulfillmentTerminalEventType = `fulfillment.${FulfillmentOutcome}`;

export type FulfillmentEvent =
  | EventEnvelope<"fulfillment.started", { payment_id: string; owner_id: number; action: FulfillmentAction }>
  | EventEnvelope<FulfillmentTerminalEventType, FulfillmentReport>
  | EventEnvelope<"gift.completed", GiftCompletionResult & { owner_id: number }>
  | EventEnvelope<"reconciliation.completed", ReconciliationSummary & { scope: string }>;

export type FulfillmentEventType = FulfillmentEvent["type"];
