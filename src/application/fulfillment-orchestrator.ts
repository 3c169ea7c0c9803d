import { randomUUID } from "node:crypto";
import { durationLabel, resolvePlanDays } from "../domain/duration.js";
import {
  BALANCE_PAYMENT_METHOD,
  isCardLikeMethod,
  type FulfillmentMetadata,
  type GiftKeyMetadata,
  type ProvisioningMetadata,
  type TopUpMetadata,
} from "../domain/metadata.js";
import {
  classifyProvisioningError,
  type FulfillmentFailureCode,
} from "../domain/provisioning-errors.js";
import { computeCommission, decideReferralReward } from "../domain/referral.js";
import type {
  CredentialOriginKind,
  CredentialRecord,
  FulfillmentEvent,
  FulfillmentOutcome,
  FulfillmentReport,
  FulfillmentSettings,
  FulfillmentTerminalEventType,
  GiftCompletionResult,
  PendingGiftRecord,
  PlanRecord,
  TransactionKind,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import type { CredentialRepositoryPort } from "../ports/credential-repository.js";
import type { EventBusPort } from "../ports/event-bus.js";
import type { Notification, NotificationSinkPort } from "../ports/notification-sink.js";
import type { ProvisioningClientPort } from "../ports/provisioning-client.js";
import type { RunLockPort } from "../ports/run-lock.js";
import type { StorefrontRepositoryPort } from "../ports/storefront-repository.js";
import { EffectRecorder } from "./effect-recorder.js";
import { eventEnvelope } from "./events.js";
import { DEFAULT_FULFILLMENT_SETTINGS, loadSettingsSnapshot } from "./fulfillment-settings.js";
import type { FulfillmentGuard } from "./fulfillment-guard.js";

export interface FulfillmentOrchestratorOptions {
  provisioningTimeoutMs: number;
  eventSource: string;
  identityFactory?: (hint: string) => string;
  credentialIdFactory?: () => string;
}

export interface AccrueCommissionInput {
  instanceId: string;
  paymentId: string;
  ownerId: number;
  amount: number;
  percent: number;
  paymentMethod: string;
}

interface ProvisioningTarget {
  host: string;
  identity: string;
  days: number;
  originKind: CredentialOriginKind;
  plan: PlanRecord | null;
  existing: CredentialRecord | null;
}

type TargetResolution =
  | { ok: true; target: ProvisioningTarget }
  | { ok: false; code: FulfillmentFailureCode; detail: string };

const RECIPIENT_HANDLE_PATTERN = /^@?[A-Za-z0-9_.-]{3,64}$/;

function defaultIdentityFactory(hint: string): string {
  return `${hint}-${randomUUID().slice(0, 8)}`.toLowerCase();
}

function terminalEventType(outcome: FulfillmentOutcome): FulfillmentTerminalEventType {
  return `fulfillment.${outcome}`;
}

export class FulfillmentOrchestrator {
  private readonly identityFactory: (hint: string) => string;
  private readonly credentialIdFactory: () => string;

  constructor(
    private readonly guard: FulfillmentGuard,
    private readonly credentials: CredentialRepositoryPort,
    private readonly storefront: StorefrontRepositoryPort,
    private readonly provisioning: ProvisioningClientPort,
    private readonly notifications: NotificationSinkPort,
    private readonly eventBus: EventBusPort,
    private readonly runLock: RunLockPort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly options: FulfillmentOrchestratorOptions,
  ) {
    this.identityFactory = options.identityFactory ?? defaultIdentityFactory;
    this.credentialIdFactory = options.credentialIdFactory ?? (() => `cred_${randomUUID()}`);
  }

  /**
   * Runs every side effect of a paid order at most once per payment id. A
   * second call for the same id reports `duplicate` and touches nothing.
   */
  async runFulfillment(metadata: FulfillmentMetadata): Promise<FulfillmentReport> {
    return this.runGuarded(metadata);
  }

  /** Balance path: no ledger row, the stored balance pays for the order. */
  async payFromBalance(metadata: FulfillmentMetadata): Promise<FulfillmentReport> {
    if (metadata.payment_method !== BALANCE_PAYMENT_METHOD) {
      throw new AppError(422, "invalid_metadata", "payment_method must be 'balance' for balance payments.");
    }
    if (metadata.action === "top_up" || metadata.action === "trial") {
      throw new AppError(422, "invalid_metadata", `${metadata.action} cannot be paid from the stored balance.`);
    }
    const account = await this.storefront.getAccount(metadata.owner_id);
    if (!account || account.balance < metadata.amount) {
      // A replay of a settled order finds the balance already spent; a claim always precedes its debit.
      if (await this.guard.isClaimed(metadata.payment_id)) {
        return this.runGuarded(metadata);
      }
      throw new AppError(422, "insufficient_balance", "Stored balance does not cover the order amount.");
    }

    return this.runGuarded(metadata, async (effects) => {
      const debited = await this.storefront.debitBalanceIfSufficient(metadata.owner_id, metadata.amount);
      if (debited) {
        effects.applied("debit_balance", String(metadata.amount));
      }
      return debited;
    });
  }

  /** Idempotent on `(instance_id, payment_id)`; true only for the first accrual. */
  async accrueCommission(input: AccrueCommissionInput): Promise<boolean> {
    return this.storefront.insertCommissionIfAbsent({
      instance_id: input.instanceId,
      payment_id: input.paymentId,
      owner_id: input.ownerId,
      amount: input.amount,
      percent: input.percent,
      commission: computeCommission(input.amount, input.percent),
      payment_method: input.paymentMethod,
      created_at: this.clock.nowIso(),
    });
  }

  async listPendingGifts(ownerId: number): Promise<PendingGiftRecord[]> {
    return this.storefront.listPendingGifts(ownerId);
  }

  /**
   * Provisions a paid gift for the recipient handle. The pending gift survives a
   * provisioning failure so the payer can retry with another handle.
   */
  async completeGift(paymentId: string, recipientHandle: string): Promise<GiftCompletionResult> {
    const handle = recipientHandle.trim();
    if (!RECIPIENT_HANDLE_PATTERN.test(handle)) {
      throw new AppError(422, "invalid_recipient_handle", "recipient handle must be 3-64 characters of [A-Za-z0-9_.-].");
    }

    return this.runLock.withLock(`gift:${paymentId}`, async () => {
      const gift = await this.storefront.getPendingGift(paymentId);
      if (!gift) {
        throw new AppError(404, "pending_gift_not_found", `No pending gift for payment '${paymentId}'.`);
      }
      const recipient = handle.replace(/^@/, "").toLowerCase();
      const identity = this.identityFactory(`gift-${recipient}`);

      const attempt = await this.provisioning
        .createOrExtend({
          host: gift.host_name,
          identity,
          daysToAdd: gift.days,
          timeoutMs: this.options.provisioningTimeoutMs,
        })
        .then(
          (value) => ({ ok: true as const, value }),
          (error: unknown) => ({ ok: false as const, error }),
        );

      let result: GiftCompletionResult;
      if (attempt.ok) {
        const provisioned = attempt.value;
        const now = this.clock.nowIso();
        const credentialId = this.credentialIdFactory();
        const plan = await this.storefront.getPlan(gift.plan_id);
        await this.credentials.create({
          credential_id: credentialId,
          owner_id: gift.owner_id,
          provider_host: gift.host_name,
          remote_uuid: provisioned.remoteUuid,
          unique_identity: identity,
          expires_at: provisioned.expiresAt,
          missing_since: null,
          origin: {
            kind: "gift",
            plan_id: gift.plan_id,
            plan_name: plan?.name ?? null,
            days: gift.days,
            label: `${durationLabel(gift.days)} for @${recipient}`,
          },
          connection_info: provisioned.connectionInfo,
          created_at: now,
          updated_at: now,
        });
        await this.storefront.deletePendingGift(paymentId);
        result = { payment_id: paymentId, status: "delivered", credential_id: credentialId };
        await this.sendQuietly(() =>
          this.notifications.notifyPayer(gift.owner_id, {
            kind: "gift_delivered",
            payment_id: paymentId,
            data: {
              credential_id: credentialId,
              recipient_handle: recipient,
              expires_at: provisioned.expiresAt,
              connection_info: provisioned.connectionInfo,
            },
          }),
        );
      } else {
        const classified = classifyProvisioningError(attempt.error);
        this.logger.warn({ err: attempt.error, paymentId, code: classified.code }, "gift provisioning failed");
        result = { payment_id: paymentId, status: "provisioning_failed", error_code: classified.code };
        await this.sendQuietly(() =>
          this.notifications.notifyPayer(gift.owner_id, {
            kind: "provisioning_failed",
            payment_id: paymentId,
            data: { error_code: classified.code, refunded: false, gift_still_pending: true },
          }),
        );
        await this.sendQuietly(() =>
          this.notifications.notifyOperators({
            kind: "provisioning_failed",
            payment_id: paymentId,
            data: { error_code: classified.code, detail: classified.detail, owner_id: gift.owner_id },
          }),
        );
      }

      await this.publish({
        ...eventEnvelope(this.options.eventSource, this.clock),
        type: "gift.completed",
        data: { ...result, owner_id: gift.owner_id },
      });
      return result;
    });
  }

  private async runGuarded(
    metadata: FulfillmentMetadata,
    preflight?: (effects: EffectRecorder) => Promise<boolean>,
  ): Promise<FulfillmentReport> {
    const runLogger = this.logger.child({ paymentId: metadata.payment_id, action: metadata.action });
    const claimed = await this.guard.claim(metadata.payment_id);
    if (!claimed) {
      runLogger.info("fulfillment already claimed; skipping duplicate delivery");
      return this.finish(runLogger, this.report(metadata, "duplicate", []));
    }

    await this.publish({
      ...eventEnvelope(this.options.eventSource, this.clock),
      type: "fulfillment.started",
      data: { payment_id: metadata.payment_id, owner_id: metadata.owner_id, action: metadata.action },
    });

    const effects = new EffectRecorder(runLogger);
    if (preflight && !(await preflight(effects))) {
      await this.notifyPayer(effects, metadata.owner_id, {
        kind: "insufficient_balance",
        payment_id: metadata.payment_id,
        data: { amount: metadata.amount, currency: metadata.currency },
      });
      return this.finish(runLogger, this.report(metadata, "insufficient_balance", effects.results));
    }

    const settings = await this.settingsSnapshot(runLogger);
    return this.finish(runLogger, await this.execute(metadata, settings, effects));
  }

  private async execute(
    metadata: FulfillmentMetadata,
    settings: FulfillmentSettings,
    effects: EffectRecorder,
  ): Promise<FulfillmentReport> {
    switch (metadata.action) {
      case "top_up":
        return this.fulfillTopUp(metadata, settings, effects);
      case "gift":
        return this.fulfillGiftPurchase(metadata, settings, effects);
      case "new":
      case "extend":
      case "trial":
        return this.fulfillProvisioning(metadata, settings, effects);
    }
  }

  private async fulfillTopUp(
    metadata: TopUpMetadata,
    settings: FulfillmentSettings,
    effects: EffectRecorder,
  ): Promise<FulfillmentReport> {
    await effects.attempt("credit_balance", async () => {
      const balance = await this.storefront.adjustBalance(metadata.owner_id, metadata.amount);
      return `balance ${balance}`;
    });
    await this.logTransaction(effects, metadata, "top_up");
    const promoOutcome = await this.applyMoneyEffects(metadata, settings, effects);

    await this.notifyPayer(effects, metadata.owner_id, {
      kind: "balance_credited",
      payment_id: metadata.payment_id,
      data: { amount: metadata.amount, currency: metadata.currency },
    });
    await this.notifyOperatorsOfSale(effects, metadata, promoOutcome);
    await this.deletePrompt(effects, metadata);
    return this.report(metadata, "fulfilled", effects.results, { promoOutcome });
  }

  private async fulfillGiftPurchase(
    metadata: GiftKeyMetadata,
    settings: FulfillmentSettings,
    effects: EffectRecorder,
  ): Promise<FulfillmentReport> {
    const plan = await this.storefront.getPlan(metadata.plan_id);
    const days = plan ? resolvePlanDays(plan) : null;
    if (!plan || days === null) {
      return this.failProvisioning(metadata, effects, "plan_not_found", `plan '${metadata.plan_id}' is not available`);
    }

    const saved = await effects.attempt("save_pending_gift", async () => {
      await this.storefront.savePendingGift({
        payment_id: metadata.payment_id,
        owner_id: metadata.owner_id,
        plan_id: plan.plan_id,
        host_name: metadata.host_name,
        days,
        created_at: this.clock.nowIso(),
      });
    });
    await this.recordPurchase(effects, metadata);
    const promoOutcome = await this.applyMoneyEffects(metadata, settings, effects);

    if (saved) {
      await this.notifyPayer(effects, metadata.owner_id, {
        kind: "gift_recipient_requested",
        payment_id: metadata.payment_id,
        data: { plan_id: plan.plan_id, days },
      });
    }
    await this.notifyOperatorsOfSale(effects, metadata, promoOutcome);
    await this.deletePrompt(effects, metadata);
    return this.report(metadata, "gift_pending", effects.results, { promoOutcome });
  }

  private async fulfillProvisioning(
    metadata: ProvisioningMetadata,
    settings: FulfillmentSettings,
    effects: EffectRecorder,
  ): Promise<FulfillmentReport> {
    const resolution = await this.resolveTarget(metadata, settings);
    if (!resolution.ok) {
      return this.failProvisioning(metadata, effects, resolution.code, resolution.detail);
    }
    const { target } = resolution;

    const attempt = await this.provisioning
      .createOrExtend({
        host: target.host,
        identity: target.identity,
        daysToAdd: target.days,
        timeoutMs: this.options.provisioningTimeoutMs,
        ...(target.plan?.traffic_limit_bytes ? { trafficLimitBytes: target.plan.traffic_limit_bytes } : {}),
        ...(target.plan?.device_limit ? { deviceLimit: target.plan.device_limit } : {}),
      })
      .then(
        (value) => ({ ok: true as const, value }),
        (error: unknown) => ({ ok: false as const, error }),
      );
    if (!attempt.ok) {
      const classified = classifyProvisioningError(attempt.error);
      effects.failed("provision_credential", attempt.error);
      return this.failProvisioning(metadata, effects, classified.code, classified.detail);
    }
    const provisioned = attempt.value;
    effects.applied("provision_credential", target.identity);

    const now = this.clock.nowIso();
    const origin = {
      kind: target.originKind,
      plan_id: target.plan?.plan_id ?? null,
      plan_name: target.plan?.name ?? null,
      days: target.days,
      label: durationLabel(target.days),
    };
    const credentialId = target.existing?.credential_id ?? this.credentialIdFactory();
    await effects.attempt("save_credential", async () => {
      if (!target.existing) {
        await this.credentials.create({
          credential_id: credentialId,
          owner_id: metadata.owner_id,
          provider_host: target.host,
          remote_uuid: provisioned.remoteUuid,
          unique_identity: target.identity,
          expires_at: provisioned.expiresAt,
          missing_since: null,
          origin,
          connection_info: provisioned.connectionInfo,
          created_at: now,
          updated_at: now,
        });
        return "created";
      }
      // Re-read by primary key: reconciliation may have touched the row meanwhile.
      const current = await this.credentials.getById(target.existing.credential_id);
      const next: CredentialRecord = {
        ...(current ?? target.existing),
        remote_uuid: provisioned.remoteUuid,
        expires_at: provisioned.expiresAt,
        missing_since: null,
        origin,
        connection_info: provisioned.connectionInfo ?? (current ?? target.existing).connection_info,
        updated_at: now,
      };
      if (current) {
        await this.credentials.update(next);
        return "extended";
      }
      await this.credentials.create(next);
      return "recreated";
    });

    if (metadata.action === "trial") {
      await effects.attempt("mark_trial_used", () => this.storefront.markTrialUsed(metadata.owner_id));
    } else {
      await this.recordPurchase(effects, metadata);
    }
    const promoOutcome = await this.applyMoneyEffects(metadata, settings, effects);

    await this.notifyPayer(effects, metadata.owner_id, {
      kind: metadata.action === "extend" ? "key_extended" : metadata.action === "trial" ? "trial_issued" : "key_issued",
      payment_id: metadata.payment_id,
      data: {
        credential_id: credentialId,
        expires_at: provisioned.expiresAt,
        connection_info: provisioned.connectionInfo,
        days: target.days,
      },
    });
    await this.notifyOperatorsOfSale(effects, metadata, promoOutcome);
    await this.deletePrompt(effects, metadata);
    return this.report(metadata, "fulfilled", effects.results, { promoOutcome, credentialId });
  }

  private async resolveTarget(
    metadata: ProvisioningMetadata,
    settings: FulfillmentSettings,
  ): Promise<TargetResolution> {
    if (metadata.action === "trial") {
      const account = await this.storefront.getAccount(metadata.owner_id);
      if (account?.trial_used) {
        return { ok: false, code: "trial_already_used", detail: `owner ${metadata.owner_id} already used the trial` };
      }
      return {
        ok: true,
        target: {
          host: metadata.host_name,
          identity: this.identityFactory(`trial-u${metadata.owner_id}`),
          days: settings.trialDays,
          originKind: "trial",
          plan: null,
          existing: null,
        },
      };
    }

    const plan = await this.storefront.getPlan(metadata.plan_id);
    const days = plan ? resolvePlanDays(plan) : null;
    if (!plan || days === null) {
      return { ok: false, code: "plan_not_found", detail: `plan '${metadata.plan_id}' is not available` };
    }

    if (metadata.action === "new") {
      return {
        ok: true,
        target: {
          host: metadata.host_name,
          identity: this.identityFactory(`u${metadata.owner_id}`),
          days,
          originKind: "purchase",
          plan,
          existing: null,
        },
      };
    }

    const credential = await this.credentials.getById(metadata.credential_id);
    if (!credential || credential.owner_id !== metadata.owner_id) {
      return {
        ok: false,
        code: "credential_not_found",
        detail: `credential '${metadata.credential_id}' does not exist for owner ${metadata.owner_id}`,
      };
    }
    return {
      ok: true,
      target: {
        host: credential.provider_host,
        identity: credential.unique_identity,
        days,
        originKind: "extend",
        plan,
        existing: credential,
      },
    };
  }

  /** Refund to the stored balance, tell payer and operators, write nothing else. */
  private async failProvisioning(
    metadata: FulfillmentMetadata,
    effects: EffectRecorder,
    code: FulfillmentFailureCode,
    detail: string,
  ): Promise<FulfillmentReport> {
    let refunded = false;
    if (metadata.amount > 0) {
      refunded = await effects.attempt("refund_balance", async () => {
        await this.storefront.adjustBalance(metadata.owner_id, metadata.amount);
        return String(metadata.amount);
      });
      if (refunded) {
        await this.logTransaction(effects, metadata, "refund");
      }
    } else {
      effects.skipped("refund_balance", "nothing_charged");
    }

    await this.notifyPayer(effects, metadata.owner_id, {
      kind: "provisioning_failed",
      payment_id: metadata.payment_id,
      data: { error_code: code, refunded, amount: metadata.amount, currency: metadata.currency },
    });
    await effects.attempt("notify_operators", () =>
      this.notifications.notifyOperators({
        kind: "provisioning_failed",
        payment_id: metadata.payment_id,
        data: {
          error_code: code,
          detail,
          owner_id: metadata.owner_id,
          action: metadata.action,
          amount: metadata.amount,
          refunded,
        },
      }),
    );
    await this.deletePrompt(effects, metadata);
    return this.report(metadata, "provisioning_failed", effects.results, { errorCode: code });
  }

  /** Referral reward, promo redemption and partner commission. */
  private async applyMoneyEffects(
    metadata: FulfillmentMetadata,
    settings: FulfillmentSettings,
    effects: EffectRecorder,
  ): Promise<FulfillmentReport["promo_outcome"]> {
    await this.payReferralReward(metadata, settings, effects);
    const promoOutcome = await this.redeemPromo(metadata, effects);
    await this.accruePartnerCommission(metadata, settings, effects);
    return promoOutcome;
  }

  private async payReferralReward(
    metadata: FulfillmentMetadata,
    settings: FulfillmentSettings,
    effects: EffectRecorder,
  ): Promise<void> {
    if (metadata.payment_method === BALANCE_PAYMENT_METHOD) {
      effects.skipped("referral_reward", "paid_from_balance");
      return;
    }
    if (metadata.amount <= 0) {
      effects.skipped("referral_reward", "nothing_charged");
      return;
    }
    await effects.attempt("referral_reward", async () => {
      const account = await this.storefront.getAccount(metadata.owner_id);
      const referrerId = account?.referrer_id ?? null;
      if (referrerId === null) {
        return "no_referrer";
      }
      const decision = decideReferralReward(settings, metadata.amount);
      if (decision.kind === "skip") {
        return decision.reason;
      }
      await this.storefront.creditReferralBalance(referrerId, decision.amount);
      await this.storefront.logTransaction({
        id: `txn_${randomUUID()}`,
        owner_id: referrerId,
        payment_id: metadata.payment_id,
        kind: "referral_reward",
        amount: decision.amount,
        currency: metadata.currency,
        payment_method: metadata.payment_method,
        created_at: this.clock.nowIso(),
      });
      return `${decision.amount} to ${referrerId}`;
    });
  }

  private async redeemPromo(
    metadata: FulfillmentMetadata,
    effects: EffectRecorder,
  ): Promise<FulfillmentReport["promo_outcome"]> {
    const code = metadata.promo_code;
    if (!code) {
      effects.skipped("promo_redemption", "no_promo_code");
      return undefined;
    }
    try {
      const result = await this.storefront.redeemPromo({
        code,
        orderId: metadata.payment_id,
        ownerId: metadata.owner_id,
        now: this.clock.nowIso(),
      });
      const detail = result.deactivated ? `${result.outcome}; deactivated` : result.outcome;
      if (result.outcome === "redeemed") {
        effects.applied("promo_redemption", detail);
      } else {
        effects.skipped("promo_redemption", detail);
      }
      return result.outcome;
    } catch (error) {
      effects.failed("promo_redemption", error);
      return undefined;
    }
  }

  private async accruePartnerCommission(
    metadata: FulfillmentMetadata,
    settings: FulfillmentSettings,
    effects: EffectRecorder,
  ): Promise<void> {
    const instanceId = metadata.instance_id;
    if (!instanceId) {
      effects.skipped("partner_commission", "no_instance");
      return;
    }
    if (!isCardLikeMethod(metadata.payment_method)) {
      effects.skipped("partner_commission", "not_card_payment");
      return;
    }
    await effects.attempt("partner_commission", async () => {
      const accrued = await this.accrueCommission({
        instanceId,
        paymentId: metadata.payment_id,
        ownerId: metadata.owner_id,
        amount: metadata.amount,
        percent: settings.franchisePercent,
        paymentMethod: metadata.payment_method,
      });
      return accrued ? `${computeCommission(metadata.amount, settings.franchisePercent)}` : "already_accrued";
    });
  }

  private async recordPurchase(effects: EffectRecorder, metadata: FulfillmentMetadata): Promise<void> {
    await effects.attempt("record_purchase", () => this.storefront.recordPurchase(metadata.owner_id, metadata.amount));
    await this.logTransaction(effects, metadata, "purchase");
  }

  private async logTransaction(
    effects: EffectRecorder,
    metadata: FulfillmentMetadata,
    kind: TransactionKind,
  ): Promise<void> {
    await effects.attempt("log_transaction", async () => {
      await this.storefront.logTransaction({
        id: `txn_${randomUUID()}`,
        owner_id: metadata.owner_id,
        payment_id: metadata.payment_id,
        kind,
        amount: metadata.amount,
        currency: metadata.currency,
        payment_method: metadata.payment_method,
        created_at: this.clock.nowIso(),
      });
      return kind;
    });
  }

  private async notifyPayer(effects: EffectRecorder, ownerId: number, notification: Notification): Promise<void> {
    await effects.attempt("notify_payer", () => this.notifications.notifyPayer(ownerId, notification));
  }

  private async notifyOperatorsOfSale(
    effects: EffectRecorder,
    metadata: FulfillmentMetadata,
    promoOutcome: FulfillmentReport["promo_outcome"],
  ): Promise<void> {
    await effects.attempt("notify_operators", () =>
      this.notifications.notifyOperators({
        kind: "payment_fulfilled",
        payment_id: metadata.payment_id,
        data: {
          owner_id: metadata.owner_id,
          action: metadata.action,
          amount: metadata.amount,
          currency: metadata.currency,
          payment_method: metadata.payment_method,
          promo_code: metadata.promo_code ?? null,
          promo_outcome: promoOutcome ?? null,
        },
      }),
    );
  }

  private async deletePrompt(effects: EffectRecorder, metadata: FulfillmentMetadata): Promise<void> {
    const messageId = metadata.prompt_message_id;
    if (!messageId) {
      return;
    }
    await effects.attempt("delete_prompt_message", () => this.notifications.deleteMessage(metadata.owner_id, messageId));
  }

  private async settingsSnapshot(logger: Logger): Promise<FulfillmentSettings> {
    try {
      return await loadSettingsSnapshot(this.storefront);
    } catch (error) {
      logger.error({ err: error }, "failed to load settings; using defaults for this run");
      return DEFAULT_FULFILLMENT_SETTINGS;
    }
  }

  private async sendQuietly(send: () => Promise<void>): Promise<void> {
    try {
      await send();
    } catch (error) {
      this.logger.warn({ err: error }, "notification delivery failed");
    }
  }

  private report(
    metadata: FulfillmentMetadata,
    outcome: FulfillmentOutcome,
    effects: FulfillmentReport["effects"],
    extra: {
      promoOutcome?: FulfillmentReport["promo_outcome"];
      credentialId?: string;
      errorCode?: string;
    } = {},
  ): FulfillmentReport {
    return {
      payment_id: metadata.payment_id,
      owner_id: metadata.owner_id,
      action: metadata.action,
      outcome,
      effects,
      ...(extra.credentialId ? { credential_id: extra.credentialId } : {}),
      ...(extra.errorCode ? { error_code: extra.errorCode } : {}),
      ...(extra.promoOutcome ? { promo_outcome: extra.promoOutcome } : {}),
    };
  }

  private async finish(logger: Logger, report: FulfillmentReport): Promise<FulfillmentReport> {
    const failed = report.effects.filter((effect) => effect.status === "failed").map((effect) => effect.effect);
    logger[failed.length > 0 ? "warn" : "info"](
      { outcome: report.outcome, failedEffects: failed, errorCode: report.error_code },
      "fulfillment finished",
    );
    await this.publish({
      ...eventEnvelope(this.options.eventSource, this.clock),
      type: terminalEventType(report.outcome),
      data: report,
    });
    return report;
  }

  private async publish(event: FulfillmentEvent): Promise<void> {
    try {
      await this.eventBus.publish(event);
    } catch (error) {
      this.logger.error({ err: error, eventType: event.type }, "failed to publish fulfillment event");
    }
  }
}
