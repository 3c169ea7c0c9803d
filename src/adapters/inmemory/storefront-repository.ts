import type {
  AccountRecord,
  PartnerCommissionRecord,
  PendingGiftRecord,
  PlanRecord,
  PromoCodeRecord,
  TransactionLogEntry,
} from "../../domain/types.js";
import type {
  PromoRedemptionInput,
  PromoRedemptionResult,
  StorefrontRepositoryPort,
} from "../../ports/storefront-repository.js";

function emptyAccount(ownerId: number): AccountRecord {
  return {
    owner_id: ownerId,
    referrer_id: null,
    balance: 0,
    referral_balance: 0,
    trial_used: false,
    total_spent: 0,
    keys_purchased: 0,
  };
}

export class InMemoryStorefrontRepository implements StorefrontRepositoryPort {
  private readonly accounts = new Map<number, AccountRecord>();
  private readonly transactions: TransactionLogEntry[] = [];
  private readonly plans = new Map<string, PlanRecord>();
  private readonly promos = new Map<string, PromoCodeRecord>();
  private readonly promoUsages = new Map<string, { code: string; owner_id: number; used_at: string }>();
  private readonly commissions = new Map<string, PartnerCommissionRecord>();
  private readonly gifts = new Map<string, PendingGiftRecord>();
  private readonly settings = new Map<string, string>();

  // Seeding helpers; the admin dashboard owns these records in production.
  saveAccount(account: AccountRecord): void {
    this.accounts.set(account.owner_id, { ...account });
  }

  savePlan(plan: PlanRecord): void {
    this.plans.set(plan.plan_id, { ...plan });
  }

  savePromoCode(promo: PromoCodeRecord): void {
    this.promos.set(promo.code.toUpperCase(), { ...promo, code: promo.code.toUpperCase() });
  }

  getPromoCode(code: string): PromoCodeRecord | null {
    const promo = this.promos.get(code.toUpperCase());
    return promo ? { ...promo } : null;
  }

  putSetting(key: string, value: string): void {
    this.settings.set(key, value);
  }

  async getAccount(ownerId: number): Promise<AccountRecord | null> {
    const account = this.accounts.get(ownerId);
    return account ? { ...account } : null;
  }

  async adjustBalance(ownerId: number, delta: number): Promise<number> {
    const account = this.accountFor(ownerId);
    account.balance += delta;
    return account.balance;
  }

  async debitBalanceIfSufficient(ownerId: number, amount: number): Promise<boolean> {
    const account = this.accountFor(ownerId);
    if (account.balance < amount) {
      return false;
    }
    account.balance -= amount;
    return true;
  }

  async creditReferralBalance(ownerId: number, amount: number): Promise<void> {
    const account = this.accountFor(ownerId);
    account.balance += amount;
    account.referral_balance += amount;
  }

  async recordPurchase(ownerId: number, amount: number): Promise<void> {
    const account = this.accountFor(ownerId);
    account.total_spent += amount;
    account.keys_purchased += 1;
  }

  async markTrialUsed(ownerId: number): Promise<void> {
    this.accountFor(ownerId).trial_used = true;
  }

  async logTransaction(entry: TransactionLogEntry): Promise<void> {
    this.transactions.push({ ...entry });
  }

  async listTransactions(ownerId: number): Promise<TransactionLogEntry[]> {
    return this.transactions.filter((entry) => entry.owner_id === ownerId).map((entry) => ({ ...entry }));
  }

  async getPlan(planId: string): Promise<PlanRecord | null> {
    const plan = this.plans.get(planId);
    return plan ? { ...plan } : null;
  }

  async redeemPromo(input: PromoRedemptionInput): Promise<PromoRedemptionResult> {
    const code = input.code.toUpperCase();
    const promo = this.promos.get(code);
    if (!promo) {
      return { outcome: "not_found", deactivated: false };
    }
    if (this.promoUsages.has(input.orderId)) {
      return { outcome: "already_redeemed", deactivated: false };
    }
    if (promo.valid_until !== null && Date.parse(promo.valid_until) < Date.parse(input.now)) {
      const deactivated = promo.active;
      promo.active = false;
      return { outcome: "expired", deactivated };
    }
    if (!promo.active || (promo.usage_limit_total !== null && promo.used_total >= promo.usage_limit_total)) {
      const deactivated = promo.active;
      promo.active = false;
      return { outcome: "exhausted", deactivated };
    }

    promo.used_total += 1;
    this.promoUsages.set(input.orderId, { code, owner_id: input.ownerId, used_at: input.now });
    const reachedLimit = promo.usage_limit_total !== null && promo.used_total >= promo.usage_limit_total;
    if (reachedLimit) {
      promo.active = false;
    }
    return { outcome: "redeemed", deactivated: reachedLimit };
  }

  async insertCommissionIfAbsent(record: PartnerCommissionRecord): Promise<boolean> {
    const key = `${record.instance_id}:${record.payment_id}`;
    if (this.commissions.has(key)) {
      return false;
    }
    this.commissions.set(key, { ...record });
    return true;
  }

  async listCommissions(instanceId: string): Promise<PartnerCommissionRecord[]> {
    return [...this.commissions.values()]
      .filter((record) => record.instance_id === instanceId)
      .map((record) => ({ ...record }));
  }

  async savePendingGift(gift: PendingGiftRecord): Promise<void> {
    this.gifts.set(gift.payment_id, { ...gift });
  }

  async getPendingGift(paymentId: string): Promise<PendingGiftRecord | null> {
    const gift = this.gifts.get(paymentId);
    return gift ? { ...gift } : null;
  }

  async deletePendingGift(paymentId: string): Promise<boolean> {
    return this.gifts.delete(paymentId);
  }

  async listPendingGifts(ownerId: number): Promise<PendingGiftRecord[]> {
    return [...this.gifts.values()]
      .filter((gift) => gift.owner_id === ownerId)
      .sort((a, b) => a.created_at.localeCompare(b.created_at))
      .map((gift) => ({ ...gift }));
  }

  async loadSettings(): Promise<Record<string, string>> {
    return Object.fromEntries(this.settings);
  }

  private accountFor(ownerId: number): AccountRecord {
    const existing = this.accounts.get(ownerId);
    if (existing) {
      return existing;
    }
    const created = emptyAccount(ownerId);
    this.accounts.set(ownerId, created);
    return created;
  }
}
