import type { FulfillmentSettings } from "./types.js";

export type ReferralRewardDecision =
  | { kind: "reward"; amount: number }
  | { kind: "skip"; reason: string };

export function decideReferralReward(settings: FulfillmentSettings, paidAmount: number): ReferralRewardDecision {
  switch (settings.referralScheme) {
    case "fixed_at_start":
      return { kind: "skip", reason: "reward_paid_at_referral_start" };
    case "fixed_per_purchase":
      return settings.referralFixedAmount > 0
        ? { kind: "reward", amount: settings.referralFixedAmount }
        : { kind: "skip", reason: "zero_reward" };
    case "percent_of_price": {
      const amount = Math.floor((paidAmount * settings.referralPercent) / 100);
      return amount > 0 ? { kind: "reward", amount } : { kind: "skip", reason: "zero_reward" };
    }
  }
}

// Minor units, rounded half up.
export function computeCommission(amount: number, percent: number): number {
  return Math.round((amount * percent) / 100);
}
