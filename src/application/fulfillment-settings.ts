import type { FulfillmentSettings, ReferralScheme } from "../domain/types.js";
import type { StorefrontRepositoryPort } from "../ports/storefront-repository.js";

const REFERRAL_SCHEMES: readonly ReferralScheme[] = ["percent_of_price", "fixed_per_purchase", "fixed_at_start"];

export const DEFAULT_FULFILLMENT_SETTINGS: FulfillmentSettings = Object.freeze({
  referralScheme: "percent_of_price",
  referralPercent: 10,
  referralFixedAmount: 5000,
  franchisePercent: 35,
  trialDays: 3,
});

function readNumber(raw: string | undefined, fallback: number, min: number, max: number): number {
  if (raw === undefined || raw.trim().length === 0) {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed >= min && parsed <= max ? parsed : fallback;
}

export function parseFulfillmentSettings(raw: Record<string, string>): FulfillmentSettings {
  const scheme = REFERRAL_SCHEMES.find((value) => value === raw.referral_scheme?.trim());
  return Object.freeze({
    referralScheme: scheme ?? DEFAULT_FULFILLMENT_SETTINGS.referralScheme,
    referralPercent: readNumber(raw.referral_percent, DEFAULT_FULFILLMENT_SETTINGS.referralPercent, 0, 100),
    referralFixedAmount: Math.trunc(
      readNumber(raw.referral_fixed_amount, DEFAULT_FULFILLMENT_SETTINGS.referralFixedAmount, 0, 1_000_000_000),
    ),
    franchisePercent: readNumber(raw.franchise_percent, DEFAULT_FULFILLMENT_SETTINGS.franchisePercent, 0, 100),
    trialDays: Math.trunc(readNumber(raw.trial_days, DEFAULT_FULFILLMENT_SETTINGS.trialDays, 1, 365)),
  });
}

/** One frozen snapshot per fulfillment run. */
export async function loadSettingsSnapshot(repository: StorefrontRepositoryPort): Promise<FulfillmentSettings> {
  return parseFulfillmentSettings(await repository.loadSettings());
}
