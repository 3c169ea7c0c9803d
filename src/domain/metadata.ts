import { AppError } from "../infra/app-error.js";

export type FulfillmentAction = "new" | "extend" | "gift" | "top_up" | "trial";

export const FULFILLMENT_ACTIONS: readonly FulfillmentAction[] = ["new", "extend", "gift", "top_up", "trial"];

// Payment methods for which a managed sub-instance earns a commission.
const CARD_LIKE_METHODS: ReadonlySet<string> = new Set(["yookassa", "platega", "heleket", "yoomoney"]);

export const BALANCE_PAYMENT_METHOD = "balance";

interface MetadataBase {
  owner_id: number;
  payment_id: string;
  amount: number;
  currency: string;
  payment_method: string;
  promo_code?: string;
  promo_discount?: number;
  instance_id?: string;
  prompt_message_id?: string;
}

export interface NewKeyMetadata extends MetadataBase {
  action: "new";
  plan_id: string;
  host_name: string;
}

export interface ExtendKeyMetadata extends MetadataBase {
  action: "extend";
  plan_id: string;
  credential_id: string;
}

export interface GiftKeyMetadata extends MetadataBase {
  action: "gift";
  plan_id: string;
  host_name: string;
}

export interface TopUpMetadata extends MetadataBase {
  action: "top_up";
}

export interface TrialMetadata extends MetadataBase {
  action: "trial";
  host_name: string;
}

export type FulfillmentMetadata =
  | NewKeyMetadata
  | ExtendKeyMetadata
  | GiftKeyMetadata
  | TopUpMetadata
  | TrialMetadata;

export type ProvisioningMetadata = NewKeyMetadata | ExtendKeyMetadata | TrialMetadata;

function invalidMetadata(message: string): AppError {
  return new AppError(422, "invalid_metadata", message);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function requireId(payload: Record<string, unknown>, field: string): string {
  const value = payload[field];
  if (typeof value !== "string" || value.trim().length === 0 || value.length > 255) {
    throw invalidMetadata(`${field} must be a non-empty string up to 255 characters.`);
  }
  return value.trim();
}

function optionalId(payload: Record<string, unknown>, field: string): string | undefined {
  if (payload[field] === undefined || payload[field] === null) {
    return undefined;
  }
  return requireId(payload, field);
}

function requireInteger(payload: Record<string, unknown>, field: string, min: number): number {
  const value = payload[field];
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw invalidMetadata(`${field} must be an integer >= ${min}.`);
  }
  return value;
}

function isFulfillmentAction(value: unknown): value is FulfillmentAction {
  return FULFILLMENT_ACTIONS.some((action) => action === value);
}

/**
 * Validates an untrusted metadata blob into the tagged union. Every stored or
 * received metadata document passes through here before the orchestrator sees it.
 */
export function parseFulfillmentMetadata(value: unknown): FulfillmentMetadata {
  if (!isObject(value)) {
    throw invalidMetadata("metadata must be an object.");
  }

  const action = value.action;
  if (!isFulfillmentAction(action)) {
    throw invalidMetadata(`action must be one of: ${FULFILLMENT_ACTIONS.join(", ")}.`);
  }

  const currency = value.currency;
  if (typeof currency !== "string" || !/^[A-Za-z]{3}$/.test(currency)) {
    throw invalidMetadata("currency must be a 3-letter code.");
  }

  const promoCode = optionalId(value, "promo_code");
  const promoDiscount = value.promo_discount === undefined ? undefined : requireInteger(value, "promo_discount", 0);
  const instanceId = optionalId(value, "instance_id");
  const promptMessageId = optionalId(value, "prompt_message_id");

  const base: MetadataBase = {
    owner_id: requireInteger(value, "owner_id", 1),
    payment_id: requireId(value, "payment_id"),
    amount: requireInteger(value, "amount", 0),
    currency: currency.toUpperCase(),
    payment_method: requireId(value, "payment_method").toLowerCase(),
    ...(promoCode ? { promo_code: promoCode } : {}),
    ...(promoDiscount !== undefined ? { promo_discount: promoDiscount } : {}),
    ...(instanceId ? { instance_id: instanceId } : {}),
    ...(promptMessageId ? { prompt_message_id: promptMessageId } : {}),
  };

  if (action === "trial") {
    if (base.amount !== 0) {
      throw invalidMetadata("trial metadata must carry amount 0.");
    }
    return { ...base, action, host_name: requireId(value, "host_name") };
  }

  if (base.amount <= 0) {
    throw invalidMetadata(`${action} metadata must carry a positive amount.`);
  }

  switch (action) {
    case "new":
      return { ...base, action, plan_id: requireId(value, "plan_id"), host_name: requireId(value, "host_name") };
    case "extend":
      return {
        ...base,
        action,
        plan_id: requireId(value, "plan_id"),
        credential_id: requireId(value, "credential_id"),
      };
    case "gift":
      return { ...base, action, plan_id: requireId(value, "plan_id"), host_name: requireId(value, "host_name") };
    case "top_up":
      if (base.payment_method === BALANCE_PAYMENT_METHOD) {
        throw invalidMetadata("top_up cannot be paid from the stored balance.");
      }
      return { ...base, action };
  }
}

export function isCardLikeMethod(paymentMethod: string): boolean {
  return CARD_LIKE_METHODS.has(paymentMethod.toLowerCase());
}
