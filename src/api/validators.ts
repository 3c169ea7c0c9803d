import { parseFulfillmentMetadata, type FulfillmentMetadata } from "../domain/metadata.js";
import type { FulfillmentEventType, FulfillmentOutcome } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function requireObject(payload: unknown): Record<string, unknown> {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  return payload;
}

const fulfillmentOutcomes: readonly FulfillmentOutcome[] = [
  "fulfilled",
  "gift_pending",
  "provisioning_failed",
  "insufficient_balance",
  "duplicate",
];

const fulfillmentEventTypes: ReadonlySet<string> = new Set<FulfillmentEventType>([
  "fulfillment.started",
  ...fulfillmentOutcomes.map((outcome): FulfillmentEventType => `fulfillment.${outcome}`),
  "gift.completed",
  "reconciliation.completed",
]);

function isFulfillmentEventType(value: string): value is FulfillmentEventType {
  return fulfillmentEventTypes.has(value);
}

export interface CreateIntentBody {
  paymentId: string;
  ownerId: number;
  amount: number;
  currency: string;
  metadata: unknown;
}

export function parseCreateIntentBody(payload: unknown): CreateIntentBody {
  const body = requireObject(payload);
  const { payment_id, owner_id, amount, currency, metadata } = body;

  if (typeof payment_id !== "string" || payment_id.length > 255) {
    throw new AppError(422, "invalid_payment_id", "payment_id must be a string up to 255 characters.");
  }
  if (typeof owner_id !== "number" || !Number.isInteger(owner_id) || owner_id <= 0) {
    throw new AppError(422, "invalid_owner_id", "owner_id must be a positive integer.");
  }
  if (typeof amount !== "number" || !Number.isInteger(amount) || amount < 0) {
    throw new AppError(422, "invalid_amount", "amount must be a non-negative integer in minor units.");
  }
  const normalizedCurrency = normalizeCurrencyCode(currency);
  if (!normalizedCurrency) {
    throw new AppError(422, "invalid_currency", "currency is required.");
  }
  if (!isObject(metadata)) {
    throw new AppError(422, "invalid_metadata", "metadata must be an object.");
  }

  return { paymentId: payment_id, ownerId: owner_id, amount, currency: normalizedCurrency, metadata };
}

/** `{ metadata }` bodies for balance payments and direct fulfillment runs. */
export function parseMetadataBody(payload: unknown): FulfillmentMetadata {
  return parseFulfillmentMetadata(requireObject(payload).metadata);
}

export function parseGiftRecipientBody(payload: unknown): string {
  const { recipient_handle } = requireObject(payload);
  if (typeof recipient_handle !== "string" || recipient_handle.trim().length === 0) {
    throw new AppError(422, "invalid_recipient_handle", "recipient_handle must be a non-empty string.");
  }
  return recipient_handle;
}

export function normalizeOwnerId(value: unknown): number {
  const raw = typeof value === "string" ? value.trim() : "";
  if (!/^[1-9][0-9]{0,15}$/.test(raw)) {
    throw new AppError(422, "invalid_owner_id", "ownerId must be a positive integer.");
  }
  return Number(raw);
}

export function normalizeEventType(value: unknown): FulfillmentEventType | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, "invalid_event_type", "event_type must be a string.");
  }
  const eventType = value.trim();
  if (!isFulfillmentEventType(eventType)) {
    throw new AppError(422, "invalid_event_type", "Unsupported event type.");
  }
  return eventType;
}

export function normalizeCurrencyCode(value: unknown): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, "invalid_currency", "currency must be a string.");
  }

  const currency = value.trim().toUpperCase();
  if (!/^[A-Z]{3}$/.test(currency)) {
    throw new AppError(422, "invalid_currency", "currency must be a 3-letter ISO code.");
  }
  return currency;
}

export function normalizeLimit(value: unknown, defaultLimit: number, maxLimit: number): number {
  if (value === undefined) {
    return defaultLimit;
  }
  const raw = typeof value === "string" ? value.trim() : "";
  if (!/^[0-9]+$/.test(raw)) {
    throw new AppError(422, "invalid_limit", "limit must be a positive integer.");
  }
  const limit = Number(raw);
  if (limit < 1 || limit > maxLimit) {
    throw new AppError(422, "invalid_limit", `limit must be between 1 and ${maxLimit}.`);
  }
  return limit;
}

export function normalizeIsoDateTime(value: unknown, fieldName: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a string.`);
  }
  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > 64) {
    throw new AppError(
      422,
      `invalid_${fieldName}`,
      `${fieldName} length must be between 1 and 64 characters.`,
    );
  }
  const timestamp = Date.parse(normalized);
  if (!Number.isFinite(timestamp)) {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a valid ISO-8601 date-time.`);
  }
  return new Date(timestamp).toISOString();
}

export function normalizeResourceId(value: unknown, fieldName: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a string.`);
  }

  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > 255) {
    throw new AppError(
      422,
      `invalid_${fieldName}`,
      `${fieldName} length must be between 1 and 255 characters.`,
    );
  }
  return normalized;
}
