import { signPayload, signaturesMatch } from "../../application/signing.js";
import { AppError } from "../../infra/app-error.js";
import type { ClockPort } from "../../infra/clock.js";
import { clockNowMs } from "../../infra/clock.js";
import type { PaymentVerifierPort, RawProviderRequest, VerifiedPayment } from "../../ports/payment-verifier.js";

interface HmacPaymentVerifierOptions {
  provider: string;
  secret: string;
  toleranceSeconds: number;
  clock: ClockPort;
}

const SUCCEEDED_STATUSES = new Set(["succeeded", "paid", "success", "confirmed"]);

function headerValue(headers: RawProviderRequest["headers"], name: string): string | undefined {
  const value = headers[name];
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function invalidPayload(message: string): AppError {
  return new AppError(400, "invalid_payload", message);
}

/**
 * Signed-body verifier: `X-Signature` carries hex HMAC-SHA256 of
 * `<X-Timestamp>.<raw body>` under the provider's shared secret.
 */
export class HmacPaymentVerifier implements PaymentVerifierPort {
  readonly provider: string;

  constructor(private readonly options: HmacPaymentVerifierOptions) {
    this.provider = options.provider;
  }

  verify(request: RawProviderRequest): VerifiedPayment {
    const timestamp = headerValue(request.headers, "x-timestamp");
    const signature = headerValue(request.headers, "x-signature");
    if (!timestamp || !signature) {
      throw new AppError(401, "invalid_signature", "X-Timestamp and X-Signature headers are required.");
    }
    const timestampMs = Date.parse(timestamp);
    if (!Number.isFinite(timestampMs)) {
      throw new AppError(401, "invalid_signature", "X-Timestamp is not a valid date-time.");
    }
    if (Math.abs(clockNowMs(this.options.clock) - timestampMs) > this.options.toleranceSeconds * 1000) {
      throw new AppError(401, "invalid_signature", "X-Timestamp is outside the accepted window.");
    }
    const expected = signPayload(this.options.secret, timestamp, request.body);
    if (!signaturesMatch(expected, signature)) {
      throw new AppError(401, "invalid_signature", "Signature does not match.");
    }

    let payload: unknown;
    try {
      payload = JSON.parse(request.body);
    } catch {
      throw invalidPayload("Body must be valid JSON.");
    }
    if (!isObject(payload)) {
      throw invalidPayload("Body must be a JSON object.");
    }
    const { payment_id, provider_payment_id, amount, currency, status } = payload;
    if (typeof payment_id !== "string" || payment_id.trim().length === 0) {
      throw invalidPayload("payment_id is required.");
    }
    if (typeof provider_payment_id !== "string" || provider_payment_id.trim().length === 0) {
      throw invalidPayload("provider_payment_id is required.");
    }
    if (typeof amount !== "number" || !Number.isInteger(amount) || amount < 0) {
      throw invalidPayload("amount must be a non-negative integer in minor units.");
    }
    if (typeof currency !== "string" || !/^[A-Za-z]{3}$/.test(currency)) {
      throw invalidPayload("currency must be a 3-letter code.");
    }
    if (typeof status !== "string") {
      throw invalidPayload("status is required.");
    }

    return {
      internalPaymentId: payment_id.trim(),
      providerPaymentId: provider_payment_id.trim(),
      amount,
      currency: currency.toUpperCase(),
      succeeded: SUCCEEDED_STATUSES.has(status.toLowerCase()),
    };
  }
}
