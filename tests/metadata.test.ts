import { describe, expect, it } from "vitest";
import { isCardLikeMethod, parseFulfillmentMetadata } from "../src/domain/metadata.js";
import { AppError } from "../src/infra/app-error.js";

function expectInvalid(payload: unknown): void {
  try {
    parseFulfillmentMetadata(payload);
  } catch (error) {
    expect(error).toBeInstanceOf(AppError);
    if (error instanceof AppError) {
      expect(error.statusCode).toBe(422);
      expect(error.code).toBe("invalid_metadata");
    }
    return;
  }
  throw new Error("expected metadata to be rejected");
}

describe("parseFulfillmentMetadata", () => {
  it("parses a new-key order and normalizes currency and method", () => {
    const metadata = parseFulfillmentMetadata({
      action: "new",
      owner_id: 42,
      payment_id: " p1 ",
      amount: 30000,
      currency: "rub",
      payment_method: "YooKassa",
      plan_id: "plan_1m",
      host_name: "main",
      promo_code: "SPRING",
    });

    expect(metadata).toEqual({
      action: "new",
      owner_id: 42,
      payment_id: "p1",
      amount: 30000,
      currency: "RUB",
      payment_method: "yookassa",
      plan_id: "plan_1m",
      host_name: "main",
      promo_code: "SPRING",
    });
  });

  it("requires the credential id for extensions", () => {
    expectInvalid({
      action: "extend",
      owner_id: 42,
      payment_id: "p2",
      amount: 100,
      currency: "RUB",
      payment_method: "yookassa",
      plan_id: "plan_1m",
    });
  });

  it("accepts a zero-amount trial and rejects a paid one", () => {
    const trial = parseFulfillmentMetadata({
      action: "trial",
      owner_id: 7,
      payment_id: "trial_7",
      amount: 0,
      currency: "RUB",
      payment_method: "none",
      host_name: "main",
    });
    expect(trial.action).toBe("trial");

    expectInvalid({
      action: "trial",
      owner_id: 7,
      payment_id: "trial_7",
      amount: 100,
      currency: "RUB",
      payment_method: "none",
      host_name: "main",
    });
  });

  it("rejects zero amounts for paid actions", () => {
    expectInvalid({ action: "top_up", owner_id: 1, payment_id: "t1", amount: 0, currency: "RUB", payment_method: "yookassa" });
  });

  it("refuses a top-up paid from the stored balance", () => {
    expectInvalid({ action: "top_up", owner_id: 1, payment_id: "t1", amount: 500, currency: "RUB", payment_method: "balance" });
  });

  it("rejects unknown actions, bad currencies and non-objects", () => {
    expectInvalid({ action: "refund", owner_id: 1, payment_id: "x", amount: 1, currency: "RUB", payment_method: "m" });
    expectInvalid({ action: "top_up", owner_id: 1, payment_id: "x", amount: 1, currency: "RUBLE", payment_method: "m" });
    expectInvalid("not an object");
    expectInvalid(null);
  });
});

describe("isCardLikeMethod", () => {
  it("matches card-like providers case-insensitively", () => {
    expect(isCardLikeMethod("yookassa")).toBe(true);
    expect(isCardLikeMethod("Heleket")).toBe(true);
    expect(isCardLikeMethod("balance")).toBe(false);
    expect(isCardLikeMethod("cryptobot")).toBe(false);
  });
});
