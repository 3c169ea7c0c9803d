import type { FastifyInstance } from "fastify";
import { afterEach, describe, expect, it } from "vitest";
import { signPayload } from "../src/application/signing.js";
import { InMemoryCredentialRepository } from "../src/adapters/inmemory/credential-repository.js";
import { RecordingNotificationSink } from "../src/adapters/inmemory/notification-sink.js";
import { InMemoryStorefrontRepository } from "../src/adapters/inmemory/storefront-repository.js";
import { MockProvisioningClient } from "../src/adapters/provisioning/mock-provisioning-client.js";
import { silentLogger } from "../src/infra/logger.js";
import { buildApp } from "../src/server.js";
import { ManualClock, TEST_API_KEY, account, plan, testConfig } from "./helpers.js";

const PROVIDER_SECRET = "test-provider-secret";
const AUTH = { authorization: `Bearer ${TEST_API_KEY}` };

let app: FastifyInstance | null = null;

afterEach(async () => {
  await app?.close();
  app = null;
});

function setup() {
  const clock = new ManualClock();
  const credentials = new InMemoryCredentialRepository();
  const storefront = new InMemoryStorefrontRepository();
  const notifications = new RecordingNotificationSink();
  storefront.savePlan(plan());
  const instance = buildApp(testConfig({ providerSecrets: { yookassa: PROVIDER_SECRET } }), {
    clock,
    credentials,
    storefront,
    notifications,
    provisioning: new MockProvisioningClient({ hosts: ["main"], clock }),
    logger: silentLogger(),
  });
  app = instance;
  return { app: instance, clock, credentials, storefront, notifications };
}

const intentBody = {
  payment_id: "p1",
  owner_id: 42,
  amount: 30000,
  currency: "rub",
  metadata: { action: "new", plan_id: "plan_1m", host_name: "main", payment_method: "yookassa" },
};

function webhook(clock: ManualClock, payload: Record<string, unknown>) {
  const body = JSON.stringify(payload);
  const timestamp = clock.nowIso();
  return {
    method: "POST" as const,
    url: "/v1/webhooks/yookassa",
    headers: {
      "content-type": "application/json",
      "x-timestamp": timestamp,
      "x-signature": signPayload(PROVIDER_SECRET, timestamp, body),
    },
    payload: body,
  };
}

const paidNotification = {
  payment_id: "p1",
  provider_payment_id: "yk_1",
  amount: 30000,
  currency: "RUB",
  status: "succeeded",
};

describe("fulfillment API", () => {
  it("requires an API key outside webhooks and health checks", async () => {
    const { app } = setup();

    const missing = await app.inject({ method: "POST", url: "/v1/intents", payload: intentBody });
    expect(missing.statusCode).toBe(401);
    expect(missing.json().error.code).toBe("missing_api_key");

    const wrong = await app.inject({
      method: "GET",
      url: "/v1/intents/p1",
      headers: { authorization: "Bearer nope" },
    });
    expect(wrong.json().error.code).toBe("invalid_api_key");

    const live = await app.inject({ method: "GET", url: "/health/live" });
    expect(live.json()).toEqual({ status: "ok" });
  });

  it("takes an intent through a signed webhook to an issued credential", async () => {
    const { app, clock, credentials, notifications } = setup();

    const created = await app.inject({ method: "POST", url: "/v1/intents", headers: AUTH, payload: intentBody });
    expect(created.statusCode).toBe(201);
    expect(created.json()).toEqual({ payment_id: "p1", outcome: "created" });

    const metadata = await app.inject({ method: "GET", url: "/v1/intents/p1/metadata", headers: AUTH });
    expect(metadata.json()).toMatchObject({ action: "new", owner_id: 42, amount: 30000, currency: "RUB" });

    const pending = await app.inject({ method: "GET", url: "/v1/owners/42/pending-intent", headers: AUTH });
    expect(pending.json()).toMatchObject({ payment_id: "p1", status: "pending" });

    const delivered = await app.inject(webhook(clock, paidNotification));
    expect(delivered.statusCode).toBe(200);
    expect(delivered.json()).toMatchObject({ status: "completed", report: { outcome: "fulfilled" } });

    const redelivered = await app.inject(webhook(clock, paidNotification));
    expect(redelivered.json()).toEqual({ status: "not_pending" });

    const owned = await credentials.listByOwner(42);
    expect(owned).toHaveLength(1);
    expect(owned[0]?.expires_at).toBe("2026-03-31T10:00:00.000Z");
    expect(notifications.payerNotifications.map((item) => item.notification.kind)).toEqual(["key_issued"]);

    const status = await app.inject({ method: "GET", url: "/v1/intents/p1", headers: AUTH });
    expect(status.json()).toMatchObject({ payment_id: "p1", status: "paid" });

    const revived = await app.inject({ method: "POST", url: "/v1/intents", headers: AUTH, payload: intentBody });
    expect(revived.statusCode).toBe(409);
    expect(revived.json().error.code).toBe("intent_already_paid");

    const metrics = await app.inject({ method: "GET", url: "/metrics" });
    expect(metrics.body).toContain('fl_ledger_completions_total{source="webhook",outcome="completed"} 1');
    expect(metrics.body).toContain('fl_ledger_completions_total{source="webhook",outcome="not_pending"} 1');
    expect(metrics.body).toContain('fl_fulfillment_runs_total{action="new",outcome="fulfilled"} 1');
  });

  it("rejects webhooks with a bad signature or an unknown provider", async () => {
    const { app, clock } = setup();
    const request = webhook(clock, paidNotification);

    const forged = await app.inject({ ...request, headers: { ...request.headers, "x-signature": "00" } });
    expect(forged.statusCode).toBe(401);
    expect(forged.json().error.code).toBe("invalid_signature");

    const unknown = await app.inject({ ...request, url: "/v1/webhooks/unknown" });
    expect(unknown.statusCode).toBe(404);
    expect(unknown.json().error.code).toBe("unknown_provider");
  });

  it("completes a payment manually and reports repeats as not pending", async () => {
    const { app } = setup();
    await app.inject({ method: "POST", url: "/v1/intents", headers: AUTH, payload: intentBody });

    const first = await app.inject({ method: "POST", url: "/v1/intents/p1/complete", headers: AUTH });
    const second = await app.inject({ method: "POST", url: "/v1/intents/p1/complete", headers: AUTH });

    expect(first.json().status).toBe("completed");
    expect(second.json()).toEqual({ status: "not_pending" });
  });

  it("validates intent bodies", async () => {
    const { app } = setup();

    const badOwner = await app.inject({
      method: "POST",
      url: "/v1/intents",
      headers: AUTH,
      payload: { ...intentBody, owner_id: 0 },
    });
    expect(badOwner.statusCode).toBe(422);
    expect(badOwner.json().error.code).toBe("invalid_owner_id");

    const blank = await app.inject({
      method: "POST",
      url: "/v1/intents",
      headers: AUTH,
      payload: { ...intentBody, payment_id: "  " },
    });
    expect(blank.statusCode).toBe(422);
    expect(blank.json().error.code).toBe("invalid_payment_id");

    const malformed = await app.inject({
      method: "POST",
      url: "/v1/intents",
      headers: { ...AUTH, "content-type": "application/json" },
      payload: "{",
    });
    expect(malformed.statusCode).toBe(400);
    expect(malformed.json().error.code).toBe("invalid_request_body");
  });

  it("pays from the stored balance", async () => {
    const { app, storefront } = setup();
    const metadata = { ...intentBody.metadata, owner_id: 42, payment_id: "bal_1", amount: 30000, currency: "RUB", payment_method: "balance" };

    const refused = await app.inject({ method: "POST", url: "/v1/balance-payments", headers: AUTH, payload: { metadata } });
    expect(refused.statusCode).toBe(422);
    expect(refused.json().error.code).toBe("insufficient_balance");

    storefront.saveAccount(account(42, { balance: 30000 }));
    const paid = await app.inject({ method: "POST", url: "/v1/balance-payments", headers: AUTH, payload: { metadata } });
    expect(paid.json()).toMatchObject({ payment_id: "bal_1", outcome: "fulfilled" });
    expect((await storefront.getAccount(42))?.balance).toBe(0);
  });

  it("runs the gift flow over HTTP", async () => {
    const { app } = setup();
    const metadata = {
      action: "gift",
      owner_id: 42,
      payment_id: "g1",
      amount: 30000,
      currency: "RUB",
      payment_method: "yookassa",
      plan_id: "plan_1m",
      host_name: "main",
      instance_id: "inst_1",
    };

    const purchased = await app.inject({ method: "POST", url: "/v1/fulfillments", headers: AUTH, payload: { metadata } });
    expect(purchased.json().outcome).toBe("gift_pending");

    const gifts = await app.inject({ method: "GET", url: "/v1/owners/42/pending-gifts", headers: AUTH });
    expect(gifts.json().data).toHaveLength(1);

    const delivered = await app.inject({
      method: "POST",
      url: "/v1/gifts/g1/recipient",
      headers: AUTH,
      payload: { recipient_handle: "@friend" },
    });
    expect(delivered.json()).toMatchObject({ payment_id: "g1", status: "delivered" });

    const commissions = await app.inject({ method: "GET", url: "/v1/instances/inst_1/commissions", headers: AUTH });
    expect(commissions.json().data).toEqual([
      expect.objectContaining({ payment_id: "g1", commission: 10500, percent: 35 }),
    ]);
  });

  it("reconciles an owner's credentials on demand", async () => {
    const { app } = setup();
    await app.inject({ method: "POST", url: "/v1/intents", headers: AUTH, payload: intentBody });
    await app.inject({ method: "POST", url: "/v1/intents/p1/complete", headers: AUTH });

    const response = await app.inject({ method: "POST", url: "/v1/reconciliation/owners/42", headers: AUTH });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      checked: 1,
      present: 1,
      synced: 0,
      marked_missing: 0,
      still_missing: 0,
      cleared: 0,
      deleted: 0,
      delete_skipped: 0,
      unknown: 0,
      failed: 0,
    });

    const invalid = await app.inject({ method: "POST", url: "/v1/reconciliation/owners/abc", headers: AUTH });
    expect(invalid.statusCode).toBe(422);
  });

  it("revokes a credential on the panel and in the store", async () => {
    const { app, credentials } = setup();
    await app.inject({ method: "POST", url: "/v1/intents", headers: AUTH, payload: intentBody });
    await app.inject({ method: "POST", url: "/v1/intents/p1/complete", headers: AUTH });
    const [issued] = await credentials.listByOwner(42);
    const credentialId = issued?.credential_id ?? "";

    const revoked = await app.inject({ method: "DELETE", url: `/v1/credentials/${credentialId}`, headers: AUTH });

    expect(revoked.statusCode).toBe(200);
    expect(revoked.json()).toEqual({
      credential_id: credentialId,
      owner_id: 42,
      remote_deleted: true,
      local_deleted: true,
    });
    expect(await credentials.listByOwner(42)).toEqual([]);

    const again = await app.inject({ method: "DELETE", url: `/v1/credentials/${credentialId}`, headers: AUTH });
    expect(again.statusCode).toBe(404);
    expect(again.json().error.code).toBe("credential_not_found");
  });

  it("pages fulfillment events newest first with a signed cursor", async () => {
    const { app } = setup();
    await app.inject({ method: "POST", url: "/v1/intents", headers: AUTH, payload: intentBody });
    await app.inject({ method: "POST", url: "/v1/intents/p1/complete", headers: AUTH });

    const first = await app.inject({
      method: "GET",
      url: "/v1/fulfillment-events?limit=1&payment_id=p1",
      headers: AUTH,
    });
    const firstPage = first.json();
    expect(firstPage.data.map((event: { type: string }) => event.type)).toEqual(["fulfillment.fulfilled"]);
    expect(firstPage.pagination.has_more).toBe(true);

    const second = await app.inject({
      method: "GET",
      url: `/v1/fulfillment-events?limit=1&payment_id=p1&cursor=${encodeURIComponent(firstPage.pagination.next_cursor)}`,
      headers: AUTH,
    });
    const secondPage = second.json();
    expect(secondPage.data.map((event: { type: string }) => event.type)).toEqual(["fulfillment.started"]);
    expect(secondPage.pagination).toEqual({ limit: 1, has_more: false, next_cursor: null });

    const tampered = await app.inject({
      method: "GET",
      url: `/v1/fulfillment-events?cursor=${encodeURIComponent(`${firstPage.pagination.next_cursor}x`)}`,
      headers: AUTH,
    });
    expect(tampered.statusCode).toBe(422);

    const badType = await app.inject({ method: "GET", url: "/v1/fulfillment-events?event_type=nope", headers: AUTH });
    expect(badType.json().error.code).toBe("invalid_event_type");
  });
});
