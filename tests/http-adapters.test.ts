import { describe, expect, it } from "vitest";
import { signPayload } from "../src/application/signing.js";
import { HttpNotificationRelay, RelayDeliveryError } from "../src/adapters/notifications/http-notification-relay.js";
import { HttpProvisioningClient } from "../src/adapters/provisioning/http-provisioning-client.js";
import { classifyProvisioningError, ProvisioningError } from "../src/domain/provisioning-errors.js";
import { ManualClock } from "./helpers.js";

interface RecordedCall {
  url: string;
  method: string | undefined;
  headers: Headers;
  body: string | null;
}

function fakeFetch(responses: Array<Response | Error>) {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method,
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : null,
    });
    const next = responses.shift() ?? new Response(null, { status: 200 });
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };
  return { calls, fetchImpl };
}

function json(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), { status, headers: { "content-type": "application/json" } });
}

describe("HttpNotificationRelay", () => {
  function relay(responses: Array<Response | Error>, maxAttempts = 3) {
    const fake = fakeFetch(responses);
    const delays: number[] = [];
    const sink = new HttpNotificationRelay({
      url: "https://bot.example.test/relay",
      secret: "test-relay-secret",
      timeoutMs: 1000,
      maxAttempts,
      retryBaseDelayMs: 50,
      clock: new ManualClock(),
      fetchImpl: fake.fetchImpl,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });
    return { ...fake, delays, sink };
  }

  it("posts a signed message", async () => {
    const { calls, sink } = relay([]);

    await sink.notifyPayer(42, { kind: "key_issued", payment_id: "p1", data: { days: 30 } });

    expect(calls).toHaveLength(1);
    const [call] = calls;
    const body = '{"type":"notify_payer","owner_id":42,"notification":{"kind":"key_issued","payment_id":"p1","data":{"days":30}}}';
    expect(call?.url).toBe("https://bot.example.test/relay");
    expect(call?.method).toBe("POST");
    expect(call?.body).toBe(body);
    expect(call?.headers.get("x-fl-timestamp")).toBe("2026-03-01T10:00:00.000Z");
    expect(call?.headers.get("x-fl-signature")).toBe(
      signPayload("test-relay-secret", "2026-03-01T10:00:00.000Z", body),
    );
  });

  it("retries transient failures with backoff", async () => {
    const { calls, delays, sink } = relay([new Response(null, { status: 503 }), new TypeError("socket hang up")]);

    await sink.deleteMessage(42, "msg_1");

    expect(calls).toHaveLength(3);
    expect(delays).toEqual([50, 100]);
  });

  it("stops on a permanent 4xx", async () => {
    const { calls, sink } = relay([new Response(null, { status: 400 })]);

    await expect(sink.notifyOperators({ kind: "payment_fulfilled", data: {} })).rejects.toBeInstanceOf(
      RelayDeliveryError,
    );
    expect(calls).toHaveLength(1);
  });

  it("gives up after the last attempt", async () => {
    const { calls, sink } = relay(
      [new Response(null, { status: 429 }), new Response(null, { status: 429 })],
      2,
    );

    await expect(sink.notifyOperators({ kind: "payment_fulfilled", data: {} })).rejects.toMatchObject({
      statusCode: 429,
    });
    expect(calls).toHaveLength(2);
  });
});

describe("HttpProvisioningClient", () => {
  function client(responses: Array<Response | Error>) {
    const fake = fakeFetch(responses);
    return {
      ...fake,
      panel: new HttpProvisioningClient({
        baseUrl: "https://panel.example.test/",
        apiToken: "test-panel-token",
        fetchImpl: fake.fetchImpl,
      }),
    };
  }

  it("creates or extends a client", async () => {
    const { calls, panel } = client([
      json({ uuid: "remote-1", expires_at: "2026-03-31T10:00:00Z", subscription_url: "https://sub.example.test/1" }),
    ]);

    const result = await panel.createOrExtend({ host: "main", identity: "u42 a", daysToAdd: 30, deviceLimit: 3, timeoutMs: 500 });

    expect(result).toEqual({
      remoteUuid: "remote-1",
      expiresAt: "2026-03-31T10:00:00.000Z",
      connectionInfo: "https://sub.example.test/1",
    });
    expect(calls[0]?.url).toBe("https://panel.example.test/api/hosts/main/clients/u42%20a");
    expect(calls[0]?.method).toBe("PUT");
    expect(calls[0]?.body).toBe('{"days_to_add":30,"device_limit":3}');
    expect(calls[0]?.headers.get("authorization")).toBe("Bearer test-panel-token");
  });

  it("surfaces panel errors for classification", async () => {
    const { panel } = client([new Response("client already exists", { status: 409 })]);

    const error = await panel
      .createOrExtend({ host: "main", identity: "u42-a", daysToAdd: 30, timeoutMs: 500 })
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(ProvisioningError);
    expect(classifyProvisioningError(error).code).toBe("identity_taken");
  });

  it("rejects a response without an expiry", async () => {
    const { panel } = client([json({ uuid: "remote-1" })]);
    await expect(
      panel.createOrExtend({ host: "main", identity: "u42-a", daysToAdd: 30, timeoutMs: 500 }),
    ).rejects.toThrow("panel response is missing uuid or expires_at");
  });

  it("maps existence answers", async () => {
    const { panel } = client([
      json({ uuid: "remote-1", expires_at: "2026-03-31T10:00:00Z", subscription_url: "https://sub.example.test/1" }),
      json({ uuid: "remote-2", expires_at: "2026-04-30T10:00:00Z" }),
      json({ uuid: "remote-3" }),
      new Response(null, { status: 404 }),
      new Response(null, { status: 502 }),
      new TypeError("fetch failed"),
    ]);
    const input = { host: "main", identity: "u42-a", timeoutMs: 500 };

    expect(await panel.exists(input)).toEqual({
      state: "present",
      remoteUuid: "remote-1",
      expiresAt: "2026-03-31T10:00:00.000Z",
      connectionInfo: "https://sub.example.test/1",
    });
    expect(await panel.exists(input)).toEqual({
      state: "present",
      remoteUuid: "remote-2",
      expiresAt: "2026-04-30T10:00:00.000Z",
      connectionInfo: null,
    });
    expect(await panel.exists(input)).toEqual({ state: "unknown" });
    expect(await panel.exists(input)).toEqual({ state: "absent" });
    expect(await panel.exists(input)).toEqual({ state: "unknown" });
    expect(await panel.exists(input)).toEqual({ state: "unknown" });
  });

  it("deletes idempotently", async () => {
    const { calls, panel } = client([new Response(null, { status: 204 }), new Response(null, { status: 404 })]);

    expect(await panel.delete("main", "u42-a", 500)).toBe(true);
    expect(await panel.delete("main", "u42-a", 500)).toBe(false);
    expect(calls.map((call) => call.method)).toEqual(["DELETE", "DELETE"]);
  });
});
