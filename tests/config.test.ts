import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AppError } from "../src/infra/app-error.js";
import { loadRuntimeConfig } from "../src/infra/config.js";

const originalEnv = { ...process.env };

function clearFulfillmentEnv(): void {
  for (const key of Object.keys(process.env)) {
    if (key.startsWith("FL_")) {
      delete process.env[key];
    }
  }
  delete process.env.HOST;
  delete process.env.PORT;
  delete process.env.NODE_ENV;
}

beforeEach(() => {
  clearFulfillmentEnv();
});

afterEach(() => {
  process.env = { ...originalEnv };
});

describe("Runtime config", () => {
  it("loads defaults", () => {
    const config = loadRuntimeConfig();

    expect(config.host).toBe("0.0.0.0");
    expect(config.port).toBe(8080);
    expect(config.apiKeys).toEqual(["dev_fl_api_key"]);
    expect(config.cursorSecret).toBe("dev_cursor_secret_change_me");
    expect(config.listDefaultLimit).toBe(50);
    expect(config.listMaxLimit).toBe(500);
    expect(config.eventSource).toBe("fulfillment-ledger");
    expect(config.logLevel).toBe("info");
    expect(config.ledgerRetryAttempts).toBe(5);
    expect(config.ledgerRetryBaseDelayMs).toBe(50);
    expect(config.providerSecrets).toEqual({});
    expect(config.provisioningBackend).toBe("mock");
    expect(config.provisioningMockHosts).toEqual(["main"]);
    expect(config.provisioningTimeoutMs).toBe(15000);
    expect(config.notificationMaxAttempts).toBe(3);
    expect(config.reconcileGraceHours).toBe(24);
    expect(config.reconcileConcurrency).toBe(8);
    expect(config.reconcileIntervalSeconds).toBe(3600);
    expect(config.storageBackend).toBe("memory");
    expect(config.rateLimitBackend).toBe("memory");
    expect(config.redisRateLimitPrefix).toBe("fl:ratelimit");
    expect(config.postgresUrl).toBeUndefined();
  });

  it("rejects an out-of-range port", () => {
    process.env.PORT = "70000";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });

  it("refuses default secrets in production", () => {
    process.env.NODE_ENV = "production";
    expect(() => loadRuntimeConfig()).toThrowError(/FL_API_KEY/);

    process.env.FL_API_KEY = "prod_api_key_12345";
    expect(() => loadRuntimeConfig()).toThrowError(/FL_CURSOR_SECRET/);

    process.env.FL_CURSOR_SECRET = "prod_cursor_secret_123456";
    expect(() => loadRuntimeConfig()).toThrowError(/FL_NOTIFICATION_SECRET/);

    process.env.FL_NOTIFICATION_SECRET = "prod_notification_secret";
    expect(loadRuntimeConfig().apiKey).toBe("prod_api_key_12345");
  });

  it("parses provider secrets keyed by lower-cased provider", () => {
    process.env.FL_PROVIDER_SECRETS = "YooKassa:secret_one_123, heleket:secret_two_456";
    expect(loadRuntimeConfig().providerSecrets).toEqual({
      yookassa: "secret_one_123",
      heleket: "secret_two_456",
    });
  });

  it("rejects malformed provider secrets", () => {
    process.env.FL_PROVIDER_SECRETS = "yookassa:short";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });

  it("supports API key rotation list", () => {
    process.env.FL_API_KEYS = "new_key_12345678,old_key_12345678";
    const config = loadRuntimeConfig();
    expect(config.apiKey).toBe("new_key_12345678");
    expect(config.apiKeys).toEqual(["new_key_12345678", "old_key_12345678"]);
  });

  it("rejects a default list limit above the max", () => {
    process.env.FL_LIST_DEFAULT_LIMIT = "600";
    process.env.FL_LIST_MAX_LIMIT = "500";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });

  it("requires connection settings for the selected backends", () => {
    process.env.FL_STORAGE_BACKEND = "postgres";
    expect(() => loadRuntimeConfig()).toThrowError(/FL_POSTGRES_URL/);

    process.env.FL_STORAGE_BACKEND = "memory";
    process.env.FL_RATE_LIMIT_BACKEND = "redis";
    expect(() => loadRuntimeConfig()).toThrowError(/FL_REDIS_URL/);

    process.env.FL_RATE_LIMIT_BACKEND = "memory";
    process.env.FL_PROVISIONING_BACKEND = "http";
    expect(() => loadRuntimeConfig()).toThrowError(/FL_PROVISIONING_BASE_URL/);
  });

  it("accepts a full distributed setup", () => {
    process.env.FL_STORAGE_BACKEND = "postgres";
    process.env.FL_POSTGRES_URL = "postgres://localhost:5432/fulfillment";
    process.env.FL_RATE_LIMIT_BACKEND = "redis";
    process.env.FL_REDIS_URL = "redis://localhost:6379";
    process.env.FL_PROVISIONING_BACKEND = "http";
    process.env.FL_PROVISIONING_BASE_URL = "https://panel.example.test";
    process.env.FL_PROVISIONING_API_TOKEN = "test-secret-token";

    const config = loadRuntimeConfig();
    expect(config.storageBackend).toBe("postgres");
    expect(config.postgresUrl).toBe("postgres://localhost:5432/fulfillment");
    expect(config.redisUrl).toBe("redis://localhost:6379");
    expect(config.provisioningBaseUrl).toBe("https://panel.example.test");
  });

  it("rejects an unknown log level", () => {
    process.env.FL_LOG_LEVEL = "verbose";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });
});
