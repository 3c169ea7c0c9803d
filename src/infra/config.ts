import { AppError } from "./app-error.js";
import type { LogLevel } from "./logger.js";

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseStringListEnv(name: string, minItemLength: number, maxItems: number): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
  }
  if (items.length > maxItems) {
    throw invalidConfig(name, `must contain at most ${maxItems} values`);
  }
  for (const item of items) {
    if (item.length < minItemLength) {
      throw invalidConfig(name, `items must contain at least ${minItemLength} characters`);
    }
  }

  return [...new Set(items)];
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

// Format: "yookassa:secret_one,cryptobot:secret_two".
function parseProviderSecretsEnv(name: string): Record<string, string> {
  const items = parseStringListEnv(name, 3, 50);
  if (!items) {
    return {};
  }
  const secrets: Record<string, string> = {};
  for (const item of items) {
    const separator = item.indexOf(":");
    const provider = separator > 0 ? item.slice(0, separator).trim().toLowerCase() : "";
    const secret = separator > 0 ? item.slice(separator + 1).trim() : "";
    if (!/^[a-z0-9_-]+$/.test(provider) || secret.length < 8) {
      throw invalidConfig(name, "items must look like '<provider>:<secret of at least 8 characters>'");
    }
    secrets[provider] = secret;
  }
  return secrets;
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const satisfies readonly LogLevel[];

export interface RuntimeConfig {
  host: string;
  port: number;
  apiKey: string;
  apiKeys: string[];
  cursorSecret: string;
  cursorVerificationSecrets: string[];
  listDefaultLimit: number;
  listMaxLimit: number;
  eventSource: string;
  logLevel: LogLevel;
  metricsEnabled: boolean;
  rateLimitEnabled: boolean;
  rateLimitWindowSeconds: number;
  rateLimitMaxRequests: number;
  ledgerRetryAttempts: number;
  ledgerRetryBaseDelayMs: number;
  ledgerLockTimeoutMs: number;
  providerSecrets: Record<string, string>;
  webhookToleranceSeconds: number;
  provisioningBackend: "mock" | "http";
  provisioningTimeoutMs: number;
  provisioningMockHosts: string[];
  notificationTimeoutMs: number;
  notificationMaxAttempts: number;
  notificationSecret: string;
  reconcileGraceHours: number;
  reconcileConcurrency: number;
  reconcileIntervalSeconds: number;
  storageBackend?: "memory" | "postgres";
  rateLimitBackend?: "memory" | "redis";
  postgresUrl?: string;
  redisUrl?: string;
  redisRateLimitPrefix?: string;
  provisioningBaseUrl?: string;
  provisioningApiToken?: string;
  notificationRelayUrl?: string;
}

export function loadRuntimeConfig(): RuntimeConfig {
  const defaultApiKey = "dev_fl_api_key";
  const defaultCursorSecret = "dev_cursor_secret_change_me";
  const defaultNotificationSecret = "dev_notification_secret";
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const configuredApiKeys = parseStringListEnv("FL_API_KEYS", 8, 100);
  const fallbackApiKey = parseStringEnv("FL_API_KEY", defaultApiKey, 8);
  const apiKeys = configuredApiKeys ?? [fallbackApiKey];
  const apiKey = apiKeys[0] ?? fallbackApiKey;
  const configuredCursorSecrets = parseStringListEnv("FL_CURSOR_SECRETS", 16, 10);
  const fallbackCursorSecret = parseStringEnv("FL_CURSOR_SECRET", defaultCursorSecret, 16);
  const cursorSecret = configuredCursorSecrets?.[0] ?? fallbackCursorSecret;
  const cursorVerificationSecrets = configuredCursorSecrets ?? [fallbackCursorSecret];
  const listDefaultLimit = parseIntegerEnv("FL_LIST_DEFAULT_LIMIT", 50, 1, 1000);
  const listMaxLimit = parseIntegerEnv("FL_LIST_MAX_LIMIT", 500, 1, 5000);
  const eventSource = parseStringEnv("FL_EVENT_SOURCE", "fulfillment-ledger", 3);
  const logLevel = parseEnumEnv("FL_LOG_LEVEL", LOG_LEVELS, "info");
  const metricsEnabled = parseBooleanEnv("FL_METRICS_ENABLED", true);
  const rateLimitEnabled = parseBooleanEnv("FL_RATE_LIMIT_ENABLED", true);
  const rateLimitWindowSeconds = parseIntegerEnv("FL_RATE_LIMIT_WINDOW_SECONDS", 1, 1, 3600);
  const rateLimitMaxRequests = parseIntegerEnv("FL_RATE_LIMIT_MAX_REQUESTS", 1000, 1, 1_000_000);
  const ledgerRetryAttempts = parseIntegerEnv("FL_LEDGER_RETRY_ATTEMPTS", 5, 1, 20);
  const ledgerRetryBaseDelayMs = parseIntegerEnv("FL_LEDGER_RETRY_BASE_DELAY_MS", 50, 1, 5000);
  const ledgerLockTimeoutMs = parseIntegerEnv("FL_LEDGER_LOCK_TIMEOUT_MS", 2000, 10, 60000);
  const providerSecrets = parseProviderSecretsEnv("FL_PROVIDER_SECRETS");
  const webhookToleranceSeconds = parseIntegerEnv("FL_WEBHOOK_TOLERANCE_SECONDS", 300, 1, 86400);
  const provisioningBackend = parseEnumEnv("FL_PROVISIONING_BACKEND", ["mock", "http"] as const, "mock");
  const provisioningBaseUrl = parseOptionalStringEnv("FL_PROVISIONING_BASE_URL", 8);
  const provisioningApiToken = parseOptionalStringEnv("FL_PROVISIONING_API_TOKEN", 8);
  const provisioningTimeoutMs = parseIntegerEnv("FL_PROVISIONING_TIMEOUT_MS", 15000, 100, 120000);
  const provisioningMockHosts = parseStringListEnv("FL_PROVISIONING_MOCK_HOSTS", 1, 100) ?? ["main"];
  const notificationRelayUrl = parseOptionalStringEnv("FL_NOTIFICATION_RELAY_URL", 8);
  const notificationSecret = parseStringEnv("FL_NOTIFICATION_SECRET", defaultNotificationSecret, 16);
  const notificationTimeoutMs = parseIntegerEnv("FL_NOTIFICATION_TIMEOUT_MS", 5000, 100, 120000);
  const notificationMaxAttempts = parseIntegerEnv("FL_NOTIFICATION_MAX_ATTEMPTS", 3, 1, 20);
  const reconcileGraceHours = parseIntegerEnv("FL_RECONCILE_GRACE_HOURS", 24, 1, 720);
  const reconcileConcurrency = parseIntegerEnv("FL_RECONCILE_CONCURRENCY", 8, 1, 128);
  const reconcileIntervalSeconds = parseIntegerEnv("FL_RECONCILE_INTERVAL_SECONDS", 3600, 0, 604800);
  const storageBackend = parseEnumEnv("FL_STORAGE_BACKEND", ["memory", "postgres"] as const, "memory");
  const rateLimitBackend = parseEnumEnv("FL_RATE_LIMIT_BACKEND", ["memory", "redis"] as const, "memory");
  const postgresUrl = parseOptionalStringEnv("FL_POSTGRES_URL", 12);
  const redisUrl = parseOptionalStringEnv("FL_REDIS_URL", 8);
  const redisRateLimitPrefix = parseStringEnv("FL_REDIS_RATE_LIMIT_PREFIX", "fl:ratelimit", 3);

  const production = process.env.NODE_ENV === "production";
  if (production && apiKeys.includes(defaultApiKey)) {
    throw invalidConfig(
      configuredApiKeys ? "FL_API_KEYS" : "FL_API_KEY",
      "must not include default key value in production",
    );
  }
  if (production && cursorSecret === defaultCursorSecret) {
    throw invalidConfig("FL_CURSOR_SECRET", "must not use default value in production");
  }
  if (production && notificationSecret === defaultNotificationSecret) {
    throw invalidConfig("FL_NOTIFICATION_SECRET", "must not use default value in production");
  }
  if (listDefaultLimit > listMaxLimit) {
    throw invalidConfig("FL_LIST_DEFAULT_LIMIT", "must be lower or equal to FL_LIST_MAX_LIMIT");
  }
  if (storageBackend === "postgres" && !postgresUrl) {
    throw invalidConfig("FL_POSTGRES_URL", "is required when FL_STORAGE_BACKEND=postgres");
  }
  if (rateLimitBackend === "redis" && !redisUrl) {
    throw invalidConfig("FL_REDIS_URL", "is required when FL_RATE_LIMIT_BACKEND=redis");
  }
  if (provisioningBackend === "http" && (!provisioningBaseUrl || !provisioningApiToken)) {
    throw invalidConfig(
      provisioningBaseUrl ? "FL_PROVISIONING_API_TOKEN" : "FL_PROVISIONING_BASE_URL",
      "is required when FL_PROVISIONING_BACKEND=http",
    );
  }

  return {
    host,
    port,
    apiKey,
    apiKeys,
    cursorSecret,
    cursorVerificationSecrets,
    listDefaultLimit,
    listMaxLimit,
    eventSource,
    logLevel,
    metricsEnabled,
    rateLimitEnabled,
    rateLimitWindowSeconds,
    rateLimitMaxRequests,
    ledgerRetryAttempts,
    ledgerRetryBaseDelayMs,
    ledgerLockTimeoutMs,
    providerSecrets,
    webhookToleranceSeconds,
    provisioningBackend,
    provisioningTimeoutMs,
    provisioningMockHosts,
    notificationTimeoutMs,
    notificationMaxAttempts,
    notificationSecret,
    reconcileGraceHours,
    reconcileConcurrency,
    reconcileIntervalSeconds,
    storageBackend,
    rateLimitBackend,
    redisRateLimitPrefix,
    ...(postgresUrl ? { postgresUrl } : {}),
    ...(redisUrl ? { redisUrl } : {}),
    ...(provisioningBaseUrl ? { provisioningBaseUrl } : {}),
    ...(provisioningApiToken ? { provisioningApiToken } : {}),
    ...(notificationRelayUrl ? { notificationRelayUrl } : {}),
  };
}
