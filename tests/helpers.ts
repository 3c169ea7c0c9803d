import { CompletionCoordinator } from "../src/application/completion-coordinator.js";
import { FulfillmentGuard } from "../src/application/fulfillment-guard.js";
import { FulfillmentOrchestrator } from "../src/application/fulfillment-orchestrator.js";
import { PendingLedgerService } from "../src/application/pending-ledger-service.js";
import { InMemoryCredentialRepository } from "../src/adapters/inmemory/credential-repository.js";
import { InMemoryEventBus } from "../src/adapters/inmemory/event-bus.js";
import { RecordingNotificationSink } from "../src/adapters/inmemory/notification-sink.js";
import { InMemoryPendingLedger } from "../src/adapters/inmemory/pending-ledger.js";
import { InMemoryProcessedPaymentStore } from "../src/adapters/inmemory/processed-payments.js";
import { InMemoryRunLock } from "../src/adapters/inmemory/run-lock.js";
import { InMemoryStorefrontRepository } from "../src/adapters/inmemory/storefront-repository.js";
import { MockProvisioningClient } from "../src/adapters/provisioning/mock-provisioning-client.js";
import type { FulfillmentMetadata } from "../src/domain/metadata.js";
import type { AccountRecord, PlanRecord } from "../src/domain/types.js";
import type { ClockPort } from "../src/infra/clock.js";
import type { RuntimeConfig } from "../src/infra/config.js";
import { silentLogger } from "../src/infra/logger.js";

export const TEST_API_KEY = "test_api_key_123";

export class ManualClock implements ClockPort {
  private currentMs: number;

  constructor(startIso = "2026-03-01T10:00:00.000Z") {
    this.currentMs = Date.parse(startIso);
  }

  nowIso(): string {
    return new Date(this.currentMs).toISOString();
  }

  advanceHours(hours: number): void {
    this.currentMs += hours * 60 * 60 * 1000;
  }

  advanceMs(ms: number): void {
    this.currentMs += ms;
  }
}

export function testConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    host: "127.0.0.1",
    port: 8080,
    apiKey: TEST_API_KEY,
    apiKeys: [TEST_API_KEY],
    cursorSecret: "test_cursor_secret_123456",
    cursorVerificationSecrets: ["test_cursor_secret_123456"],
    listDefaultLimit: 50,
    listMaxLimit: 500,
    eventSource: "fulfillment-ledger-test",
    logLevel: "silent",
    metricsEnabled: true,
    rateLimitEnabled: true,
    rateLimitWindowSeconds: 1,
    rateLimitMaxRequests: 1000,
    ledgerRetryAttempts: 5,
    ledgerRetryBaseDelayMs: 1,
    ledgerLockTimeoutMs: 2000,
    providerSecrets: {},
    webhookToleranceSeconds: 300,
    provisioningBackend: "mock",
    provisioningTimeoutMs: 1000,
    provisioningMockHosts: ["main"],
    notificationTimeoutMs: 1000,
    notificationMaxAttempts: 1,
    notificationSecret: "test_notification_secret",
    reconcileGraceHours: 24,
    reconcileConcurrency: 4,
    reconcileIntervalSeconds: 0,
    storageBackend: "memory",
    rateLimitBackend: "memory",
    ...overrides,
  };
}

export function plan(overrides: Partial<PlanRecord> = {}): PlanRecord {
  return {
    plan_id: "plan_1m",
    host_name: "main",
    name: "One month",
    months: 1,
    duration_days: null,
    price: 30000,
    traffic_limit_bytes: null,
    device_limit: null,
    active: true,
    ...overrides,
  };
}

export function account(ownerId: number, overrides: Partial<AccountRecord> = {}): AccountRecord {
  return {
    owner_id: ownerId,
    referrer_id: null,
    balance: 0,
    referral_balance: 0,
    trial_used: false,
    total_spent: 0,
    keys_purchased: 0,
    ...overrides,
  };
}

export function newKeyMetadata(
  paymentId: string,
  overrides: Partial<Omit<Extract<FulfillmentMetadata, { action: "new" }>, "action">> = {},
): FulfillmentMetadata {
  return {
    action: "new",
    owner_id: 42,
    payment_id: paymentId,
    amount: 30000,
    currency: "RUB",
    payment_method: "yookassa",
    plan_id: "plan_1m",
    host_name: "main",
    ...overrides,
  };
}

/** Orchestrator wired to in-memory adapters with deterministic identities. */
export function createHarness(clock = new ManualClock()) {
  const ledger = new InMemoryPendingLedger();
  const processed = new InMemoryProcessedPaymentStore();
  const credentials = new InMemoryCredentialRepository();
  const storefront = new InMemoryStorefrontRepository();
  const provisioning = new MockProvisioningClient({ hosts: ["main"], clock });
  const notifications = new RecordingNotificationSink();
  const eventBus = new InMemoryEventBus();
  const runLock = new InMemoryRunLock();
  const logger = silentLogger();
  let identitySeq = 0;
  let credentialSeq = 0;

  storefront.savePlan(plan());

  const orchestrator = new FulfillmentOrchestrator(
    new FulfillmentGuard(processed, clock),
    credentials,
    storefront,
    provisioning,
    notifications,
    eventBus,
    runLock,
    clock,
    logger,
    {
      provisioningTimeoutMs: 1000,
      eventSource: "fulfillment-ledger-test",
      identityFactory: (hint) => {
        identitySeq += 1;
        return `${hint}-${identitySeq}`;
      },
      credentialIdFactory: () => {
        credentialSeq += 1;
        return `c${credentialSeq}`;
      },
    },
  );
  const ledgerService = new PendingLedgerService(ledger, clock, logger);
  const coordinator = new CompletionCoordinator(ledger, clock, logger, { attempts: 5, baseDelayMs: 1 }, async () => {});

  return {
    clock,
    ledger,
    processed,
    credentials,
    storefront,
    provisioning,
    notifications,
    eventBus,
    runLock,
    logger,
    orchestrator,
    ledgerService,
    coordinator,
  };
}
