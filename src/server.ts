import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";
import { Redis } from "ioredis";
import { createHash } from "node:crypto";
import { Pool } from "pg";
import { CompletionCoordinator } from "./application/completion-coordinator.js";
import { CredentialAdminService } from "./application/credential-admin.js";
import { FulfillmentGuard } from "./application/fulfillment-guard.js";
import { FulfillmentOrchestrator } from "./application/fulfillment-orchestrator.js";
import { PaymentIntakeService, type IntakeResult } from "./application/payment-intake.js";
import { PendingLedgerService, type IntentWriteOutcome } from "./application/pending-ledger-service.js";
import { ReconciliationScheduler } from "./application/reconciliation-scheduler.js";
import { ReconciliationService } from "./application/reconciliation-service.js";
import { InMemoryCredentialRepository } from "./adapters/inmemory/credential-repository.js";
import { InMemoryEventBus } from "./adapters/inmemory/event-bus.js";
import { RecordingNotificationSink } from "./adapters/inmemory/notification-sink.js";
import { InMemoryPendingLedger } from "./adapters/inmemory/pending-ledger.js";
import { InMemoryProcessedPaymentStore } from "./adapters/inmemory/processed-payments.js";
import { InMemoryRunLock } from "./adapters/inmemory/run-lock.js";
import { InMemoryStorefrontRepository } from "./adapters/inmemory/storefront-repository.js";
import { HttpNotificationRelay } from "./adapters/notifications/http-notification-relay.js";
import { PostgresCredentialRepository } from "./adapters/postgres/credential-repository.js";
import { PostgresPendingLedger } from "./adapters/postgres/pending-ledger.js";
import { PostgresProcessedPaymentStore } from "./adapters/postgres/processed-payments.js";
import { PostgresRunLock } from "./adapters/postgres/run-lock.js";
import { PostgresStorefrontRepository } from "./adapters/postgres/storefront-repository.js";
import { HttpProvisioningClient } from "./adapters/provisioning/http-provisioning-client.js";
import { MockProvisioningClient } from "./adapters/provisioning/mock-provisioning-client.js";
import { RedisRateLimiter } from "./adapters/redis/rate-limiter.js";
import { HmacPaymentVerifier } from "./adapters/verifiers/hmac-payment-verifier.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { CursorTokenService } from "./infra/cursor-token.js";
import { createLogger, type Logger } from "./infra/logger.js";
import { FulfillmentMetricsRegistry } from "./infra/metrics.js";
import { InMemoryRateLimiter } from "./infra/rate-limiter.js";
import type { CredentialRepositoryPort } from "./ports/credential-repository.js";
import type { EventBusPort } from "./ports/event-bus.js";
import type { NotificationSinkPort } from "./ports/notification-sink.js";
import type { PaymentVerifierPort } from "./ports/payment-verifier.js";
import type { PendingLedgerPort } from "./ports/pending-ledger.js";
import type { ProcessedPaymentStorePort } from "./ports/processed-payments.js";
import type { ProvisioningClientPort } from "./ports/provisioning-client.js";
import type { RateLimiterPort } from "./ports/rate-limiter.js";
import type { RunLockPort } from "./ports/run-lock.js";
import type { StorefrontRepositoryPort } from "./ports/storefront-repository.js";
import {
  normalizeEventType,
  normalizeIsoDateTime,
  normalizeLimit,
  normalizeOwnerId,
  normalizeResourceId,
  parseCreateIntentBody,
  parseGiftRecipientBody,
  parseMetadataBody,
} from "./api/validators.js";

/** Overrides for tests and embedding; anything left out is built from the runtime config. */
export interface AppDependencies {
  clock?: ClockPort;
  logger?: Logger;
  ledger?: PendingLedgerPort;
  processedPayments?: ProcessedPaymentStorePort;
  credentials?: CredentialRepositoryPort;
  storefront?: StorefrontRepositoryPort;
  provisioning?: ProvisioningClientPort;
  notifications?: NotificationSinkPort;
  eventBus?: EventBusPort;
  runLock?: RunLockPort;
  verifiers?: PaymentVerifierPort[];
  rateLimiter?: RateLimiterPort;
}

const WEBHOOK_PATH_PATTERN = /^\/v1\/webhooks\/([^/?]+)/;

function requireBearerApiKey(headers: Record<string, unknown>, validApiKeys: ReadonlySet<string>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "missing_api_key", "Authorization header with Bearer API key is required.");
  }

  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AppError(401, "invalid_api_key", "Invalid API key.");
  }

  return token;
}

function setRateLimitHeaders(
  reply: { header(name: string, value: string): unknown },
  options: {
    limit: number;
    remaining: number;
    resetSeconds: number;
  },
): void {
  reply.header("RateLimit-Limit", String(options.limit));
  reply.header("RateLimit-Remaining", String(options.remaining));
  reply.header("RateLimit-Reset", String(options.resetSeconds));
}

function rateLimitIdentityFromApiKey(apiKey: string): string {
  return `api:${createHash("sha256").update(apiKey).digest("hex")}`;
}

function intentWriteStatus(outcome: IntentWriteOutcome): number {
  switch (outcome) {
    case "created":
      return 201;
    case "refreshed":
      return 200;
    case "rejected_paid":
      throw new AppError(409, "intent_already_paid", "The intent is already paid and cannot be refreshed.");
    case "rejected_blank_id":
      throw new AppError(422, "invalid_payment_id", "payment_id must not be blank.");
    case "failed":
      throw new AppError(503, "storage_unavailable", "The intent could not be stored. Retry later.");
  }
}

function completionOutcome(result: IntakeResult): "completed" | "not_pending" | null {
  if (result.status === "completed" || result.status === "not_pending") {
    return result.status;
  }
  return null;
}

export function buildApp(
  config: RuntimeConfig = loadRuntimeConfig(),
  deps: AppDependencies = {},
): FastifyInstance {
  const app = Fastify({ logger: false });
  const logger = deps.logger ?? createLogger(config.logLevel);
  const metrics = new FulfillmentMetricsRegistry();
  const validApiKeys = new Set<string>(config.apiKeys.length > 0 ? config.apiKeys : [config.apiKey]);
  const closeActions: Array<() => Promise<void>> = [];
  const requestStarts = new WeakMap<FastifyRequest, bigint>();
  const clock = deps.clock ?? new SystemClock();

  const postgresPool =
    config.storageBackend === "postgres" && config.postgresUrl
      ? new Pool({ connectionString: config.postgresUrl })
      : null;
  if (postgresPool) {
    closeActions.push(async () => {
      await postgresPool.end();
    });
  }

  const redisClient =
    config.redisUrl && config.rateLimitBackend === "redis" && !deps.rateLimiter
      ? new Redis(config.redisUrl, {
        lazyConnect: false,
        maxRetriesPerRequest: 1,
      })
      : null;
  if (redisClient) {
    closeActions.push(async () => {
      await redisClient.quit();
    });
  }

  let rateLimiter: RateLimiterPort;
  if (deps.rateLimiter) {
    rateLimiter = deps.rateLimiter;
  } else if (redisClient) {
    rateLimiter = new RedisRateLimiter(redisClient, {
      windowSeconds: config.rateLimitWindowSeconds,
      maxRequests: config.rateLimitMaxRequests,
      keyPrefix: config.redisRateLimitPrefix ?? "fl:ratelimit",
    });
  } else {
    rateLimiter = new InMemoryRateLimiter({
      windowSeconds: config.rateLimitWindowSeconds,
      maxRequests: config.rateLimitMaxRequests,
    });
  }

  const ledger =
    deps.ledger ??
    (postgresPool
      ? new PostgresPendingLedger(postgresPool, { lockTimeoutMs: config.ledgerLockTimeoutMs })
      : new InMemoryPendingLedger());
  const processedPayments =
    deps.processedPayments ??
    (postgresPool ? new PostgresProcessedPaymentStore(postgresPool) : new InMemoryProcessedPaymentStore());
  const credentials =
    deps.credentials ??
    (postgresPool ? new PostgresCredentialRepository(postgresPool) : new InMemoryCredentialRepository());
  const storefront =
    deps.storefront ??
    (postgresPool ? new PostgresStorefrontRepository(postgresPool) : new InMemoryStorefrontRepository());
  const runLock = deps.runLock ?? (postgresPool ? new PostgresRunLock(postgresPool) : new InMemoryRunLock());
  const eventBus = deps.eventBus ?? new InMemoryEventBus();

  let provisioning: ProvisioningClientPort;
  if (deps.provisioning) {
    provisioning = deps.provisioning;
  } else if (config.provisioningBackend === "http" && config.provisioningBaseUrl && config.provisioningApiToken) {
    provisioning = new HttpProvisioningClient({
      baseUrl: config.provisioningBaseUrl,
      apiToken: config.provisioningApiToken,
    });
  } else {
    provisioning = new MockProvisioningClient({ hosts: config.provisioningMockHosts, clock });
  }

  let notifications: NotificationSinkPort;
  if (deps.notifications) {
    notifications = deps.notifications;
  } else if (config.notificationRelayUrl) {
    notifications = new HttpNotificationRelay({
      url: config.notificationRelayUrl,
      secret: config.notificationSecret,
      timeoutMs: config.notificationTimeoutMs,
      maxAttempts: config.notificationMaxAttempts,
      clock,
    });
  } else {
    logger.warn("FL_NOTIFICATION_RELAY_URL is not set; notifications are only recorded in memory");
    notifications = new RecordingNotificationSink();
  }

  const verifiers =
    deps.verifiers ??
    Object.entries(config.providerSecrets).map(
      ([provider, secret]) =>
        new HmacPaymentVerifier({ provider, secret, toleranceSeconds: config.webhookToleranceSeconds, clock }),
    );

  const cursorTokens = new CursorTokenService(config.cursorSecret, config.cursorVerificationSecrets);
  const ledgerService = new PendingLedgerService(ledger, clock, logger.child({ component: "pending-ledger" }));
  const coordinator = new CompletionCoordinator(ledger, clock, logger.child({ component: "completion" }), {
    attempts: config.ledgerRetryAttempts,
    baseDelayMs: config.ledgerRetryBaseDelayMs,
  });
  const orchestrator = new FulfillmentOrchestrator(
    new FulfillmentGuard(processedPayments, clock),
    credentials,
    storefront,
    provisioning,
    notifications,
    eventBus,
    runLock,
    clock,
    logger.child({ component: "fulfillment" }),
    {
      provisioningTimeoutMs: config.provisioningTimeoutMs,
      eventSource: config.eventSource,
    },
  );
  const intake = new PaymentIntakeService(
    verifiers,
    ledgerService,
    coordinator,
    orchestrator,
    logger.child({ component: "payment-intake" }),
  );
  const reconciliation = new ReconciliationService(
    credentials,
    provisioning,
    runLock,
    eventBus,
    clock,
    logger.child({ component: "reconciliation" }),
    {
      graceMs: config.reconcileGraceHours * 60 * 60 * 1000,
      concurrency: config.reconcileConcurrency,
      existsTimeoutMs: config.provisioningTimeoutMs,
      eventSource: config.eventSource,
    },
  );
  const credentialAdmin = new CredentialAdminService(
    credentials,
    provisioning,
    logger.child({ component: "credential-admin" }),
    { timeoutMs: config.provisioningTimeoutMs },
  );
  const scheduler = new ReconciliationScheduler(
    reconciliation,
    config.reconcileIntervalSeconds,
    logger.child({ component: "reconciliation-scheduler" }),
  );

  eventBus.subscribe(async (event) => {
    metrics.recordPublishedEvent(event);
  });

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    if (postgresPool) {
      try {
        await postgresPool.query("SELECT 1");
      } catch (error) {
        logger.warn({ err: error }, "readiness check could not reach PostgreSQL");
        return reply.status(503).send({ status: "unavailable" });
      }
    }
    return reply.status(200).send({ status: "ready" });
  });

  app.addHook("onRequest", async (request, reply) => {
    requestStarts.set(request, process.hrtime.bigint());
    if (request.url.startsWith("/health/")) {
      return;
    }
    if (config.metricsEnabled && request.url === "/metrics") {
      return;
    }
    reply.header("X-Request-Id", request.id);

    // Providers authenticate with signatures, not API keys.
    const webhookProvider = WEBHOOK_PATH_PATTERN.exec(request.url)?.[1];
    const identity = webhookProvider
      ? `webhook:${webhookProvider.toLowerCase()}`
      : rateLimitIdentityFromApiKey(requireBearerApiKey(request.headers, validApiKeys));
    if (!config.rateLimitEnabled) {
      return;
    }
    const decision = await rateLimiter.consume(identity);
    setRateLimitHeaders(reply, decision);
    if (!decision.allowed) {
      if (config.metricsEnabled) {
        metrics.recordRateLimitRejection(webhookProvider ? "webhook" : "api_key");
      }
      reply.header("Retry-After", String(decision.retryAfterSeconds));
      throw new AppError(429, "rate_limit_exceeded", "Rate limit exceeded. Retry later.");
    }
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const startNs = requestStarts.get(request);
    if (!startNs) {
      return;
    }
    const durationSeconds = Number(process.hrtime.bigint() - startNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? request.url.split("?")[0] ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.post("/v1/intents", async (request, reply) => {
    const body = parseCreateIntentBody(request.body);
    const outcome = await ledgerService.writeIntent(body);
    return reply.status(intentWriteStatus(outcome)).send({ payment_id: body.paymentId.trim(), outcome });
  });

  app.get<{ Params: { paymentId: string } }>("/v1/intents/:paymentId", async (request, reply) => {
    const intent = await ledgerService.getIntent(request.params.paymentId);
    if (!intent) {
      throw new AppError(404, "intent_not_found", "Payment intent not found.");
    }
    return reply.status(200).send(intent);
  });

  app.get<{ Params: { paymentId: string } }>("/v1/intents/:paymentId/metadata", async (request, reply) => {
    const metadata = await ledgerService.peekMetadata(request.params.paymentId);
    if (!metadata) {
      throw new AppError(404, "pending_intent_not_found", "No pending intent with this payment id.");
    }
    return reply.status(200).send(metadata);
  });

  app.get<{ Params: { ownerId: string } }>("/v1/owners/:ownerId/pending-intent", async (request, reply) => {
    const intent = await ledgerService.mostRecentPendingFor(normalizeOwnerId(request.params.ownerId));
    if (!intent) {
      throw new AppError(404, "pending_intent_not_found", "Owner has no pending intent.");
    }
    return reply.status(200).send(intent);
  });

  app.post<{ Params: { paymentId: string } }>("/v1/intents/:paymentId/complete", async (request, reply) => {
    const result = await intake.completeManually(request.params.paymentId);
    const outcome = completionOutcome(result);
    if (outcome && config.metricsEnabled) {
      metrics.recordCompletion("manual", outcome);
    }
    return reply.status(200).send(result);
  });

  // Raw body is kept as a string so the signature is checked over the exact bytes received.
  void app.register(async (webhooks) => {
    webhooks.addContentTypeParser("application/json", { parseAs: "string" }, (_request, body, done) => {
      done(null, body);
    });

    webhooks.post<{ Params: { provider: string } }>("/v1/webhooks/:provider", async (request, reply) => {
      const body = typeof request.body === "string" ? request.body : "";
      const result = await intake.handleProviderNotification(request.params.provider, {
        headers: request.headers,
        body,
      });
      const outcome = completionOutcome(result);
      if (outcome && config.metricsEnabled) {
        metrics.recordCompletion("webhook", outcome);
      }
      return reply.status(200).send(result);
    });
  });

  app.post("/v1/fulfillments", async (request, reply) => {
    const report = await orchestrator.runFulfillment(parseMetadataBody(request.body));
    return reply.status(200).send(report);
  });

  app.post("/v1/balance-payments", async (request, reply) => {
    const report = await orchestrator.payFromBalance(parseMetadataBody(request.body));
    return reply.status(200).send(report);
  });

  app.post<{ Params: { paymentId: string } }>("/v1/gifts/:paymentId/recipient", async (request, reply) => {
    const result = await orchestrator.completeGift(request.params.paymentId, parseGiftRecipientBody(request.body));
    return reply.status(200).send(result);
  });

  app.get<{ Params: { ownerId: string } }>("/v1/owners/:ownerId/pending-gifts", async (request, reply) => {
    const gifts = await orchestrator.listPendingGifts(normalizeOwnerId(request.params.ownerId));
    return reply.status(200).send({ data: gifts });
  });

  app.get<{ Params: { instanceId: string } }>("/v1/instances/:instanceId/commissions", async (request, reply) => {
    const instanceId = normalizeResourceId(request.params.instanceId, "instance_id") ?? "";
    const commissions = await storefront.listCommissions(instanceId);
    return reply.status(200).send({ data: commissions });
  });

  app.post<{ Params: { ownerId: string } }>("/v1/reconciliation/owners/:ownerId", async (request, reply) => {
    const summary = await reconciliation.reconcileOwner(normalizeOwnerId(request.params.ownerId));
    return reply.status(200).send(summary);
  });

  app.delete<{ Params: { credentialId: string } }>("/v1/credentials/:credentialId", async (request, reply) => {
    const credentialId = normalizeResourceId(request.params.credentialId, "credential_id") ?? "";
    return reply.status(200).send(await credentialAdmin.revoke(credentialId));
  });

  app.post("/v1/reconciliation/sweep", async (_request, reply) => {
    const summary = await reconciliation.reconcileAll();
    return reply.status(200).send(summary);
  });

  app.get<{
    Querystring: {
      limit?: string;
      cursor?: string;
      payment_id?: string;
      event_type?: string;
      occurred_from?: string;
      occurred_to?: string;
    };
  }>("/v1/fulfillment-events", async (request, reply) => {
    const query = request.query;
    const limit = normalizeLimit(query.limit, config.listDefaultLimit, config.listMaxLimit);
    const cursor = normalizeResourceId(query.cursor, "cursor");
    const paymentId = normalizeResourceId(query.payment_id, "payment_id");
    const eventType = normalizeEventType(query.event_type);
    const occurredFrom = normalizeIsoDateTime(query.occurred_from, "occurred_from");
    const occurredTo = normalizeIsoDateTime(query.occurred_to, "occurred_to");
    if (occurredFrom && occurredTo && Date.parse(occurredFrom) > Date.parse(occurredTo)) {
      throw new AppError(422, "invalid_occurred_range", "occurred_from must be lower or equal to occurred_to.");
    }
    const internalCursor = cursor ? cursorTokens.decode("events", cursor) : undefined;
    const page = await eventBus.listPublishedEvents({
      limit,
      ...(internalCursor ? { cursor: internalCursor } : {}),
      ...(paymentId ? { paymentId } : {}),
      ...(eventType ? { eventType } : {}),
      ...(occurredFrom ? { occurredFrom } : {}),
      ...(occurredTo ? { occurredTo } : {}),
    });
    return reply.status(200).send({
      data: page.data,
      pagination: {
        limit,
        has_more: page.hasMore,
        next_cursor: page.nextCursor ? cursorTokens.encode("events", page.nextCursor) : null,
      },
    });
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(metrics.renderPrometheus());
    });
  }

  app.setNotFoundHandler(async (_, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
      },
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        logger.warn({ err: error, requestId: request.id, url: request.url }, "request failed");
      }
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
        },
      });
    }
    if (error.validation || error.statusCode === 400 || error.statusCode === 415) {
      return reply.status(error.statusCode ?? 400).send({
        error: {
          code: "invalid_request_body",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    logger.error({ err: error, requestId: request.id, url: request.url }, "unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  app.addHook("onReady", async () => {
    scheduler.start();
  });

  app.addHook("onClose", async () => {
    await scheduler.stop();
    for (const closeAction of [...closeActions].reverse()) {
      await closeAction();
    }
  });

  return app;
}
