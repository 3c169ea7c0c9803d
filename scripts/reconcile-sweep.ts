import { Pool } from "pg";
import { ReconciliationService } from "../src/application/reconciliation-service.js";
import { InMemoryEventBus } from "../src/adapters/inmemory/event-bus.js";
import { PostgresCredentialRepository } from "../src/adapters/postgres/credential-repository.js";
import { PostgresRunLock } from "../src/adapters/postgres/run-lock.js";
import { HttpProvisioningClient } from "../src/adapters/provisioning/http-provisioning-client.js";
import { SystemClock } from "../src/infra/clock.js";
import { loadRuntimeConfig } from "../src/infra/config.js";
import { createLogger } from "../src/infra/logger.js";

// One-shot sweep for cron; the API process runs the same pass on its own interval.
async function main(): Promise<void> {
  const config = loadRuntimeConfig();
  const logger = createLogger(config.logLevel, "reconcile-sweep");
  if (!config.postgresUrl || !config.provisioningBaseUrl || !config.provisioningApiToken) {
    throw new Error("FL_POSTGRES_URL, FL_PROVISIONING_BASE_URL and FL_PROVISIONING_API_TOKEN are required.");
  }

  const pool = new Pool({ connectionString: config.postgresUrl });
  try {
    const service = new ReconciliationService(
      new PostgresCredentialRepository(pool),
      new HttpProvisioningClient({ baseUrl: config.provisioningBaseUrl, apiToken: config.provisioningApiToken }),
      new PostgresRunLock(pool),
      new InMemoryEventBus(),
      new SystemClock(),
      logger,
      {
        graceMs: config.reconcileGraceHours * 60 * 60 * 1000,
        concurrency: config.reconcileConcurrency,
        existsTimeoutMs: config.provisioningTimeoutMs,
        eventSource: config.eventSource,
      },
    );
    const ownerArg = process.argv[2];
    const summary = ownerArg ? await service.reconcileOwner(Number(ownerArg)) : await service.reconcileAll();
    logger.info({ ...summary }, "sweep finished");
  } finally {
    await pool.end();
  }
}

await main();
