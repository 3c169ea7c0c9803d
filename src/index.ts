import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";
import { createLogger } from "./infra/logger.js";

const config = loadRuntimeConfig();
const logger = createLogger(config.logLevel);
const app = buildApp(config, { logger });

app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    logger.info({ host: config.host, port: config.port }, "fulfillment ledger listening");
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, "failed to start");
    process.exit(1);
  });

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, "shutdown failed");
        process.exit(1);
      });
  });
}
