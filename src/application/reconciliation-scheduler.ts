import type { Logger } from "../infra/logger.js";
import type { ReconciliationService } from "./reconciliation-service.js";

/** Periodic `reconcileAll`; a tick is skipped while the previous sweep still runs. */
export class ReconciliationScheduler {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly service: ReconciliationService,
    private readonly intervalSeconds: number,
    private readonly logger: Logger,
  ) {}

  start(): void {
    if (this.intervalSeconds <= 0 || this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalSeconds * 1000);
    this.timer.unref();
    this.logger.info({ intervalSeconds: this.intervalSeconds }, "reconciliation scheduler started");
  }

  async tick(): Promise<void> {
    if (this.inFlight) {
      this.logger.debug("previous reconciliation sweep still running; skipping tick");
      return;
    }
    this.inFlight = this.service
      .reconcileAll()
      .then((summary) => {
        this.logger.debug({ ...summary }, "scheduled reconciliation sweep done");
      })
      .catch((error: unknown) => {
        this.logger.error({ err: error }, "scheduled reconciliation sweep failed");
      })
      .finally(() => {
        this.inFlight = null;
      });
    await this.inFlight;
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }
}
