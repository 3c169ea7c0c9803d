import { decideReconciliation } from "../domain/reconciliation.js";
import type { CredentialRecord, ExistenceCheck, ReconciliationSummary } from "../domain/types.js";
import type { ClockPort } from "../infra/clock.js";
import { clockNowMs } from "../infra/clock.js";
import { mapWithConcurrency } from "../infra/concurrency.js";
import type { Logger } from "../infra/logger.js";
import type { CredentialRepositoryPort } from "../ports/credential-repository.js";
import type { EventBusPort } from "../ports/event-bus.js";
import type { ProvisioningClientPort } from "../ports/provisioning-client.js";
import type { RunLockPort } from "../ports/run-lock.js";
import { eventEnvelope } from "./events.js";

export interface ReconciliationOptions {
  graceMs: number;
  concurrency: number;
  existsTimeoutMs: number;
  eventSource: string;
}

type CredentialTransition = Exclude<keyof ReconciliationSummary, "checked">;

function emptySummary(): ReconciliationSummary {
  return {
    checked: 0,
    present: 0,
    synced: 0,
    marked_missing: 0,
    still_missing: 0,
    cleared: 0,
    deleted: 0,
    delete_skipped: 0,
    unknown: 0,
    failed: 0,
  };
}

export class ReconciliationService {
  constructor(
    private readonly credentials: CredentialRepositoryPort,
    private readonly provisioning: ProvisioningClientPort,
    private readonly runLock: RunLockPort,
    private readonly eventBus: EventBusPort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly options: ReconciliationOptions,
  ) {}

  async reconcileOwner(ownerId: number): Promise<ReconciliationSummary> {
    const scope = `owner:${ownerId}`;
    return this.runLock.withLock(`reconcile:${scope}`, async () =>
      this.reconcile(scope, await this.credentials.listByOwner(ownerId)),
    );
  }

  async reconcileAll(): Promise<ReconciliationSummary> {
    return this.runLock.withLock("reconcile:all", async () =>
      this.reconcile("all", await this.credentials.listAll()),
    );
  }

  private async reconcile(scope: string, credentials: CredentialRecord[]): Promise<ReconciliationSummary> {
    const transitions = await mapWithConcurrency(credentials, this.options.concurrency, (credential) =>
      this.reconcileOne(credential).catch((error: unknown): CredentialTransition => {
        this.logger.error(
          { err: error, scope, credentialId: credential.credential_id },
          "credential reconciliation failed; continuing with the rest",
        );
        return "failed";
      }),
    );
    const summary = emptySummary();
    for (const transition of transitions) {
      summary.checked += 1;
      summary[transition] += 1;
    }

    this.logger.info({ scope, ...summary }, "reconciliation pass finished");
    try {
      await this.eventBus.publish({
        ...eventEnvelope(this.options.eventSource, this.clock),
        type: "reconciliation.completed",
        data: { scope, ...summary },
      });
    } catch (error) {
      this.logger.error({ err: error, scope }, "failed to publish reconciliation summary");
    }
    return summary;
  }

  private async reconcileOne(credential: CredentialRecord): Promise<CredentialTransition> {
    const logger = this.logger.child({ credentialId: credential.credential_id });
    let check: ExistenceCheck;
    try {
      check = await this.provisioning.exists({
        host: credential.provider_host,
        identity: credential.unique_identity,
        timeoutMs: this.options.existsTimeoutMs,
      });
    } catch (error) {
      logger.warn({ err: error }, "existence check failed; leaving credential untouched");
      return "unknown";
    }

    const now = this.clock.nowIso();
    const decision = decideReconciliation(credential, check, clockNowMs(this.clock), this.options.graceMs);
    switch (decision.kind) {
      case "present":
        return "present";
      case "unknown":
        return "unknown";
      case "still_missing":
        return "still_missing";
      case "sync": {
        const synced = await this.credentials.syncFromRemote(credential.credential_id, null, decision.remote, now);
        if (synced) {
          logger.info(
            { remoteUuid: decision.remote.remoteUuid, expiresAt: decision.remote.expiresAt },
            "credential synced from the panel",
          );
        }
        return synced ? "synced" : "present";
      }
      case "clear_missing": {
        const cleared = await this.credentials.syncFromRemote(
          credential.credential_id,
          credential.missing_since,
          decision.remote,
          now,
        );
        return cleared ? "cleared" : "present";
      }
      case "mark_missing": {
        const marked = await this.credentials.setMissingSince(
          credential.credential_id,
          credential.missing_since,
          now,
          now,
        );
        if (marked) {
          logger.info("credential missing on the panel; grace window started");
        }
        return marked ? "marked_missing" : "still_missing";
      }
      case "delete": {
        // Final re-read guards against an extension that landed during this pass.
        const current = await this.credentials.getById(credential.credential_id);
        if (!current || current.missing_since !== decision.missingSince) {
          return "delete_skipped";
        }
        const deleted = await this.credentials.deleteIfMissingSince(credential.credential_id, decision.missingSince);
        if (deleted) {
          logger.warn({ missingSince: decision.missingSince }, "credential deleted after grace window");
        }
        return deleted ? "deleted" : "delete_skipped";
      }
    }
  }
}
