import type { FulfillmentReport } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { Logger } from "../infra/logger.js";
import type { PaymentVerifierPort, RawProviderRequest } from "../ports/payment-verifier.js";
import type { CompletionCoordinator } from "./completion-coordinator.js";
import type { FulfillmentOrchestrator } from "./fulfillment-orchestrator.js";
import type { PendingLedgerService } from "./pending-ledger-service.js";

export type IntakeResult =
  | { status: "completed"; report: FulfillmentReport }
  | { status: "not_pending" }
  | { status: "ignored"; reason: "payment_not_succeeded" | "unknown_payment" | "amount_mismatch" };

/** Storage faults become a retryable 503 so the provider redelivers. */
function asRetryable(error: unknown): unknown {
  if (error instanceof AppError) {
    return error;
  }
  return new AppError(503, "storage_unavailable", "Storage is temporarily unavailable. Retry later.");
}

export class PaymentIntakeService {
  private readonly verifiers: Map<string, PaymentVerifierPort>;

  constructor(
    verifiers: PaymentVerifierPort[],
    private readonly ledger: PendingLedgerService,
    private readonly coordinator: CompletionCoordinator,
    private readonly orchestrator: FulfillmentOrchestrator,
    private readonly logger: Logger,
  ) {
    this.verifiers = new Map(verifiers.map((verifier) => [verifier.provider, verifier]));
  }

  /** verify -> amount check -> complete -> fulfill. */
  async handleProviderNotification(provider: string, request: RawProviderRequest): Promise<IntakeResult> {
    const verifier = this.verifiers.get(provider.toLowerCase());
    if (!verifier) {
      throw new AppError(404, "unknown_provider", `No verifier is registered for provider '${provider}'.`);
    }
    const verified = verifier.verify(request);
    const logger = this.logger.child({ provider, paymentId: verified.internalPaymentId });
    if (!verified.succeeded) {
      logger.info("provider reported a non-successful payment; nothing to complete");
      return { status: "ignored", reason: "payment_not_succeeded" };
    }

    try {
      const intent = await this.ledger.getIntent(verified.internalPaymentId);
      if (!intent) {
        logger.warn({ providerPaymentId: verified.providerPaymentId }, "verified payment has no ledger row");
        return { status: "ignored", reason: "unknown_payment" };
      }
      if (
        intent.status === "pending" &&
        (intent.amount !== verified.amount || intent.currency !== verified.currency)
      ) {
        logger.warn(
          {
            expected: { amount: intent.amount, currency: intent.currency },
            received: { amount: verified.amount, currency: verified.currency },
          },
          "provider amount does not match the pending intent",
        );
        return { status: "ignored", reason: "amount_mismatch" };
      }
      return await this.completeAndFulfill(verified.internalPaymentId);
    } catch (error) {
      throw asRetryable(error);
    }
  }

  /** Manual "check payment" path used by the bot once the provider confirmed the charge. */
  async completeManually(paymentId: string): Promise<IntakeResult> {
    try {
      return await this.completeAndFulfill(paymentId);
    } catch (error) {
      throw asRetryable(error);
    }
  }

  private async completeAndFulfill(paymentId: string): Promise<IntakeResult> {
    const metadata = await this.coordinator.completeIfPending(paymentId);
    if (!metadata) {
      return { status: "not_pending" };
    }
    const report = await this.orchestrator.runFulfillment(metadata);
    return { status: "completed", report };
  }
}
