import { isPermanentDeliveryFailure } from "../../application/delivery-policy.js";
import { signPayload, signatureKeyId } from "../../application/signing.js";
import type { ClockPort } from "../../infra/clock.js";
import { defaultSleep, withRetry, type SleepFn } from "../../infra/retry.js";
import type { Notification, NotificationSinkPort } from "../../ports/notification-sink.js";

interface HttpNotificationRelayOptions {
  url: string;
  secret: string;
  timeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs?: number;
  clock: ClockPort;
  fetchImpl?: typeof fetch;
  sleep?: SleepFn;
}

type RelayMessage =
  | { type: "notify_payer"; owner_id: number; notification: Notification }
  | { type: "notify_operators"; notification: Notification }
  | { type: "delete_message"; owner_id: number; message_id: string };

export class RelayDeliveryError extends Error {
  constructor(message: string, readonly statusCode?: number) {
    super(message);
    this.name = "RelayDeliveryError";
  }
}

/**
 * Posts signed JSON to the bot front end. Transient failures are retried with
 * backoff; a 4xx other than 408/425/429 stops immediately.
 */
export class HttpNotificationRelay implements NotificationSinkPort {
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: SleepFn;

  constructor(private readonly options: HttpNotificationRelayOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async notifyPayer(ownerId: number, notification: Notification): Promise<void> {
    await this.deliver({ type: "notify_payer", owner_id: ownerId, notification });
  }

  async notifyOperators(notification: Notification): Promise<void> {
    await this.deliver({ type: "notify_operators", notification });
  }

  async deleteMessage(ownerId: number, messageId: string): Promise<void> {
    await this.deliver({ type: "delete_message", owner_id: ownerId, message_id: messageId });
  }

  private async deliver(message: RelayMessage): Promise<void> {
    const body = JSON.stringify(message);
    await withRetry(
      async () => {
        const timestamp = this.options.clock.nowIso();
        let response: Response;
        try {
          response = await this.fetchImpl(this.options.url, {
            method: "POST",
            headers: {
              "Content-Type": "application/json",
              "X-FL-Timestamp": timestamp,
              "X-FL-Signature": signPayload(this.options.secret, timestamp, body),
              "X-FL-Signature-Key-Id": signatureKeyId(this.options.secret),
            },
            body,
            signal: AbortSignal.timeout(this.options.timeoutMs),
          });
        } catch (error) {
          throw new RelayDeliveryError(error instanceof Error ? error.message : "relay request failed");
        }
        if (!response.ok) {
          throw new RelayDeliveryError(`relay responded ${response.status}`, response.status);
        }
      },
      { attempts: this.options.maxAttempts, baseDelayMs: this.options.retryBaseDelayMs ?? 200 },
      (error) => !(error instanceof RelayDeliveryError && isPermanentDeliveryFailure(error.statusCode)),
      this.sleep,
    );
  }
}
