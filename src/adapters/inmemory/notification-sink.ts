import type { Notification, NotificationSinkPort } from "../../ports/notification-sink.js";

export interface RecordedPayerNotification {
  ownerId: number;
  notification: Notification;
}

export interface RecordedDeletedMessage {
  ownerId: number;
  messageId: string;
}

/** Keeps every notification in memory; `failWith` makes the next sends reject. */
export class RecordingNotificationSink implements NotificationSinkPort {
  readonly payerNotifications: RecordedPayerNotification[] = [];
  readonly operatorNotifications: Notification[] = [];
  readonly deletedMessages: RecordedDeletedMessage[] = [];
  private failure: Error | null = null;

  failWith(error: Error | null): void {
    this.failure = error;
  }

  async notifyPayer(ownerId: number, notification: Notification): Promise<void> {
    this.throwIfFailing();
    this.payerNotifications.push({ ownerId, notification });
  }

  async notifyOperators(notification: Notification): Promise<void> {
    this.throwIfFailing();
    this.operatorNotifications.push(notification);
  }

  async deleteMessage(ownerId: number, messageId: string): Promise<void> {
    this.throwIfFailing();
    this.deletedMessages.push({ ownerId, messageId });
  }

  private throwIfFailing(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}
