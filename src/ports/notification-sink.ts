export type NotificationKind =
  | "key_issued"
  | "key_extended"
  | "trial_issued"
  | "balance_credited"
  | "gift_recipient_requested"
  | "gift_delivered"
  | "provisioning_failed"
  | "payment_fulfilled"
  | "insufficient_balance";

export interface Notification {
  kind: NotificationKind;
  payment_id?: string;
  data: Record<string, string | number | boolean | null>;
}

export interface NotificationSinkPort {
  notifyPayer(ownerId: number, notification: Notification): Promise<void>;
  notifyOperators(notification: Notification): Promise<void>;
  deleteMessage(ownerId: number, messageId: string): Promise<void>;
}
