import type { FulfillmentEvent, FulfillmentEventType } from "../domain/types.js";

export interface FulfillmentEventListInput {
  limit: number;
  cursor?: string;
  paymentId?: string;
  eventType?: FulfillmentEventType;
  occurredFrom?: string;
  occurredTo?: string;
}

export interface FulfillmentEventListResult {
  data: FulfillmentEvent[];
  hasMore: boolean;
  nextCursor?: string;
}

export interface EventBusPort {
  publish(event: FulfillmentEvent): Promise<void>;
  listPublishedEvents(input: FulfillmentEventListInput): Promise<FulfillmentEventListResult>;
  subscribe(handler: (event: FulfillmentEvent) => Promise<void>): void;
}
