import type { FulfillmentEvent } from "../../domain/types.js";
import type {
  EventBusPort,
  FulfillmentEventListInput,
  FulfillmentEventListResult,
} from "../../ports/event-bus.js";
import { AppError } from "../../infra/app-error.js";

function eventPaymentId(event: FulfillmentEvent): string | undefined {
  return "payment_id" in event.data ? event.data.payment_id : undefined;
}

function withinRange(occurredAt: string, from: string | undefined, to: string | undefined): boolean {
  const occurredAtMs = Date.parse(occurredAt);
  if (!Number.isFinite(occurredAtMs)) {
    return true;
  }
  if (from !== undefined && occurredAtMs < Date.parse(from)) {
    return false;
  }
  if (to !== undefined && occurredAtMs > Date.parse(to)) {
    return false;
  }
  return true;
}

export class InMemoryEventBus implements EventBusPort {
  private readonly outbox: FulfillmentEvent[] = [];
  private readonly subscribers: Array<(event: FulfillmentEvent) => Promise<void>> = [];

  async publish(event: FulfillmentEvent): Promise<void> {
    this.outbox.push(event);
    for (const subscriber of this.subscribers) {
      await subscriber(event);
    }
  }

  getPublishedEvents(): FulfillmentEvent[] {
    return [...this.outbox];
  }

  async listPublishedEvents(input: FulfillmentEventListInput): Promise<FulfillmentEventListResult> {
    const items = this.outbox
      .filter((event) => {
        if (input.paymentId && eventPaymentId(event) !== input.paymentId) {
          return false;
        }
        if (input.eventType && event.type !== input.eventType) {
          return false;
        }
        return withinRange(event.occurred_at, input.occurredFrom, input.occurredTo);
      })
      .map((event, index) => ({ event, index }))
      .sort((a, b) => {
        const byOccurredAt = b.event.occurred_at.localeCompare(a.event.occurred_at);
        if (byOccurredAt !== 0) {
          return byOccurredAt;
        }
        return b.index - a.index;
      })
      .map(({ event }) => event);

    const limit = Math.max(1, input.limit);
    let startIndex = 0;
    if (input.cursor) {
      const cursorIndex = items.findIndex((item) => item.id === input.cursor);
      if (cursorIndex < 0) {
        throw new AppError(422, "invalid_cursor", "cursor not found for current collection.");
      }
      startIndex = cursorIndex + 1;
    }

    const page = items.slice(startIndex, startIndex + limit);
    const hasMore = startIndex + page.length < items.length;
    const lastItem = page.at(-1);
    const nextCursor = hasMore && lastItem ? lastItem.id : undefined;

    return {
      data: page,
      hasMore,
      ...(nextCursor ? { nextCursor } : {}),
    };
  }

  subscribe(handler: (event: FulfillmentEvent) => Promise<void>): void {
    this.subscribers.push(handler);
  }
}
