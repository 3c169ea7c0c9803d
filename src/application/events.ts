import { randomUUID } from "node:crypto";
import type { ClockPort } from "../infra/clock.js";

export const EVENT_VERSION = "1";

export function eventEnvelope(source: string, clock: ClockPort): {
  id: string;
  source: string;
  event_version: string;
  occurred_at: string;
} {
  return {
    id: `evt_${randomUUID()}`,
    source,
    event_version: EVENT_VERSION,
    occurred_at: clock.nowIso(),
  };
}
