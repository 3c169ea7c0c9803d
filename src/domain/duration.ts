import type { PlanRecord } from "./types.js";

export const DAYS_PER_MONTH = 30;
const DAY_MS = 86_400_000;

/** Day count of a plan; `duration_days` wins over `months`. Returns null when neither is usable. */
export function resolvePlanDays(plan: Pick<PlanRecord, "months" | "duration_days">): number | null {
  if (plan.duration_days !== null && plan.duration_days > 0) {
    return plan.duration_days;
  }
  if (plan.months !== null && plan.months > 0) {
    return plan.months * DAYS_PER_MONTH;
  }
  return null;
}

export function durationLabel(days: number): string {
  if (days % DAYS_PER_MONTH === 0) {
    const months = days / DAYS_PER_MONTH;
    return months === 1 ? "1 month" : `${months} months`;
  }
  return days === 1 ? "1 day" : `${days} days`;
}

export function addDays(fromIso: string, days: number): string {
  return new Date(Date.parse(fromIso) + days * DAY_MS).toISOString();
}
