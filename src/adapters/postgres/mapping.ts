import { AppError } from "../../infra/app-error.js";
import { LedgerContentionError } from "../../domain/ledger-errors.js";

// serialization_failure, deadlock_detected, lock_not_available
const CONTENTION_SQL_STATES: ReadonlySet<string> = new Set(["40001", "40P01", "55P03"]);

export function mapTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

export function mapNullableTimestamp(value: unknown): string | null {
  return value === null || value === undefined ? null : mapTimestamp(value);
}

export function toNumber(value: unknown, field: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new AppError(500, "persistence_mapping_error", `Unable to map numeric field '${field}'.`);
  }
  return parsed;
}

export function toNullableNumber(value: unknown, field: string): number | null {
  return value === null || value === undefined ? null : toNumber(value, field);
}

export function sqlStateOf(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/** Rewrites lock and serialization conflicts into the retryable ledger error. */
export function asContentionError(error: unknown): unknown {
  const sqlState = sqlStateOf(error);
  if (sqlState && CONTENTION_SQL_STATES.has(sqlState)) {
    const message = error instanceof Error ? error.message : "ledger contention";
    return new LedgerContentionError(message, sqlState);
  }
  return error;
}
