export type ProvisioningErrorCode = "identity_taken" | "host_not_found" | "timeout" | "upstream_error";

export type FulfillmentFailureCode =
  | ProvisioningErrorCode
  | "plan_not_found"
  | "credential_not_found"
  | "trial_already_used";

export class ProvisioningError extends Error {
  constructor(message: string, readonly statusCode?: number) {
    super(message);
    this.name = "ProvisioningError";
  }
}

const IDENTITY_TAKEN_PATTERN = /(already exists|duplicate|is taken|already taken|email.*exists)/i;
const HOST_NOT_FOUND_PATTERN = /(host.*not found|unknown host|inbound.*not found|no such host)/i;
const TIMEOUT_PATTERN = /(timed? ?out|timeout|deadline exceeded)/i;

export interface ClassifiedProvisioningError {
  code: ProvisioningErrorCode;
  detail: string;
}

export function classifyProvisioningError(error: unknown): ClassifiedProvisioningError {
  const name = error instanceof Error ? error.name : "";
  const detail = error instanceof Error ? error.message : String(error);

  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERN.test(detail)) {
    return { code: "timeout", detail };
  }
  if (IDENTITY_TAKEN_PATTERN.test(detail)) {
    return { code: "identity_taken", detail };
  }
  if (HOST_NOT_FOUND_PATTERN.test(detail)) {
    return { code: "host_not_found", detail };
  }
  return { code: "upstream_error", detail };
}
