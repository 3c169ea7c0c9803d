import type { CredentialRecord, ExistenceCheck, RemoteCredentialState } from "./types.js";

export const DEFAULT_RECONCILE_GRACE_MS = 24 * 60 * 60 * 1000;

export type ReconciliationDecision =
  | { kind: "present" }
  | { kind: "sync"; remote: RemoteCredentialState }
  | { kind: "clear_missing"; remote: RemoteCredentialState }
  | { kind: "mark_missing" }
  | { kind: "still_missing" }
  | { kind: "delete"; missingSince: string }
  | { kind: "unknown" };

type ReconciledFields = Pick<CredentialRecord, "missing_since" | "remote_uuid" | "expires_at" | "connection_info">;

function hasDrifted(credential: ReconciledFields, remote: RemoteCredentialState): boolean {
  return (
    credential.remote_uuid !== remote.remoteUuid ||
    Date.parse(credential.expires_at) !== Date.parse(remote.expiresAt) ||
    (remote.connectionInfo !== null && credential.connection_info !== remote.connectionInfo)
  );
}

/**
 * Debounced soft-delete: one absent observation only marks the row. Deletion
 * needs the row to have stayed missing for the whole grace window, and an
 * unknown observation never moves the state. A present client is matched by
 * identity alone; its panel attributes win over whatever the row remembers.
 */
export function decideReconciliation(
  credential: ReconciledFields,
  check: ExistenceCheck,
  nowMs: number,
  graceMs: number = DEFAULT_RECONCILE_GRACE_MS,
): ReconciliationDecision {
  switch (check.state) {
    case "unknown":
      return { kind: "unknown" };
    case "present": {
      const remote: RemoteCredentialState = {
        remoteUuid: check.remoteUuid,
        expiresAt: check.expiresAt,
        connectionInfo: check.connectionInfo,
      };
      if (credential.missing_since !== null) {
        return { kind: "clear_missing", remote };
      }
      return hasDrifted(credential, remote) ? { kind: "sync", remote } : { kind: "present" };
    }
    case "absent": {
      if (credential.missing_since === null) {
        return { kind: "mark_missing" };
      }
      const missingSinceMs = Date.parse(credential.missing_since);
      if (!Number.isFinite(missingSinceMs)) {
        return { kind: "mark_missing" };
      }
      return nowMs - missingSinceMs >= graceMs
        ? { kind: "delete", missingSince: credential.missing_since }
        : { kind: "still_missing" };
    }
  }
}
