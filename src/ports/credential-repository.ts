import type { CredentialRecord, RemoteCredentialState } from "../domain/types.js";

export interface CredentialRepositoryPort {
  create(credential: CredentialRecord): Promise<void>;
  getById(credentialId: string): Promise<CredentialRecord | null>;
  findByIdentity(uniqueIdentity: string): Promise<CredentialRecord | null>;
  listByOwner(ownerId: number): Promise<CredentialRecord[]>;
  listAll(): Promise<CredentialRecord[]>;
  update(credential: CredentialRecord): Promise<void>;
  /** Compare-and-set on `missing_since`; false when the stored value no longer equals `expected`. */
  setMissingSince(credentialId: string, expected: string | null, next: string | null, now: string): Promise<boolean>;
  /** Deletes only while the row is still marked missing with exactly `missingSince`. */
  deleteIfMissingSince(credentialId: string, missingSince: string): Promise<boolean>;
  /**
   * Copies the panel's view of the client onto the row and clears `missing_since`,
   * guarded by the same compare-and-set. A null connection info keeps the stored one.
   */
  syncFromRemote(
    credentialId: string,
    expectedMissingSince: string | null,
    remote: RemoteCredentialState,
    now: string,
  ): Promise<boolean>;
  delete(credentialId: string): Promise<boolean>;
}
