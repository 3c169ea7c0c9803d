import type { CredentialRecord, RemoteCredentialState } from "../../domain/types.js";
import { AppError } from "../../infra/app-error.js";
import type { CredentialRepositoryPort } from "../../ports/credential-repository.js";

function copy(credential: CredentialRecord): CredentialRecord {
  return { ...credential, origin: { ...credential.origin } };
}

export class InMemoryCredentialRepository implements CredentialRepositoryPort {
  private readonly credentials = new Map<string, CredentialRecord>();

  async create(credential: CredentialRecord): Promise<void> {
    if (this.credentials.has(credential.credential_id)) {
      throw new AppError(409, "credential_exists", `Credential '${credential.credential_id}' already exists.`);
    }
    const identity = credential.unique_identity.toLowerCase();
    for (const existing of this.credentials.values()) {
      if (existing.unique_identity === identity) {
        throw new AppError(409, "identity_taken", `Identity '${identity}' is already in use.`);
      }
    }
    this.credentials.set(credential.credential_id, copy({ ...credential, unique_identity: identity }));
  }

  async getById(credentialId: string): Promise<CredentialRecord | null> {
    const credential = this.credentials.get(credentialId);
    return credential ? copy(credential) : null;
  }

  async findByIdentity(uniqueIdentity: string): Promise<CredentialRecord | null> {
    const identity = uniqueIdentity.toLowerCase();
    for (const credential of this.credentials.values()) {
      if (credential.unique_identity === identity) {
        return copy(credential);
      }
    }
    return null;
  }

  async listByOwner(ownerId: number): Promise<CredentialRecord[]> {
    return [...this.credentials.values()]
      .filter((credential) => credential.owner_id === ownerId)
      .sort((a, b) => a.created_at.localeCompare(b.created_at))
      .map(copy);
  }

  async listAll(): Promise<CredentialRecord[]> {
    return [...this.credentials.values()].sort((a, b) => a.created_at.localeCompare(b.created_at)).map(copy);
  }

  async update(credential: CredentialRecord): Promise<void> {
    if (!this.credentials.has(credential.credential_id)) {
      throw new AppError(404, "credential_not_found", `Credential '${credential.credential_id}' not found.`);
    }
    this.credentials.set(credential.credential_id, copy(credential));
  }

  async setMissingSince(
    credentialId: string,
    expected: string | null,
    next: string | null,
    now: string,
  ): Promise<boolean> {
    const credential = this.credentials.get(credentialId);
    if (!credential || credential.missing_since !== expected) {
      return false;
    }
    this.credentials.set(credentialId, { ...credential, missing_since: next, updated_at: now });
    return true;
  }

  async deleteIfMissingSince(credentialId: string, missingSince: string): Promise<boolean> {
    const credential = this.credentials.get(credentialId);
    if (!credential || credential.missing_since !== missingSince) {
      return false;
    }
    return this.credentials.delete(credentialId);
  }

  async syncFromRemote(
    credentialId: string,
    expectedMissingSince: string | null,
    remote: RemoteCredentialState,
    now: string,
  ): Promise<boolean> {
    const credential = this.credentials.get(credentialId);
    if (!credential || credential.missing_since !== expectedMissingSince) {
      return false;
    }
    this.credentials.set(credentialId, {
      ...credential,
      remote_uuid: remote.remoteUuid,
      expires_at: remote.expiresAt,
      connection_info: remote.connectionInfo ?? credential.connection_info,
      missing_since: null,
      updated_at: now,
    });
    return true;
  }

  async delete(credentialId: string): Promise<boolean> {
    return this.credentials.delete(credentialId);
  }
}
