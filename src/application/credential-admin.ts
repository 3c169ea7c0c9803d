import { AppError } from "../infra/app-error.js";
import type { Logger } from "../infra/logger.js";
import type { CredentialRepositoryPort } from "../ports/credential-repository.js";
import type { ProvisioningClientPort } from "../ports/provisioning-client.js";

export interface CredentialRevocation {
  credential_id: string;
  owner_id: number;
  remote_deleted: boolean;
  local_deleted: boolean;
}

/** Operator-initiated removal of a credential from the panel and the store. */
export class CredentialAdminService {
  constructor(
    private readonly credentials: CredentialRepositoryPort,
    private readonly provisioning: ProvisioningClientPort,
    private readonly logger: Logger,
    private readonly options: { timeoutMs: number },
  ) {}

  /**
   * The panel client goes first. When the panel cannot be reached the row is
   * kept so the operator can retry; a client the panel no longer knows counts
   * as removed.
   */
  async revoke(credentialId: string): Promise<CredentialRevocation> {
    const credential = await this.credentials.getById(credentialId);
    if (!credential) {
      throw new AppError(404, "credential_not_found", `Credential '${credentialId}' not found.`);
    }
    const logger = this.logger.child({ credentialId, ownerId: credential.owner_id });

    let remoteDeleted: boolean;
    try {
      remoteDeleted = await this.provisioning.delete(
        credential.provider_host,
        credential.unique_identity,
        this.options.timeoutMs,
      );
    } catch (error) {
      logger.warn({ err: error, host: credential.provider_host }, "panel delete failed; credential kept");
      throw new AppError(502, "provisioning_unavailable", "The provisioning panel could not delete the client.");
    }

    const localDeleted = await this.credentials.delete(credentialId);
    logger.info({ remoteDeleted, localDeleted }, "credential revoked");
    return {
      credential_id: credentialId,
      owner_id: credential.owner_id,
      remote_deleted: remoteDeleted,
      local_deleted: localDeleted,
    };
  }
}
