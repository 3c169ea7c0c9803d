import type { ExistenceCheck } from "../domain/types.js";

export interface CreateOrExtendInput {
  host: string;
  identity: string;
  daysToAdd: number;
  trafficLimitBytes?: number;
  deviceLimit?: number;
  timeoutMs: number;
}

export interface ProvisionedCredential {
  remoteUuid: string;
  expiresAt: string;
  connectionInfo: string | null;
}

export interface ExistsInput {
  host: string;
  identity: string;
  timeoutMs: number;
}

export interface ProvisioningClientPort {
  /** Rejects with the upstream error; callers classify it. */
  createOrExtend(input: CreateOrExtendInput): Promise<ProvisionedCredential>;
  /** Looks the client up by identity; a present client carries its current panel attributes. */
  exists(input: ExistsInput): Promise<ExistenceCheck>;
  delete(host: string, identity: string, timeoutMs: number): Promise<boolean>;
}
