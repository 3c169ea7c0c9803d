import type { Pool } from "pg";
import type {
  CredentialOrigin,
  CredentialOriginKind,
  CredentialRecord,
  RemoteCredentialState,
} from "../../domain/types.js";
import { AppError } from "../../infra/app-error.js";
import type { CredentialRepositoryPort } from "../../ports/credential-repository.js";
import { mapNullableTimestamp, mapTimestamp, sqlStateOf, toNumber } from "./mapping.js";

interface CredentialRow {
  credential_id: string;
  owner_id: unknown;
  provider_host: string;
  remote_uuid: string;
  unique_identity: string;
  expires_at: unknown;
  missing_since: unknown;
  origin: unknown;
  connection_info: string | null;
  created_at: unknown;
  updated_at: unknown;
}

const CREDENTIAL_COLUMNS = `
  credential_id, owner_id, provider_host, remote_uuid, unique_identity,
  expires_at, missing_since, origin, connection_info, created_at, updated_at
`;

const ORIGIN_KINDS: readonly CredentialOriginKind[] = ["trial", "purchase", "extend", "gift"];

function mapOrigin(value: unknown): CredentialOrigin {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new AppError(500, "persistence_mapping_error", "Credential origin must be an object.");
  }
  const kind = "kind" in value ? value.kind : undefined;
  const matched = ORIGIN_KINDS.find((candidate) => candidate === kind);
  if (!matched) {
    throw new AppError(500, "persistence_mapping_error", "Credential origin has an unknown kind.");
  }
  const planId = "plan_id" in value && typeof value.plan_id === "string" ? value.plan_id : null;
  const planName = "plan_name" in value && typeof value.plan_name === "string" ? value.plan_name : null;
  const days = "days" in value ? toNumber(value.days, "origin.days") : 0;
  const label = "label" in value && typeof value.label === "string" ? value.label : "";
  return { kind: matched, plan_id: planId, plan_name: planName, days, label };
}

function mapRow(row: CredentialRow): CredentialRecord {
  return {
    credential_id: row.credential_id,
    owner_id: toNumber(row.owner_id, "owner_id"),
    provider_host: row.provider_host,
    remote_uuid: row.remote_uuid,
    unique_identity: row.unique_identity,
    expires_at: mapTimestamp(row.expires_at),
    missing_since: mapNullableTimestamp(row.missing_since),
    origin: mapOrigin(row.origin),
    connection_info: row.connection_info,
    created_at: mapTimestamp(row.created_at),
    updated_at: mapTimestamp(row.updated_at),
  };
}

export class PostgresCredentialRepository implements CredentialRepositoryPort {
  constructor(private readonly pool: Pool) {}

  async create(credential: CredentialRecord): Promise<void> {
    try {
      await this.pool.query(
        `
          INSERT INTO fl_credentials (
            credential_id, owner_id, provider_host, remote_uuid, unique_identity,
            expires_at, missing_since, origin, connection_info, created_at, updated_at
          )
          VALUES (
            $1, $2::bigint, $3, $4, $5,
            $6::timestamptz, $7::timestamptz, $8::jsonb, $9, $10::timestamptz, $11::timestamptz
          )
        `,
        [
          credential.credential_id,
          credential.owner_id,
          credential.provider_host,
          credential.remote_uuid,
          credential.unique_identity.toLowerCase(),
          credential.expires_at,
          credential.missing_since,
          JSON.stringify(credential.origin),
          credential.connection_info,
          credential.created_at,
          credential.updated_at,
        ],
      );
    } catch (error) {
      if (sqlStateOf(error) === "23505") {
        throw new AppError(409, "identity_taken", `Identity '${credential.unique_identity}' is already in use.`);
      }
      throw error;
    }
  }

  async getById(credentialId: string): Promise<CredentialRecord | null> {
    const result = await this.pool.query<CredentialRow>(
      `SELECT ${CREDENTIAL_COLUMNS} FROM fl_credentials WHERE credential_id = $1`,
      [credentialId],
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async findByIdentity(uniqueIdentity: string): Promise<CredentialRecord | null> {
    const result = await this.pool.query<CredentialRow>(
      `SELECT ${CREDENTIAL_COLUMNS} FROM fl_credentials WHERE unique_identity = $1`,
      [uniqueIdentity.toLowerCase()],
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async listByOwner(ownerId: number): Promise<CredentialRecord[]> {
    const result = await this.pool.query<CredentialRow>(
      `SELECT ${CREDENTIAL_COLUMNS} FROM fl_credentials WHERE owner_id = $1::bigint ORDER BY created_at ASC`,
      [ownerId],
    );
    return result.rows.map(mapRow);
  }

  async listAll(): Promise<CredentialRecord[]> {
    const result = await this.pool.query<CredentialRow>(
      `SELECT ${CREDENTIAL_COLUMNS} FROM fl_credentials ORDER BY created_at ASC`,
    );
    return result.rows.map(mapRow);
  }

  async update(credential: CredentialRecord): Promise<void> {
    const result = await this.pool.query(
      `
        UPDATE fl_credentials
        SET remote_uuid = $2,
            expires_at = $3::timestamptz,
            missing_since = $4::timestamptz,
            origin = $5::jsonb,
            connection_info = $6,
            updated_at = $7::timestamptz
        WHERE credential_id = $1
      `,
      [
        credential.credential_id,
        credential.remote_uuid,
        credential.expires_at,
        credential.missing_since,
        JSON.stringify(credential.origin),
        credential.connection_info,
        credential.updated_at,
      ],
    );
    if ((result.rowCount ?? 0) === 0) {
      throw new AppError(404, "credential_not_found", `Credential '${credential.credential_id}' not found.`);
    }
  }

  async setMissingSince(
    credentialId: string,
    expected: string | null,
    next: string | null,
    now: string,
  ): Promise<boolean> {
    const result = await this.pool.query(
      `
        UPDATE fl_credentials
        SET missing_since = $3::timestamptz, updated_at = $4::timestamptz
        WHERE credential_id = $1
          AND missing_since IS NOT DISTINCT FROM $2::timestamptz
      `,
      [credentialId, expected, next, now],
    );
    return (result.rowCount ?? 0) === 1;
  }

  async deleteIfMissingSince(credentialId: string, missingSince: string): Promise<boolean> {
    const result = await this.pool.query(
      `
        DELETE FROM fl_credentials
        WHERE credential_id = $1
          AND missing_since = $2::timestamptz
      `,
      [credentialId, missingSince],
    );
    return (result.rowCount ?? 0) === 1;
  }

  async syncFromRemote(
    credentialId: string,
    expectedMissingSince: string | null,
    remote: RemoteCredentialState,
    now: string,
  ): Promise<boolean> {
    const result = await this.pool.query(
      `
        UPDATE fl_credentials
        SET remote_uuid = $3,
            expires_at = $4::timestamptz,
            connection_info = COALESCE($5, connection_info),
            missing_since = NULL,
            updated_at = $6::timestamptz
        WHERE credential_id = $1
          AND missing_since IS NOT DISTINCT FROM $2::timestamptz
      `,
      [credentialId, expectedMissingSince, remote.remoteUuid, remote.expiresAt, remote.connectionInfo, now],
    );
    return (result.rowCount ?? 0) === 1;
  }

  async delete(credentialId: string): Promise<boolean> {
    const result = await this.pool.query("DELETE FROM fl_credentials WHERE credential_id = $1", [credentialId]);
    return (result.rowCount ?? 0) === 1;
  }
}
