import { describe, expect, it } from "vitest";
import { CredentialAdminService } from "../src/application/credential-admin.js";
import { InMemoryCredentialRepository } from "../src/adapters/inmemory/credential-repository.js";
import { MockProvisioningClient } from "../src/adapters/provisioning/mock-provisioning-client.js";
import type { CredentialRecord } from "../src/domain/types.js";
import { silentLogger } from "../src/infra/logger.js";
import type { ProvisioningClientPort } from "../src/ports/provisioning-client.js";

function credential(overrides: Partial<CredentialRecord> = {}): CredentialRecord {
  return {
    credential_id: "c1",
    owner_id: 42,
    provider_host: "main",
    remote_uuid: "remote-1",
    unique_identity: "u42-a",
    expires_at: "2026-04-01T00:00:00.000Z",
    missing_since: null,
    origin: { kind: "purchase", plan_id: "plan_1m", plan_name: "One month", days: 30, label: "1 month" },
    connection_info: null,
    created_at: "2026-03-01T09:00:00.000Z",
    updated_at: "2026-03-01T09:00:00.000Z",
    ...overrides,
  };
}

function setup(provisioning: ProvisioningClientPort) {
  const credentials = new InMemoryCredentialRepository();
  const admin = new CredentialAdminService(credentials, provisioning, silentLogger(), { timeoutMs: 500 });
  return { admin, credentials };
}

describe("CredentialAdminService", () => {
  it("deletes the panel client before the stored row", async () => {
    const provisioning = new MockProvisioningClient({ hosts: ["main"] });
    await provisioning.createOrExtend({ host: "main", identity: "u42-a", daysToAdd: 30, timeoutMs: 500 });
    const { admin, credentials } = setup(provisioning);
    await credentials.create(credential());

    expect(await admin.revoke("c1")).toEqual({
      credential_id: "c1",
      owner_id: 42,
      remote_deleted: true,
      local_deleted: true,
    });
    expect(await provisioning.exists({ host: "main", identity: "u42-a", timeoutMs: 500 })).toEqual({
      state: "absent",
    });
    expect(await credentials.getById("c1")).toBeNull();
  });

  it("removes the row when the panel no longer knows the client", async () => {
    const { admin, credentials } = setup(new MockProvisioningClient({ hosts: ["main"] }));
    await credentials.create(credential());

    expect(await admin.revoke("c1")).toMatchObject({ remote_deleted: false, local_deleted: true });
    expect(await credentials.getById("c1")).toBeNull();
  });

  it("keeps the row when the panel delete fails", async () => {
    const unreachable: ProvisioningClientPort = {
      createOrExtend: async () => {
        throw new Error("not used");
      },
      exists: async () => ({ state: "unknown" }),
      delete: async () => {
        throw new TypeError("fetch failed");
      },
    };
    const { admin, credentials } = setup(unreachable);
    await credentials.create(credential());

    await expect(admin.revoke("c1")).rejects.toMatchObject({ statusCode: 502, code: "provisioning_unavailable" });
    expect(await credentials.getById("c1")).not.toBeNull();
  });

  it("rejects an unknown credential", async () => {
    const { admin } = setup(new MockProvisioningClient({ hosts: ["main"] }));

    await expect(admin.revoke("missing")).rejects.toMatchObject({ statusCode: 404, code: "credential_not_found" });
  });
});
