import { ProvisioningError } from "../../domain/provisioning-errors.js";
import type { ExistenceCheck } from "../../domain/types.js";
import type {
  CreateOrExtendInput,
  ExistsInput,
  ProvisionedCredential,
  ProvisioningClientPort,
} from "../../ports/provisioning-client.js";

interface HttpProvisioningOptions {
  baseUrl: string;
  apiToken: string;
  fetchImpl?: typeof fetch;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/** REST client for the provisioning panel: bearer token, JSON bodies, per-call timeout. */
export class HttpProvisioningClient implements ProvisioningClientPort {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpProvisioningOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async createOrExtend(input: CreateOrExtendInput): Promise<ProvisionedCredential> {
    const response = await this.fetchImpl(this.clientUrl(input.host, input.identity), {
      method: "PUT",
      headers: this.headers(),
      body: JSON.stringify({
        days_to_add: input.daysToAdd,
        ...(input.trafficLimitBytes !== undefined ? { traffic_limit_bytes: input.trafficLimitBytes } : {}),
        ...(input.deviceLimit !== undefined ? { device_limit: input.deviceLimit } : {}),
      }),
      signal: AbortSignal.timeout(input.timeoutMs),
    });
    const text = await response.text();
    if (!response.ok) {
      throw new ProvisioningError(`panel responded ${response.status}: ${text.slice(0, 500)}`, response.status);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw new ProvisioningError("panel returned a non-JSON body");
    }
    if (!isObject(payload) || typeof payload.uuid !== "string" || typeof payload.expires_at !== "string") {
      throw new ProvisioningError("panel response is missing uuid or expires_at");
    }
    const expiresAtMs = Date.parse(payload.expires_at);
    if (!Number.isFinite(expiresAtMs)) {
      throw new ProvisioningError("panel returned an invalid expires_at");
    }
    return {
      remoteUuid: payload.uuid,
      expiresAt: new Date(expiresAtMs).toISOString(),
      connectionInfo: typeof payload.subscription_url === "string" ? payload.subscription_url : null,
    };
  }

  async exists(input: ExistsInput): Promise<ExistenceCheck> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.clientUrl(input.host, input.identity), {
        method: "GET",
        headers: this.headers(),
        signal: AbortSignal.timeout(input.timeoutMs),
      });
    } catch {
      return { state: "unknown" };
    }
    if (response.status === 404) {
      return { state: "absent" };
    }
    if (!response.ok) {
      return { state: "unknown" };
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      return { state: "unknown" };
    }
    if (!isObject(payload) || typeof payload.uuid !== "string" || typeof payload.expires_at !== "string") {
      return { state: "unknown" };
    }
    const expiresAtMs = Date.parse(payload.expires_at);
    if (!Number.isFinite(expiresAtMs)) {
      return { state: "unknown" };
    }
    return {
      state: "present",
      remoteUuid: payload.uuid,
      expiresAt: new Date(expiresAtMs).toISOString(),
      connectionInfo: typeof payload.subscription_url === "string" ? payload.subscription_url : null,
    };
  }

  async delete(host: string, identity: string, timeoutMs: number): Promise<boolean> {
    const response = await this.fetchImpl(this.clientUrl(host, identity), {
      method: "DELETE",
      headers: this.headers(),
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (response.status === 404) {
      return false;
    }
    if (!response.ok) {
      throw new ProvisioningError(`panel responded ${response.status} on delete`, response.status);
    }
    return true;
  }

  private clientUrl(host: string, identity: string): string {
    return `${this.baseUrl}/api/hosts/${encodeURIComponent(host)}/clients/${encodeURIComponent(identity)}`;
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.options.apiToken}`,
      "Content-Type": "application/json",
      Accept: "application/json",
    };
  }
}
