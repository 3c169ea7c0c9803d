import { randomUUID } from "node:crypto";
import { addDays } from "../../domain/duration.js";
import { ProvisioningError } from "../../domain/provisioning-errors.js";
import type { ExistenceCheck } from "../../domain/types.js";
import type { ClockPort } from "../../infra/clock.js";
import { SystemClock } from "../../infra/clock.js";
import type {
  CreateOrExtendInput,
  ExistsInput,
  ProvisionedCredential,
  ProvisioningClientPort,
} from "../../ports/provisioning-client.js";

interface MockProvisioningOptions {
  hosts: string[];
  clock?: ClockPort;
  subscriptionBaseUrl?: string;
}

interface RemoteClient {
  uuid: string;
  expiresAt: string;
}

/**
 * In-process provisioning panel. Tests script failures and existence answers;
 * otherwise it behaves like a panel that keeps every client it created.
 */
export class MockProvisioningClient implements ProvisioningClientPort {
  readonly createCalls: CreateOrExtendInput[] = [];
  private readonly hosts: Set<string>;
  private readonly clients = new Map<string, RemoteClient>();
  private readonly queuedFailures: Error[] = [];
  private readonly scriptedExistence = new Map<string, ExistenceCheck[]>();
  private readonly clock: ClockPort;

  constructor(private readonly options: MockProvisioningOptions) {
    this.hosts = new Set(options.hosts);
    this.clock = options.clock ?? new SystemClock();
  }

  failNextCreate(error: Error): void {
    this.queuedFailures.push(error);
  }

  /** Answers for the next `exists` calls on `identity`, consumed in order. */
  scriptExistence(identity: string, observations: ExistenceCheck[]): void {
    const queue = this.scriptedExistence.get(identity.toLowerCase()) ?? [];
    queue.push(...observations);
    this.scriptedExistence.set(identity.toLowerCase(), queue);
  }

  removeRemote(host: string, identity: string): void {
    this.clients.delete(this.clientKey(host, identity));
  }

  async createOrExtend(input: CreateOrExtendInput): Promise<ProvisionedCredential> {
    this.createCalls.push({ ...input });
    const failure = this.queuedFailures.shift();
    if (failure) {
      throw failure;
    }
    if (!this.hosts.has(input.host)) {
      throw new ProvisioningError(`host '${input.host}' not found`, 404);
    }

    const key = this.clientKey(input.host, input.identity);
    const now = this.clock.nowIso();
    const existing = this.clients.get(key);
    const base = existing && Date.parse(existing.expiresAt) > Date.parse(now) ? existing.expiresAt : now;
    const client: RemoteClient = {
      uuid: existing?.uuid ?? randomUUID(),
      expiresAt: addDays(base, input.daysToAdd),
    };
    this.clients.set(key, client);

    return this.describe(client);
  }

  async exists(input: ExistsInput): Promise<ExistenceCheck> {
    const scripted = this.scriptedExistence.get(input.identity.toLowerCase())?.shift();
    if (scripted) {
      return scripted;
    }
    if (!this.hosts.has(input.host)) {
      return { state: "unknown" };
    }
    const client = this.clients.get(this.clientKey(input.host, input.identity));
    return client ? { state: "present", ...this.describe(client) } : { state: "absent" };
  }

  async delete(host: string, identity: string): Promise<boolean> {
    return this.clients.delete(this.clientKey(host, identity));
  }

  private describe(client: RemoteClient): ProvisionedCredential {
    const subscriptionBaseUrl = this.options.subscriptionBaseUrl ?? "https://panel.example.test/sub";
    return {
      remoteUuid: client.uuid,
      expiresAt: client.expiresAt,
      connectionInfo: `${subscriptionBaseUrl}/${client.uuid}`,
    };
  }

  private clientKey(host: string, identity: string): string {
    return `${host}:${identity.toLowerCase()}`;
  }
}
