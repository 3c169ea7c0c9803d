import type { RunLockPort } from "../../ports/run-lock.js";
import { KeyedLock } from "./keyed-lock.js";

export class InMemoryRunLock implements RunLockPort {
  private readonly lock = new KeyedLock();

  async withLock<TOutput>(scope: string, operation: () => Promise<TOutput>): Promise<TOutput> {
    return this.lock.run(scope, operation);
  }
}
