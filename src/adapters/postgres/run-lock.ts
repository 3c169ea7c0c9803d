import { createHash } from "node:crypto";
import type { Pool } from "pg";
import type { RunLockPort } from "../../ports/run-lock.js";

function advisoryLockId(scope: string): bigint {
  const digest = createHash("sha256").update(`fl-run:${scope}`).digest();
  return digest.readBigInt64BE(0);
}

/** Session advisory lock, so concurrent processes serialize the same scope. */
export class PostgresRunLock implements RunLockPort {
  constructor(private readonly pool: Pool) {}

  async withLock<TOutput>(scope: string, operation: () => Promise<TOutput>): Promise<TOutput> {
    const lockKey = advisoryLockId(scope).toString();
    const client = await this.pool.connect();
    try {
      await client.query("SELECT pg_advisory_lock($1::bigint)", [lockKey]);
      try {
        return await operation();
      } finally {
        await client.query("SELECT pg_advisory_unlock($1::bigint)", [lockKey]);
      }
    } finally {
      client.release();
    }
  }
}
