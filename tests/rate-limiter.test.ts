import { describe, expect, it } from "vitest";
import { RedisRateLimiter, type LuaScriptRunner } from "../src/adapters/redis/rate-limiter.js";
import { InMemoryRateLimiter } from "../src/infra/rate-limiter.js";

describe("InMemoryRateLimiter", () => {
  it("allows requests inside the configured window", () => {
    const limiter = new InMemoryRateLimiter({
      windowSeconds: 1,
      maxRequests: 2,
      nowMs: () => 1_000,
    });

    const first = limiter.consume("webhook:yookassa");
    const second = limiter.consume("webhook:yookassa");

    expect(first).toEqual({ allowed: true, limit: 2, remaining: 1, resetSeconds: 1, retryAfterSeconds: 0 });
    expect(second.allowed).toBe(true);
    expect(second.remaining).toBe(0);
  });

  it("blocks requests over quota and allows again after refill", () => {
    let nowMs = 5_000;
    const limiter = new InMemoryRateLimiter({
      windowSeconds: 10,
      maxRequests: 1,
      nowMs: () => nowMs,
    });

    expect(limiter.consume("api:abc").allowed).toBe(true);
    const blocked = limiter.consume("api:abc");
    expect(blocked.allowed).toBe(false);
    expect(blocked.remaining).toBe(0);
    expect(blocked.retryAfterSeconds).toBe(10);

    nowMs = 15_000;
    const refilled = limiter.consume("api:abc");
    expect(refilled.allowed).toBe(true);
    expect(refilled.remaining).toBe(0);
  });

  it("keeps independent buckets per identity", () => {
    const limiter = new InMemoryRateLimiter({
      windowSeconds: 60,
      maxRequests: 1,
      nowMs: () => 1_000,
    });

    expect(limiter.consume("webhook:yookassa").allowed).toBe(true);
    expect(limiter.consume("webhook:heleket").allowed).toBe(true);
    expect(limiter.consume("webhook:yookassa").allowed).toBe(false);
  });
});

describe("RedisRateLimiter", () => {
  function redisWith(replies: unknown[]) {
    const calls: Array<Array<string | number>> = [];
    const redis: LuaScriptRunner = {
      eval: async (_script, _numKeys, ...args) => {
        calls.push(args);
        return replies.shift();
      },
    };
    const limiter = new RedisRateLimiter(redis, {
      windowSeconds: 10,
      maxRequests: 4,
      keyPrefix: "fl:ratelimit",
      nowMs: () => 7_000,
    });
    return { calls, limiter };
  }

  it("keys the bucket by identity and passes the refill rate", async () => {
    const { calls, limiter } = redisWith([[1, "3"]]);

    const decision = await limiter.consume("api:abc");

    expect(calls).toEqual([["fl:ratelimit:api:abc", 7_000, 0.0004, 4, 30_000]]);
    expect(decision).toEqual({ allowed: true, limit: 4, remaining: 3, resetSeconds: 3, retryAfterSeconds: 0 });
  });

  it("answers a rejected take the way the in-process limiter does", async () => {
    const { limiter } = redisWith([[0, "0.25"]]);

    expect(await limiter.consume("webhook:yookassa")).toEqual({
      allowed: false,
      limit: 4,
      remaining: 0,
      resetSeconds: 10,
      retryAfterSeconds: 2,
    });
  });

  it("fails closed on a malformed reply", async () => {
    const { limiter } = redisWith([[1, 2, 3, 4, 5]]);

    await expect(limiter.consume("api:abc")).rejects.toMatchObject({
      statusCode: 503,
      code: "rate_limiter_unavailable",
    });
  });
});
