import { AppError } from "../../infra/app-error.js";
import { TokenBucketPolicy, type RateLimitDecision, type TokenBucketOptions } from "../../infra/rate-limiter.js";
import type { RateLimiterPort } from "../../ports/rate-limiter.js";

/** The slice of an ioredis client the limiter needs. */
export interface LuaScriptRunner {
  eval(script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>;
}

export interface RedisRateLimiterOptions extends TokenBucketOptions {
  keyPrefix: string;
}

// Refill and take only; the decision is built by TokenBucketPolicy so both backends answer alike.
const TAKE_TOKEN_LUA = `
local key = KEYS[1]
local now_ms = tonumber(ARGV[1])
local refill_per_ms = tonumber(ARGV[2])
local max_tokens = tonumber(ARGV[3])
local max_idle_ms = tonumber(ARGV[4])

local tokens = tonumber(redis.call('HGET', key, 'tokens')) or max_tokens
local refilled_at_ms = tonumber(redis.call('HGET', key, 'refilled_at_ms')) or now_ms
if now_ms > refilled_at_ms then
  tokens = math.min(max_tokens, tokens + (now_ms - refilled_at_ms) * refill_per_ms)
  refilled_at_ms = now_ms
end

local allowed = 0
if tokens >= 1 then
  tokens = tokens - 1
  allowed = 1
end

redis.call('HSET', key, 'tokens', tostring(tokens), 'refilled_at_ms', refilled_at_ms)
redis.call('PEXPIRE', key, max_idle_ms)
return { allowed, tostring(tokens) }
`;

/** Bucket shared by every API replica, keyed `<prefix>:<identity>`. */
export class RedisRateLimiter implements RateLimiterPort {
  private readonly policy: TokenBucketPolicy;

  constructor(
    private readonly redis: LuaScriptRunner,
    private readonly options: RedisRateLimiterOptions,
  ) {
    this.policy = new TokenBucketPolicy(options);
  }

  async consume(identity: string): Promise<RateLimitDecision> {
    const reply = await this.redis.eval(
      TAKE_TOKEN_LUA,
      1,
      `${this.options.keyPrefix}:${identity}`,
      this.policy.nowMs(),
      this.policy.refillPerMs,
      this.options.maxRequests,
      this.policy.maxIdleMs,
    );
    if (!Array.isArray(reply) || reply.length !== 2) {
      throw new AppError(503, "rate_limiter_unavailable", "Rate limiter returned an unexpected reply.");
    }
    const allowed = Number(reply[0]);
    const tokens = Number(reply[1]);
    if (!Number.isFinite(tokens)) {
      throw new AppError(503, "rate_limiter_unavailable", "Rate limiter returned an unexpected reply.");
    }
    return this.policy.decide(allowed === 1, tokens);
  }
}
