import type { RateLimiterPort } from "../ports/rate-limiter.js";

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetSeconds: number;
  retryAfterSeconds: number;
}

export interface TokenBucketOptions {
  windowSeconds: number;
  maxRequests: number;
  nowMs?: () => number;
  maxIdleWindows?: number;
}

/**
 * Token bucket maths shared by every limiter backend: `maxRequests` tokens
 * refill evenly over `windowSeconds`. Backends only store `tokens` and the
 * instant they were last refilled.
 */
export class TokenBucketPolicy {
  readonly windowMs: number;
  readonly refillPerMs: number;
  readonly maxIdleMs: number;
  readonly nowMs: () => number;

  constructor(readonly options: TokenBucketOptions) {
    this.windowMs = options.windowSeconds * 1000;
    this.refillPerMs = options.maxRequests / this.windowMs;
    this.maxIdleMs = this.windowMs * (options.maxIdleWindows ?? 3);
    this.nowMs = options.nowMs ?? (() => Date.now());
  }

  refill(tokens: number, refilledAtMs: number, nowMs: number): number {
    if (nowMs <= refilledAtMs) {
      return tokens;
    }
    return Math.min(this.options.maxRequests, tokens + (nowMs - refilledAtMs) * this.refillPerMs);
  }

  /** `tokens` is what is left after this call took its token, if it got one. */
  decide(allowed: boolean, tokens: number): RateLimitDecision {
    return {
      allowed,
      limit: this.options.maxRequests,
      remaining: Math.max(0, Math.floor(tokens)),
      resetSeconds: this.secondsUntil(this.options.maxRequests - tokens),
      retryAfterSeconds: allowed ? 0 : this.secondsUntil(1 - tokens),
    };
  }

  private secondsUntil(tokens: number): number {
    if (tokens <= 0) {
      return 1;
    }
    return Math.max(1, Math.ceil(tokens / this.refillPerMs / 1000));
  }
}

interface Bucket {
  tokens: number;
  refilledAtMs: number;
  seenAtMs: number;
}

const SWEEP_EVERY = 1000;

/** Single-process limiter; idle buckets are swept every thousand calls. */
export class InMemoryRateLimiter implements RateLimiterPort {
  private readonly buckets = new Map<string, Bucket>();
  private readonly policy: TokenBucketPolicy;
  private calls = 0;

  constructor(options: TokenBucketOptions) {
    this.policy = new TokenBucketPolicy(options);
  }

  consume(identity: string): RateLimitDecision {
    const nowMs = this.policy.nowMs();
    const bucket = this.buckets.get(identity) ?? {
      tokens: this.policy.options.maxRequests,
      refilledAtMs: nowMs,
      seenAtMs: nowMs,
    };
    bucket.tokens = this.policy.refill(bucket.tokens, bucket.refilledAtMs, nowMs);
    bucket.refilledAtMs = Math.max(bucket.refilledAtMs, nowMs);
    bucket.seenAtMs = nowMs;
    const allowed = bucket.tokens >= 1;
    if (allowed) {
      bucket.tokens -= 1;
    }
    this.buckets.set(identity, bucket);

    this.calls += 1;
    if (this.calls % SWEEP_EVERY === 0) {
      this.sweep(nowMs);
    }
    return this.policy.decide(allowed, bucket.tokens);
  }

  private sweep(nowMs: number): void {
    for (const [identity, bucket] of this.buckets) {
      if (nowMs - bucket.seenAtMs > this.policy.maxIdleMs) {
        this.buckets.delete(identity);
      }
    }
  }
}
