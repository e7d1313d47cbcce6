import { randomUUID } from "node:crypto";
import type { Redis } from "ioredis";
import type { RateLimitDecision } from "../../infra/rate-limiter.js";
import type { RateLimiterPort } from "../../ports/rate-limiter.js";

interface RedisRateLimiterOptions {
  windowSeconds: number;
  maxRequests: number;
  keyPrefix: string;
  nowMs?: () => number;
}

const SLIDING_WINDOW_LUA = `
local key = KEYS[1]
local now_ms = tonumber(ARGV[1])
local window_ms = tonumber(ARGV[2])
local max_requests = tonumber(ARGV[3])
local member = ARGV[4]

redis.call('ZREMRANGEBYSCORE', key, '-inf', now_ms - window_ms)
local count = redis.call('ZCARD', key)

local allowed = 0
if count < max_requests then
  redis.call('ZADD', key, now_ms, member)
  count = count + 1
  allowed = 1
end
redis.call('PEXPIRE', key, window_ms)

local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
local newest = redis.call('ZRANGE', key, -1, -1, 'WITHSCORES')
local oldest_ms = now_ms
local newest_ms = now_ms
if oldest[2] then
  oldest_ms = tonumber(oldest[2])
end
if newest[2] then
  newest_ms = tonumber(newest[2])
end

local retry_seconds = 0
if allowed == 0 then
  retry_seconds = math.max(1, math.ceil((oldest_ms + window_ms - now_ms) / 1000))
end
local reset_seconds = math.max(1, math.ceil((newest_ms + window_ms - now_ms) / 1000))
local remaining = max_requests - count
if remaining < 0 then
  remaining = 0
end

return { allowed, max_requests, remaining, reset_seconds, retry_seconds }
`;

export class RedisRateLimiter implements RateLimiterPort {
  private readonly windowMs: number;
  private readonly nowMs: () => number;

  constructor(
    private readonly redis: Redis,
    private readonly options: RedisRateLimiterOptions,
  ) {
    this.windowMs = options.windowSeconds * 1000;
    this.nowMs = options.nowMs ?? (() => Date.now());
  }

  async consume(identity: string): Promise<RateLimitDecision> {
    const key = `${this.options.keyPrefix}:${identity}`;
    const nowMs = this.nowMs();
    const raw = await this.redis.eval(
      SLIDING_WINDOW_LUA,
      1,
      key,
      nowMs,
      this.windowMs,
      this.options.maxRequests,
      `${nowMs}:${randomUUID()}`,
    );
    const values = Array.isArray(raw) ? raw : [];

    return {
      allowed: Number(values[0]) === 1,
      limit: Number(values[1]),
      remaining: Number(values[2]),
      resetSeconds: Number(values[3]),
      retryAfterSeconds: Number(values[4]),
    };
  }
}
