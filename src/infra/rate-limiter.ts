interface SlidingWindowState {
  hits: number[];
  lastSeenMs: number;
}

interface InMemoryRateLimiterOptions {
  windowSeconds: number;
  maxRequests: number;
  nowMs?: () => number;
  maxIdleWindows?: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetSeconds: number;
  retryAfterSeconds: number;
}

/**
 * Sliding-window log: a client may make `maxRequests` requests within any
 * `windowSeconds` span. Rejected requests are not logged.
 */
export class InMemoryRateLimiter {
  private readonly clients = new Map<string, SlidingWindowState>();
  private readonly windowMs: number;
  private readonly maxIdleMs: number;
  private readonly nowMs: () => number;
  private consumeCount = 0;

  constructor(private readonly options: InMemoryRateLimiterOptions) {
    this.windowMs = options.windowSeconds * 1000;
    this.maxIdleMs = this.windowMs * (options.maxIdleWindows ?? 3);
    this.nowMs = options.nowMs ?? (() => Date.now());
  }

  consume(identity: string): RateLimitDecision {
    const nowMs = this.nowMs();
    const state = this.clients.get(identity) ?? { hits: [], lastSeenMs: nowMs };
    this.clients.set(identity, state);

    state.hits = state.hits.filter((hitMs) => nowMs - hitMs < this.windowMs);
    state.lastSeenMs = nowMs;

    const allowed = state.hits.length < this.options.maxRequests;
    if (allowed) {
      state.hits.push(nowMs);
    }

    const oldestHitMs = state.hits[0] ?? nowMs;
    const retryAfterSeconds = allowed ? 0 : this.secondsUntil(oldestHitMs + this.windowMs, nowMs);
    const newestHitMs = state.hits.at(-1) ?? nowMs;

    this.consumeCount += 1;
    if (this.consumeCount % 1000 === 0) {
      this.cleanupIdleClients(nowMs);
    }

    return {
      allowed,
      limit: this.options.maxRequests,
      remaining: Math.max(0, this.options.maxRequests - state.hits.length),
      resetSeconds: this.secondsUntil(newestHitMs + this.windowMs, nowMs),
      retryAfterSeconds,
    };
  }

  private secondsUntil(targetMs: number, nowMs: number): number {
    return Math.max(1, Math.ceil((targetMs - nowMs) / 1000));
  }

  private cleanupIdleClients(nowMs: number): void {
    for (const [identity, state] of this.clients.entries()) {
      if (nowMs - state.lastSeenMs > this.maxIdleMs) {
        this.clients.delete(identity);
      }
    }
  }
}
