import type { ClockPort } from "../infra/clock.js";
import { utcDay } from "../infra/clock.js";
import { API_USAGE_PREFIX, cacheKeys } from "../infra/fingerprint.js";
import type { Logger } from "../infra/logger.js";
import type { ServiceMetricsRegistry } from "../infra/metrics.js";
import type { CacheStorePort } from "../ports/cache-store.js";

export class UsageAccountant {
  constructor(
    private readonly store: CacheStorePort,
    private readonly clock: ClockPort,
    private readonly metrics: ServiceMetricsRegistry,
    private readonly logger: Logger,
  ) {}

  /**
   * Counts one request against the endpoint, the user (when known) and the
   * current UTC day. Never rejects.
   */
  async record(endpoint: string, userId?: string): Promise<void> {
    const day = utcDay(this.clock.nowMs());
    const keys = [cacheKeys.apiUsage(endpoint), cacheKeys.dailyUsage(day, endpoint)];
    if (userId && userId.length > 0) {
      keys.push(cacheKeys.userUsage(userId, endpoint));
    }

    const results = await Promise.allSettled(keys.map((key) => this.store.increment(key)));
    for (const [index, result] of results.entries()) {
      if (result.status === "rejected") {
        this.metrics.recordUsageTrackingFailure(endpoint);
        this.logger.warn({ err: result.reason, key: keys[index] }, "Usage tracking increment failed");
      }
    }
  }

  /** Global counters keyed by endpoint. */
  async endpointCounts(): Promise<Map<string, number>> {
    const keys = await this.store.keysWithPrefix(API_USAGE_PREFIX);
    const counts = new Map<string, number>();
    const values = await Promise.all(keys.map((key) => this.store.get<number>(key)));
    for (const [index, key] of keys.entries()) {
      counts.set(key.slice(API_USAGE_PREFIX.length), Number(values[index] ?? 0));
    }
    return counts;
  }

  async dailyCount(day: string, endpoint: string): Promise<number> {
    return Number((await this.store.get<number>(cacheKeys.dailyUsage(day, endpoint))) ?? 0);
  }

  async userCount(userId: string, endpoint: string): Promise<number> {
    return Number((await this.store.get<number>(cacheKeys.userUsage(userId, endpoint))) ?? 0);
  }
}
