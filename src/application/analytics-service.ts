import { randomUUID } from "node:crypto";
import type {
  HealthStatus,
  JsonObject,
  ModelPerformanceStats,
  TrendMetric,
  TrendPeriod,
  TrendPoint,
  UsageStats,
} from "../domain/types.js";
import { NotFoundError, UpstreamUnavailableError } from "../infra/app-error.js";
import { utcDay, type ClockPort } from "../infra/clock.js";
import { cacheKeys } from "../infra/fingerprint.js";
import type { Logger } from "../infra/logger.js";
import type { ServiceMetricsRegistry } from "../infra/metrics.js";
import { withTimeout } from "../infra/timeout.js";
import type { CacheStorePort } from "../ports/cache-store.js";
import type { EventTransportPort } from "../ports/event-transport.js";
import type { BackgroundEventEmitter } from "./event-emitter.js";
import { USAGE_ENDPOINTS } from "./inference-service.js";
import type { ModelRegistry } from "./model-registry.js";
import type { UsageAccountant } from "./usage-accountant.js";

const DAY_MS = 86_400_000;
const TOP_ENDPOINT_COUNT = 5;
const HEALTH_CHECK_KEY = "health_check";

export const ANALYTICS_EVENTS_TOPIC = "analytics-events";

const METRIC_ENDPOINTS: Record<Exclude<TrendMetric, "requests">, string> = {
  predictions: USAGE_ENDPOINTS.predict,
  recommendations: USAGE_ENDPOINTS.recommend,
  sentiment: USAGE_ENDPOINTS.sentiment,
};

const PERIOD_DAYS: Record<TrendPeriod, number> = {
  "7d": 7,
  "30d": 30,
};

export interface AnalyticsServiceOptions {
  serviceName: string;
  sendTimeoutMs: number;
}

export interface PerformanceSnapshot {
  total_predictions: number;
  average_response_time: number;
  cache_hit_rate: number;
  error_rate: number;
  active_models: number;
  timestamp: string;
}

export interface TrendReport {
  metric: TrendMetric;
  period: TrendPeriod;
  interval: "day";
  data_points: number;
  data: TrendPoint[];
}

export interface TrackedEventReceipt {
  status: "success";
  message: string;
  event_id: string;
}

export interface AnalyticsHealthReport {
  status: HealthStatus;
  components: {
    cache: HealthStatus;
    event_transport: { backend: string; pending_events: number };
    analytics_engine: HealthStatus;
  };
  timestamp: string;
  uptime_seconds: number;
}

function bytesToMegabytes(bytes: number): number {
  return Math.round((bytes / 1024 / 1024) * 10) / 10;
}

export class AnalyticsService {
  constructor(
    private readonly store: CacheStorePort,
    private readonly usage: UsageAccountant,
    private readonly models: ModelRegistry,
    private readonly events: BackgroundEventEmitter,
    private readonly transport: EventTransportPort,
    private readonly metrics: ServiceMetricsRegistry,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly options: AnalyticsServiceOptions,
  ) {}

  async usageStatistics(days: number): Promise<UsageStats[]> {
    const counts = await this.readCounts();
    const window = this.lastDays(days);
    const stats: UsageStats[] = [];
    for (const [endpoint, requestCount] of counts.entries()) {
      const windowCount = await this.sumDaily(window, [endpoint]);
      stats.push({
        endpoint,
        request_count: requestCount,
        window_request_count: windowCount,
        average_daily_usage: Math.round((windowCount / days) * 100) / 100,
      });
    }
    return stats.sort((a, b) => b.request_count - a.request_count || a.endpoint.localeCompare(b.endpoint));
  }

  async performance(): Promise<PerformanceSnapshot> {
    const counts = await this.readCounts();
    return {
      total_predictions: [...counts.values()].reduce((sum, value) => sum + value, 0),
      average_response_time: this.metrics.averageResponseTimeMs(),
      cache_hit_rate: this.metrics.cacheHitRate(),
      error_rate: this.metrics.errorRate(),
      active_models: this.models.activeModelCount(),
      timestamp: this.clock.nowIso(),
    };
  }

  async modelPerformance(modelName: string): Promise<ModelPerformanceStats>;
  async modelPerformance(): Promise<Record<string, ModelPerformanceStats>>;
  async modelPerformance(
    modelName?: string,
  ): Promise<ModelPerformanceStats | Record<string, ModelPerformanceStats>> {
    if (modelName !== undefined) {
      return this.statsFor(modelName);
    }
    const all: Record<string, ModelPerformanceStats> = {};
    for (const model of this.models.list()) {
      all[model.name] = await this.statsFor(model.name);
    }
    return all;
  }

  async trends(metric: TrendMetric, period: TrendPeriod): Promise<TrendReport> {
    const endpoints =
      metric === "requests" ? [...(await this.readCounts()).keys()] : [METRIC_ENDPOINTS[metric]];
    const data: TrendPoint[] = [];
    for (const day of this.lastDays(PERIOD_DAYS[period])) {
      data.push({ date: day, value: await this.sumDaily([day], endpoints), metric });
    }
    return {
      metric,
      period,
      interval: "day",
      data_points: data.length,
      data,
    };
  }

  async dashboard(): Promise<JsonObject> {
    const counts = await this.readCounts();
    const memory = process.memoryUsage();
    const topEndpoints = [...counts.entries()]
      .sort(([endpointA, a], [endpointB, b]) => b - a || endpointA.localeCompare(endpointB))
      .slice(0, TOP_ENDPOINT_COUNT)
      .map(([endpoint, requests]) => ({ endpoint, requests }));

    return {
      overview: {
        total_requests: [...counts.values()].reduce((sum, value) => sum + value, 0),
        active_models: this.models.activeModelCount(),
        cache_hit_rate: this.metrics.cacheHitRate(),
        average_response_time: this.metrics.averageResponseTimeMs(),
        error_rate: this.metrics.errorRate(),
      },
      top_endpoints: topEndpoints,
      events: {
        published: this.metrics.eventCount("published"),
        failed: this.metrics.eventCount("failed"),
        dropped: this.metrics.eventCount("dropped"),
        pending: this.events.pendingCount(),
      },
      system_health: {
        rss_mb: bytesToMegabytes(memory.rss),
        heap_used_mb: bytesToMegabytes(memory.heapUsed),
        uptime_seconds: Math.floor(process.uptime()),
      },
      generated_at: this.clock.nowIso(),
    };
  }

  /** Synchronous publish: unlike background events, a failure here fails the request. */
  async trackEvent(payload: JsonObject): Promise<TrackedEventReceipt> {
    const eventId = `evt_${randomUUID()}`;
    const eventType =
      typeof payload.event_type === "string" && payload.event_type.length > 0 ? payload.event_type : "unknown";
    const message = {
      ...payload,
      event_id: eventId,
      timestamp: this.clock.nowIso(),
      service: this.options.serviceName,
    };

    try {
      await withTimeout(
        this.transport.send({ topic: ANALYTICS_EVENTS_TOPIC, key: eventType, value: message }),
        this.options.sendTimeoutMs,
        () => new Error(`Publishing to ${ANALYTICS_EVENTS_TOPIC} timed out.`),
      );
    } catch (error) {
      this.logger.error({ err: error, eventType }, "Failed to track event");
      throw new UpstreamUnavailableError("event_publish_failed", "Failed to track event.", { cause: error });
    }

    try {
      await this.store.increment(cacheKeys.eventCount(eventType));
    } catch (error) {
      this.logger.warn({ err: error, eventType }, "Event counter increment failed");
    }

    return {
      status: "success",
      message: "Event tracked successfully",
      event_id: eventId,
    };
  }

  async healthCheck(): Promise<AnalyticsHealthReport> {
    let cache: HealthStatus = "healthy";
    try {
      await this.store.set(HEALTH_CHECK_KEY, "ok", 60);
      const present = await this.store.exists(HEALTH_CHECK_KEY);
      const value = await this.store.get<string>(HEALTH_CHECK_KEY);
      if (!present || value !== "ok") {
        cache = "degraded";
      }
    } catch (error) {
      this.logger.warn({ err: error }, "Cache health check failed");
      cache = "unhealthy";
    }

    return {
      status: cache === "healthy" ? "healthy" : "degraded",
      components: {
        cache,
        event_transport: { backend: this.transport.name, pending_events: this.events.pendingCount() },
        analytics_engine: "healthy",
      },
      timestamp: this.clock.nowIso(),
      uptime_seconds: Math.floor(process.uptime()),
    };
  }

  private async statsFor(modelName: string): Promise<ModelPerformanceStats> {
    const definition = this.models.definition(modelName);
    if (!definition) {
      throw new NotFoundError("model_not_found", `Model not found: ${modelName}`);
    }
    try {
      const stored = await this.store.get<ModelPerformanceStats>(cacheKeys.modelPerformance(modelName));
      if (stored) {
        return stored;
      }
    } catch (error) {
      this.logger.warn({ err: error, modelName }, "Stored model performance unavailable; using defaults");
    }
    return { model_name: modelName, ...definition.performance };
  }

  private readCounts(): Promise<Map<string, number>> {
    return this.readUsage(() => this.usage.endpointCounts());
  }

  private async readUsage<TValue>(read: () => Promise<TValue>): Promise<TValue> {
    try {
      return await read();
    } catch (error) {
      throw new UpstreamUnavailableError("usage_unavailable", "Usage statistics are unavailable.", { cause: error });
    }
  }

  /** UTC days, oldest first, ending today. */
  private lastDays(days: number): string[] {
    const nowMs = this.clock.nowMs();
    return Array.from({ length: days }, (_, index) => utcDay(nowMs - (days - 1 - index) * DAY_MS));
  }

  private async sumDaily(days: string[], endpoints: string[]): Promise<number> {
    let total = 0;
    for (const day of days) {
      for (const endpoint of endpoints) {
        total += await this.readUsage(() => this.usage.dailyCount(day, endpoint));
      }
    }
    return total;
  }
}
