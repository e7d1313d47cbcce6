import { Redis } from "ioredis";
import { Kafka } from "kafkajs";
import { AnalyticsService } from "./application/analytics-service.js";
import { CacheAsideOrchestrator } from "./application/cache-aside.js";
import { BackgroundEventEmitter } from "./application/event-emitter.js";
import { InferenceService } from "./application/inference-service.js";
import { ModelRegistry } from "./application/model-registry.js";
import { UsageAccountant } from "./application/usage-accountant.js";
import { InMemoryCacheStore } from "./adapters/inmemory/cache-store.js";
import { InMemoryEventTransport } from "./adapters/inmemory/event-transport.js";
import { KafkaEventTransport } from "./adapters/kafka/event-transport.js";
import { RedisCacheStore } from "./adapters/redis/cache-store.js";
import { RedisRateLimiter } from "./adapters/redis/rate-limiter.js";
import type { ModelDefinition } from "./domain/models.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import type { RuntimeConfig } from "./infra/config.js";
import type { Logger } from "./infra/logger.js";
import { ServiceMetricsRegistry } from "./infra/metrics.js";
import { InMemoryRateLimiter } from "./infra/rate-limiter.js";
import type { CacheStorePort } from "./ports/cache-store.js";
import type { EventTransportPort } from "./ports/event-transport.js";
import type { RateLimiterPort } from "./ports/rate-limiter.js";

export interface ContainerOverrides {
  clock?: ClockPort;
  cacheStore?: CacheStorePort;
  eventTransport?: EventTransportPort;
  rateLimiter?: RateLimiterPort;
  /** Replaces the built-in model catalogue. */
  models?: readonly ModelDefinition[];
}

/**
 * Owns every process-wide dependency of one app instance. Connections are
 * created lazily by their clients and released in `close()`.
 */
export class ServiceContainer {
  readonly clock: ClockPort;
  readonly metrics = new ServiceMetricsRegistry();
  readonly cacheStore: CacheStorePort;
  readonly eventTransport: EventTransportPort;
  readonly rateLimiter: RateLimiterPort;
  readonly models: ModelRegistry;
  readonly usage: UsageAccountant;
  readonly cacheAside: CacheAsideOrchestrator;
  readonly events: BackgroundEventEmitter;
  readonly inference: InferenceService;
  readonly analytics: AnalyticsService;

  private readonly closeActions: Array<() => Promise<void>> = [];
  private closed = false;

  constructor(config: RuntimeConfig, logger: Logger, overrides: ContainerOverrides = {}) {
    const clock = overrides.clock ?? new SystemClock();
    this.clock = clock;

    let redisClient: Redis | null = null;
    if (overrides.cacheStore) {
      this.cacheStore = overrides.cacheStore;
    } else if (config.cacheBackend === "redis") {
      redisClient = new Redis({
        host: config.redisHost,
        port: config.redisPort,
        db: config.redisDb,
        lazyConnect: true,
        commandTimeout: config.redisCommandTimeoutMs,
        maxRetriesPerRequest: 1,
      });
      this.cacheStore = new RedisCacheStore(redisClient);
    } else {
      this.cacheStore = new InMemoryCacheStore({ nowMs: () => clock.nowMs() });
    }
    const { cacheStore } = this;
    if (cacheStore.close) {
      this.closeActions.push(async () => {
        await cacheStore.close?.();
      });
    }

    if (overrides.rateLimiter) {
      this.rateLimiter = overrides.rateLimiter;
    } else if (redisClient) {
      this.rateLimiter = new RedisRateLimiter(redisClient, {
        windowSeconds: config.rateLimitWindowSeconds,
        maxRequests: config.rateLimitMaxRequests,
        keyPrefix: "aiml:ratelimit",
      });
    } else {
      this.rateLimiter = new InMemoryRateLimiter({
        windowSeconds: config.rateLimitWindowSeconds,
        maxRequests: config.rateLimitMaxRequests,
        nowMs: () => clock.nowMs(),
      });
    }

    this.eventTransport =
      overrides.eventTransport ??
      (config.eventTransport === "kafka"
        ? new KafkaEventTransport(new Kafka({ clientId: config.kafkaClientId, brokers: config.kafkaBrokers }), {
          sendTimeoutMs: config.kafkaSendTimeoutMs,
        })
        : new InMemoryEventTransport());

    this.models = new ModelRegistry(clock, logger, overrides.models);
    this.usage = new UsageAccountant(this.cacheStore, clock, this.metrics, logger);
    this.cacheAside = new CacheAsideOrchestrator(this.cacheStore, this.metrics, logger);
    this.events = new BackgroundEventEmitter(this.eventTransport, clock, this.metrics, logger, {
      serviceName: config.serviceName,
      capacity: config.eventQueueCapacity,
      workers: config.eventWorkers,
      maxAttempts: config.eventMaxAttempts,
      sendTimeoutMs: config.kafkaSendTimeoutMs,
      overflowPolicy: config.eventOverflowPolicy,
    });
    // The emitter drains its queue and then closes the transport.
    const { events } = this;
    this.closeActions.push(async () => {
      await events.close();
    });

    this.inference = new InferenceService(this.models, this.cacheAside, this.usage, this.events, clock, {
      predictionTtlSeconds: config.predictionTtlSeconds,
      recommendationTtlSeconds: config.recommendationTtlSeconds,
    });
    this.analytics = new AnalyticsService(
      this.cacheStore,
      this.usage,
      this.models,
      this.events,
      this.eventTransport,
      this.metrics,
      clock,
      logger,
      {
        serviceName: config.serviceName,
        sendTimeoutMs: config.kafkaSendTimeoutMs,
      },
    );
  }

  async open(): Promise<void> {
    await this.models.load();
  }

  /** Idempotent; events are drained before the cache connection goes away. */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const closeAction of [...this.closeActions].reverse()) {
      await closeAction();
    }
  }
}
