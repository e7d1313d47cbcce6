import { vi } from "vitest";
import { InMemoryCacheStore } from "../src/adapters/inmemory/cache-store.js";
import type { ClockPort } from "../src/infra/clock.js";
import type { RuntimeConfig } from "../src/infra/config.js";
import type { Logger } from "../src/infra/logger.js";

export const TEST_JWT_SECRET = "test-secret";

export function silentLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export class ManualClock implements ClockPort {
  constructor(public currentMs: number) {}

  nowIso(): string {
    return new Date(this.currentMs).toISOString();
  }

  nowMs(): number {
    return this.currentMs;
  }

  advanceSeconds(seconds: number): void {
    this.currentMs += seconds * 1000;
  }
}

/** In-memory store whose operations can be switched to fail. */
export class FlakyCacheStore extends InMemoryCacheStore {
  failGet = false;
  failSet = false;
  failIncrement = false;
  /** Thrown from `keysWithPrefix` when set. */
  scanError: Error | null = null;

  override async get<TValue>(key: string): Promise<TValue | null> {
    if (this.failGet) {
      throw new Error("cache read unavailable");
    }
    return super.get<TValue>(key);
  }

  override async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    if (this.failSet) {
      throw new Error("cache write unavailable");
    }
    await super.set(key, value, ttlSeconds);
  }

  override async increment(key: string, delta?: number): Promise<number> {
    if (this.failIncrement) {
      throw new Error("cache increment unavailable");
    }
    return super.increment(key, delta);
  }

  override async keysWithPrefix(prefix: string): Promise<string[]> {
    if (this.scanError) {
      throw this.scanError;
    }
    return super.keysWithPrefix(prefix);
  }
}

export function testConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    host: "127.0.0.1",
    port: 8083,
    logLevel: "silent",
    serviceName: "ai-ml-service",
    serviceVersion: "1.0.0",
    corsOrigins: ["*"],
    authEnabled: true,
    jwtSecret: TEST_JWT_SECRET,
    cacheBackend: "memory",
    redisHost: "localhost",
    redisPort: 6379,
    redisDb: 0,
    redisCommandTimeoutMs: 1000,
    eventTransport: "memory",
    kafkaBrokers: ["localhost:9092"],
    kafkaClientId: "ai-ml-service",
    kafkaSendTimeoutMs: 1000,
    eventQueueCapacity: 100,
    eventWorkers: 2,
    eventMaxAttempts: 2,
    eventOverflowPolicy: "drop_oldest",
    predictionTtlSeconds: 300,
    recommendationTtlSeconds: 3600,
    requestTimeoutMs: 10000,
    rateLimitEnabled: false,
    rateLimitWindowSeconds: 60,
    rateLimitMaxRequests: 60,
    metricsEnabled: true,
    ...overrides,
  };
}
