import { AppError } from "./app-error.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import type { OverflowPolicy } from "../application/event-emitter.js";

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
    "internal",
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseStringListEnv(name: string, defaultValue: string[], maxItems: number): string[] {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
  }
  if (items.length > maxItems) {
    throw invalidConfig(name, `must contain at most ${maxItems} values`);
  }

  return [...new Set(items)];
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

export const DEFAULT_JWT_SECRET = "dev_jwt_secret_change_me_2026";

export interface RuntimeConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  serviceName: string;
  serviceVersion: string;
  corsOrigins: string[];
  authEnabled: boolean;
  jwtSecret: string;
  cacheBackend: "memory" | "redis";
  redisHost: string;
  redisPort: number;
  redisDb: number;
  redisCommandTimeoutMs: number;
  eventTransport: "memory" | "kafka";
  kafkaBrokers: string[];
  kafkaClientId: string;
  kafkaSendTimeoutMs: number;
  eventQueueCapacity: number;
  eventWorkers: number;
  eventMaxAttempts: number;
  eventOverflowPolicy: OverflowPolicy;
  predictionTtlSeconds: number;
  recommendationTtlSeconds: number;
  requestTimeoutMs: number;
  rateLimitEnabled: boolean;
  rateLimitWindowSeconds: number;
  rateLimitMaxRequests: number;
  metricsEnabled: boolean;
}

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8083, 1, 65535);
  const logLevel = parseEnumEnv("AIML_LOG_LEVEL", LOG_LEVELS, "info");
  const serviceName = parseStringEnv("AIML_SERVICE_NAME", "ai-ml-service", 3);
  const serviceVersion = parseStringEnv("AIML_SERVICE_VERSION", "1.0.0", 1);
  const corsOrigins = parseStringListEnv("AIML_CORS_ORIGINS", ["*"], 50);
  const authEnabled = parseBooleanEnv("AIML_AUTH_ENABLED", true);
  const jwtSecret = parseStringEnv("JWT_SECRET", DEFAULT_JWT_SECRET, 16);
  const cacheBackend = parseEnumEnv("AIML_CACHE_BACKEND", ["memory", "redis"] as const, "memory");
  const redisHost = parseStringEnv("REDIS_HOST", "localhost", 1);
  const redisPort = parseIntegerEnv("REDIS_PORT", 6379, 1, 65535);
  const redisDb = parseIntegerEnv("REDIS_DB", 0, 0, 15);
  const redisCommandTimeoutMs = parseIntegerEnv("AIML_REDIS_COMMAND_TIMEOUT_MS", 1000, 50, 60000);
  const eventTransport = parseEnumEnv("AIML_EVENT_TRANSPORT", ["memory", "kafka"] as const, "memory");
  const kafkaBrokers = parseStringListEnv("KAFKA_BROKERS", ["localhost:9092"], 20);
  const kafkaClientId = parseStringEnv("AIML_KAFKA_CLIENT_ID", "ai-ml-service", 3);
  const kafkaSendTimeoutMs = parseIntegerEnv("AIML_KAFKA_SEND_TIMEOUT_MS", 5000, 100, 120000);
  const eventQueueCapacity = parseIntegerEnv("AIML_EVENT_QUEUE_CAPACITY", 1000, 1, 100_000);
  const eventWorkers = parseIntegerEnv("AIML_EVENT_WORKERS", 2, 1, 64);
  const eventMaxAttempts = parseIntegerEnv("AIML_EVENT_MAX_ATTEMPTS", 2, 1, 10);
  const eventOverflowPolicy = parseEnumEnv(
    "AIML_EVENT_OVERFLOW_POLICY",
    ["drop_oldest", "reject_new"] as const,
    "drop_oldest",
  );
  const predictionTtlSeconds = parseIntegerEnv("AIML_PREDICTION_TTL_SECONDS", 300, 1, 86400);
  const recommendationTtlSeconds = parseIntegerEnv("AIML_RECOMMENDATION_TTL_SECONDS", 3600, 1, 86400);
  const requestTimeoutMs = parseIntegerEnv("AIML_REQUEST_TIMEOUT_MS", 10000, 100, 120000);
  const rateLimitEnabled = parseBooleanEnv("AIML_RATE_LIMIT_ENABLED", true);
  const rateLimitWindowSeconds = parseIntegerEnv("AIML_RATE_LIMIT_WINDOW_SECONDS", 60, 1, 3600);
  const rateLimitMaxRequests = parseIntegerEnv("AIML_RATE_LIMIT_MAX_REQUESTS", 60, 1, 1_000_000);
  const metricsEnabled = parseBooleanEnv("AIML_METRICS_ENABLED", true);

  if (process.env.NODE_ENV === "production" && authEnabled && jwtSecret === DEFAULT_JWT_SECRET) {
    throw invalidConfig("JWT_SECRET", "must not use default value in production");
  }

  return {
    host,
    port,
    logLevel,
    serviceName,
    serviceVersion,
    corsOrigins,
    authEnabled,
    jwtSecret,
    cacheBackend,
    redisHost,
    redisPort,
    redisDb,
    redisCommandTimeoutMs,
    eventTransport,
    kafkaBrokers,
    kafkaClientId,
    kafkaSendTimeoutMs,
    eventQueueCapacity,
    eventWorkers,
    eventMaxAttempts,
    eventOverflowPolicy,
    predictionTtlSeconds,
    recommendationTtlSeconds,
    requestTimeoutMs,
    rateLimitEnabled,
    rateLimitWindowSeconds,
    rateLimitMaxRequests,
    metricsEnabled,
  };
}
