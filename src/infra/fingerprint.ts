import { createHash } from "node:crypto";

function normalize(value: unknown): unknown {
  if (typeof value === "number") {
    if (Number.isNaN(value)) {
      return "__NaN__";
    }
    if (value === Number.POSITIVE_INFINITY) {
      return "__+Infinity__";
    }
    if (value === Number.NEGATIVE_INFINITY) {
      return "__-Infinity__";
    }
    // JSON renders -0 as 0 already; keep the invariant explicit.
    return Object.is(value, -0) ? 0 : value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => normalize(item));
  }
  if (value && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const normalizedEntries = entries.map(([key, item]) => [key, normalize(item)]);
    return Object.fromEntries(normalizedEntries);
  }
  return value;
}

export function canonicalJson(payload: unknown): string {
  return JSON.stringify(normalize(payload)) ?? "null";
}

export function hashPayload(payload: unknown): string {
  return createHash("sha256").update(canonicalJson(payload)).digest("hex");
}

/**
 * Deterministic identity of one operation instance. Parameter order does not
 * matter; any difference in values does.
 */
export function fingerprint(operation: string, params: Record<string, unknown>): string {
  return `${operation}:${hashPayload(params)}`;
}

export const cacheKeys = {
  prediction: (modelName: string, input: Record<string, unknown>) => fingerprint(`prediction:${modelName}`, input),
  recommendations: (userId: string, itemType: string, count: number, filtersHash?: string) =>
    filtersHash
      ? `recommendations:${userId}:${itemType}:${count}:${filtersHash}`
      : `recommendations:${userId}:${itemType}:${count}`,
  apiUsage: (endpoint: string) => `api_usage:${endpoint}`,
  userUsage: (userId: string, endpoint: string) => `user_usage:${userId}:${endpoint}`,
  dailyUsage: (day: string, endpoint: string) => `daily_usage:${day}:${endpoint}`,
  eventCount: (eventType: string) => `event_count:${eventType}`,
  modelPerformance: (modelName: string) => `model_performance:${modelName}`,
} as const;

export const API_USAGE_PREFIX = "api_usage:";
