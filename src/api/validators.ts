import type {
  JsonObject,
  PredictionInput,
  RecommendationInput,
  SentimentInput,
  TrendMetric,
  TrendPeriod,
} from "../domain/types.js";
import { ValidationError } from "../infra/app-error.js";

const MODEL_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;
const MAX_FEATURES = 1000;
/** Keeps weighted sums over MAX_FEATURES values well inside double range. */
const MAX_FEATURE_MAGNITUDE = 1e12;
const MAX_TEXT_LENGTH = 5000;
const MAX_SANITIZED_LENGTH = 1000;
const trendMetrics: readonly TrendMetric[] = ["requests", "predictions", "recommendations", "sentiment"];
const trendPeriods: readonly TrendPeriod[] = ["7d", "30d"];

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function invalidBody(): ValidationError {
  return new ValidationError("invalid_request_body", "Request body must be an object.", 400);
}

function assertOptionalIdentifier(value: unknown, fieldName: string): void {
  if (value === undefined) {
    return;
  }
  if (!isString(value) || value.length > 255) {
    throw new ValidationError(
      `invalid_${fieldName}`,
      `${fieldName} length must be between 1 and 255 characters.`,
    );
  }
}

export function assertModelName(value: unknown): asserts value is string {
  if (!isString(value) || !MODEL_NAME_PATTERN.test(value)) {
    throw new ValidationError(
      "invalid_model_name",
      "model_name must contain only letters, digits, underscores and hyphens.",
    );
  }
}

export function assertPredictionInput(payload: unknown): asserts payload is PredictionInput {
  if (!isObject(payload)) {
    throw invalidBody();
  }

  const { model_name, features, user_id, context } = payload;

  assertModelName(model_name);
  if (!Array.isArray(features) || features.length === 0 || features.length > MAX_FEATURES) {
    throw new ValidationError(
      "invalid_features",
      `features must be a non-empty array of at most ${MAX_FEATURES} numbers.`,
    );
  }
  if (!features.every((feature) => typeof feature === "number" && Number.isFinite(feature))) {
    throw new ValidationError("invalid_features", "All features must be finite numbers.");
  }
  if (features.some((feature) => Math.abs(feature) > MAX_FEATURE_MAGNITUDE)) {
    throw new ValidationError(
      "invalid_features",
      `Feature values must be between -${MAX_FEATURE_MAGNITUDE} and ${MAX_FEATURE_MAGNITUDE}.`,
    );
  }
  assertOptionalIdentifier(user_id, "user_id");
  if (context !== undefined && !isObject(context)) {
    throw new ValidationError("invalid_context", "context must be an object.");
  }
}

export function assertRecommendationInput(payload: unknown): asserts payload is RecommendationInput {
  if (!isObject(payload)) {
    throw invalidBody();
  }

  const { user_id, item_type, num_recommendations, filters } = payload;

  if (!isString(user_id) || user_id.length > 255) {
    throw new ValidationError("invalid_user_id", "user_id is required.");
  }
  if (!isString(item_type) || item_type.length > 64) {
    throw new ValidationError("invalid_item_type", "item_type length must be between 1 and 64 characters.");
  }
  if (
    num_recommendations !== undefined &&
    (typeof num_recommendations !== "number" ||
      !Number.isInteger(num_recommendations) ||
      num_recommendations < 1 ||
      num_recommendations > 100)
  ) {
    throw new ValidationError("invalid_num_recommendations", "num_recommendations must be between 1 and 100.");
  }

  if (filters === undefined) {
    return;
  }
  if (!isObject(filters)) {
    throw new ValidationError("invalid_filters", "filters must be an object.");
  }
  const unknownKeys = Object.keys(filters).filter((key) => key !== "min_score" && key !== "exclude_item_ids");
  if (unknownKeys.length > 0) {
    throw new ValidationError("invalid_filters", `Unsupported filters: ${unknownKeys.join(", ")}.`);
  }
  const { min_score, exclude_item_ids } = filters;
  if (min_score !== undefined && (typeof min_score !== "number" || min_score < 0 || min_score > 1)) {
    throw new ValidationError("invalid_filters", "filters.min_score must be a number between 0 and 1.");
  }
  if (
    exclude_item_ids !== undefined &&
    (!Array.isArray(exclude_item_ids) || !exclude_item_ids.every((itemId) => isString(itemId)))
  ) {
    throw new ValidationError("invalid_filters", "filters.exclude_item_ids must be an array of item ids.");
  }
}

export function assertSentimentInput(payload: unknown): asserts payload is SentimentInput {
  if (!isObject(payload)) {
    throw invalidBody();
  }

  const { text, language, user_id } = payload;

  if (!isString(text) || text.trim().length === 0 || text.length > MAX_TEXT_LENGTH) {
    throw new ValidationError(
      "invalid_text",
      `text length must be between 1 and ${MAX_TEXT_LENGTH} characters.`,
    );
  }
  if (language !== undefined && (!isString(language) || language.length > 16)) {
    throw new ValidationError("invalid_language", "language length must be between 1 and 16 characters.");
  }
  assertOptionalIdentifier(user_id, "user_id");
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === "string") {
    return value.replace(/[<>"']/g, "").slice(0, MAX_SANITIZED_LENGTH);
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeValue(item));
  }
  if (isObject(value)) {
    return sanitizeEventPayload(value);
  }
  return value;
}

/** Strips markup characters from every string, at any depth, and caps its length. */
export function sanitizeEventPayload(payload: unknown): JsonObject {
  if (!isObject(payload)) {
    throw invalidBody();
  }
  const sanitized: JsonObject = {};
  for (const [key, value] of Object.entries(payload)) {
    sanitized[key] = sanitizeValue(value);
  }
  return sanitized;
}

export function normalizeUsageDays(value: unknown): number {
  if (value === undefined) {
    return 7;
  }
  const parsed = typeof value === "string" && value.trim().length > 0 ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 30) {
    throw new ValidationError("invalid_days", "days must be an integer between 1 and 30.");
  }
  return parsed;
}

export function normalizeTrendMetric(value: unknown): TrendMetric {
  if (value === undefined) {
    return "requests";
  }
  const metric = trendMetrics.find((candidate) => candidate === value);
  if (metric === undefined) {
    throw new ValidationError("invalid_metric", `metric must be one of: ${trendMetrics.join(", ")}.`);
  }
  return metric;
}

export function normalizeTrendPeriod(value: unknown): TrendPeriod {
  if (value === undefined) {
    return "7d";
  }
  const period = trendPeriods.find((candidate) => candidate === value);
  if (period === undefined) {
    throw new ValidationError("invalid_period", `period must be one of: ${trendPeriods.join(", ")}.`);
  }
  return period;
}

export function normalizeModelName(value: unknown): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  assertModelName(value);
  return value;
}
