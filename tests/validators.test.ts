import { describe, expect, it } from "vitest";
import {
  assertModelName,
  assertPredictionInput,
  assertRecommendationInput,
  normalizeTrendMetric,
  normalizeUsageDays,
  sanitizeEventPayload,
} from "../src/api/validators.js";
import { ValidationError } from "../src/infra/app-error.js";

describe("sanitizeEventPayload", () => {
  it("truncates strings after stripping markup characters", () => {
    const sanitized = sanitizeEventPayload({ note: `<${"a".repeat(1200)}>` });

    expect(sanitized.note).toBe("a".repeat(1000));
  });

  it("walks nested objects and arrays and leaves other values alone", () => {
    expect(
      sanitizeEventPayload({
        count: 3,
        flag: true,
        missing: null,
        nested: { deeper: [{ quote: `"x"` }, ["<y>"]] },
      }),
    ).toEqual({
      count: 3,
      flag: true,
      missing: null,
      nested: { deeper: [{ quote: "x" }, ["y"]] },
    });
  });

  it("rejects payloads that are not objects", () => {
    expect(() => sanitizeEventPayload("click")).toThrowError(ValidationError);
  });
});

describe("request validators", () => {
  it("only accepts simple model names", () => {
    expect(() => assertModelName("regression")).not.toThrow();
    expect(() => assertModelName("model-v2_b")).not.toThrow();
    expect(() => assertModelName("../etc/passwd")).toThrowError("model_name must contain only letters");
    expect(() => assertModelName("")).toThrowError(ValidationError);
  });

  it("bounds the magnitude of feature values", () => {
    expect(() => assertPredictionInput({ model_name: "regression", features: [1e12, -1e12] })).not.toThrow();
    expect(() => assertPredictionInput({ model_name: "classification", features: [1, 1e308] })).toThrowError(
      "Feature values must be between -1000000000000 and 1000000000000.",
    );
  });

  it("bounds the number of recommendations", () => {
    const base = { user_id: "u1", item_type: "movie" };
    expect(() => assertRecommendationInput({ ...base, num_recommendations: 100 })).not.toThrow();
    expect(() => assertRecommendationInput({ ...base, num_recommendations: 0 })).toThrowError(
      "num_recommendations must be between 1 and 100.",
    );
    expect(() => assertRecommendationInput({ ...base, num_recommendations: 2.5 })).toThrowError(ValidationError);
  });

  it("rejects unsupported recommendation filters", () => {
    expect(() =>
      assertRecommendationInput({ user_id: "u1", item_type: "movie", filters: { genre: "drama" } }),
    ).toThrowError("Unsupported filters: genre.");
  });

  it("normalizes query parameters with defaults", () => {
    expect(normalizeUsageDays(undefined)).toBe(7);
    expect(normalizeUsageDays("30")).toBe(30);
    expect(() => normalizeUsageDays("0")).toThrowError("days must be an integer between 1 and 30.");
    expect(() => normalizeUsageDays("7.5")).toThrowError(ValidationError);
    expect(normalizeTrendMetric(undefined)).toBe("requests");
    expect(normalizeTrendMetric("sentiment")).toBe("sentiment");
    expect(() => normalizeTrendMetric("revenue")).toThrowError(ValidationError);
  });
});
