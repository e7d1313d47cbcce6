import { describe, expect, it } from "vitest";
import { cacheKeys, canonicalJson, fingerprint, hashPayload } from "../src/infra/fingerprint.js";

describe("canonicalJson", () => {
  it("sorts keys at every depth and drops undefined members", () => {
    expect(canonicalJson({ b: 1, a: { d: [1, 2], c: undefined, b: "x" } })).toBe('{"a":{"b":"x","d":[1,2]},"b":1}');
  });

  it("keeps array order", () => {
    expect(canonicalJson([3, 1, 2])).toBe("[3,1,2]");
  });

  it("maps negative zero to zero and non-finite numbers to tokens", () => {
    expect(canonicalJson([-0, Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY])).toBe(
      '[0,"__NaN__","__+Infinity__","__-Infinity__"]',
    );
  });
});

describe("fingerprint", () => {
  it("ignores parameter order", () => {
    expect(fingerprint("predict", { features: [1, 2], context: null })).toBe(
      fingerprint("predict", { context: null, features: [1, 2] }),
    );
  });

  it("changes with any parameter value", () => {
    const base = fingerprint("predict", { features: [1, 2, 3] });
    expect(fingerprint("predict", { features: [1, 2, 4] })).not.toBe(base);
    expect(fingerprint("predict", { features: [3, 2, 1] })).not.toBe(base);
    expect(fingerprint("recommend", { features: [1, 2, 3] })).not.toBe(base);
  });

  it("prefixes a sha256 digest with the operation", () => {
    expect(fingerprint("predict", { a: 1 })).toMatch(/^predict:[0-9a-f]{64}$/);
    expect(hashPayload({ a: 1 })).toBe(hashPayload({ a: 1 }));
  });
});

describe("cacheKeys", () => {
  it("builds prediction keys per model", () => {
    const input = { features: [0.5, 1.5], context: null };
    expect(cacheKeys.prediction("regression", input)).toBe(`prediction:regression:${hashPayload(input)}`);
    expect(cacheKeys.prediction("regression", input)).not.toBe(cacheKeys.prediction("classification", input));
  });

  it("adds the filters hash to recommendation keys only when present", () => {
    expect(cacheKeys.recommendations("u1", "movie", 5)).toBe("recommendations:u1:movie:5");
    expect(cacheKeys.recommendations("u1", "movie", 5, "abc123")).toBe("recommendations:u1:movie:5:abc123");
  });

  it("names the usage counters", () => {
    expect(cacheKeys.apiUsage("/predict")).toBe("api_usage:/predict");
    expect(cacheKeys.userUsage("u1", "/predict")).toBe("user_usage:u1:/predict");
    expect(cacheKeys.dailyUsage("2026-01-15", "/predict")).toBe("daily_usage:2026-01-15:/predict");
    expect(cacheKeys.eventCount("click")).toBe("event_count:click");
  });
});
