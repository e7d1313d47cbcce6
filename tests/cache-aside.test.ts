import { describe, expect, it, vi } from "vitest";
import { CacheAsideOrchestrator } from "../src/application/cache-aside.js";
import { ComputationError, NotFoundError, RequestTimeoutError } from "../src/infra/app-error.js";
import { ServiceMetricsRegistry } from "../src/infra/metrics.js";
import { FlakyCacheStore, silentLogger } from "./helpers.js";

function setup() {
  let nowMs = 0;
  const store = new FlakyCacheStore({ nowMs: () => nowMs });
  const metrics = new ServiceMetricsRegistry();
  const logger = silentLogger();
  const orchestrator = new CacheAsideOrchestrator(store, metrics, logger);
  return {
    store,
    metrics,
    logger,
    orchestrator,
    setNow(value: number) {
      nowMs = value;
    },
  };
}

describe("CacheAsideOrchestrator", () => {
  it("computes on a miss, serves hits within the TTL and recomputes after expiry", async () => {
    const { orchestrator, metrics, setNow } = setup();
    const compute = vi.fn(async () => ({ prediction: 2.5 }));
    const request = { operation: "predict", key: "prediction:regression:abc", ttlSeconds: 300, compute };

    const first = await orchestrator.getOrCompute(request);
    expect(first).toEqual({ value: { prediction: 2.5 }, cached: false });

    setNow(299_000);
    const second = await orchestrator.getOrCompute(request);
    expect(second).toEqual({ value: { prediction: 2.5 }, cached: true });
    expect(compute).toHaveBeenCalledTimes(1);

    setNow(301_000);
    const third = await orchestrator.getOrCompute(request);
    expect(third.cached).toBe(false);
    expect(compute).toHaveBeenCalledTimes(2);
    expect(metrics.cacheHitRate()).toBe(0.3333);
  });

  it("treats a failed read as a miss", async () => {
    const { orchestrator, store, metrics, logger } = setup();
    await store.set("k", "stale", 60);
    store.failGet = true;

    const result = await orchestrator.getOrCompute({
      operation: "predict",
      key: "k",
      ttlSeconds: 60,
      compute: async () => "fresh",
    });

    expect(result).toEqual({ value: "fresh", cached: false });
    expect(metrics.renderPrometheus()).toContain('aiml_cache_lookups_total{operation="predict",outcome="error"} 1');
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("returns the computed value when the write fails", async () => {
    const { orchestrator, store, metrics } = setup();
    store.failSet = true;

    const result = await orchestrator.getOrCompute({
      operation: "recommend",
      key: "recommendations:u1:movie:5",
      ttlSeconds: 3600,
      compute: async () => ["movie_1"],
    });

    expect(result).toEqual({ value: ["movie_1"], cached: false });
    expect(metrics.renderPrometheus()).toContain('aiml_cache_write_failures_total{operation="recommend"} 1');
    store.failSet = false;
    expect(await store.exists("recommendations:u1:movie:5")).toBe(false);
  });

  it("wraps computation failures and caches nothing", async () => {
    const { orchestrator, store } = setup();

    const failing = orchestrator.getOrCompute({
      operation: "predict",
      key: "k",
      ttlSeconds: 60,
      compute: async () => {
        throw new Error("model exploded");
      },
    });

    await expect(failing).rejects.toBeInstanceOf(ComputationError);
    await expect(failing).rejects.toMatchObject({ code: "predict_failed", statusCode: 500 });
    expect(await store.exists("k")).toBe(false);
  });

  it("passes application errors through unchanged", async () => {
    const { orchestrator } = setup();
    const notFound = new NotFoundError("model_not_found", "Model not found: nope");

    await expect(
      orchestrator.getOrCompute({
        operation: "predict",
        key: "k",
        ttlSeconds: 60,
        compute: async () => {
          throw notFound;
        },
      }),
    ).rejects.toBe(notFound);
  });

  it("releases a cancelled caller and still caches the late result", async () => {
    const { orchestrator, store } = setup();
    let finish: (value: string) => void = () => undefined;
    const computation = new Promise<string>((resolve) => {
      finish = resolve;
    });
    const controller = new AbortController();

    const pending = orchestrator.getOrCompute({
      operation: "predict",
      key: "slow",
      ttlSeconds: 60,
      compute: () => computation,
      signal: controller.signal,
    });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RequestTimeoutError);

    finish("late");
    await vi.waitFor(async () => {
      expect(await store.get("slow")).toBe("late");
    });
  });
});
