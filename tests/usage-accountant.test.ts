import { describe, expect, it } from "vitest";
import { UsageAccountant } from "../src/application/usage-accountant.js";
import { ServiceMetricsRegistry } from "../src/infra/metrics.js";
import { FlakyCacheStore, ManualClock, silentLogger } from "./helpers.js";

const JAN_15_NOON_UTC = Date.UTC(2026, 0, 15, 12, 0, 0);

describe("UsageAccountant", () => {
  it("counts per endpoint, per user and per UTC day", async () => {
    const clock = new ManualClock(JAN_15_NOON_UTC);
    const store = new FlakyCacheStore({ nowMs: () => clock.nowMs() });
    const accountant = new UsageAccountant(store, clock, new ServiceMetricsRegistry(), silentLogger());

    await accountant.record("/predict", "u1");
    await accountant.record("/predict", "u1");
    await accountant.record("/predict", "u2");
    await accountant.record("/recommend");

    expect(await accountant.endpointCounts()).toEqual(
      new Map([
        ["/predict", 3],
        ["/recommend", 1],
      ]),
    );
    expect(await accountant.userCount("u1", "/predict")).toBe(2);
    expect(await accountant.userCount("u2", "/predict")).toBe(1);
    expect(await accountant.dailyCount("2026-01-15", "/predict")).toBe(3);
    expect(await store.keysWithPrefix("user_usage:")).toEqual(["user_usage:u1:/predict", "user_usage:u2:/predict"]);
  });

  it("starts a new daily bucket at UTC midnight", async () => {
    const clock = new ManualClock(Date.UTC(2026, 0, 15, 23, 59, 59));
    const store = new FlakyCacheStore({ nowMs: () => clock.nowMs() });
    const accountant = new UsageAccountant(store, clock, new ServiceMetricsRegistry(), silentLogger());

    await accountant.record("/sentiment");
    clock.advanceSeconds(1);
    await accountant.record("/sentiment");

    expect(await accountant.dailyCount("2026-01-15", "/sentiment")).toBe(1);
    expect(await accountant.dailyCount("2026-01-16", "/sentiment")).toBe(1);
    expect((await accountant.endpointCounts()).get("/sentiment")).toBe(2);
  });

  it("never rejects when the store is down", async () => {
    const clock = new ManualClock(JAN_15_NOON_UTC);
    const store = new FlakyCacheStore({ nowMs: () => clock.nowMs() });
    store.failIncrement = true;
    const metrics = new ServiceMetricsRegistry();
    const logger = silentLogger();
    const accountant = new UsageAccountant(store, clock, metrics, logger);

    await expect(accountant.record("/predict")).resolves.toBeUndefined();

    expect(metrics.renderPrometheus()).toContain('aiml_usage_tracking_failures_total{endpoint="/predict"} 2');
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });
});
