import { AppError, ComputationError, RequestTimeoutError } from "../infra/app-error.js";
import type { Logger } from "../infra/logger.js";
import type { ServiceMetricsRegistry } from "../infra/metrics.js";
import { raceAbort } from "../infra/timeout.js";
import type { CacheStorePort } from "../ports/cache-store.js";

export interface GetOrComputeInput<TValue> {
  /** Metric/log label, e.g. `predict`. */
  operation: string;
  key: string;
  ttlSeconds: number;
  compute: () => Promise<TValue>;
  signal?: AbortSignal;
}

export interface CacheAsideResult<TValue> {
  value: TValue;
  cached: boolean;
}

/**
 * Read-through cache. Concurrent misses on one key may each compute; the last
 * write wins. Failed computations are never written.
 */
export class CacheAsideOrchestrator {
  constructor(
    private readonly store: CacheStorePort,
    private readonly metrics: ServiceMetricsRegistry,
    private readonly logger: Logger,
  ) {}

  async getOrCompute<TValue>(input: GetOrComputeInput<TValue>): Promise<CacheAsideResult<TValue>> {
    const cachedValue = await this.read<TValue>(input.operation, input.key);
    if (cachedValue !== null) {
      this.metrics.recordCacheLookup(input.operation, "hit");
      return { value: cachedValue, cached: true };
    }
    this.metrics.recordCacheLookup(input.operation, "miss");

    const pending = this.computeAndStore(input);
    try {
      const value = await raceAbort(pending, input.signal, () => new RequestTimeoutError());
      return { value, cached: false };
    } catch (error) {
      if (error instanceof RequestTimeoutError) {
        // The computation keeps running so its cache write completes; only the caller is released.
        pending.then(
          () => {
            this.logger.info({ key: input.key }, "Computation finished after caller was cancelled");
          },
          (lateError: unknown) => {
            this.logger.warn({ err: lateError, key: input.key }, "Computation failed after caller was cancelled");
          },
        );
      }
      throw error;
    }
  }

  private async read<TValue>(operation: string, key: string): Promise<TValue | null> {
    try {
      return await this.store.get<TValue>(key);
    } catch (error) {
      this.metrics.recordCacheLookup(operation, "error");
      this.logger.warn({ err: error, key }, "Cache read failed; computing instead");
      return null;
    }
  }

  private async computeAndStore<TValue>(input: GetOrComputeInput<TValue>): Promise<TValue> {
    let value: TValue;
    try {
      value = await input.compute();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      this.logger.error({ err: error, key: input.key }, "Computation failed");
      throw new ComputationError(`${input.operation}_failed`, "The computation could not be completed.", {
        cause: error,
      });
    }

    try {
      await this.store.set(input.key, value, input.ttlSeconds);
    } catch (error) {
      this.metrics.recordCacheWriteFailure(input.operation);
      this.logger.warn({ err: error, key: input.key }, "Cache write failed; returning computed result");
    }
    return value;
  }
}
