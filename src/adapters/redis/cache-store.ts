import type { Redis } from "ioredis";
import { UpstreamUnavailableError } from "../../infra/app-error.js";
import type { CacheStorePort } from "../../ports/cache-store.js";

const SCAN_BATCH_SIZE = 200;

function escapeGlob(value: string): string {
  return value.replace(/[\\*?[\]]/g, (match) => `\\${match}`);
}

/** Key and driver details stay on `cause`; the message is safe to return to clients. */
function unavailable(operation: string, key: string, error: unknown): UpstreamUnavailableError {
  return new UpstreamUnavailableError("cache_unavailable", "Cache store is unavailable.", {
    cause: new Error(`Cache store ${operation} failed for '${key}'`, { cause: error }),
  });
}

/**
 * Redis-backed store. Values are JSON; counters are plain integers so that
 * INCRBY and GET agree on the representation.
 */
export class RedisCacheStore implements CacheStorePort {
  constructor(private readonly redis: Redis) {}

  async get<TValue>(key: string): Promise<TValue | null> {
    let raw: string | null;
    try {
      raw = await this.redis.get(key);
    } catch (error) {
      throw unavailable("get", key, error);
    }
    if (raw === null) {
      return null;
    }
    return JSON.parse(raw) as TValue;
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    const serialized = JSON.stringify(value) ?? "null";
    try {
      if (ttlSeconds === undefined) {
        await this.redis.set(key, serialized);
      } else {
        await this.redis.set(key, serialized, "EX", ttlSeconds);
      }
    } catch (error) {
      throw unavailable("set", key, error);
    }
  }

  async increment(key: string, delta = 1): Promise<number> {
    try {
      return await this.redis.incrby(key, delta);
    } catch (error) {
      throw unavailable("increment", key, error);
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      return (await this.redis.exists(key)) > 0;
    } catch (error) {
      throw unavailable("exists", key, error);
    }
  }

  async keysWithPrefix(prefix: string): Promise<string[]> {
    const pattern = `${escapeGlob(prefix)}*`;
    const keys = new Set<string>();
    let cursor = "0";
    try {
      do {
        const [nextCursor, batch] = await this.redis.scan(cursor, "MATCH", pattern, "COUNT", SCAN_BATCH_SIZE);
        for (const key of batch) {
          keys.add(key);
        }
        cursor = nextCursor;
      } while (cursor !== "0");
    } catch (error) {
      throw unavailable("scan", pattern, error);
    }
    return [...keys];
  }

  async ping(): Promise<void> {
    try {
      await this.redis.ping();
    } catch (error) {
      throw unavailable("ping", "-", error);
    }
  }

  async close(): Promise<void> {
    if (this.redis.status === "wait" || this.redis.status === "end") {
      this.redis.disconnect();
      return;
    }
    await this.redis.quit();
  }
}
