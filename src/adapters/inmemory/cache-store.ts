import type { CacheStorePort } from "../../ports/cache-store.js";

interface StoredEntry {
  serialized: string;
  expiresAtMs: number | null;
}

interface InMemoryCacheStoreOptions {
  nowMs?: () => number;
}

export class InMemoryCacheStore implements CacheStorePort {
  private readonly entries = new Map<string, StoredEntry>();
  private readonly nowMs: () => number;

  constructor(options: InMemoryCacheStoreOptions = {}) {
    this.nowMs = options.nowMs ?? (() => Date.now());
  }

  async get<TValue>(key: string): Promise<TValue | null> {
    const entry = this.liveEntry(key);
    if (!entry) {
      return null;
    }
    return JSON.parse(entry.serialized) as TValue;
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    this.entries.set(key, {
      serialized: JSON.stringify(value) ?? "null",
      expiresAtMs: ttlSeconds === undefined ? null : this.nowMs() + ttlSeconds * 1000,
    });
  }

  async increment(key: string, delta = 1): Promise<number> {
    const entry = this.liveEntry(key);
    const current = entry ? Number(entry.serialized) : 0;
    if (!Number.isInteger(current)) {
      throw new Error(`Value at '${key}' is not an integer.`);
    }
    const next = current + delta;
    this.entries.set(key, {
      serialized: String(next),
      expiresAtMs: entry?.expiresAtMs ?? null,
    });
    return next;
  }

  async exists(key: string): Promise<boolean> {
    return this.liveEntry(key) !== undefined;
  }

  async keysWithPrefix(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix) && this.liveEntry(key)) {
        keys.push(key);
      }
    }
    return keys;
  }

  async ping(): Promise<void> {}

  private liveEntry(key: string): StoredEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAtMs !== null && this.nowMs() >= entry.expiresAtMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
