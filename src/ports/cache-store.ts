export interface CacheStorePort {
  /** Absent or expired keys resolve to `null`, never an error. */
  get<TValue>(key: string): Promise<TValue | null>;
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  /** Absent keys start at zero; an existing TTL is kept. */
  increment(key: string, delta?: number): Promise<number>;
  exists(key: string): Promise<boolean>;
  keysWithPrefix(prefix: string): Promise<string[]>;
  ping(): Promise<void>;
  close?(): Promise<void>;
}
