/**
 * Cache Store - shared key/value records with a time-to-live
 *
 * Backs the context cache, the exercise pools and summary memoization.
 *
 * - SupabaseCacheStore: rows in `cache_entries` filtered by `expires_at`,
 *   shared by every instance of the service
 * - MemoryCacheStore: an LRU inside this process, for single-instance
 *   deployments and tests
 *
 * Adapters raise CacheStoreError when the backing store fails. Consumers
 * treat that as a miss; an unreachable store costs latency, never a request.
 */

import { createHash } from "crypto";
import type { SupabaseClient } from "@supabase/supabase-js";
import { LRUCache } from "lru-cache";

export type Json =
  | string
  | number
  | boolean
  | null
  | { [key: string]: Json | undefined }
  | Json[];

export interface CacheStore {
  /** Live value for a key, or null when absent or expired. */
  get(key: string): Promise<unknown>;
  set(key: string, value: Json, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** Deletes every key matching a glob pattern such as `context:*`. */
  deletePattern(pattern: string): Promise<number>;
}

export class CacheStoreError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string) {
    super(`Cache ${operation} failed: ${message}`);
    this.name = "CacheStoreError";
    this.operation = operation;
  }
}

/**
 * Deterministic key from a prefix and named parameters; parameter order
 * does not matter.
 */
export function buildCacheKey(prefix: string, params: Record<string, string | number | null | undefined>): string {
  const sorted = Object.keys(params)
    .sort()
    .map((name) => [name, params[name] ?? null]);
  const hash = createHash("md5").update(JSON.stringify(sorted)).digest("hex");
  return `${prefix}:${hash}`;
}

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${escaped}$`);
}

function globToLike(pattern: string): string {
  return pattern.replace(/[%_]/g, (ch) => `\\${ch}`).replace(/\*/g, "%");
}

export class MemoryCacheStore implements CacheStore {
  // Values are stored serialized so callers never share mutable state
  private readonly entries: LRUCache<string, string>;

  constructor(maxEntries = 10_000) {
    this.entries = new LRUCache<string, string>({ max: maxEntries });
  }

  async get(key: string): Promise<unknown> {
    const raw = this.entries.get(key);
    return raw === undefined ? null : JSON.parse(raw);
  }

  async set(key: string, value: Json, ttlSeconds: number): Promise<void> {
    this.entries.set(key, JSON.stringify(value), { ttl: Math.max(1, Math.round(ttlSeconds * 1000)) });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async deletePattern(pattern: string): Promise<number> {
    const matcher = globToRegExp(pattern);
    const doomed = [...this.entries.keys()].filter((key) => matcher.test(key));
    for (const key of doomed) {
      this.entries.delete(key);
    }
    return doomed.length;
  }
}

export class SupabaseCacheStore implements CacheStore {
  constructor(private readonly sb: SupabaseClient) {}

  async get(key: string): Promise<unknown> {
    const { data, error } = await this.sb
      .from("cache_entries")
      .select("value")
      .eq("key", key)
      .gt("expires_at", new Date().toISOString())
      .maybeSingle();

    if (error) {
      console.error("[cache-store] get error:", { key, message: error.message });
      throw new CacheStoreError("get", error.message);
    }
    if (!data || typeof data !== "object" || !("value" in data)) return null;
    return data.value ?? null;
  }

  /**
   * Upsert so concurrent writers of one key settle on the last write.
   */
  async set(key: string, value: Json, ttlSeconds: number): Promise<void> {
    const expiresAt = new Date(Date.now() + ttlSeconds * 1000).toISOString();
    const { error } = await this.sb
      .from("cache_entries")
      .upsert({ key, value, expires_at: expiresAt }, { onConflict: "key" });

    if (error) {
      console.error("[cache-store] set error:", { key, message: error.message });
      throw new CacheStoreError("set", error.message);
    }
  }

  async delete(key: string): Promise<void> {
    const { error } = await this.sb.from("cache_entries").delete().eq("key", key);
    if (error) {
      console.error("[cache-store] delete error:", { key, message: error.message });
      throw new CacheStoreError("delete", error.message);
    }
  }

  async deletePattern(pattern: string): Promise<number> {
    const { data, error } = await this.sb
      .from("cache_entries")
      .delete()
      .like("key", globToLike(pattern))
      .select("key");

    if (error) {
      console.error("[cache-store] deletePattern error:", { pattern, message: error.message });
      throw new CacheStoreError("deletePattern", error.message);
    }
    return Array.isArray(data) ? data.length : 0;
  }
}
