import type { SupabaseClient } from "@supabase/supabase-js";
import { getErrorMessage } from "./log-utils";

/**
 * The right to refill one pool key. Producers that cannot take it skip the
 * refill instead of waiting.
 */
export interface RefillLock {
  tryAcquire(key: string): Promise<boolean>;
  release(key: string): Promise<void>;
}

export class InProcessRefillLock implements RefillLock {
  private readonly held = new Set<string>();

  async tryAcquire(key: string): Promise<boolean> {
    if (this.held.has(key)) return false;
    this.held.add(key);
    return true;
  }

  async release(key: string): Promise<void> {
    this.held.delete(key);
  }
}

export type LockResult = { acquired: boolean; supported: boolean; reason?: "busy" | "error" };

const MISSING_TABLE = /relation .* does not exist/i;

/**
 * Cross-instance refill right held as a row in `pool_refill_locks`
 * (primary key `lock_key`). A row older than the TTL is taken over. When the
 * table is missing the lock falls back to the in-process one.
 */
export class SupabaseRefillLock implements RefillLock {
  private readonly fallback = new InProcessRefillLock();
  private supported = true;

  constructor(
    private readonly sb: SupabaseClient,
    private readonly ttlMs = 3 * 60_000
  ) {}

  async tryAcquire(key: string): Promise<boolean> {
    if (!this.supported) return this.fallback.tryAcquire(key);

    const result = await this.acquireRow(key);
    if (!result.supported) {
      console.warn("[refill-lock] pool_refill_locks missing; using in-process lock");
      this.supported = false;
      return this.fallback.tryAcquire(key);
    }
    if (result.reason === "error") {
      console.warn("[refill-lock] lock insert failed", { key });
    }
    return result.acquired;
  }

  async release(key: string): Promise<void> {
    if (!this.supported) return this.fallback.release(key);

    const { error } = await this.sb.from("pool_refill_locks").delete().eq("lock_key", key);
    if (error) {
      // The row ages out through the TTL takeover
      console.warn("[refill-lock] release failed", { key, message: error.message });
    }
  }

  async acquireRow(key: string): Promise<LockResult> {
    const now = Date.now();
    try {
      const insert = await this.sb
        .from("pool_refill_locks")
        .insert({ lock_key: key, created_at: new Date(now).toISOString() });
      if (!insert.error) return { acquired: true, supported: true };

      const code = insert.error.code ?? "";
      if (code === "42P01" || MISSING_TABLE.test(insert.error.message)) {
        return { acquired: false, supported: false };
      }
      if (code !== "23505" && !/duplicate key/i.test(insert.error.message)) {
        return { acquired: false, supported: true, reason: "error" };
      }

      const { data: existing } = await this.sb
        .from("pool_refill_locks")
        .select("created_at")
        .eq("lock_key", key)
        .maybeSingle();
      const createdAt =
        existing && typeof existing.created_at === "string" ? +new Date(existing.created_at) : null;

      if (createdAt && now - createdAt > this.ttlMs) {
        // Stale lock; try to steal
        await this.sb.from("pool_refill_locks").delete().eq("lock_key", key);
        const retry = await this.sb
          .from("pool_refill_locks")
          .insert({ lock_key: key, created_at: new Date(now).toISOString() });
        if (!retry.error) return { acquired: true, supported: true };
      }
      return { acquired: false, supported: true, reason: "busy" };
    } catch (error) {
      if (MISSING_TABLE.test(getErrorMessage(error))) return { acquired: false, supported: false };
      return { acquired: false, supported: true, reason: "error" };
    }
  }
}
