/**
 * Exercise Pool Cache
 *
 * One bounded FIFO of pre-generated exercises per (topic, difficulty, course),
 * kept in the shared cache store under `exercise_pool:<hash>`.
 *
 * - take: first entry the student has not completed, removed from the queue
 * - add: rejected when the same content is already queued; overflow evicts
 *   the oldest entry
 *
 * Both run under a per-key lock so capacity and uniqueness hold for every
 * caller in this process. Writers in other processes share the queue
 * without that lock; see DESIGN.md.
 */

import { Mutex } from "async-mutex";
import { z } from "zod";
import type { PoolKey } from "@/types/practice";
import { buildCacheKey, type CacheStore } from "./cache-store";
import { safeErrorForLog } from "./log-utils";
import { ExercisePayloadSchema, type ExercisePayload } from "./schema";

export const POOL_KEY_PREFIX = "exercise_pool";

const PoolEntrySchema = z.object({
  content: z.string(),
  payload: ExercisePayloadSchema,
  queuedAt: z.number(),
});

export type PoolEntry = z.infer<typeof PoolEntrySchema>;

const PoolEntriesSchema = z.array(PoolEntrySchema);

export type AddResult =
  | { added: true; evicted: number; size: number }
  | { added: false; reason: "duplicate" | "empty" | "unavailable"; size: number };

export type ExercisePoolOptions = {
  capacity?: number;
  ttlSeconds?: number;
};

export function poolCacheKey(key: PoolKey): string {
  return buildCacheKey(POOL_KEY_PREFIX, {
    topic: key.topic,
    difficulty: key.difficulty,
    course: key.course,
  });
}

/**
 * Mutexes created on demand per key and dropped once nobody waits on them.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, { mutex: Mutex; refs: number }>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    let slot = this.locks.get(key);
    if (!slot) {
      slot = { mutex: new Mutex(), refs: 0 };
      this.locks.set(key, slot);
    }
    slot.refs += 1;
    try {
      return await slot.mutex.runExclusive(task);
    } finally {
      slot.refs -= 1;
      if (slot.refs === 0) this.locks.delete(key);
    }
  }
}

export class ExercisePoolCache {
  readonly capacity: number;
  private readonly ttlSeconds: number;
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly store: CacheStore,
    options: ExercisePoolOptions = {}
  ) {
    this.capacity = Math.max(1, options.capacity ?? 5);
    this.ttlSeconds = options.ttlSeconds ?? 3600;
  }

  /**
   * Removes and returns the oldest entry whose content is not in
   * `completedContents`. Null means the queue is empty or exhausted for this
   * student; skipped entries stay queued for other students.
   */
  async takeExercise(key: PoolKey, completedContents: ReadonlySet<string>): Promise<ExercisePayload | null> {
    const cacheKey = poolCacheKey(key);
    return this.mutex.runExclusive(cacheKey, async () => {
      const entries = await this.read(cacheKey);
      if (!entries) return null;

      const index = entries.findIndex((entry) => !completedContents.has(entry.content));
      if (index === -1) {
        if (entries.length > 0) {
          console.debug("[exercise-pool] exhausted for student", { ...key, queued: entries.length });
        }
        return null;
      }

      const [taken] = entries.splice(index, 1);
      await this.write(cacheKey, entries);
      console.debug("[exercise-pool] hit", { ...key, remaining: entries.length });
      return taken ? taken.payload : null;
    });
  }

  async addExercise(key: PoolKey, payload: ExercisePayload): Promise<AddResult> {
    const cacheKey = poolCacheKey(key);
    return this.mutex.runExclusive(cacheKey, async () => {
      const entries = await this.read(cacheKey);
      if (!entries) return { added: false, reason: "unavailable", size: 0 };
      if (!payload.content) return { added: false, reason: "empty", size: entries.length };

      if (entries.some((entry) => entry.content === payload.content)) {
        return { added: false, reason: "duplicate", size: entries.length };
      }

      entries.push({ content: payload.content, payload, queuedAt: Date.now() });
      let evicted = 0;
      while (entries.length > this.capacity) {
        entries.shift();
        evicted += 1;
      }

      if (!(await this.write(cacheKey, entries))) {
        return { added: false, reason: "unavailable", size: 0 };
      }
      console.debug("[exercise-pool] added", { ...key, size: entries.length, evicted });
      return { added: true, evicted, size: entries.length };
    });
  }

  /** Queued entries; 0 when the store cannot be read. */
  async size(key: PoolKey): Promise<number> {
    const entries = await this.read(poolCacheKey(key));
    return entries ? entries.length : 0;
  }

  async contents(key: PoolKey): Promise<string[]> {
    const entries = await this.read(poolCacheKey(key));
    return entries ? entries.map((entry) => entry.content) : [];
  }

  async clear(key: PoolKey): Promise<void> {
    const cacheKey = poolCacheKey(key);
    await this.mutex.runExclusive(cacheKey, async () => {
      try {
        await this.store.delete(cacheKey);
      } catch (error) {
        console.warn("[exercise-pool] clear failed", { cacheKey, error: safeErrorForLog(error) });
      }
    });
  }

  /** Current queue, [] when absent or malformed, null when the store failed. */
  private async read(cacheKey: string): Promise<PoolEntry[] | null> {
    let raw: unknown;
    try {
      raw = await this.store.get(cacheKey);
    } catch (error) {
      console.warn("[exercise-pool] store unavailable on read", { cacheKey, error: safeErrorForLog(error) });
      return null;
    }
    if (raw == null) return [];

    const parsed = PoolEntriesSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn("[exercise-pool] discarding malformed queue", { cacheKey });
      return [];
    }
    return parsed.data;
  }

  private async write(cacheKey: string, entries: PoolEntry[]): Promise<boolean> {
    try {
      if (entries.length === 0) {
        await this.store.delete(cacheKey);
      } else {
        await this.store.set(cacheKey, entries, this.ttlSeconds);
      }
      return true;
    } catch (error) {
      console.warn("[exercise-pool] store unavailable on write", { cacheKey, error: safeErrorForLog(error) });
      return false;
    }
  }
}
