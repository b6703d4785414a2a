import type { ZodType } from "zod";
import type { CacheStore, Json } from "./cache-store";
import { safeErrorForLog } from "./log-utils";

export type GetOrComputeOptions<T> = {
  /** Validates what the store hands back; a mismatch counts as a miss. */
  schema: ZodType<T>;
  /** Return false to serve a computed value without storing it. */
  shouldCache?: (value: T) => boolean;
};

/**
 * Explicit cache-aside client: look up, else compute and store.
 * Store failures are logged and degrade to recomputation.
 */
export class CacheAside {
  constructor(
    private readonly store: CacheStore,
    private readonly tag = "cache"
  ) {}

  async getOrCompute<T extends Json>(
    key: string,
    ttlSeconds: number,
    compute: () => Promise<T>,
    options: GetOrComputeOptions<T>
  ): Promise<T> {
    const cached = await this.read(key);
    if (cached != null) {
      const parsed = options.schema.safeParse(cached);
      if (parsed.success) {
        console.debug(`[${this.tag}] cache hit`, { key });
        return parsed.data;
      }
      console.warn(`[${this.tag}] discarding malformed cache value`, { key });
    }

    console.debug(`[${this.tag}] cache miss`, { key });
    const value = await compute();

    if (options.shouldCache?.(value) ?? true) {
      await this.write(key, value, ttlSeconds);
    }
    return value;
  }

  async invalidate(pattern: string): Promise<number> {
    try {
      return await this.store.deletePattern(pattern);
    } catch (error) {
      console.warn(`[${this.tag}] invalidate failed`, { pattern, error: safeErrorForLog(error) });
      return 0;
    }
  }

  private async read(key: string): Promise<unknown> {
    try {
      return await this.store.get(key);
    } catch (error) {
      console.warn(`[${this.tag}] store unavailable on read`, { key, error: safeErrorForLog(error) });
      return null;
    }
  }

  private async write(key: string, value: Json, ttlSeconds: number): Promise<void> {
    try {
      await this.store.set(key, value, ttlSeconds);
    } catch (error) {
      console.warn(`[${this.tag}] store unavailable on write`, { key, error: safeErrorForLog(error) });
    }
  }
}
