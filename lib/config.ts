// lib/config.ts
// Environment-driven settings for the practice service.

import { getEngineConfig, parseEngineProvider, type EngineConfig } from "./engine-config";

export type CacheBackend = "supabase" | "memory";
export type PoolLockBackend = "process" | "supabase";

export type TutorConfig = {
  supabase: {
    url: string;
    serviceRoleKey: string;
    anonKey: string;
  };
  engine: EngineConfig;
  embeddings: {
    apiKey: string;
    baseURL?: string;
    model: string;
    dimensions: number;
    cacheSize: number;
    batchSize: number;
  };
  cache: {
    backend: CacheBackend;
    contextTtlSeconds: number;
    summaryTtlSeconds: number;
    poolTtlSeconds: number;
  };
  pool: {
    capacity: number;
    refillAttempts: number;
    lockBackend: PoolLockBackend;
    lockTtlMs: number;
  };
  retrieval: {
    contextTopK: number;
  };
  prefetch: {
    /** Session entry and rolling prefetch queue jobs only when enabled. */
    enabled: boolean;
    contextTopics: number;
    exerciseTopics: number;
    concurrency: number;
    maxPending: number;
  };
  ingestion: {
    chunkSize: number;
    chunkOverlap: number;
  };
  /** Language the engine writes exercises, hints and summaries in. */
  language: string;
  port: number;
};

type Env = Record<string, string | undefined>;

export const resolveNumericEnv = (value: string | undefined, fallback: number) => {
  if (value == null || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const resolvePositiveInt = (value: string | undefined, fallback: number) => {
  const parsed = Math.floor(resolveNumericEnv(value, fallback));
  return parsed > 0 ? parsed : fallback;
};

export function normalizeBooleanEnv(value: string | undefined): boolean | null {
  if (!value) return null;
  const trimmed = value.trim().toLowerCase();
  if (!trimmed) return null;
  if (["1", "true", "yes", "on", "enable"].includes(trimmed)) return true;
  if (["0", "false", "no", "off", "disable"].includes(trimmed)) return false;
  return null;
}

function parseCacheBackend(value: string | undefined): CacheBackend {
  return value?.trim().toLowerCase() === "memory" ? "memory" : "supabase";
}

function parseLockBackend(value: string | undefined): PoolLockBackend {
  return value?.trim().toLowerCase() === "supabase" ? "supabase" : "process";
}

export function loadTutorConfig(env: Env = process.env): TutorConfig {
  const provider = parseEngineProvider(env.ACTIVE_AI_ENGINE);

  return {
    supabase: {
      url: env.SUPABASE_URL ?? "",
      serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY ?? "",
      anonKey: env.SUPABASE_ANON_KEY ?? "",
    },
    engine: getEngineConfig(provider, env),
    embeddings: {
      apiKey: env.EMBEDDING_API_KEY || env.OPENAI_API_KEY || "",
      baseURL: env.EMBEDDING_BASE_URL || undefined,
      model: env.EMBEDDING_MODEL || "text-embedding-3-small",
      dimensions: resolvePositiveInt(env.EMBEDDING_DIMENSIONS, 384),
      cacheSize: resolvePositiveInt(env.EMBEDDING_CACHE_SIZE, 5000),
      batchSize: resolvePositiveInt(env.EMBEDDING_BATCH_SIZE, 32),
    },
    cache: {
      backend: parseCacheBackend(env.CACHE_BACKEND),
      contextTtlSeconds: resolvePositiveInt(env.CONTEXT_CACHE_TTL_SECONDS, 24 * 3600),
      summaryTtlSeconds: resolvePositiveInt(env.SUMMARY_CACHE_TTL_SECONDS, 24 * 3600),
      poolTtlSeconds: resolvePositiveInt(env.EXERCISE_POOL_TTL_SECONDS, 3600),
    },
    pool: {
      capacity: resolvePositiveInt(env.EXERCISE_POOL_SIZE, 5),
      refillAttempts: resolvePositiveInt(env.EXERCISE_REFILL_ATTEMPTS, 3),
      lockBackend: parseLockBackend(env.POOL_LOCK_BACKEND),
      lockTtlMs: resolvePositiveInt(env.POOL_LOCK_TTL_MS, 3 * 60_000),
    },
    retrieval: {
      contextTopK: resolvePositiveInt(env.CONTEXT_TOP_K, 3),
    },
    prefetch: {
      enabled: normalizeBooleanEnv(env.PREFETCH_ENABLED) ?? true,
      contextTopics: resolvePositiveInt(env.PREFETCH_CONTEXT_TOPICS, 3),
      exerciseTopics: resolvePositiveInt(env.PREFETCH_EXERCISE_TOPICS, 2),
      concurrency: resolvePositiveInt(env.PREFETCH_CONCURRENCY, 4),
      maxPending: resolvePositiveInt(env.PREFETCH_MAX_PENDING, 64),
    },
    ingestion: {
      chunkSize: resolvePositiveInt(env.CHUNK_SIZE, 500),
      chunkOverlap: Math.max(0, Math.floor(resolveNumericEnv(env.CHUNK_OVERLAP, 50))),
    },
    language: env.TUTOR_LANGUAGE?.trim() || "Spanish",
    port: resolvePositiveInt(env.PORT, 3000),
  };
}
