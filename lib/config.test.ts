import { describe, it, expect } from "vitest";
import { loadTutorConfig, normalizeBooleanEnv, resolveNumericEnv } from "./config";
import { getEngineConfig, parseEngineProvider } from "./engine-config";

describe("loadTutorConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadTutorConfig({});

    expect(config.engine).toMatchObject({ provider: "openai", model: "gpt-4o-mini", timeoutMs: 60_000 });
    expect(config.embeddings).toMatchObject({ model: "text-embedding-3-small", dimensions: 384, batchSize: 32 });
    expect(config.cache).toEqual({
      backend: "supabase",
      contextTtlSeconds: 86_400,
      summaryTtlSeconds: 86_400,
      poolTtlSeconds: 3600,
    });
    expect(config.pool).toEqual({ capacity: 5, refillAttempts: 3, lockBackend: "process", lockTtlMs: 180_000 });
    expect(config.retrieval.contextTopK).toBe(3);
    expect(config.prefetch).toEqual({ enabled: true, contextTopics: 3, exerciseTopics: 2, concurrency: 4, maxPending: 64 });
    expect(config.ingestion).toEqual({ chunkSize: 500, chunkOverlap: 50 });
    expect(config.language).toBe("Spanish");
    expect(config.port).toBe(3000);
  });

  it("reads overrides and ignores invalid numbers", () => {
    const config = loadTutorConfig({
      EXERCISE_POOL_SIZE: "8",
      CONTEXT_TOP_K: "zero",
      CACHE_BACKEND: "Memory",
      POOL_LOCK_BACKEND: "supabase",
      PREFETCH_ENABLED: "off",
      TUTOR_LANGUAGE: " English ",
    });

    expect(config.pool.capacity).toBe(8);
    expect(config.pool.lockBackend).toBe("supabase");
    expect(config.retrieval.contextTopK).toBe(3);
    expect(config.cache.backend).toBe("memory");
    expect(config.prefetch.enabled).toBe(false);
    expect(config.language).toBe("English");
  });

  it("falls back to the chat key for embeddings", () => {
    expect(loadTutorConfig({ OPENAI_API_KEY: "test-secret" }).embeddings.apiKey).toBe("test-secret");
  });
});

describe("engine configuration", () => {
  it("rejects unknown providers", () => {
    expect(() => parseEngineProvider("gemini")).toThrow(
      "Engine 'gemini' not supported. Available engines: openai, deepseek, ollama"
    );
  });

  it("points ollama at its OpenAI-compatible endpoint", () => {
    expect(getEngineConfig("ollama", { OLLAMA_BASE_URL: "http://gpu-box:11434/", ACTIVE_AI_MODEL: "qwen2.5" })).toEqual({
      provider: "ollama",
      apiKey: "ollama",
      baseURL: "http://gpu-box:11434/v1",
      model: "qwen2.5",
      timeoutMs: 60_000,
    });
  });

  it("reads the deepseek key", () => {
    expect(getEngineConfig("deepseek", { DEEPSEEK_API_KEY: "test-secret" })).toMatchObject({
      apiKey: "test-secret",
      model: "deepseek-chat",
    });
  });
});

describe("env helpers", () => {
  it("parses booleans loosely", () => {
    expect(normalizeBooleanEnv("Yes")).toBe(true);
    expect(normalizeBooleanEnv("0")).toBe(false);
    expect(normalizeBooleanEnv("maybe")).toBeNull();
    expect(normalizeBooleanEnv(undefined)).toBeNull();
  });

  it("falls back on blank or non-numeric values", () => {
    expect(resolveNumericEnv(" ", 7)).toBe(7);
    expect(resolveNumericEnv("abc", 7)).toBe(7);
    expect(resolveNumericEnv("2.5", 7)).toBe(2.5);
  });
});
