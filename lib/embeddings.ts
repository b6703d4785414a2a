import { createHash } from "crypto";
import OpenAI from "openai";
import { LRUCache } from "lru-cache";
import { Mutex } from "async-mutex";
import { getErrorMessage } from "./log-utils";

/**
 * A loaded text-embedding model with a fixed output dimension.
 */
export interface EmbeddingModel {
  readonly name: string;
  readonly dimension: number;
  /** Returns one vector per input text, in input order. */
  embed(texts: string[]): Promise<number[][]>;
}

export type EmbeddingModelLoader = () => Promise<EmbeddingModel>;

export class EmbeddingModelLoadError extends Error {
  readonly modelName: string;

  constructor(modelName: string, cause: unknown) {
    super(`Failed to load embedding model ${modelName}: ${getErrorMessage(cause)}`);
    this.name = "EmbeddingModelLoadError";
    this.modelName = modelName;
  }
}

export class EmbeddingDimensionError extends Error {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Embedding dimension mismatch: expected ${expected}, got ${actual}`);
    this.name = "EmbeddingDimensionError";
    this.expected = expected;
    this.actual = actual;
  }
}

export function assertEmbeddingDimension(vector: number[], expected: number): void {
  if (vector.length !== expected) {
    throw new EmbeddingDimensionError(expected, vector.length);
  }
}

/**
 * Process-wide owner of the embedding model. The first caller pays the load;
 * concurrent callers wait on the same lock and then share the instance.
 * A failed load is remembered and rethrown to every later caller.
 */
export class EmbeddingModelHandle {
  private model: EmbeddingModel | null = null;
  private loadError: EmbeddingModelLoadError | null = null;
  private readonly lock = new Mutex();
  private loads = 0;

  constructor(
    private readonly modelName: string,
    private readonly loader: EmbeddingModelLoader
  ) {}

  async get(): Promise<EmbeddingModel> {
    if (this.model) return this.model;

    return this.lock.runExclusive(async () => {
      if (this.model) return this.model;
      if (this.loadError) throw this.loadError;

      this.loads += 1;
      const startedAt = Date.now();
      console.log("[embeddings] loading model", { model: this.modelName });
      try {
        const model = await this.loader();
        this.model = model;
        console.log("[embeddings] model ready", {
          model: model.name,
          dimension: model.dimension,
          loadMs: Date.now() - startedAt,
        });
        return model;
      } catch (error) {
        this.loadError = new EmbeddingModelLoadError(this.modelName, error);
        console.error("[embeddings] model load failed:", this.loadError.message);
        throw this.loadError;
      }
    });
  }

  get isLoaded(): boolean {
    return this.model !== null;
  }

  /** How many times the loader ran; stays at 1 for a healthy process. */
  get loadCount(): number {
    return this.loads;
  }
}

type OpenAIEmbeddingOptions = {
  apiKey: string;
  baseURL?: string;
  model: string;
  dimensions: number;
};

class OpenAIEmbeddingModel implements EmbeddingModel {
  constructor(
    private readonly client: OpenAI,
    readonly name: string,
    readonly dimension: number
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.client.embeddings.create({
      model: this.name,
      // Limit to ~8k chars to stay within token limits
      input: texts.map((text) => text.trim().slice(0, 8000)),
      dimensions: this.dimension,
      encoding_format: "float",
    });

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}

/**
 * Loader for OpenAI's text-embedding-3 family, requested at a reduced
 * dimension. Loading probes the endpoint once and verifies the dimension.
 */
export function openAIEmbeddingLoader(options: OpenAIEmbeddingOptions): EmbeddingModelLoader {
  return async () => {
    if (!options.apiKey) {
      throw new Error("EMBEDDING_API_KEY or OPENAI_API_KEY is not configured");
    }
    const client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
    const model = new OpenAIEmbeddingModel(client, options.model, options.dimensions);
    const [probe] = await model.embed(["dimension probe"]);
    if (!probe) {
      throw new Error("Embedding endpoint returned no vectors");
    }
    assertEmbeddingDimension(probe, options.dimensions);
    return model;
  };
}

export type EmbeddingGeneratorOptions = {
  /** Maximum cached vectors; least recently used are evicted first. */
  cacheSize?: number;
  /** Texts per model call during batch encoding. */
  batchSize?: number;
};

export function embeddingCacheKey(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

/**
 * Embeds text through the shared model handle, memoizing vectors by content
 * hash. Callers always receive their own copy of a vector.
 */
export class EmbeddingGenerator {
  private readonly cache: LRUCache<string, number[]>;
  private readonly batchSize: number;
  private stats = { hits: 0, misses: 0 };

  constructor(
    private readonly handle: EmbeddingModelHandle,
    options: EmbeddingGeneratorOptions = {}
  ) {
    this.cache = new LRUCache<string, number[]>({ max: options.cacheSize ?? 5000 });
    this.batchSize = Math.max(1, options.batchSize ?? 32);
  }

  async dimension(): Promise<number> {
    const model = await this.handle.get();
    return model.dimension;
  }

  async generateEmbedding(text: string): Promise<number[]> {
    if (!text || text.trim().length === 0) {
      throw new Error("Cannot generate embedding for empty text");
    }

    const key = embeddingCacheKey(text);
    const cached = this.cache.get(key);
    if (cached) {
      this.stats.hits += 1;
      return [...cached];
    }

    this.stats.misses += 1;
    const model = await this.handle.get();
    const [vector] = await model.embed([text]);
    if (!vector) {
      throw new Error("Embedding model returned no vector");
    }
    assertEmbeddingDimension(vector, model.dimension);
    this.cache.set(key, vector);
    return [...vector];
  }

  /**
   * Embeds many texts, sending only cache misses to the model, one call per
   * batch. Output order matches input order.
   */
  async batchEncode(texts: string[]): Promise<number[][]> {
    const results = new Array<number[]>(texts.length);

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      const pending = new Map<string, { text: string; positions: number[] }>();

      batch.forEach((text, offset) => {
        if (!text || text.trim().length === 0) {
          throw new Error(`Cannot generate embedding for empty text at position ${start + offset}`);
        }
        const key = embeddingCacheKey(text);
        const cached = this.cache.get(key);
        if (cached) {
          this.stats.hits += 1;
          results[start + offset] = [...cached];
          return;
        }
        const entry = pending.get(key);
        if (entry) {
          entry.positions.push(start + offset);
        } else {
          this.stats.misses += 1;
          pending.set(key, { text, positions: [start + offset] });
        }
      });

      if (pending.size === 0) continue;

      const model = await this.handle.get();
      const entries = [...pending.entries()];
      const vectors = await model.embed(entries.map(([, entry]) => entry.text));
      if (vectors.length !== entries.length) {
        throw new Error(`Embedding model returned ${vectors.length} vectors for ${entries.length} texts`);
      }

      entries.forEach(([key, entry], idx) => {
        const vector = vectors[idx];
        if (!vector) return;
        assertEmbeddingDimension(vector, model.dimension);
        this.cache.set(key, vector);
        for (const position of entry.positions) {
          results[position] = [...vector];
        }
      });
    }

    return results;
  }

  getCacheStats() {
    const total = this.stats.hits + this.stats.misses;
    return {
      ...this.stats,
      size: this.cache.size,
      hitRate: total > 0 ? this.stats.hits / total : 0,
    };
  }
}
