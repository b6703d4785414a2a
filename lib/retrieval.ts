import type { EmbeddingGenerator } from "./embeddings";
import { assertEmbeddingDimension } from "./embeddings";
import type { ChunkLocator, ChunkMatch, TextChunk, VectorStore } from "./vector-store";

export type ChunkInput = ChunkLocator & {
  text: string;
  chunkIndex: number;
};

export type RetrieveOptions = {
  /** Restrict ranking to one source; omit to search every source. */
  sourceId?: string | null;
  topK?: number;
};

const DEFAULT_TOP_K = 3;
const DEFAULT_STORE_BATCH = 32;

/**
 * Stores embedded chunks and answers nearest-neighbour queries against them.
 */
export class RetrievalEngine {
  constructor(
    private readonly embeddings: EmbeddingGenerator,
    private readonly store: VectorStore
  ) {}

  /**
   * Embeds and writes chunks one batch at a time so a large ingestion never
   * holds a single oversized write. Returns the number stored.
   */
  async storeChunks(sourceId: string, chunks: ChunkInput[], batchSize = DEFAULT_STORE_BATCH): Promise<number> {
    const size = Math.max(1, batchSize);
    const batches = Math.ceil(chunks.length / size);
    let stored = 0;

    for (let start = 0; start < chunks.length; start += size) {
      const batch = chunks.slice(start, start + size);
      const vectors = await this.embeddings.batchEncode(batch.map((chunk) => chunk.text));

      const records: TextChunk[] = batch.map((chunk, idx) => {
        const embedding = vectors[idx] ?? [];
        assertEmbeddingDimension(embedding, this.store.dimension);
        return {
          sourceId,
          text: chunk.text,
          chunkIndex: chunk.chunkIndex,
          pageNumber: chunk.pageNumber ?? null,
          timestamp: chunk.timestamp ?? null,
          embedding,
        };
      });

      stored += await this.store.insertChunks(records);
      console.debug("[retrieval] batch committed", {
        sourceId,
        batch: start / size + 1,
        batches,
        stored,
      });
    }

    return stored;
  }

  /**
   * Most similar chunks for a query, highest score first. An empty scope
   * yields an empty list.
   */
  async retrieve(query: string, options: RetrieveOptions = {}): Promise<ChunkMatch[]> {
    const topK = options.topK ?? DEFAULT_TOP_K;
    if (topK <= 0) return [];

    const startedAt = Date.now();
    const embedding = await this.embeddings.generateEmbedding(query);
    const embedMs = Date.now() - startedAt;

    const matches = await this.store.matchChunks({
      embedding,
      sourceId: options.sourceId ?? null,
      topK,
    });

    console.debug("[retrieval] query", {
      sourceId: options.sourceId ?? null,
      topK,
      matches: matches.length,
      embedMs,
      totalMs: Date.now() - startedAt,
    });

    return [...matches].sort((a, b) => b.score - a.score).slice(0, topK);
  }

  async deleteSource(sourceId: string): Promise<number> {
    return this.store.deleteSourceChunks(sourceId);
  }
}
