// lib/vector-store.ts
// Persisted text chunks with their embeddings, ranked by pgvector.

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { assertEmbeddingDimension } from "./embeddings";

export type ChunkLocator = {
  pageNumber?: number | null;
  /** "MM:SS" or "HH:MM:SS" for transcript chunks. */
  timestamp?: string | null;
};

export type TextChunk = ChunkLocator & {
  sourceId: string;
  text: string;
  chunkIndex: number;
  embedding: number[];
};

export type ChunkMatch = {
  text: string;
  score: number;
};

export type ChunkQuery = {
  embedding: number[];
  sourceId?: string | null;
  topK: number;
};

export interface VectorStore {
  readonly dimension: number;
  /** Writes all records as one batch. */
  insertChunks(chunks: TextChunk[]): Promise<number>;
  /** Top-k chunks by cosine similarity, most similar first. */
  matchChunks(query: ChunkQuery): Promise<ChunkMatch[]>;
  deleteSourceChunks(sourceId: string): Promise<number>;
}

const MatchRowSchema = z.object({
  chunk_text: z.string(),
  similarity: z.coerce.number(),
});

const DeletedRowSchema = z.object({ id: z.union([z.string(), z.number()]) });

/**
 * Vector store over the `text_chunks` table. Similarity ranking happens in
 * Postgres through the `match_text_chunks` RPC and its HNSW index; vectors
 * are never pulled into the application.
 */
export class SupabaseVectorStore implements VectorStore {
  constructor(
    private readonly sb: SupabaseClient,
    readonly dimension: number
  ) {}

  async insertChunks(chunks: TextChunk[]): Promise<number> {
    if (chunks.length === 0) return 0;
    for (const chunk of chunks) {
      assertEmbeddingDimension(chunk.embedding, this.dimension);
    }

    const { error } = await this.sb.from("text_chunks").insert(
      chunks.map((chunk) => ({
        source_id: chunk.sourceId,
        chunk_text: chunk.text,
        chunk_index: chunk.chunkIndex,
        page_number: chunk.pageNumber ?? null,
        timestamp_label: chunk.timestamp ?? null,
        embedding: chunk.embedding,
      }))
    );

    if (error) {
      console.error("[vector-store] insertChunks error:", error);
      throw new Error(`Failed to store ${chunks.length} chunks: ${error.message}`);
    }
    return chunks.length;
  }

  async matchChunks(query: ChunkQuery): Promise<ChunkMatch[]> {
    if (query.topK <= 0) return [];
    assertEmbeddingDimension(query.embedding, this.dimension);

    const { data, error } = await this.sb.rpc("match_text_chunks", {
      query_embedding: query.embedding,
      match_source_id: query.sourceId ?? null,
      match_count: query.topK,
    });

    if (error) {
      console.error("[vector-store] match_text_chunks error:", error);
      throw new Error(`Similarity query failed: ${error.message}`);
    }

    const rows = z.array(MatchRowSchema).safeParse(data ?? []);
    if (!rows.success) {
      console.error("[vector-store] unexpected match rows:", rows.error.issues.slice(0, 3));
      return [];
    }
    return rows.data.map((row) => ({ text: row.chunk_text, score: row.similarity }));
  }

  async deleteSourceChunks(sourceId: string): Promise<number> {
    const { data, error } = await this.sb
      .from("text_chunks")
      .delete()
      .eq("source_id", sourceId)
      .select("id");

    if (error) {
      console.error("[vector-store] deleteSourceChunks error:", error);
      throw new Error(`Failed to delete chunks for source ${sourceId}: ${error.message}`);
    }
    const rows = z.array(DeletedRowSchema).safeParse(data ?? []);
    return rows.success ? rows.data.length : 0;
  }
}
