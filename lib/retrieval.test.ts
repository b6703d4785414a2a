import { describe, it, expect, beforeEach } from "vitest";
import { EmbeddingDimensionError } from "./embeddings";
import { RetrievalEngine, type ChunkInput } from "./retrieval";
import { createTestEmbeddings, KeywordEmbeddingModel, MemoryVectorStore } from "@/test-utils/fakes";

const VOCABULARY = ["fracciones", "álgebra"];

function chunks(...texts: string[]): ChunkInput[] {
  return texts.map((text, idx) => ({ text, chunkIndex: idx, pageNumber: idx + 1 }));
}

describe("RetrievalEngine", () => {
  let model: KeywordEmbeddingModel;
  let store: MemoryVectorStore;
  let engine: RetrievalEngine;

  beforeEach(() => {
    model = new KeywordEmbeddingModel(VOCABULARY);
    store = new MemoryVectorStore(model.dimension);
    engine = new RetrievalEngine(createTestEmbeddings(model).generator, store);
  });

  describe("storeChunks", () => {
    it("writes one bounded batch at a time and returns the total", async () => {
      const stored = await engine.storeChunks("book-1", chunks("a", "b", "c", "d", "e"), 2);

      expect(stored).toBe(5);
      expect(store.insertBatches).toEqual([2, 2, 1]);
      expect(model.calls).toEqual([["a", "b"], ["c", "d"], ["e"]]);
    });

    it("keeps locators and indexes on the stored records", async () => {
      await engine.storeChunks("book-1", chunks("Las fracciones"));

      expect(store.chunks[0]).toMatchObject({
        sourceId: "book-1",
        text: "Las fracciones",
        chunkIndex: 0,
        pageNumber: 1,
        timestamp: null,
        embedding: [1, 0, 1],
      });
    });

    it("rejects embeddings that do not match the store's dimension", async () => {
      const wideStore = new MemoryVectorStore(model.dimension + 2);
      const mismatched = new RetrievalEngine(createTestEmbeddings(model).generator, wideStore);

      await expect(mismatched.storeChunks("book-1", chunks("x"))).rejects.toBeInstanceOf(EmbeddingDimensionError);
      expect(wideStore.chunks).toHaveLength(0);
    });
  });

  describe("retrieve", () => {
    beforeEach(async () => {
      await engine.storeChunks("book-1", chunks("Las fracciones se suman", "El álgebra usa letras", "Texto sin relación"));
      await engine.storeChunks("book-2", chunks("fracciones fracciones"));
    });

    it("returns at most topK matches in non-increasing score order within the source", async () => {
      const matches = await engine.retrieve("fracciones", { sourceId: "book-1", topK: 2 });

      expect(matches.map((match) => match.text)).toEqual(["Las fracciones se suman", "Texto sin relación"]);
      expect(matches[0]?.score).toBeCloseTo(1, 10);
      expect(matches[1]?.score).toBeCloseTo(Math.SQRT1_2, 10);
    });

    it("searches every source when no source is given", async () => {
      const matches = await engine.retrieve("fracciones", { topK: 4 });

      expect(matches).toHaveLength(4);
      for (let i = 1; i < matches.length; i += 1) {
        expect(matches[i - 1]?.score ?? 0).toBeGreaterThanOrEqual(matches[i]?.score ?? 0);
      }
    });

    it("returns an empty list for a source without chunks", async () => {
      expect(await engine.retrieve("fracciones", { sourceId: "book-9", topK: 3 })).toEqual([]);
    });

    it("skips the store entirely when topK is not positive", async () => {
      const before = store.matchCalls;

      expect(await engine.retrieve("fracciones", { topK: 0 })).toEqual([]);
      expect(store.matchCalls).toBe(before);
    });
  });

  it("deletes a source's chunks", async () => {
    await engine.storeChunks("book-1", chunks("a", "b"));
    await engine.storeChunks("book-2", chunks("c"));

    expect(await engine.deleteSource("book-1")).toBe(2);
    expect(store.chunks.map((chunk) => chunk.text)).toEqual(["c"]);
  });
});
