import { describe, it, expect, beforeEach } from "vitest";
import { CacheAside } from "./cache-aside";
import { MemoryCacheStore, type CacheStore } from "./cache-store";
import { ContextCache } from "./context-cache";
import { RetrievalEngine } from "./retrieval";
import {
  createTestEmbeddings,
  FakeTopicRepository,
  KeywordEmbeddingModel,
  MemoryVectorStore,
  ThrowingCacheStore,
} from "@/test-utils/fakes";

const TOPICS = [{ id: "t1", name: "Fracciones", sourceId: "book-1" }];

describe("ContextCache", () => {
  let vectorStore: MemoryVectorStore;
  let retrieval: RetrievalEngine;
  let topics: FakeTopicRepository;

  function contextCache(store: CacheStore) {
    return new ContextCache(topics, retrieval, new CacheAside(store, "context-cache"), 3600);
  }

  beforeEach(async () => {
    const model = new KeywordEmbeddingModel(["fracciones", "álgebra"]);
    vectorStore = new MemoryVectorStore(model.dimension);
    retrieval = new RetrievalEngine(createTestEmbeddings(model).generator, vectorStore);
    topics = new FakeTopicRepository(TOPICS);

    await retrieval.storeChunks("book-1", [
      { text: "Las fracciones se suman.", chunkIndex: 0 },
      { text: "El álgebra usa letras.", chunkIndex: 1 },
      { text: "Texto sin relación.", chunkIndex: 2 },
    ]);
    await retrieval.storeChunks("book-2", [{ text: "Fracciones de otro libro.", chunkIndex: 0 }]);
  });

  it("joins the topic's best chunks from its own source with blank lines", async () => {
    const cache = contextCache(new MemoryCacheStore());

    expect(await cache.getContext("t1", 2)).toBe("Las fracciones se suman.\n\nTexto sin relación.");
  });

  it("serves a second call within the TTL without retrieving again", async () => {
    const cache = contextCache(new MemoryCacheStore());

    const first = await cache.getContext("t1", 2);
    const matchesAfterFirst = vectorStore.matchCalls;
    const second = await cache.getContext("t1", 2);

    expect(second).toBe(first);
    expect(vectorStore.matchCalls).toBe(matchesAfterFirst);
  });

  it("keys entries by topK", async () => {
    const cache = contextCache(new MemoryCacheStore());

    await cache.getContext("t1", 2);

    expect(await cache.getContext("t1", 1)).toBe("Las fracciones se suman.");
    expect(vectorStore.matchCalls).toBe(2);
  });

  it("returns an empty string for an unknown topic without caching it", async () => {
    const cache = contextCache(new MemoryCacheStore());

    expect(await cache.getContext("missing", 3)).toBe("");
    expect(await cache.getContext("missing", 3)).toBe("");
    expect(topics.lookups).toEqual(["missing", "missing"]);
  });

  it("recomputes on every call when the cache store is down", async () => {
    const cache = contextCache(new ThrowingCacheStore());

    expect(await cache.getContext("t1", 1)).toBe("Las fracciones se suman.");
    expect(await cache.getContext("t1", 1)).toBe("Las fracciones se suman.");
    expect(vectorStore.matchCalls).toBe(2);
  });

  it("drops every cached context on invalidateAll", async () => {
    const cache = contextCache(new MemoryCacheStore());
    await cache.getContext("t1", 2);
    await cache.getContext("t1", 1);

    expect(await cache.invalidateAll()).toBe(2);

    await cache.getContext("t1", 2);
    expect(vectorStore.matchCalls).toBe(3);
  });
});
