import { describe, it, expect, beforeEach } from "vitest";
import { buildCacheKey, MemoryCacheStore } from "./cache-store";

describe("buildCacheKey", () => {
  it("ignores parameter order", () => {
    expect(buildCacheKey("context", { topicId: "t1", topK: 3 })).toBe(buildCacheKey("context", { topK: 3, topicId: "t1" }));
  });

  it("prefixes an md5 digest of the parameters", () => {
    expect(buildCacheKey("context", { topicId: "t1", topK: 3 })).toMatch(/^context:[0-9a-f]{32}$/);
  });

  it("separates different parameter values", () => {
    expect(buildCacheKey("context", { topicId: "t1", topK: 3 })).not.toBe(buildCacheKey("context", { topicId: "t1", topK: 2 }));
  });

  it("treats undefined and null parameters alike", () => {
    expect(buildCacheKey("summary", { topicId: "t1", course: undefined })).toBe(
      buildCacheKey("summary", { topicId: "t1", course: null })
    );
  });
});

describe("MemoryCacheStore", () => {
  let store: MemoryCacheStore;

  beforeEach(() => {
    store = new MemoryCacheStore();
  });

  it("returns null for absent keys", async () => {
    expect(await store.get("missing")).toBeNull();
  });

  it("stores a snapshot of the value", async () => {
    const value = { items: ["a"] };
    await store.set("k", value, 60);
    value.items.push("b");

    expect(await store.get("k")).toEqual({ items: ["a"] });
  });

  it("expires entries after their time-to-live", async () => {
    await store.set("short", "value", 0.05);
    expect(await store.get("short")).toBe("value");

    await new Promise((resolve) => setTimeout(resolve, 120));

    expect(await store.get("short")).toBeNull();
  });

  it("deletes a single key", async () => {
    await store.set("k", 1, 60);
    await store.delete("k");

    expect(await store.get("k")).toBeNull();
  });

  it("deletes every key matching a glob pattern", async () => {
    await store.set("context:a", "1", 60);
    await store.set("context:b", "2", 60);
    await store.set("summary:a", "3", 60);

    expect(await store.deletePattern("context:*")).toBe(2);
    expect(await store.get("context:a")).toBeNull();
    expect(await store.get("summary:a")).toBe("3");
  });

  it("matches pattern punctuation literally", async () => {
    await store.set("a.b1", "1", 60);
    await store.set("axb1", "2", 60);

    expect(await store.deletePattern("a.b*")).toBe(1);
    expect(await store.get("axb1")).toBe("2");
  });
});
