import { describe, it, expect, beforeEach, vi } from "vitest";
import type { Topic } from "@/types/practice";
import { createTestRuntime, type TestRuntimeParts } from "@/test-utils/fakes";

const TOPICS: Topic[] = [
  { id: "t1", name: "Fracciones", sourceId: "book-1" },
  { id: "t2", name: "Álgebra", sourceId: "book-1" },
  { id: "t3", name: "Geometría", sourceId: "book-1" },
  { id: "t4", name: "Estadística", sourceId: "book-1" },
];

describe("Prefetcher", () => {
  let parts: TestRuntimeParts;

  beforeEach(async () => {
    parts = createTestRuntime({ topics: TOPICS });
    await parts.runtime.retrieval.storeChunks("book-1", [{ text: "Las fracciones se suman.", chunkIndex: 0 }]);
  });

  describe("startSession", () => {
    it("queues one context job and one pool job and returns at once", () => {
      const accepted = parts.runtime.prefetcher.startSession({
        studentId: "student-1",
        course: "6A",
        topicIds: ["t1", "t2", "t3", "t4"],
      });

      expect(accepted).toBe(2);
      expect(parts.scheduler.names).toEqual(["prefetch-contexts", "prefetch-exercises"]);
      expect(parts.topics.lookups).toEqual([]);
      expect(parts.engine.exerciseCalls).toEqual([]);
    });

    it("warms contexts for the first three topics and pools for the first two", async () => {
      parts.runtime.prefetcher.startSession({ studentId: "student-1", course: "6A", topicIds: ["t1", "t2", "t3", "t4"] });

      await parts.scheduler.runAll();

      expect(parts.topics.lookups.slice(0, 3)).toEqual(["t1", "t2", "t3"]);
      expect(parts.engine.exerciseCalls.map((call) => `${call.topic}/${call.difficulty}`)).toEqual([
        "Fracciones/easy",
        "Fracciones/medium",
        "Fracciones/hard",
        "Álgebra/easy",
        "Álgebra/medium",
        "Álgebra/hard",
      ]);
      expect(await parts.runtime.pool.contents({ topic: "Fracciones", difficulty: "easy", course: "6A" })).toEqual([
        "generated 1",
      ]);
      expect(await parts.runtime.pool.size({ topic: "Geometría", difficulty: "easy", course: "6A" })).toBe(0);
    });

    it("queues nothing for a student without topics", () => {
      expect(parts.runtime.prefetcher.startSession({ studentId: "student-1", course: "6A", topicIds: [] })).toBe(0);
      expect(parts.scheduler.jobs).toHaveLength(0);
    });

    it("counts only the jobs the queue accepted", () => {
      parts.scheduler.accept = false;

      expect(parts.runtime.prefetcher.startSession({ studentId: "student-1", course: "6A", topicIds: ["t1"] })).toBe(0);
    });
  });

  it("stores warmed contexts so later requests skip retrieval", async () => {
    await parts.runtime.prefetcher.warmContexts(["t1"]);
    const matchesAfterWarm = parts.vectorStore.matchCalls;

    expect(await parts.runtime.contexts.getContext("t1", parts.runtime.config.retrieval.contextTopK)).toBe(
      "Las fracciones se suman."
    );
    expect(parts.vectorStore.matchCalls).toBe(matchesAfterWarm);
  });

  it("keeps warming the other pools when one refill fails", async () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    parts.engine.exerciseScript = [new Error("Request timed out")];

    await parts.runtime.prefetcher.warmPools("student-1", "6A", ["t1"]);

    expect(await parts.runtime.pool.size({ topic: "Fracciones", difficulty: "easy", course: "6A" })).toBe(0);
    expect(await parts.runtime.pool.contents({ topic: "Fracciones", difficulty: "medium", course: "6A" })).toEqual([
      "generated 1",
    ]);
    expect(warnSpy).toHaveBeenCalledWith(
      "[prefetch] pool refill failed",
      { topicId: "t1", difficulty: "easy", message: "Request timed out" }
    );
  });

  it("queues a rolling refill that skips the student's completed exercises", async () => {
    parts.history.complete("student-1", "generated 1");

    expect(
      parts.runtime.prefetcher.requestRollingPrefetch({ studentId: "student-1", course: "6A", topicId: "t2", difficulty: "hard" })
    ).toBe(true);
    expect(parts.scheduler.names).toEqual(["rolling-prefetch"]);

    await parts.scheduler.runAll();

    expect(await parts.runtime.pool.contents({ topic: "Álgebra", difficulty: "hard", course: "6A" })).toEqual([
      "generated 2",
    ]);
  });

  it("queues nothing for topics whose source has no chunks", async () => {
    await parts.runtime.retrieval.deleteSource("book-1");

    await parts.runtime.prefetcher.warmPools("student-1", "6A", ["t1"]);

    expect(parts.engine.exerciseCalls).toEqual([]);
    expect(await parts.runtime.pool.size({ topic: "Fracciones", difficulty: "easy", course: "6A" })).toBe(0);
  });
});
