// lib/context-cache.ts
// "Best context for topic X", memoized per (topicId, topK).

import { z } from "zod";
import type { CacheAside } from "./cache-aside";
import { buildCacheKey } from "./cache-store";
import type { RetrievalEngine } from "./retrieval";
import type { TopicRepository } from "./topics";

export const CONTEXT_KEY_PREFIX = "context";

const ContextValueSchema = z.string();

export class ContextCache {
  constructor(
    private readonly topics: TopicRepository,
    private readonly retrieval: RetrievalEngine,
    private readonly cache: CacheAside,
    private readonly ttlSeconds: number
  ) {}

  /**
   * Chunks closest to the topic's name within its own source, joined by blank
   * lines. Unknown topics yield "" and are not cached.
   */
  async getContext(topicId: string, topK: number): Promise<string> {
    const key = buildCacheKey(CONTEXT_KEY_PREFIX, { topicId, topK });
    return this.cache.getOrCompute(key, this.ttlSeconds, () => this.compute(topicId, topK), {
      schema: ContextValueSchema,
      shouldCache: (value) => value.length > 0,
    });
  }

  async invalidateAll(): Promise<number> {
    return this.cache.invalidate(`${CONTEXT_KEY_PREFIX}:*`);
  }

  private async compute(topicId: string, topK: number): Promise<string> {
    const topic = await this.topics.getTopic(topicId);
    if (!topic) {
      console.warn("[context-cache] unknown topic", { topicId });
      return "";
    }
    const matches = await this.retrieval.retrieve(topic.name, { sourceId: topic.sourceId, topK });
    return matches.map((match) => match.text).join("\n\n");
  }
}
