// lib/topics.ts
// Read-only access to topics owned by the course-management layer.

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { Topic } from "@/types/practice";

export interface TopicRepository {
  getTopic(topicId: string): Promise<Topic | null>;
  /** Topics for the given ids, in the order the ids were given. */
  getTopics(topicIds: string[]): Promise<Topic[]>;
}

const TopicRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  topic_name: z.string(),
  source_id: z.union([z.string(), z.number()]).transform(String),
  description: z.string().nullable().optional(),
  course: z.string().nullable().optional(),
  subject: z.string().nullable().optional(),
});

const TOPIC_COLUMNS = "id, topic_name, source_id, description, course, subject";

function toTopic(row: z.infer<typeof TopicRowSchema>): Topic {
  return {
    id: row.id,
    name: row.topic_name,
    sourceId: row.source_id,
    description: row.description ?? null,
    course: row.course ?? null,
    subject: row.subject ?? null,
  };
}

export class SupabaseTopicRepository implements TopicRepository {
  constructor(private readonly sb: SupabaseClient) {}

  async getTopic(topicId: string): Promise<Topic | null> {
    const { data, error } = await this.sb
      .from("topics")
      .select(TOPIC_COLUMNS)
      .eq("id", topicId)
      .maybeSingle();

    if (error) {
      console.error("[topics] getTopic error:", error);
      throw new Error(`Failed to load topic ${topicId}: ${error.message}`);
    }
    if (!data) return null;

    const parsed = TopicRowSchema.safeParse(data);
    if (!parsed.success) {
      console.warn("[topics] malformed topic row", { topicId });
      return null;
    }
    return toTopic(parsed.data);
  }

  async getTopics(topicIds: string[]): Promise<Topic[]> {
    if (topicIds.length === 0) return [];

    const { data, error } = await this.sb
      .from("topics")
      .select(TOPIC_COLUMNS)
      .in("id", topicIds);

    if (error) {
      console.error("[topics] getTopics error:", error);
      throw new Error(`Failed to load topics: ${error.message}`);
    }

    const rows = z.array(TopicRowSchema).safeParse(data ?? []);
    if (!rows.success) {
      console.warn("[topics] malformed topic rows", { count: topicIds.length });
      return [];
    }
    const byId = new Map(rows.data.map((row) => [row.id, toTopic(row)]));
    return topicIds.flatMap((id) => {
      const topic = byId.get(id);
      return topic ? [topic] : [];
    });
  }
}
