import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { StudentProfile } from "@/types/practice";

export interface StudentDirectory {
  /** The student behind a Supabase access token; null when unknown or not a student. */
  getStudentByAccessToken(accessToken: string): Promise<StudentProfile | null>;
}

export function readBearerToken(req: Request): string | null {
  const header = req.headers.get("authorization");
  if (!header) return null;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match?.[1]?.trim() || null;
}

const StudentRowSchema = z.object({
  course: z.string(),
  topic_ids: z
    .array(z.union([z.string(), z.number()]).transform(String))
    .nullable()
    .transform((ids) => ids ?? []),
});

export class SupabaseStudentDirectory implements StudentDirectory {
  constructor(private readonly sb: SupabaseClient) {}

  async getStudentByAccessToken(accessToken: string): Promise<StudentProfile | null> {
    const { data: auth, error: authError } = await this.sb.auth.getUser(accessToken);
    if (authError || !auth.user) return null;

    const { data, error } = await this.sb
      .from("student_profiles")
      .select("course, topic_ids")
      .eq("user_id", auth.user.id)
      .maybeSingle();

    if (error) {
      console.error("[student-auth] student_profiles error:", error);
      throw new Error(`Failed to load student profile: ${error.message}`);
    }
    if (!data) return null;

    const row = StudentRowSchema.safeParse(data);
    if (!row.success) {
      console.warn("[student-auth] malformed student profile", { userId: auth.user.id });
      return null;
    }
    return { id: auth.user.id, course: row.data.course, topicIds: row.data.topic_ids };
  }
}
