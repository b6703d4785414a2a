import { z } from "zod";
import { authenticateStudent, errorResponse, jsonResponse, parseJsonBody } from "@/lib/http";
import { newRequestId } from "@/lib/log-utils";
import { getTutorRuntime } from "@/lib/runtime";

const BodySchema = z.object({
  topic_id: z.union([z.string().min(1), z.number()]).transform(String),
  difficulty: z.enum(["easy", "medium", "hard"]).default("medium"),
});

// Rolling prefetch: queue one more refill for the pool the student just
// consumed from. Answers before the refill runs.
export async function POST(req: Request) {
  const reqId = newRequestId();
  try {
    const runtime = getTutorRuntime();
    const auth = await authenticateStudent(req, runtime, "api/practice/prefetch-next");
    if (auth.response) return auth.response;
    const { student } = auth;

    const body = await parseJsonBody(req, BodySchema);
    if (body.response) return body.response;

    if (!student.topicIds.includes(body.data.topic_id)) {
      return jsonResponse({ error: "Topic not assigned to this student" }, 403);
    }
    if (!runtime.config.prefetch.enabled) {
      return jsonResponse({ queued: false }, 202);
    }

    const queued = runtime.prefetcher.requestRollingPrefetch({
      studentId: student.id,
      course: student.course,
      topicId: body.data.topic_id,
      difficulty: body.data.difficulty,
    });
    return jsonResponse({ queued }, 202);
  } catch (error) {
    return errorResponse(error, "api/practice/prefetch-next", reqId);
  }
}
