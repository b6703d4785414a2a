import { z } from "zod";
import { authenticateStudent, errorResponse, jsonResponse, parseJsonBody } from "@/lib/http";
import { newRequestId } from "@/lib/log-utils";
import { getTutorRuntime } from "@/lib/runtime";

const BodySchema = z.object({
  topic_id: z.union([z.string().min(1), z.number()]).transform(String),
});

export async function POST(req: Request) {
  const reqId = newRequestId();
  try {
    const runtime = getTutorRuntime();
    const auth = await authenticateStudent(req, runtime, "api/practice/summary");
    if (auth.response) return auth.response;
    const { student } = auth;

    const body = await parseJsonBody(req, BodySchema);
    if (body.response) return body.response;

    const result = await runtime.studyAids.getTopicSummary(body.data.topic_id, student.course);
    if (!result) {
      return jsonResponse({ error: "Topic not found" }, 404);
    }
    return jsonResponse({
      topic: { id: result.topic.id, name: result.topic.name },
      summary: result.summary,
    });
  } catch (error) {
    return errorResponse(error, "api/practice/summary", reqId);
  }
}
