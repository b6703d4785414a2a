import { z } from "zod";
import { authenticateStudent, errorResponse, jsonResponse, parseJsonBody } from "@/lib/http";
import { newRequestId } from "@/lib/log-utils";
import { getTutorRuntime } from "@/lib/runtime";

const BodySchema = z.object({
  exercise_id: z.union([z.string().min(1), z.number()]).transform(String),
  level: z.union([z.literal(1), z.literal(2)]).default(1),
});

export async function POST(req: Request) {
  const reqId = newRequestId();
  try {
    const runtime = getTutorRuntime();
    const auth = await authenticateStudent(req, runtime, "api/practice/hint");
    if (auth.response) return auth.response;

    const body = await parseJsonBody(req, BodySchema);
    if (body.response) return body.response;

    const exercise = await runtime.exercises.getExercise(body.data.exercise_id);
    if (!exercise) {
      return jsonResponse({ error: "Exercise not found" }, 404);
    }

    const hint = await runtime.studyAids.getHint(
      { exercise: exercise.payload, topicId: exercise.topicId },
      body.data.level
    );
    return jsonResponse({ hint: hint.hint, hint_type: hint.kind, hint_level: hint.level });
  } catch (error) {
    return errorResponse(error, "api/practice/hint", reqId);
  }
}
