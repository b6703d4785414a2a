import { z } from "zod";
import { authenticateStudent, errorResponse, jsonResponse, parseJsonBody } from "@/lib/http";
import { newRequestId, shortId } from "@/lib/log-utils";
import { getTutorRuntime } from "@/lib/runtime";

const BodySchema = z.object({
  topic_id: z.union([z.string().min(1), z.number()]).transform(String).optional(),
  difficulty: z.enum(["easy", "medium", "hard"]).default("medium"),
});

function pickRandom<T>(items: T[]): T | undefined {
  return items[Math.floor(Math.random() * items.length)];
}

export async function POST(req: Request) {
  const reqId = newRequestId();
  try {
    const runtime = getTutorRuntime();
    const auth = await authenticateStudent(req, runtime, "api/practice/exercise");
    if (auth.response) return auth.response;
    const { student } = auth;

    const body = await parseJsonBody(req, BodySchema);
    if (body.response) return body.response;

    // Without an explicit topic the student practises a random assigned one
    const topicId = body.data.topic_id ?? pickRandom(student.topicIds);
    if (!topicId) {
      return jsonResponse({ error: "No topics assigned" }, 404);
    }
    if (!student.topicIds.includes(topicId)) {
      return jsonResponse({ error: "Topic not assigned to this student" }, 403);
    }

    const startedAt = Date.now();
    const result = await runtime.pipeline.requestExercise({
      studentId: student.id,
      topicId,
      difficulty: body.data.difficulty,
      course: student.course,
    });

    if (!result.success) {
      console.warn(`[api/practice/exercise] [${reqId}] request failed`, {
        reason: result.reason,
        retryable: result.retryable,
      });
      const status = result.reason === "topic-not-found" ? 404 : 502;
      return jsonResponse({ error: result.message, reason: result.reason, retryable: result.retryable }, status);
    }

    const exerciseId = await runtime.exercises.saveExercise({
      topicId: result.topic.id,
      difficulty: body.data.difficulty,
      course: student.course,
      payload: result.exercise,
    });

    console.log(`[api/practice/exercise] [${reqId}] served`, {
      student: shortId(student.id),
      topicId,
      difficulty: body.data.difficulty,
      source: result.source,
      ms: Date.now() - startedAt,
    });

    // Solution and methodology stay server-side until the student submits
    return jsonResponse({
      exercise_id: exerciseId,
      topic: { id: result.topic.id, name: result.topic.name },
      difficulty: body.data.difficulty,
      source: result.source,
      content: result.exercise.content,
      available_procedures: result.exercise.availableProcedures,
    });
  } catch (error) {
    return errorResponse(error, "api/practice/exercise", reqId);
  }
}
