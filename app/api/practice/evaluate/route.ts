import { z } from "zod";
import { authenticateStudent, errorResponse, jsonResponse, parseJsonBody } from "@/lib/http";
import { newRequestId, shortId } from "@/lib/log-utils";
import { getTutorRuntime } from "@/lib/runtime";

const BodySchema = z.object({
  exercise_id: z.union([z.string().min(1), z.number()]).transform(String),
  answer: z.string().trim().min(1),
  methodology: z.string().default(""),
  selected_procedures: z.array(z.union([z.string(), z.number()])).default([]),
});

export async function POST(req: Request) {
  const reqId = newRequestId();
  try {
    const runtime = getTutorRuntime();
    const auth = await authenticateStudent(req, runtime, "api/practice/evaluate");
    if (auth.response) return auth.response;
    const { student } = auth;

    const body = await parseJsonBody(req, BodySchema);
    if (body.response) return body.response;

    const exercise = await runtime.exercises.getExercise(body.data.exercise_id);
    if (!exercise) {
      return jsonResponse({ error: "Exercise not found" }, 404);
    }

    const evaluation = await runtime.studyAids.evaluateSubmission({
      exercise: exercise.payload,
      topicId: exercise.topicId,
      answer: body.data.answer,
      methodology: body.data.methodology,
      selectedProcedures: body.data.selected_procedures,
    });

    const submissionId = await runtime.exercises.saveSubmission({
      exerciseId: exercise.id,
      studentId: student.id,
      answer: body.data.answer,
      methodology: body.data.methodology,
      selectedProcedures: body.data.selected_procedures,
      evaluation,
    });

    console.log(`[api/practice/evaluate] [${reqId}] graded`, {
      student: shortId(student.id),
      exerciseId: exercise.id,
      correct: evaluation.isCorrectResult,
    });

    return jsonResponse({
      submission_id: submissionId,
      is_correct: evaluation.isCorrectResult,
      is_methodology_correct: evaluation.isCorrectMethodology,
      errors_found: evaluation.errorsFound,
      feedback: evaluation.feedback,
    });
  } catch (error) {
    return errorResponse(error, "api/practice/evaluate", reqId);
  }
}
