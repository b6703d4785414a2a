import { z } from "zod";

// Engines answer in snake_case JSON; everything past the parser is camelCase.

const ProcedureIdSchema = z.union([z.number(), z.string()]);

// Models sometimes answer with an object or list where text was asked for
const LooseText = z.unknown().transform((value) => {
  if (value == null) return "";
  return typeof value === "string" ? value : JSON.stringify(value);
});

const RawProcedureSchema = z.object({
  id: ProcedureIdSchema,
  name: z.string().min(1),
  description: LooseText,
});

const RawExerciseSchema = z.object({
  content: z.string().min(1),
  solution: LooseText,
  methodology: LooseText,
  available_procedures: z.array(RawProcedureSchema).catch([]),
  expected_procedures: z.array(ProcedureIdSchema).catch([]),
});

export const ProcedureSchema = z.object({
  id: ProcedureIdSchema,
  name: z.string(),
  description: z.string(),
});

export type Procedure = z.infer<typeof ProcedureSchema>;

export const ExercisePayloadSchema = z.object({
  content: z.string(),
  solution: z.string(),
  methodology: z.string(),
  availableProcedures: z.array(ProcedureSchema),
  expectedProcedures: z.array(ProcedureIdSchema),
});

export type ExercisePayload = z.infer<typeof ExercisePayloadSchema>;

export const EvaluationSchema = z.object({
  isCorrectResult: z.boolean(),
  isCorrectMethodology: z.boolean(),
  errorsFound: z.array(z.string()),
  feedback: z.string(),
});

export type Evaluation = z.infer<typeof EvaluationSchema>;

const RawEvaluationSchema = z.object({
  is_correct_result: z.boolean().catch(false),
  is_correct_methodology: z.boolean().catch(false),
  errors_found: z.array(z.string()).catch([]),
  feedback: z.string().catch(""),
});

export const ExtractedTopicSchema = z.object({
  name: z.string().min(1),
  description: z.string().catch(""),
});

export type ExtractedTopic = z.infer<typeof ExtractedTopicSchema>;

const RawTopicListSchema = z.object({
  topics: z.array(z.unknown()),
});

/**
 * Strips a markdown code fence around a JSON answer, if there is one.
 */
export function extractJsonBlock(response: string): string {
  if (response.includes("```json")) {
    return (response.split("```json")[1] ?? "").split("```")[0]?.trim() ?? "";
  }
  if (response.includes("```")) {
    return (response.split("```")[1] ?? "").split("```")[0]?.trim() ?? "";
  }
  return response.trim();
}

function parseJson(response: string): unknown {
  try {
    return JSON.parse(extractJsonBlock(response));
  } catch {
    return undefined;
  }
}

export function fallbackExercise(raw: string): ExercisePayload {
  return {
    content: raw,
    solution: "",
    methodology: "",
    availableProcedures: [],
    expectedProcedures: [],
  };
}

/**
 * Parses an exercise answer. Anything that is not a usable exercise object
 * degrades to a payload carrying the raw text as its content.
 */
export function parseExercisePayload(response: string): ExercisePayload {
  const parsed = RawExerciseSchema.safeParse(parseJson(response));
  if (!parsed.success) {
    console.warn("[schema] exercise answer was not valid JSON; using raw text", {
      length: response.length,
    });
    return fallbackExercise(response);
  }

  const data = parsed.data;
  return {
    content: data.content,
    solution: data.solution,
    methodology: data.methodology,
    availableProcedures: data.available_procedures,
    expectedProcedures: data.expected_procedures,
  };
}

export function parseEvaluation(response: string): Evaluation {
  const parsed = RawEvaluationSchema.safeParse(parseJson(response));
  if (!parsed.success) {
    return {
      isCorrectResult: false,
      isCorrectMethodology: false,
      errorsFound: ["Could not evaluate the submission"],
      feedback: response,
    };
  }
  return {
    isCorrectResult: parsed.data.is_correct_result,
    isCorrectMethodology: parsed.data.is_correct_methodology,
    errorsFound: parsed.data.errors_found,
    feedback: parsed.data.feedback,
  };
}

/**
 * Topics found in a `{ "topics": [...] }` answer; malformed entries are dropped.
 */
export function parseTopicList(response: string): ExtractedTopic[] {
  const parsed = RawTopicListSchema.safeParse(parseJson(response));
  if (!parsed.success) return [];

  return parsed.data.topics.flatMap((entry) => {
    const topic = ExtractedTopicSchema.safeParse(entry);
    return topic.success ? [topic.data] : [];
  });
}
