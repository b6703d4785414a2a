// lib/exercises.ts
// Served exercises, student submissions and the history derived from them.

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { Difficulty } from "@/types/practice";
import { ExercisePayloadSchema, type Evaluation, type ExercisePayload } from "./schema";

export type StoredExercise = {
  id: string;
  topicId: string;
  difficulty: Difficulty;
  course: string | null;
  payload: ExercisePayload;
};

export type NewExercise = Omit<StoredExercise, "id">;

export type NewSubmission = {
  exerciseId: string;
  studentId: string;
  answer: string;
  methodology: string;
  selectedProcedures: Array<string | number>;
  evaluation: Evaluation;
};

export interface ExerciseRepository {
  saveExercise(exercise: NewExercise): Promise<string>;
  getExercise(exerciseId: string): Promise<StoredExercise | null>;
  saveSubmission(submission: NewSubmission): Promise<string>;
}

export interface StudentHistoryRepository {
  /** Exact content strings of every exercise the student has submitted. */
  getCompletedContents(studentId: string): Promise<Set<string>>;
}

const IdSchema = z.union([z.string(), z.number()]).transform(String);

const ExerciseRowSchema = z.object({
  id: IdSchema,
  topic_id: IdSchema,
  difficulty: z.enum(["easy", "medium", "hard"]),
  course: z.string().nullable(),
  content: z.string(),
  solution: z.string().nullable(),
  methodology: z.string().nullable(),
  available_procedures: z.unknown(),
  expected_procedures: z.unknown(),
});

const CompletedRowSchema = z.object({ content: z.string() });

function toStoredExercise(row: z.infer<typeof ExerciseRowSchema>): StoredExercise | null {
  const payload = ExercisePayloadSchema.safeParse({
    content: row.content,
    solution: row.solution ?? "",
    methodology: row.methodology ?? "",
    availableProcedures: row.available_procedures ?? [],
    expectedProcedures: row.expected_procedures ?? [],
  });
  if (!payload.success) return null;
  return {
    id: row.id,
    topicId: row.topic_id,
    difficulty: row.difficulty,
    course: row.course,
    payload: payload.data,
  };
}

export class SupabaseExerciseRepository implements ExerciseRepository {
  constructor(private readonly sb: SupabaseClient) {}

  async saveExercise(exercise: NewExercise): Promise<string> {
    const { payload } = exercise;
    const { data, error } = await this.sb
      .from("exercises")
      .insert({
        topic_id: exercise.topicId,
        difficulty: exercise.difficulty,
        course: exercise.course,
        content: payload.content,
        solution: payload.solution,
        methodology: payload.methodology,
        available_procedures: payload.availableProcedures,
        expected_procedures: payload.expectedProcedures,
      })
      .select("id")
      .single();

    if (error || !data) {
      console.error("[exercises] saveExercise error:", error);
      throw new Error(`Failed to save exercise: ${error?.message ?? "no row returned"}`);
    }
    return IdSchema.parse(data.id);
  }

  async getExercise(exerciseId: string): Promise<StoredExercise | null> {
    const { data, error } = await this.sb
      .from("exercises")
      .select("id, topic_id, difficulty, course, content, solution, methodology, available_procedures, expected_procedures")
      .eq("id", exerciseId)
      .maybeSingle();

    if (error) {
      console.error("[exercises] getExercise error:", error);
      throw new Error(`Failed to load exercise ${exerciseId}: ${error.message}`);
    }
    if (!data) return null;

    const row = ExerciseRowSchema.safeParse(data);
    const stored = row.success ? toStoredExercise(row.data) : null;
    if (!stored) console.warn("[exercises] malformed exercise row", { exerciseId });
    return stored;
  }

  async saveSubmission(submission: NewSubmission): Promise<string> {
    const { evaluation } = submission;
    const { data, error } = await this.sb
      .from("submissions")
      .insert({
        exercise_id: submission.exerciseId,
        student_id: submission.studentId,
        answer: submission.answer,
        methodology: submission.methodology,
        selected_procedures: submission.selectedProcedures,
        is_correct_result: evaluation.isCorrectResult,
        is_correct_methodology: evaluation.isCorrectMethodology,
        errors_found: evaluation.errorsFound,
        feedback: evaluation.feedback,
      })
      .select("id")
      .single();

    if (error || !data) {
      console.error("[exercises] saveSubmission error:", error);
      throw new Error(`Failed to save submission: ${error?.message ?? "no row returned"}`);
    }
    return IdSchema.parse(data.id);
  }
}

export class SupabaseStudentHistoryRepository implements StudentHistoryRepository {
  constructor(private readonly sb: SupabaseClient) {}

  async getCompletedContents(studentId: string): Promise<Set<string>> {
    const { data, error } = await this.sb.rpc("completed_exercise_contents", { p_student_id: studentId });

    if (error) {
      console.error("[exercises] completed_exercise_contents error:", error);
      throw new Error(`Failed to load student history: ${error.message}`);
    }

    const rows = z.array(CompletedRowSchema).safeParse(data ?? []);
    if (!rows.success) {
      console.warn("[exercises] malformed history rows", { studentId });
      return new Set();
    }
    return new Set(rows.data.map((row) => row.content));
  }
}
