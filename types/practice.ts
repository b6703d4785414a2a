// @/types/practice.ts
export type Difficulty = "easy" | "medium" | "hard";

export const SUPPORTED_DIFFICULTIES: readonly Difficulty[] = ["easy", "medium", "hard"];

export function isDifficulty(value: unknown): value is Difficulty {
  return value === "easy" || value === "medium" || value === "hard";
}

export type Topic = {
  id: string;
  name: string;
  sourceId: string;
  description?: string | null;
  course?: string | null;
  subject?: string | null;
};

export type StudentProfile = {
  id: string;
  course: string;
  /** Topics assigned by the teacher, in assignment order. */
  topicIds: string[];
};

/**
 * Identifies one FIFO queue of pre-generated exercises.
 */
export type PoolKey = {
  topic: string;
  difficulty: Difficulty;
  course: string;
};
