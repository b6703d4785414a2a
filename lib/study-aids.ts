import { z } from "zod";
import type { CacheAside } from "./cache-aside";
import { buildCacheKey } from "./cache-store";
import type { ContextCache } from "./context-cache";
import { safeErrorForLog } from "./log-utils";
import type { Evaluation, ExercisePayload } from "./schema";
import type { TopicRepository } from "./topics";
import type { TutorEngine } from "./tutor-engine";
import type { Topic } from "@/types/practice";

export const SUMMARY_KEY_PREFIX = "summary";

export type HintLevel = 1 | 2;

export type Hint = {
  level: HintLevel;
  kind: "text" | "visual";
  hint: string;
};

export type TopicSummary = {
  topic: Topic;
  summary: string;
};

export type SubmissionAttempt = {
  exercise: ExercisePayload;
  topicId: string;
  answer: string;
  methodology: string;
  selectedProcedures: Array<string | number>;
};

export type StudyAidsDeps = {
  topics: TopicRepository;
  contexts: ContextCache;
  engine: TutorEngine;
  cache: CacheAside;
  summaryTtlSeconds: number;
  contextTopK: number;
};

/**
 * Methodology verdict from procedure selection: every expected procedure was
 * selected. Null when either list is empty and the engine's verdict stands.
 */
export function proceduresCoverExpected(
  expected: Array<string | number>,
  selected: Array<string | number>
): boolean | null {
  if (expected.length === 0 || selected.length === 0) return null;
  const chosen = new Set(selected.map(String));
  return expected.every((id) => chosen.has(String(id)));
}

export class StudyAids {
  constructor(private readonly deps: StudyAidsDeps) {}

  /** Null when the topic does not exist. */
  async getTopicSummary(topicId: string, course: string | null): Promise<TopicSummary | null> {
    const topic = await this.deps.topics.getTopic(topicId);
    if (!topic) return null;

    const key = buildCacheKey(SUMMARY_KEY_PREFIX, { topicId, course });
    const summary = await this.deps.cache.getOrCompute(
      key,
      this.deps.summaryTtlSeconds,
      async () => {
        const context = await this.deps.contexts.getContext(topic.id, this.deps.contextTopK);
        return this.deps.engine.generateTopicSummary(topic.name, context, course);
      },
      { schema: z.string(), shouldCache: (value) => value.length > 0 }
    );
    return { topic, summary };
  }

  /** Level 1 is a textual nudge; level 2 a Mermaid scheme of the strategy. */
  async getHint(exercise: Pick<SubmissionAttempt, "exercise" | "topicId">, level: HintLevel): Promise<Hint> {
    const context = await this.deps.contexts.getContext(exercise.topicId, this.deps.contextTopK);
    const content = exercise.exercise.content;

    if (level === 1) {
      return { level, kind: "text", hint: await this.deps.engine.generateHint(content, context) };
    }
    return { level, kind: "visual", hint: await this.deps.engine.generateVisualScheme(content, context) };
  }

  /**
   * Grades an attempt. Procedure selection overrides the engine's methodology
   * verdict; a wrong answer with named errors gets detailed feedback.
   */
  async evaluateSubmission(attempt: SubmissionAttempt): Promise<Evaluation> {
    const { engine } = this.deps;
    const { exercise } = attempt;

    const evaluation = await engine.evaluateSubmission({
      exercise: exercise.content,
      expectedSolution: exercise.solution,
      expectedMethodology: exercise.methodology,
      studentAnswer: attempt.answer,
      studentMethodology: attempt.methodology,
    });

    const byProcedures = proceduresCoverExpected(exercise.expectedProcedures, attempt.selectedProcedures);
    const result: Evaluation = {
      ...evaluation,
      isCorrectMethodology: byProcedures ?? evaluation.isCorrectMethodology,
    };

    if (result.isCorrectResult || result.errorsFound.length === 0) return result;

    try {
      const context = await this.deps.contexts.getContext(attempt.topicId, this.deps.contextTopK);
      const feedback = await engine.generateFeedback({
        exercise: exercise.content,
        studentAnswer: attempt.answer,
        studentMethodology: attempt.methodology,
        errors: result.errorsFound,
        context,
      });
      return feedback ? { ...result, feedback } : result;
    } catch (error) {
      console.warn("[study-aids] detailed feedback failed; keeping evaluation feedback", {
        error: safeErrorForLog(error),
      });
      return result;
    }
  }
}
