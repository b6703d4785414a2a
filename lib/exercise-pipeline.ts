/**
 * Exercise Generation Pipeline
 *
 * Serves one exercise for (student, topic, difficulty, course):
 *
 * 1. Pool hit: the oldest queued exercise the student has not completed.
 *    No generative call.
 * 2. Miss or exhausted pool: topic context, then one synchronous engine call.
 *    Malformed answers degrade to a raw-text payload inside the engine.
 * 3. Either way after a miss, one refill of the same pool is queued as a
 *    background job the request never waits on. A miss refill may push the
 *    oldest entry out of a full pool, so a pool a student has used up turns
 *    over. Prefetch refills leave full pools alone and skip topics without
 *    context.
 *
 * Engine transport failures and unknown topics come back as failure results
 * so the caller can show a retry prompt instead of an error page.
 */

import type { Difficulty, PoolKey, Topic } from "@/types/practice";
import type { JobScheduler } from "./background-jobs/job-queue";
import type { ContextCache } from "./context-cache";
import type { ExercisePoolCache } from "./exercise-pool";
import { poolCacheKey } from "./exercise-pool";
import type { StudentHistoryRepository } from "./exercises";
import type { RefillLock } from "./refill-lock";
import type { ExercisePayload } from "./schema";
import type { TopicRepository } from "./topics";
import { toEngineRequestError, type TutorEngine } from "./tutor-engine";

export type ExerciseRequest = {
  studentId: string;
  topicId: string;
  difficulty: Difficulty;
  course: string;
};

export type ExerciseFailureReason = "topic-not-found" | "engine-error";

export type ExerciseResult =
  | { success: true; exercise: ExercisePayload; source: "pool" | "generated"; topic: Topic }
  | { success: false; reason: ExerciseFailureReason; message: string; retryable: boolean };

export type RefillStatus =
  | "added"
  | "full"
  | "busy"
  | "duplicates"
  | "unavailable"
  | "no-context"
  | "topic-not-found";

/** "miss" refills follow a request the pool could not serve; "prefetch" ones are speculative. */
export type RefillTrigger = "miss" | "prefetch";

export type RefillOutcome = { status: RefillStatus; attempts: number };

export type PoolRefill = {
  topic: Topic;
  difficulty: Difficulty;
  course: string;
  trigger: RefillTrigger;
  /** Contents the refill must not produce: the student's history and anything just served. */
  excludedContents: ReadonlySet<string>;
};

export type StudentRefill = {
  studentId: string;
  topicId: string;
  difficulty: Difficulty;
  course: string;
};

export type ExercisePipelineDeps = {
  topics: TopicRepository;
  history: StudentHistoryRepository;
  contexts: ContextCache;
  engine: TutorEngine;
  pool: ExercisePoolCache;
  refillLock: RefillLock;
  scheduler: JobScheduler;
  contextTopK: number;
  refillAttempts: number;
};

export class ExercisePipeline {
  constructor(private readonly deps: ExercisePipelineDeps) {}

  async requestExercise(request: ExerciseRequest): Promise<ExerciseResult> {
    const { topics, history, contexts, engine, pool } = this.deps;

    const topic = await topics.getTopic(request.topicId);
    if (!topic) {
      return {
        success: false,
        reason: "topic-not-found",
        message: `Topic ${request.topicId} not found`,
        retryable: false,
      };
    }

    const key: PoolKey = { topic: topic.name, difficulty: request.difficulty, course: request.course };
    const completed = await history.getCompletedContents(request.studentId);

    const pooled = await pool.takeExercise(key, completed);
    if (pooled) {
      return { success: true, exercise: pooled, source: "pool", topic };
    }

    console.log("[exercise-pipeline] pool miss, generating", { ...key, completed: completed.size });

    const refill: Omit<PoolRefill, "excludedContents"> = {
      topic,
      difficulty: request.difficulty,
      course: request.course,
      trigger: "miss",
    };
    let exercise: ExercisePayload;
    try {
      const context = await contexts.getContext(topic.id, this.deps.contextTopK);
      exercise = await engine.generateExercise(topic.name, context, request.difficulty, request.course);
    } catch (error) {
      this.scheduleRefill({ ...refill, excludedContents: completed });
      const engineError = toEngineRequestError(error);
      console.warn("[exercise-pipeline] generation failed", { ...key, retryable: engineError.retryable });
      return {
        success: false,
        reason: "engine-error",
        message: engineError.message,
        retryable: engineError.retryable,
      };
    }

    this.scheduleRefill({ ...refill, excludedContents: new Set([...completed, exercise.content]) });
    return { success: true, exercise, source: "generated", topic };
  }

  /** Queues one refill; false when the job queue dropped it. */
  scheduleRefill(refill: PoolRefill): boolean {
    return this.deps.scheduler.enqueue({
      name: "pool-refill",
      detail: { topic: refill.topic.name, difficulty: refill.difficulty, course: refill.course, trigger: refill.trigger },
      run: async () => {
        await this.refillPool(refill);
      },
    });
  }

  /**
   * Adds at most one fresh exercise to the pool. Only the holder of the key's
   * refill right generates. After the attempt budget is spent on duplicates
   * the cycle is skipped.
   *
   * A prefetch refill leaves a full pool alone and never generates without
   * topic context. A miss refill always adds, evicting the oldest entry when
   * the pool is full.
   */
  async refillPool(refill: PoolRefill): Promise<RefillOutcome> {
    const { contexts, engine, pool, refillLock } = this.deps;
    const key: PoolKey = { topic: refill.topic.name, difficulty: refill.difficulty, course: refill.course };
    const lockKey = poolCacheKey(key);

    if (!(await refillLock.tryAcquire(lockKey))) {
      console.debug("[exercise-pipeline] refill already running", key);
      return { status: "busy", attempts: 0 };
    }

    try {
      const speculative = refill.trigger === "prefetch";
      if (speculative && (await pool.size(key)) >= pool.capacity) {
        return { status: "full", attempts: 0 };
      }

      const context = await contexts.getContext(refill.topic.id, this.deps.contextTopK);
      if (speculative && !context) {
        console.debug("[exercise-pipeline] prefetch skipped without context", key);
        return { status: "no-context", attempts: 0 };
      }
      const maxAttempts = Math.max(1, this.deps.refillAttempts);

      for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
        const payload = await engine.generateExercise(refill.topic.name, context, refill.difficulty, refill.course);
        if (refill.excludedContents.has(payload.content)) {
          console.debug("[exercise-pipeline] refill produced completed content", { ...key, attempt });
          continue;
        }

        const result = await pool.addExercise(key, payload);
        if (result.added) {
          return { status: "added", attempts: attempt };
        }
        if (result.reason === "unavailable") {
          return { status: "unavailable", attempts: attempt };
        }
        console.debug("[exercise-pipeline] refill rejected", { ...key, attempt, reason: result.reason });
      }

      console.log("[exercise-pipeline] refill skipped after duplicates", { ...key, attempts: maxAttempts });
      return { status: "duplicates", attempts: maxAttempts };
    } finally {
      await refillLock.release(lockKey);
    }
  }

  /** Refill for one student's view of a pool, as prefetch jobs run it. */
  async refillForStudent(refill: StudentRefill): Promise<RefillOutcome> {
    const topic = await this.deps.topics.getTopic(refill.topicId);
    if (!topic) {
      console.warn("[exercise-pipeline] refill for unknown topic", { topicId: refill.topicId });
      return { status: "topic-not-found", attempts: 0 };
    }
    const completed = await this.deps.history.getCompletedContents(refill.studentId);
    return this.refillPool({
      topic,
      difficulty: refill.difficulty,
      course: refill.course,
      trigger: "prefetch",
      excludedContents: completed,
    });
  }
}
