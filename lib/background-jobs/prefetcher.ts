// lib/background-jobs/prefetcher.ts
// Warms the context cache and exercise pools ahead of a student's requests.

import { SUPPORTED_DIFFICULTIES, type Difficulty } from "@/types/practice";
import type { ContextCache } from "@/lib/context-cache";
import type { ExercisePipeline } from "@/lib/exercise-pipeline";
import { getErrorMessage, shortId } from "@/lib/log-utils";
import type { JobScheduler } from "./job-queue";

export type PrefetchSession = {
  studentId: string;
  course: string;
  /** Assigned topics in assignment order; only the first few are warmed. */
  topicIds: string[];
};

export type RollingPrefetch = {
  studentId: string;
  course: string;
  topicId: string;
  difficulty: Difficulty;
};

export type PrefetcherOptions = {
  contextTopics: number;
  exerciseTopics: number;
  contextTopK: number;
};

export class Prefetcher {
  constructor(
    private readonly scheduler: JobScheduler,
    private readonly contexts: ContextCache,
    private readonly pipeline: ExercisePipeline,
    private readonly options: PrefetcherOptions
  ) {}

  /**
   * Queues the two session-entry jobs and returns immediately. Returns how
   * many of them the queue accepted.
   */
  startSession(session: PrefetchSession): number {
    const contextTopicIds = session.topicIds.slice(0, this.options.contextTopics);
    const exerciseTopicIds = session.topicIds.slice(0, this.options.exerciseTopics);
    const detail = { student: shortId(session.studentId), course: session.course };

    let accepted = 0;
    if (contextTopicIds.length > 0) {
      const queued = this.scheduler.enqueue({
        name: "prefetch-contexts",
        detail: { ...detail, topics: contextTopicIds.length },
        run: () => this.warmContexts(contextTopicIds),
      });
      if (queued) accepted += 1;
    }

    if (exerciseTopicIds.length > 0) {
      const queued = this.scheduler.enqueue({
        name: "prefetch-exercises",
        detail: { ...detail, topics: exerciseTopicIds.length },
        run: () => this.warmPools(session.studentId, session.course, exerciseTopicIds),
      });
      if (queued) accepted += 1;
    }

    return accepted;
  }

  /** One more refill for the pool a student is consuming from. */
  requestRollingPrefetch(request: RollingPrefetch): boolean {
    return this.scheduler.enqueue({
      name: "rolling-prefetch",
      detail: { student: shortId(request.studentId), topicId: request.topicId, difficulty: request.difficulty },
      run: async () => {
        await this.pipeline.refillForStudent(request);
      },
    });
  }

  async warmContexts(topicIds: string[]): Promise<void> {
    for (const topicId of topicIds) {
      await this.contexts.getContext(topicId, this.options.contextTopK);
    }
    console.log("[prefetch] contexts warmed", { topics: topicIds.length });
  }

  /**
   * One refill per (topic, difficulty). A failing pool is logged and the rest
   * still run.
   */
  async warmPools(studentId: string, course: string, topicIds: string[]): Promise<void> {
    let added = 0;
    for (const topicId of topicIds) {
      for (const difficulty of SUPPORTED_DIFFICULTIES) {
        try {
          const outcome = await this.pipeline.refillForStudent({ studentId, topicId, difficulty, course });
          if (outcome.status === "added") added += 1;
        } catch (error) {
          console.warn("[prefetch] pool refill failed", {
            topicId,
            difficulty,
            message: getErrorMessage(error),
          });
        }
      }
    }
    console.log("[prefetch] pools warmed", { student: shortId(studentId), topics: topicIds.length, added });
  }
}
