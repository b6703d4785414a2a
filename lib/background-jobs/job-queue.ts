// lib/background-jobs/job-queue.ts
// Bounded fire-and-forget queue for prefetch and pool refill work.
// Jobs never report back to whoever enqueued them; failures are only logged.

import { Semaphore } from "async-mutex";
import { safeErrorForLog } from "@/lib/log-utils";

export type BackgroundJob = {
  name: string;
  run: () => Promise<void>;
  /** Extra fields for the job's log lines. */
  detail?: Record<string, unknown>;
};

export interface JobScheduler {
  /** False when the job was dropped because the backlog is full. */
  enqueue(job: BackgroundJob): boolean;
}

export type JobQueueOptions = {
  concurrency?: number;
  maxPending?: number;
};

export type JobQueueStats = {
  pending: number;
  completed: number;
  failed: number;
  dropped: number;
};

export class BackgroundJobQueue implements JobScheduler {
  private readonly semaphore: Semaphore;
  private readonly maxPending: number;
  private readonly inFlight = new Set<Promise<void>>();
  private completed = 0;
  private failed = 0;
  private dropped = 0;

  constructor(options: JobQueueOptions = {}) {
    this.semaphore = new Semaphore(Math.max(1, options.concurrency ?? 4));
    this.maxPending = Math.max(1, options.maxPending ?? 64);
  }

  enqueue(job: BackgroundJob): boolean {
    if (this.inFlight.size >= this.maxPending) {
      this.dropped += 1;
      console.warn("[job-queue] backlog full, dropping job", {
        job: job.name,
        ...job.detail,
        pending: this.inFlight.size,
      });
      return false;
    }

    const tracked: Promise<void> = this.semaphore
      .runExclusive(() => this.execute(job))
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
    return true;
  }

  /** Resolves once every queued job, including ones queued meanwhile, settled. */
  async onIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  stats(): JobQueueStats {
    return {
      pending: this.inFlight.size,
      completed: this.completed,
      failed: this.failed,
      dropped: this.dropped,
    };
  }

  private async execute(job: BackgroundJob): Promise<void> {
    const startedAt = Date.now();
    try {
      await job.run();
      this.completed += 1;
      console.debug("[job-queue] job done", { job: job.name, ...job.detail, ms: Date.now() - startedAt });
    } catch (error) {
      this.failed += 1;
      console.error("[job-queue] job failed", {
        job: job.name,
        ...job.detail,
        ms: Date.now() - startedAt,
        error: safeErrorForLog(error),
      });
    }
  }
}
