// lib/runtime.ts
// Wires the practice service once per process. Route handlers and background
// jobs share this instance; tests assemble one from in-process stand-ins.

import { BackgroundJobQueue, type JobScheduler } from "./background-jobs/job-queue";
import { Prefetcher } from "./background-jobs/prefetcher";
import { CacheAside } from "./cache-aside";
import { MemoryCacheStore, SupabaseCacheStore, type CacheStore } from "./cache-store";
import { loadTutorConfig, type TutorConfig } from "./config";
import { ContextCache } from "./context-cache";
import { EmbeddingGenerator, EmbeddingModelHandle, openAIEmbeddingLoader } from "./embeddings";
import { ExercisePipeline } from "./exercise-pipeline";
import { ExercisePoolCache } from "./exercise-pool";
import {
  SupabaseExerciseRepository,
  SupabaseStudentHistoryRepository,
  type ExerciseRepository,
  type StudentHistoryRepository,
} from "./exercises";
import { SourceIngestor } from "./ingestion";
import { InProcessRefillLock, SupabaseRefillLock, type RefillLock } from "./refill-lock";
import { RetrievalEngine } from "./retrieval";
import { SupabaseStudentDirectory, type StudentDirectory } from "./student-auth";
import { StudyAids } from "./study-aids";
import { createServiceClient } from "./supabase";
import { SupabaseTopicRepository, type TopicRepository } from "./topics";
import { createTutorEngine, type TutorEngine } from "./tutor-engine";
import { SupabaseVectorStore, type VectorStore } from "./vector-store";

export type TutorRuntimeDeps = {
  config: TutorConfig;
  embeddings: EmbeddingGenerator;
  vectorStore: VectorStore;
  cacheStore: CacheStore;
  topics: TopicRepository;
  history: StudentHistoryRepository;
  exercises: ExerciseRepository;
  students: StudentDirectory;
  engine: TutorEngine;
  refillLock?: RefillLock;
  /** Defaults to a BackgroundJobQueue sized from the config. */
  scheduler?: JobScheduler;
};

export type TutorRuntime = {
  config: TutorConfig;
  embeddings: EmbeddingGenerator;
  retrieval: RetrievalEngine;
  contexts: ContextCache;
  pool: ExercisePoolCache;
  pipeline: ExercisePipeline;
  prefetcher: Prefetcher;
  studyAids: StudyAids;
  ingestor: SourceIngestor;
  topics: TopicRepository;
  exercises: ExerciseRepository;
  students: StudentDirectory;
  scheduler: JobScheduler;
};

export function assembleTutorRuntime(deps: TutorRuntimeDeps): TutorRuntime {
  const { config } = deps;
  const scheduler =
    deps.scheduler ??
    new BackgroundJobQueue({ concurrency: config.prefetch.concurrency, maxPending: config.prefetch.maxPending });

  const retrieval = new RetrievalEngine(deps.embeddings, deps.vectorStore);
  const contexts = new ContextCache(
    deps.topics,
    retrieval,
    new CacheAside(deps.cacheStore, "context-cache"),
    config.cache.contextTtlSeconds
  );
  const pool = new ExercisePoolCache(deps.cacheStore, {
    capacity: config.pool.capacity,
    ttlSeconds: config.cache.poolTtlSeconds,
  });
  const pipeline = new ExercisePipeline({
    topics: deps.topics,
    history: deps.history,
    contexts,
    engine: deps.engine,
    pool,
    refillLock: deps.refillLock ?? new InProcessRefillLock(),
    scheduler,
    contextTopK: config.retrieval.contextTopK,
    refillAttempts: config.pool.refillAttempts,
  });
  const prefetcher = new Prefetcher(scheduler, contexts, pipeline, {
    contextTopics: config.prefetch.contextTopics,
    exerciseTopics: config.prefetch.exerciseTopics,
    contextTopK: config.retrieval.contextTopK,
  });
  const studyAids = new StudyAids({
    topics: deps.topics,
    contexts,
    engine: deps.engine,
    cache: new CacheAside(deps.cacheStore, "summary-cache"),
    summaryTtlSeconds: config.cache.summaryTtlSeconds,
    contextTopK: config.retrieval.contextTopK,
  });
  const ingestor = new SourceIngestor(retrieval, contexts, deps.engine, config.embeddings.batchSize);

  return {
    config,
    embeddings: deps.embeddings,
    retrieval,
    contexts,
    pool,
    pipeline,
    prefetcher,
    studyAids,
    ingestor,
    topics: deps.topics,
    exercises: deps.exercises,
    students: deps.students,
    scheduler,
  };
}

/**
 * Production wiring: Supabase repositories, the OpenAI embedding model and
 * the configured generative provider.
 */
export function createTutorRuntime(config: TutorConfig = loadTutorConfig()): TutorRuntime {
  const sb = createServiceClient(config.supabase);
  const handle = new EmbeddingModelHandle(
    config.embeddings.model,
    openAIEmbeddingLoader({
      apiKey: config.embeddings.apiKey,
      baseURL: config.embeddings.baseURL,
      model: config.embeddings.model,
      dimensions: config.embeddings.dimensions,
    })
  );

  console.log("[runtime] starting", {
    engine: config.engine.provider,
    model: config.engine.model,
    cache: config.cache.backend,
    poolLock: config.pool.lockBackend,
  });

  return assembleTutorRuntime({
    config,
    embeddings: new EmbeddingGenerator(handle, {
      cacheSize: config.embeddings.cacheSize,
      batchSize: config.embeddings.batchSize,
    }),
    vectorStore: new SupabaseVectorStore(sb, config.embeddings.dimensions),
    cacheStore: config.cache.backend === "memory" ? new MemoryCacheStore() : new SupabaseCacheStore(sb),
    topics: new SupabaseTopicRepository(sb),
    history: new SupabaseStudentHistoryRepository(sb),
    exercises: new SupabaseExerciseRepository(sb),
    students: new SupabaseStudentDirectory(sb),
    engine: createTutorEngine(config.engine, config.language),
    refillLock:
      config.pool.lockBackend === "supabase"
        ? new SupabaseRefillLock(sb, config.pool.lockTtlMs)
        : new InProcessRefillLock(),
  });
}

let runtime: TutorRuntime | null = null;

export function getTutorRuntime(): TutorRuntime {
  if (!runtime) {
    runtime = createTutorRuntime();
  }
  return runtime;
}

/** Replaces the process runtime; null drops it so the next call rebuilds from env. */
export function setTutorRuntime(next: TutorRuntime | null): void {
  runtime = next;
}
