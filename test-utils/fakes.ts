/**
 * In-process stand-ins for the service's collaborators.
 *
 * @example
 * import { KeywordEmbeddingModel, MemoryVectorStore, ScriptedEngine } from '@/test-utils/fakes'
 */

import type { BackgroundJob, JobScheduler } from "@/lib/background-jobs/job-queue";
import { CacheStoreError, MemoryCacheStore, type CacheStore, type Json } from "@/lib/cache-store";
import { loadTutorConfig, type TutorConfig } from "@/lib/config";
import { EmbeddingGenerator, EmbeddingModelHandle, type EmbeddingModel } from "@/lib/embeddings";
import type { SourceMetadata } from "@/lib/exercise-prompts";
import type {
  ExerciseRepository,
  NewExercise,
  NewSubmission,
  StoredExercise,
  StudentHistoryRepository,
} from "@/lib/exercises";
import { InProcessRefillLock } from "@/lib/refill-lock";
import { assembleTutorRuntime, type TutorRuntime } from "@/lib/runtime";
import type { Evaluation, ExercisePayload, ExtractedTopic } from "@/lib/schema";
import type { StudentDirectory } from "@/lib/student-auth";
import type { TopicRepository } from "@/lib/topics";
import type { FeedbackInput, SubmissionInput, TutorEngine } from "@/lib/tutor-engine";
import type { ChunkMatch, ChunkQuery, TextChunk, VectorStore } from "@/lib/vector-store";
import type { Difficulty, StudentProfile, Topic } from "@/types/practice";

// ============================================
// Embeddings and vectors
// ============================================

/**
 * One dimension per vocabulary word (occurrence count) plus a constant bias
 * dimension, so no vector is ever all zeros.
 */
export class KeywordEmbeddingModel implements EmbeddingModel {
  readonly name = "keyword-test-model";
  readonly dimension: number;
  readonly calls: string[][] = [];

  constructor(private readonly vocabulary: string[]) {
    this.dimension = vocabulary.length + 1;
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => this.vectorFor(text));
  }

  vectorFor(text: string): number[] {
    const words = text.toLowerCase().split(/[^\p{L}\p{N}]+/u);
    const counts = this.vocabulary.map((term) => words.filter((word) => word === term).length);
    return [...counts, 1];
  }
}

export function createTestEmbeddings(
  model: EmbeddingModel,
  options: { cacheSize?: number; batchSize?: number } = {}
): { handle: EmbeddingModelHandle; generator: EmbeddingGenerator } {
  const handle = new EmbeddingModelHandle(model.name, async () => model);
  return { handle, generator: new EmbeddingGenerator(handle, options) };
}

/** Exact cosine score; the Supabase store ranks by pgvector's `<=>` instead. */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  return magnitude === 0 ? 0 : dot / magnitude;
}

export class MemoryVectorStore implements VectorStore {
  readonly chunks: TextChunk[] = [];
  readonly insertBatches: number[] = [];
  matchCalls = 0;

  constructor(readonly dimension: number) {}

  async insertChunks(chunks: TextChunk[]): Promise<number> {
    this.insertBatches.push(chunks.length);
    this.chunks.push(...chunks.map((chunk) => ({ ...chunk, embedding: [...chunk.embedding] })));
    return chunks.length;
  }

  async matchChunks(query: ChunkQuery): Promise<ChunkMatch[]> {
    this.matchCalls += 1;
    return this.chunks
      .filter((chunk) => !query.sourceId || chunk.sourceId === query.sourceId)
      .map((chunk) => ({ text: chunk.text, score: cosineSimilarity(query.embedding, chunk.embedding) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, query.topK);
  }

  async deleteSourceChunks(sourceId: string): Promise<number> {
    const before = this.chunks.length;
    const kept = this.chunks.filter((chunk) => chunk.sourceId !== sourceId);
    this.chunks.splice(0, this.chunks.length, ...kept);
    return before - kept.length;
  }
}

// ============================================
// Cache and scheduling
// ============================================

/** A cache store whose backend is always unreachable. */
export class ThrowingCacheStore implements CacheStore {
  calls = 0;

  async get(): Promise<unknown> {
    this.calls += 1;
    throw new CacheStoreError("get", "connection refused");
  }

  async set(_key: string, _value: Json, _ttlSeconds: number): Promise<void> {
    this.calls += 1;
    throw new CacheStoreError("set", "connection refused");
  }

  async delete(): Promise<void> {
    this.calls += 1;
    throw new CacheStoreError("delete", "connection refused");
  }

  async deletePattern(): Promise<number> {
    this.calls += 1;
    throw new CacheStoreError("deletePattern", "connection refused");
  }
}

/** Holds jobs until the test runs them. */
export class RecordingScheduler implements JobScheduler {
  readonly jobs: BackgroundJob[] = [];
  accept = true;

  enqueue(job: BackgroundJob): boolean {
    if (!this.accept) return false;
    this.jobs.push(job);
    return true;
  }

  get names(): string[] {
    return this.jobs.map((job) => job.name);
  }

  /** Runs queued jobs in order, including jobs they queue, until none remain. */
  async runAll(): Promise<void> {
    while (this.jobs.length > 0) {
      const job = this.jobs.shift();
      if (job) await job.run();
    }
  }
}

// ============================================
// Repositories
// ============================================

export class FakeTopicRepository implements TopicRepository {
  readonly lookups: string[] = [];
  private readonly topics: Map<string, Topic>;

  constructor(topics: Topic[]) {
    this.topics = new Map(topics.map((topic) => [topic.id, topic]));
  }

  async getTopic(topicId: string): Promise<Topic | null> {
    this.lookups.push(topicId);
    return this.topics.get(topicId) ?? null;
  }

  async getTopics(topicIds: string[]): Promise<Topic[]> {
    return topicIds.flatMap((id) => {
      const topic = this.topics.get(id);
      return topic ? [topic] : [];
    });
  }
}

export class FakeHistoryRepository implements StudentHistoryRepository {
  private readonly completed = new Map<string, Set<string>>();

  complete(studentId: string, ...contents: string[]): void {
    const set = this.completed.get(studentId) ?? new Set<string>();
    contents.forEach((content) => set.add(content));
    this.completed.set(studentId, set);
  }

  async getCompletedContents(studentId: string): Promise<Set<string>> {
    return new Set(this.completed.get(studentId) ?? []);
  }
}

export class FakeExerciseRepository implements ExerciseRepository {
  readonly exercises = new Map<string, StoredExercise>();
  readonly submissions: Array<NewSubmission & { id: string }> = [];

  async saveExercise(exercise: NewExercise): Promise<string> {
    const id = `ex-${this.exercises.size + 1}`;
    this.exercises.set(id, { ...exercise, id });
    return id;
  }

  async getExercise(exerciseId: string): Promise<StoredExercise | null> {
    return this.exercises.get(exerciseId) ?? null;
  }

  async saveSubmission(submission: NewSubmission): Promise<string> {
    const id = `sub-${this.submissions.length + 1}`;
    this.submissions.push({ ...submission, id });
    return id;
  }
}

export class FakeStudentDirectory implements StudentDirectory {
  constructor(private readonly byToken: Record<string, StudentProfile>) {}

  async getStudentByAccessToken(accessToken: string): Promise<StudentProfile | null> {
    return this.byToken[accessToken] ?? null;
  }
}

// ============================================
// Generative engine
// ============================================

export function makeExercise(content: string, overrides: Partial<ExercisePayload> = {}): ExercisePayload {
  return {
    content,
    solution: `solution of ${content}`,
    methodology: `steps for ${content}`,
    availableProcedures: [
      { id: 1, name: "Common denominator", description: "Rewrite fractions over one denominator" },
      { id: 2, name: "Cross multiplication", description: "Compare two fractions" },
    ],
    expectedProcedures: [1],
    ...overrides,
  };
}

export type ExerciseCall = {
  topic: string;
  context: string;
  difficulty: Difficulty;
  course: string | null;
};

/**
 * TutorEngine that answers from scripted queues. Once the exercise script
 * runs out it invents numbered exercises ("generated 1", "generated 2", ...).
 */
export class ScriptedEngine implements TutorEngine {
  readonly exerciseCalls: ExerciseCall[] = [];
  readonly evaluationCalls: SubmissionInput[] = [];
  readonly feedbackCalls: FeedbackInput[] = [];
  readonly hintCalls: Array<{ exercise: string; context: string | null }> = [];
  readonly summaryCalls: Array<{ topic: string; context: string; course: string | null }> = [];
  readonly topicCalls: Array<{ chunks: string[]; metadata: SourceMetadata }> = [];

  exerciseScript: Array<ExercisePayload | Error> = [];
  evaluation: Evaluation = { isCorrectResult: true, isCorrectMethodology: true, errorsFound: [], feedback: "Well done" };
  feedback = "Detailed feedback";
  hint = "Think about the common denominator";
  visualScheme = "flowchart TD\n  A[Read] --> B[Solve]";
  summary = "# Summary";
  topics: ExtractedTopic[] = [];
  private invented = 0;

  async generateExercise(topic: string, context: string, difficulty: Difficulty, course?: string | null) {
    this.exerciseCalls.push({ topic, context, difficulty, course: course ?? null });
    const next = this.exerciseScript.shift();
    if (next instanceof Error) throw next;
    if (next) return next;
    this.invented += 1;
    return makeExercise(`generated ${this.invented}`);
  }

  async evaluateSubmission(input: SubmissionInput) {
    this.evaluationCalls.push(input);
    return { ...this.evaluation, errorsFound: [...this.evaluation.errorsFound] };
  }

  async generateFeedback(input: FeedbackInput) {
    this.feedbackCalls.push(input);
    return this.feedback;
  }

  async generateHint(exercise: string, context?: string | null) {
    this.hintCalls.push({ exercise, context: context ?? null });
    return this.hint;
  }

  async generateVisualScheme(exercise: string, context?: string | null) {
    this.hintCalls.push({ exercise, context: context ?? null });
    return this.visualScheme;
  }

  async extractTopics(textChunks: string[], metadata: SourceMetadata) {
    this.topicCalls.push({ chunks: textChunks, metadata });
    return this.topics;
  }

  async generateTopicSummary(topic: string, context: string, course?: string | null) {
    this.summaryCalls.push({ topic, context, course: course ?? null });
    return this.summary;
  }
}

// ============================================
// Runtime
// ============================================

export function testConfig(overrides: Record<string, string> = {}): TutorConfig {
  return loadTutorConfig({ CACHE_BACKEND: "memory", ...overrides });
}

export type TestRuntimeParts = {
  runtime: TutorRuntime;
  engine: ScriptedEngine;
  scheduler: RecordingScheduler;
  cacheStore: MemoryCacheStore;
  vectorStore: MemoryVectorStore;
  topics: FakeTopicRepository;
  history: FakeHistoryRepository;
  exercises: FakeExerciseRepository;
};

export function createTestRuntime(options: {
  topics: Topic[];
  students?: Record<string, StudentProfile>;
  vocabulary?: string[];
  config?: TutorConfig;
}): TestRuntimeParts {
  const model = new KeywordEmbeddingModel(options.vocabulary ?? ["fracciones", "álgebra"]);
  const { generator } = createTestEmbeddings(model);
  const engine = new ScriptedEngine();
  const scheduler = new RecordingScheduler();
  const cacheStore = new MemoryCacheStore();
  const vectorStore = new MemoryVectorStore(model.dimension);
  const topics = new FakeTopicRepository(options.topics);
  const history = new FakeHistoryRepository();
  const exercises = new FakeExerciseRepository();

  const runtime = assembleTutorRuntime({
    config: options.config ?? testConfig(),
    embeddings: generator,
    vectorStore,
    cacheStore,
    topics,
    history,
    exercises,
    students: new FakeStudentDirectory(options.students ?? {}),
    engine,
    refillLock: new InProcessRefillLock(),
    scheduler,
  });

  return { runtime, engine, scheduler, cacheStore, vectorStore, topics, history, exercises };
}
