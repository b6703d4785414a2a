import OpenAI from "openai";
import type { Difficulty } from "@/types/practice";
import type { EngineConfig } from "./engine-config";
import {
  buildEvaluationPrompt,
  buildExercisePrompt,
  buildFeedbackPrompt,
  buildHintPrompt,
  buildTopicExtractionPrompt,
  buildTopicSummaryPrompt,
  buildVisualSchemePrompt,
  type ChatPrompt,
  type SourceMetadata,
} from "./exercise-prompts";
import { getErrorMessage, previewForLog } from "./log-utils";
import {
  parseEvaluation,
  parseExercisePayload,
  parseTopicList,
  type Evaluation,
  type ExercisePayload,
  type ExtractedTopic,
} from "./schema";

export type ChatMessage = { role: "system"; content: string } | { role: "user"; content: string };

export type ChatRequest = {
  messages: ChatMessage[];
  temperature: number;
  /** Ask the provider for a JSON object response. */
  jsonMode?: boolean;
};

/** One chat completion round-trip; resolves to the assistant's text. */
export type ChatCompleter = (request: ChatRequest) => Promise<string>;

export type SubmissionInput = {
  exercise: string;
  expectedSolution: string;
  expectedMethodology: string;
  studentAnswer: string;
  studentMethodology: string;
};

export type FeedbackInput = {
  exercise: string;
  studentAnswer: string;
  studentMethodology: string;
  errors: string[];
  context?: string | null;
};

/**
 * Capabilities every generative provider offers. Callers hold one instance
 * and never branch on which provider sits behind it.
 */
export interface TutorEngine {
  generateExercise(topic: string, context: string, difficulty: Difficulty, course?: string | null): Promise<ExercisePayload>;
  evaluateSubmission(input: SubmissionInput): Promise<Evaluation>;
  generateFeedback(input: FeedbackInput): Promise<string>;
  generateHint(exercise: string, context?: string | null): Promise<string>;
  generateVisualScheme(exercise: string, context?: string | null): Promise<string>;
  extractTopics(textChunks: string[], metadata: SourceMetadata): Promise<ExtractedTopic[]>;
  generateTopicSummary(topic: string, context: string, course?: string | null): Promise<string>;
}

const RETRYABLE_STATUS_CODES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ECONNABORTED",
]);
const RETRYABLE_ERROR_PATTERN =
  /(timeout|timed out|503|502|bad gateway|service unavailable|temporary unavailable|socket hang up|connection reset|connection error|ECONNRESET|ECONNREFUSED)/i;

function getErrorStatus(error: unknown): number | null {
  if (!error || typeof error !== "object") return null;
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  return null;
}

function getErrorCode(error: unknown): string | null {
  if (!error || typeof error !== "object") return null;
  if ("code" in error && typeof error.code === "string") return error.code;
  return null;
}

/**
 * A generative call that failed in transport or at the provider. `retryable`
 * tells the interactive caller whether offering "try again" makes sense.
 */
export class EngineRequestError extends Error {
  readonly status: number | null;
  readonly code: string | null;
  readonly retryable: boolean;

  constructor(message: string, options: { status: number | null; code: string | null; retryable: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "EngineRequestError";
    this.status = options.status;
    this.code = options.code;
    this.retryable = options.retryable;
  }
}

export function toEngineRequestError(error: unknown): EngineRequestError {
  if (error instanceof EngineRequestError) return error;
  const status = getErrorStatus(error);
  const code = getErrorCode(error);
  const message = getErrorMessage(error);
  const retryable =
    (status != null && RETRYABLE_STATUS_CODES.has(status)) ||
    (code != null && RETRYABLE_ERROR_CODES.has(code)) ||
    RETRYABLE_ERROR_PATTERN.test(message);
  return new EngineRequestError(message, { status, code, retryable, cause: error });
}

/** Strips a ``` fence and its language tag, if the model added one. */
export function stripCodeFence(text: string): string {
  const match = /```[a-zA-Z]*\s*\n?([\s\S]*?)```/.exec(text);
  return (match ? match[1] ?? "" : text).trim();
}

const TOPIC_SAMPLE_CHUNKS = 10;

/**
 * TutorEngine over any OpenAI-compatible chat endpoint (OpenAI, DeepSeek,
 * Ollama). The transport is injected so tests can script answers.
 */
export class OpenAICompatibleEngine implements TutorEngine {
  constructor(
    private readonly complete: ChatCompleter,
    private readonly language = "Spanish"
  ) {}

  private async ask(task: string, prompt: ChatPrompt, temperature: number, jsonMode = false): Promise<string> {
    const startedAt = Date.now();
    let text: string;
    try {
      text = await this.complete({
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user },
        ],
        temperature,
        jsonMode,
      });
    } catch (error) {
      const failure = toEngineRequestError(error);
      console.error("[tutor-engine] completion failed", {
        task,
        status: failure.status,
        code: failure.code,
        retryable: failure.retryable,
        message: previewForLog(failure.message),
      });
      throw failure;
    }
    console.debug("[tutor-engine] completion", { task, ms: Date.now() - startedAt, chars: text.length });
    return text;
  }

  async generateExercise(topic: string, context: string, difficulty: Difficulty, course?: string | null) {
    const prompt = buildExercisePrompt({ topic, context, difficulty, course, language: this.language });
    return parseExercisePayload(await this.ask("exercise", prompt, 0.8, true));
  }

  async evaluateSubmission(input: SubmissionInput) {
    const prompt = buildEvaluationPrompt({ ...input, language: this.language });
    return parseEvaluation(await this.ask("evaluation", prompt, 0.3, true));
  }

  async generateFeedback(input: FeedbackInput) {
    const prompt = buildFeedbackPrompt({ ...input, language: this.language });
    return (await this.ask("feedback", prompt, 0.7)).trim();
  }

  async generateHint(exercise: string, context?: string | null) {
    return (await this.ask("hint", buildHintPrompt(exercise, context, this.language), 0.7)).trim();
  }

  async generateVisualScheme(exercise: string, context?: string | null) {
    const raw = await this.ask("visual-scheme", buildVisualSchemePrompt(exercise, context, this.language), 0.5);
    return stripCodeFence(raw);
  }

  async extractTopics(textChunks: string[], metadata: SourceMetadata) {
    const sample = textChunks.slice(0, TOPIC_SAMPLE_CHUNKS).join("\n\n");
    if (!sample.trim()) return [];
    const prompt = buildTopicExtractionPrompt(sample, metadata, this.language);
    const topics = parseTopicList(await this.ask("topics", prompt, 0.3, true));
    console.log("[tutor-engine] topics extracted", { title: metadata.title ?? null, count: topics.length });
    return topics;
  }

  async generateTopicSummary(topic: string, context: string, course?: string | null) {
    const prompt = buildTopicSummaryPrompt({ topic, context, course, language: this.language });
    return (await this.ask("summary", prompt, 0.7)).trim();
  }
}

export function createOpenAICompleter(client: OpenAI, model: string): ChatCompleter {
  return async ({ messages, temperature, jsonMode }) => {
    const completion = await client.chat.completions.create({
      model,
      temperature,
      messages,
      ...(jsonMode ? { response_format: { type: "json_object" as const } } : {}),
    });
    return completion.choices[0]?.message?.content ?? "";
  };
}

export function createTutorEngine(config: EngineConfig, language: string): TutorEngine {
  if (!config.apiKey) {
    throw new Error(`Missing API key for engine '${config.provider}'`);
  }
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    timeout: config.timeoutMs,
    // A failed call is reported to the caller, which decides whether to retry
    maxRetries: 0,
  });
  return new OpenAICompatibleEngine(createOpenAICompleter(client, config.model), language);
}
