import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  createTutorEngine,
  EngineRequestError,
  OpenAICompatibleEngine,
  stripCodeFence,
  toEngineRequestError,
  type ChatRequest,
} from "./tutor-engine";

function scriptedCompleter(...answers: Array<string | Error>) {
  const requests: ChatRequest[] = [];
  const complete = async (request: ChatRequest) => {
    requests.push(request);
    const next = answers.shift();
    if (next instanceof Error) throw next;
    return next ?? "";
  };
  return { requests, complete };
}

describe("toEngineRequestError", () => {
  it("treats rate limits and server errors as retryable", () => {
    expect(toEngineRequestError(Object.assign(new Error("Rate limit reached"), { status: 429 })).retryable).toBe(true);
    expect(toEngineRequestError(Object.assign(new Error("Internal error"), { status: 500 })).retryable).toBe(true);
  });

  it("treats network failures as retryable", () => {
    const failure = toEngineRequestError(Object.assign(new Error("fetch failed"), { code: "ECONNRESET" }));

    expect(failure).toMatchObject({ status: null, code: "ECONNRESET", retryable: true, message: "fetch failed" });
    expect(toEngineRequestError(new Error("Connection error.")).retryable).toBe(true);
  });

  it("treats authentication and request errors as final", () => {
    const failure = toEngineRequestError(Object.assign(new Error("Incorrect API key provided"), { status: 401 }));

    expect(failure).toMatchObject({ status: 401, code: null, retryable: false });
  });

  it("passes an existing EngineRequestError through", () => {
    const original = new EngineRequestError("boom", { status: 503, code: null, retryable: true });

    expect(toEngineRequestError(original)).toBe(original);
  });
});

describe("stripCodeFence", () => {
  it("removes a fence with a language tag", () => {
    expect(stripCodeFence("```mermaid\nflowchart TD\n  A --> B\n```")).toBe("flowchart TD\n  A --> B");
  });

  it("leaves unfenced text trimmed", () => {
    expect(stripCodeFence("  flowchart TD\n")).toBe("flowchart TD");
  });
});

describe("OpenAICompatibleEngine", () => {
  beforeEach(() => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("asks for a JSON exercise and maps the answer", async () => {
    const { requests, complete } = scriptedCompleter(
      JSON.stringify({
        content: "Suma 1/2 + 1/4",
        solution: "3/4",
        methodology: "Denominador común 4",
        available_procedures: [{ id: 1, name: "Mínimo común múltiplo", description: "Denominador común" }],
        expected_procedures: [1],
      })
    );
    const engine = new OpenAICompatibleEngine(complete);

    const exercise = await engine.generateExercise("Fracciones", "Las fracciones se suman.", "medium", "6A");

    expect(exercise.content).toBe("Suma 1/2 + 1/4");
    expect(exercise.expectedProcedures).toEqual([1]);
    expect(requests).toHaveLength(1);
    expect(requests[0]).toMatchObject({ temperature: 0.8, jsonMode: true });
    expect(requests[0]?.messages[0]?.content).toContain("Write every piece of text for the student in Spanish.");
    expect(requests[0]?.messages[1]?.content).toContain("Topic: Fracciones\nCourse: 6A");
  });

  it("returns the raw answer as the exercise when it is not JSON", async () => {
    const engine = new OpenAICompatibleEngine(scriptedCompleter("Calcula 3/4 - 1/4").complete);

    expect(await engine.generateExercise("Fracciones", "", "easy")).toEqual({
      content: "Calcula 3/4 - 1/4",
      solution: "",
      methodology: "",
      availableProcedures: [],
      expectedProcedures: [],
    });
  });

  it("wraps transport failures with their retry classification", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const engine = new OpenAICompatibleEngine(scriptedCompleter(new Error("Request timed out.")).complete);

    const failure = await engine.generateExercise("Fracciones", "", "easy").catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(EngineRequestError);
    expect(failure).toMatchObject({ message: "Request timed out.", retryable: true });
  });

  it("evaluates a submission at low temperature", async () => {
    const { requests, complete } = scriptedCompleter(
      '```json\n{"is_correct_result": true, "is_correct_methodology": false, "errors_found": [], "feedback": "Bien"}\n```'
    );
    const engine = new OpenAICompatibleEngine(complete);

    const evaluation = await engine.evaluateSubmission({
      exercise: "Suma 1/2 + 1/4",
      expectedSolution: "3/4",
      expectedMethodology: "Denominador común 4",
      studentAnswer: "3/4",
      studentMethodology: "",
    });

    expect(evaluation).toEqual({ isCorrectResult: true, isCorrectMethodology: false, errorsFound: [], feedback: "Bien" });
    expect(requests[0]).toMatchObject({ temperature: 0.3, jsonMode: true });
  });

  it("trims hints and strips fences from visual schemes", async () => {
    const engine = new OpenAICompatibleEngine(
      scriptedCompleter("  Busca un denominador común.\n", "```mermaid\nflowchart TD\n  A --> B\n```").complete,
      "English"
    );

    expect(await engine.generateHint("Suma 1/2 + 1/4")).toBe("Busca un denominador común.");
    expect(await engine.generateVisualScheme("Suma 1/2 + 1/4")).toBe("flowchart TD\n  A --> B");
  });

  it("samples the first ten chunks for topic extraction", async () => {
    const { requests, complete } = scriptedCompleter('{"topics": [{"name": "Fracciones", "description": "Sumas"}]}');
    const engine = new OpenAICompatibleEngine(complete);
    const chunks = Array.from({ length: 12 }, (_, idx) => `chunk-${idx}`);

    expect(await engine.extractTopics(chunks, { title: "Matemáticas 6" })).toEqual([
      { name: "Fracciones", description: "Sumas" },
    ]);
    const user = requests[0]?.messages[1]?.content ?? "";
    expect(user).toContain("chunk-9");
    expect(user).not.toContain("chunk-10");
  });

  it("skips the call when there is no text to extract topics from", async () => {
    const { requests, complete } = scriptedCompleter();
    const engine = new OpenAICompatibleEngine(complete);

    expect(await engine.extractTopics(["  ", ""], {})).toEqual([]);
    expect(requests).toHaveLength(0);
  });
});

describe("createTutorEngine", () => {
  it("refuses to start without an API key", () => {
    expect(() =>
      createTutorEngine(
        { provider: "deepseek", apiKey: "", baseURL: "https://api.deepseek.com/v1", model: "deepseek-chat", timeoutMs: 1000 },
        "Spanish"
      )
    ).toThrow("Missing API key for engine 'deepseek'");
  });

  it("builds an engine when a key is configured", () => {
    const engine = createTutorEngine(
      { provider: "openai", apiKey: "test-secret", baseURL: "https://api.openai.com/v1", model: "gpt-4o-mini", timeoutMs: 1000 },
      "Spanish"
    );

    expect(engine).toBeInstanceOf(OpenAICompatibleEngine);
  });
});
