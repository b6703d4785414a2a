import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { setTutorRuntime } from "@/lib/runtime";
import type { StudentProfile, Topic } from "@/types/practice";
import { createTestRuntime, makeExercise, type TestRuntimeParts } from "@/test-utils/fakes";
import { postJson, STUDENT_TOKEN } from "@/test-utils/requests";
import { POST } from "./route";

const TOPIC: Topic = { id: "t1", name: "Fracciones", sourceId: "book-1" };
const STUDENT: StudentProfile = { id: "student-1", course: "6A", topicIds: ["t1"] };

describe("POST /api/practice/hint", () => {
  let parts: TestRuntimeParts;

  beforeEach(async () => {
    parts = createTestRuntime({ topics: [TOPIC], students: { [STUDENT_TOKEN]: STUDENT } });
    setTutorRuntime(parts.runtime);
    await parts.exercises.saveExercise({ topicId: "t1", difficulty: "easy", course: "6A", payload: makeExercise("Suma 1/2 + 1/4") });
  });

  afterEach(() => {
    setTutorRuntime(null);
  });

  it("gives a text hint by default", async () => {
    const res = await POST(postJson("/api/practice/hint", { exercise_id: "ex-1" }));

    expect(await res.json()).toEqual({ hint: "Think about the common denominator", hint_type: "text", hint_level: 1 });
  });

  it("gives a visual scheme at level 2", async () => {
    const res = await POST(postJson("/api/practice/hint", { exercise_id: "ex-1", level: 2 }));

    expect(await res.json()).toEqual({ hint: "flowchart TD\n  A[Read] --> B[Solve]", hint_type: "visual", hint_level: 2 });
  });

  it("rejects other levels", async () => {
    const res = await POST(postJson("/api/practice/hint", { exercise_id: "ex-1", level: 3 }));

    expect(res.status).toBe(400);
  });

  it("answers 404 for an unknown exercise", async () => {
    const res = await POST(postJson("/api/practice/hint", { exercise_id: "ex-9" }));

    expect(res.status).toBe(404);
  });
});
