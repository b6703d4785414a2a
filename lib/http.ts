// lib/http.ts
// Shared pieces of the practice route handlers.

import type { ZodType, ZodTypeDef } from "zod";
import type { StudentProfile } from "@/types/practice";
import { safeErrorForLog } from "./log-utils";
import type { TutorRuntime } from "./runtime";
import { readBearerToken } from "./student-auth";
import { EngineRequestError } from "./tutor-engine";

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export type Authenticated = { student: StudentProfile; response: null } | { student: null; response: Response };

export async function authenticateStudent(req: Request, runtime: TutorRuntime, tag: string): Promise<Authenticated> {
  const token = readBearerToken(req);
  const student = token ? await runtime.students.getStudentByAccessToken(token) : null;
  if (!student) {
    console.warn(`[${tag}] unauthorized: missing or unknown student`);
    return { student: null, response: jsonResponse({ error: "Not authenticated" }, 401) };
  }
  return { student, response: null };
}

export type ParsedBody<T> = { data: T; response: null } | { data: null; response: Response };

export async function parseJsonBody<T>(req: Request, schema: ZodType<T, ZodTypeDef, unknown>): Promise<ParsedBody<T>> {
  let raw: unknown;
  try {
    raw = await req.json();
  } catch {
    return { data: null, response: jsonResponse({ error: "Invalid JSON body" }, 400) };
  }
  const parsed = schema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "Invalid payload";
    return { data: null, response: jsonResponse({ error: `Invalid payload (${detail})` }, 400) };
  }
  return { data: parsed.data, response: null };
}

/** 502 with a retry hint for engine failures, 500 for anything else. */
export function errorResponse(error: unknown, tag: string, reqId: string): Response {
  if (error instanceof EngineRequestError) {
    console.warn(`[${tag}] [${reqId}] engine request failed`, {
      status: error.status,
      code: error.code,
      retryable: error.retryable,
    });
    return jsonResponse({ error: "The tutor engine did not answer. Try again.", retryable: error.retryable }, 502);
  }
  console.error(`[${tag}] [${reqId}] unhandled error`, safeErrorForLog(error));
  return jsonResponse({ error: "Internal server error" }, 500);
}
