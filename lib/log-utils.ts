// lib/log-utils.ts
// Keeps log payloads short and serializable.

const STACK_TRIM_PATTERN = /\bat\s+/;

export function previewForLog(value: string | null | undefined, max = 180): string | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (!trimmed) return null;
  if (trimmed.length <= max) return trimmed;
  const overflow = trimmed.length - max;
  return `${trimmed.slice(0, max)}...(+${overflow} chars)`;
}

export function safeErrorForLog(error: unknown) {
  if (!error) return { message: null, name: null, stack: null, type: typeof error };
  if (error instanceof Error) {
    return {
      message: error.message,
      name: error.name,
      stack: typeof error.stack === "string"
        ? error.stack.split("\n").slice(0, 6).map((line) => line.trim()).filter((line) => STACK_TRIM_PATTERN.test(line)).join(" | ")
        : null,
      type: "Error",
    };
  }
  if (typeof error === "object") {
    try {
      return { message: JSON.stringify(error), name: null, stack: null, type: "object" };
    } catch {
      return { message: "[unserializable object]", name: null, stack: null, type: "object" };
    }
  }
  return { message: String(error), name: null, stack: null, type: typeof error };
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  if (error && typeof error === "object" && "message" in error) {
    const message = error.message;
    if (typeof message === "string") return message;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export function shortId(value: string): string {
  return value.slice(0, 8);
}

export function newRequestId(): string {
  return Math.random().toString(36).slice(2, 8);
}
