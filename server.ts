// server.ts
// Minimal node:http host for the practice route handlers.

import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { POST as startSession } from "@/app/api/practice/route";
import { POST as evaluateSubmission } from "@/app/api/practice/evaluate/route";
import { POST as requestExercise } from "@/app/api/practice/exercise/route";
import { POST as requestHint } from "@/app/api/practice/hint/route";
import { POST as prefetchNext } from "@/app/api/practice/prefetch-next/route";
import { POST as requestSummary } from "@/app/api/practice/summary/route";
import { BackgroundJobQueue } from "@/lib/background-jobs/job-queue";
import { jsonResponse } from "@/lib/http";
import { safeErrorForLog } from "@/lib/log-utils";
import { getTutorRuntime } from "@/lib/runtime";

type RouteHandler = (req: Request) => Promise<Response>;

const POST_ROUTES: Record<string, RouteHandler> = {
  "/api/practice": startSession,
  "/api/practice/exercise": requestExercise,
  "/api/practice/prefetch-next": prefetchNext,
  "/api/practice/hint": requestHint,
  "/api/practice/summary": requestSummary,
  "/api/practice/evaluate": evaluateSubmission,
};

async function toFetchRequest(req: IncomingMessage, origin: string): Promise<Request> {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      value.forEach((item) => headers.append(name, item));
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }

  const method = req.method ?? "GET";
  const chunks: Buffer[] = [];
  if (method !== "GET" && method !== "HEAD") {
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
  }

  return new Request(new URL(req.url ?? "/", origin), {
    method,
    headers,
    body: chunks.length > 0 ? Buffer.concat(chunks).toString("utf8") : undefined,
  });
}

async function writeResponse(res: ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, name) => res.setHeader(name, value));
  res.end(await response.text());
}

function routeRequest(method: string, pathname: string): RouteHandler | null {
  if (method !== "POST") return null;
  return POST_ROUTES[pathname.replace(/\/+$/, "") || "/"] ?? null;
}

async function handle(req: IncomingMessage, res: ServerResponse, origin: string) {
  try {
    const request = await toFetchRequest(req, origin);
    const pathname = new URL(request.url).pathname;
    const handler = routeRequest(request.method, pathname);
    const response = handler ? await handler(request) : jsonResponse({ error: "Not found" }, 404);
    await writeResponse(res, response);
  } catch (error) {
    console.error("[server] request failed", safeErrorForLog(error));
    if (!res.headersSent) {
      await writeResponse(res, jsonResponse({ error: "Internal server error" }, 500));
    }
  }
}

function main() {
  const runtime = getTutorRuntime();
  const port = runtime.config.port;
  const origin = `http://localhost:${port}`;

  const server = createServer((req, res) => {
    void handle(req, res, origin);
  });

  server.listen(port, () => {
    console.log("[server] listening", { port });
  });

  const shutdown = (signal: string) => {
    console.log("[server] shutting down", { signal });
    server.close(() => {
      const pending =
        runtime.scheduler instanceof BackgroundJobQueue ? runtime.scheduler.onIdle() : Promise.resolve();
      void pending
        .catch((error: unknown) => console.error("[server] background jobs failed to settle", safeErrorForLog(error)))
        .finally(() => {
          console.log("[server] stopped", {
            embeddingCache: runtime.embeddings.getCacheStats(),
            jobs: runtime.scheduler instanceof BackgroundJobQueue ? runtime.scheduler.stats() : null,
          });
          process.exit(0);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main();
