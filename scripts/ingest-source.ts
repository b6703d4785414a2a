/**
 * Ingest one source's extracted text into the vector store.
 *
 * Usage:
 *   npx tsx scripts/ingest-source.ts --source <id> --file book.txt [--title ..] [--course ..] [--subject ..]
 *   npx tsx scripts/ingest-source.ts --source <id> --file transcript.json --transcript
 *
 * Text files are split into pages on form feeds (pdftotext output). Transcript
 * files hold a JSON array of { text, start } segments.
 *
 * Requirements:
 *   - SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY
 *   - OPENAI_API_KEY (embeddings) and the key for ACTIVE_AI_ENGINE
 */

import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { z } from "zod";
import { chunkPages, chunkTranscript, TRANSCRIPT_CHUNKING, type PageText } from "../lib/ingestion";
import { safeErrorForLog } from "../lib/log-utils";
import { getTutorRuntime } from "../lib/runtime";

const TranscriptSchema = z.array(z.object({ text: z.string(), start: z.coerce.number() }));

function splitPages(text: string): PageText[] {
  return text
    .split("\f")
    .map((pageText, idx) => ({ pageNumber: idx + 1, text: pageText }))
    .filter((page) => page.text.trim().length > 0);
}

async function main() {
  const { values } = parseArgs({
    options: {
      source: { type: "string" },
      file: { type: "string" },
      title: { type: "string" },
      course: { type: "string" },
      subject: { type: "string" },
      transcript: { type: "boolean", default: false },
      "skip-topics": { type: "boolean", default: false },
    },
  });

  if (!values.source || !values.file) {
    console.error("Usage: tsx scripts/ingest-source.ts --source <id> --file <path> [--transcript]");
    process.exit(1);
  }

  const runtime = getTutorRuntime();
  const raw = await readFile(values.file, "utf8");
  const { chunkSize, chunkOverlap } = runtime.config.ingestion;

  const chunks = values.transcript
    ? chunkTranscript(TranscriptSchema.parse(JSON.parse(raw)), TRANSCRIPT_CHUNKING)
    : chunkPages(splitPages(raw), { chunkSize, overlap: chunkOverlap });

  console.log("[ingest] chunks ready", { source: values.source, chunks: chunks.length });

  const result = await runtime.ingestor.ingestSource({
    sourceId: values.source,
    metadata: { title: values.title, course: values.course, subject: values.subject },
    chunks,
    extractTopics: !values["skip-topics"],
  });

  console.log("[ingest] done", {
    stored: result.stored,
    replaced: result.replaced,
    invalidatedContexts: result.invalidatedContexts,
  });
  for (const topic of result.topics) {
    console.log(`  - ${topic.name}${topic.description ? `: ${topic.description}` : ""}`);
  }
}

main().catch((error: unknown) => {
  console.error("[ingest] failed", safeErrorForLog(error));
  process.exit(1);
});
