/**
 * Source ingestion: split extracted text into overlapping chunks, embed and
 * store them, and ask the engine for the source's topics.
 *
 * Text extraction itself (PDF parsing, transcript download) happens upstream;
 * this module starts from plain page text or transcript segments.
 */

import type { ContextCache } from "./context-cache";
import type { SourceMetadata } from "./exercise-prompts";
import type { ChunkInput, RetrievalEngine } from "./retrieval";
import type { ExtractedTopic } from "./schema";
import type { TutorEngine } from "./tutor-engine";

export type PageText = { pageNumber: number; text: string };

export type TranscriptSegment = {
  text: string;
  /** Seconds from the start of the recording. */
  start: number;
};

export type ChunkingOptions = {
  chunkSize: number;
  overlap: number;
};

export const PAGE_CHUNKING: ChunkingOptions = { chunkSize: 500, overlap: 50 };
export const TRANSCRIPT_CHUNKING: ChunkingOptions = { chunkSize: 3000, overlap: 200 };

// Transcripts only break at a sentence this close to the window's end
const TRANSCRIPT_BREAK_MARGIN = 200;

function lastSentenceEnd(text: string): number {
  return Math.max(text.lastIndexOf("."), text.lastIndexOf("?"), text.lastIndexOf("!"));
}

type Window = { text: string; start: number };

/**
 * Sliding windows over `text`. A window that does not reach the end is cut
 * after its last sentence end when that lies past `minBreak`.
 */
function slidingWindows(text: string, options: ChunkingOptions, minBreak: number): Window[] {
  const size = Math.max(1, options.chunkSize);
  const windows: Window[] = [];
  let start = 0;

  while (start < text.length) {
    let end = start + size;
    let slice = text.slice(start, end);

    if (end < text.length) {
      const sentenceEnd = lastSentenceEnd(slice);
      if (sentenceEnd > minBreak) {
        slice = slice.slice(0, sentenceEnd + 1);
        end = start + sentenceEnd + 1;
      }
    }

    windows.push({ text: slice.trim(), start });
    if (end >= text.length) break;
    start = Math.max(end - options.overlap, start + 1);
  }

  return windows;
}

export function chunkPages(pages: PageText[], options: ChunkingOptions = PAGE_CHUNKING): ChunkInput[] {
  const chunks: ChunkInput[] = [];
  const minBreak = Math.floor(options.chunkSize / 2);

  for (const page of pages) {
    for (const window of slidingWindows(page.text, options, minBreak)) {
      if (!window.text) continue;
      chunks.push({ text: window.text, chunkIndex: chunks.length, pageNumber: page.pageNumber });
    }
  }
  return chunks;
}

/** `MM:SS`, or `HH:MM:SS` from one hour on. */
export function formatTimestamp(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  const pad = (value: number) => String(value).padStart(2, "0");
  return hours > 0 ? `${pad(hours)}:${pad(minutes)}:${pad(secs)}` : `${pad(minutes)}:${pad(secs)}`;
}

/**
 * Chunks a transcript joined into one text. Each chunk's timestamp is
 * estimated from its character offset relative to the last segment's start.
 */
export function chunkTranscript(
  segments: TranscriptSegment[],
  options: ChunkingOptions = TRANSCRIPT_CHUNKING
): ChunkInput[] {
  const last = segments[segments.length - 1];
  if (!last) return [];

  const fullText = segments.map((segment) => segment.text).join(" ");
  const minBreak = options.chunkSize - TRANSCRIPT_BREAK_MARGIN;
  const chunks: ChunkInput[] = [];

  for (const window of slidingWindows(fullText, options, minBreak)) {
    if (!window.text) continue;
    const estimatedSeconds = (window.start / fullText.length) * last.start;
    chunks.push({ text: window.text, chunkIndex: chunks.length, timestamp: formatTimestamp(estimatedSeconds) });
  }
  return chunks;
}

export type IngestRequest = {
  sourceId: string;
  metadata: SourceMetadata;
  chunks: ChunkInput[];
  /** Ask the engine for topics after storing; default true. */
  extractTopics?: boolean;
};

export type IngestResult = {
  sourceId: string;
  replaced: number;
  stored: number;
  topics: ExtractedTopic[];
  invalidatedContexts: number;
};

export class SourceIngestor {
  constructor(
    private readonly retrieval: RetrievalEngine,
    private readonly contexts: ContextCache,
    private readonly engine: TutorEngine,
    private readonly batchSize = 32
  ) {}

  /**
   * Replaces the source's chunks. Cached contexts are dropped afterwards so
   * topics pick up the new text.
   */
  async ingestSource(request: IngestRequest): Promise<IngestResult> {
    const startedAt = Date.now();
    const replaced = await this.retrieval.deleteSource(request.sourceId);
    const stored = await this.retrieval.storeChunks(request.sourceId, request.chunks, this.batchSize);
    const invalidatedContexts = await this.contexts.invalidateAll();

    const topics =
      request.extractTopics === false
        ? []
        : await this.engine.extractTopics(
            request.chunks.map((chunk) => chunk.text),
            request.metadata
          );

    console.log("[ingestion] source ingested", {
      sourceId: request.sourceId,
      replaced,
      stored,
      topics: topics.length,
      ms: Date.now() - startedAt,
    });
    return { sourceId: request.sourceId, replaced, stored, topics, invalidatedContexts };
  }
}
