import { readdir, readFile } from "fs/promises";
import { basename, join } from "path";
import { deleteChunksBySource, replaceChunksForSource, type KnowledgeChunkInput } from "../clients/db";
import { getIngestConfig } from "../utils/config";
import { describeError } from "../utils/errors";
import { errorFields, logError, logInfo, logWarn } from "../utils/logger";
import { splitText } from "../utils/textSplitter";
import { embedInBatches } from "./embedBatches";

export type TranscriptOptions = {
  chunkSize: number;
  chunkOverlap: number;
  embedBatchSize: number;
};

export type TranscriptFileResult = {
  sourceName: string;
  status: "ingested" | "empty" | "failed";
  chunks: number;
  deleted: number;
  error?: string;
};

export type TranscriptIngestResult = {
  files: TranscriptFileResult[];
  totalChunks: number;
  failed: number;
};

function isMissingDir(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

export async function findTranscriptFiles(dir: string): Promise<string[]> {
  try {
    const files = await readdir(dir);
    return files
      .filter((file) => file.toLowerCase().endsWith(".txt"))
      .sort()
      .map((file) => join(dir, file));
  } catch (err) {
    if (isMissingDir(err)) return [];
    throw err;
  }
}

/**
 * Re-ingest one transcript. Whatever was stored for this source before is
 * replaced, so the stored chunk count always equals this run's count.
 * An unreadable file leaves the stored chunks as they were.
 */
export async function ingestTranscriptFile(filePath: string, options: TranscriptOptions): Promise<TranscriptFileResult> {
  const sourceName = basename(filePath);

  let fullText: string;
  try {
    fullText = await readFile(filePath, "utf-8");
  } catch (err) {
    logError("transcript_read_failed", { sourceName, ...errorFields(err) });
    return { sourceName, status: "failed", chunks: 0, deleted: 0, error: describeError(err) };
  }

  const texts = splitText(fullText, { chunkSize: options.chunkSize, chunkOverlap: options.chunkOverlap });
  logInfo("transcript_split", { sourceName, chunks: texts.length });

  if (texts.length === 0) {
    const deleted = await deleteChunksBySource(sourceName);
    logWarn("transcript_empty", { sourceName, deleted });
    return { sourceName, status: "empty", chunks: 0, deleted };
  }

  const vectors = await embedInBatches(texts, options.embedBatchSize);
  const chunks: KnowledgeChunkInput[] = texts.map((content, i) => ({
    source_type: "transcript",
    source_name: sourceName,
    content,
    content_vector: vectors[i],
    chunk_number: i + 1,
  }));

  const { deleted, inserted } = await replaceChunksForSource(sourceName, chunks);
  logInfo("transcript_ingested", { sourceName, deleted, inserted });
  return { sourceName, status: "ingested", chunks: inserted, deleted };
}

export async function ingestTranscripts(dir: string = getIngestConfig().transcriptsDir): Promise<TranscriptIngestResult> {
  const { chunkSize, chunkOverlap, embedBatchSize } = getIngestConfig();
  const files = await findTranscriptFiles(dir);
  if (files.length === 0) {
    logWarn("transcripts_not_found", { dir });
    return { files: [], totalChunks: 0, failed: 0 };
  }

  logInfo("transcripts_found", { dir, files: files.length });
  const results: TranscriptFileResult[] = [];
  for (const filePath of files) {
    try {
      results.push(await ingestTranscriptFile(filePath, { chunkSize, chunkOverlap, embedBatchSize }));
    } catch (err) {
      logError("transcript_ingest_failed", { filePath, ...errorFields(err) });
      results.push({ sourceName: basename(filePath), status: "failed", chunks: 0, deleted: 0, error: describeError(err) });
    }
  }

  return {
    files: results,
    totalChunks: results.reduce((sum, r) => sum + r.chunks, 0),
    failed: results.filter((r) => r.status === "failed").length,
  };
}
