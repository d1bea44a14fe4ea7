import { readFile } from "fs/promises";
import { z } from "zod";
import { replaceQaEntries, type QaEntryInput } from "../clients/db";
import { getIngestConfig } from "../utils/config";
import { logInfo, logWarn } from "../utils/logger";
import { embedInBatches } from "./embedBatches";

// numbers are kept as text; anything else unusable becomes null without dropping the item
const optionalText = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .nullish()
  .catch(null);

const qaItemSchema = z.object({
  question: z.string().trim().min(1),
  answer: optionalText,
  webinar_title: optionalText,
  webinar_date: optionalText,
});

export type QaPair = {
  question: string;
  answer: string | null;
  webinarTitle: string | null;
  webinarDate: string | null;
};

export type QaIngestResult = {
  status: "ingested" | "skipped";
  inserted: number;
  skipped: number;
  reason?: string;
};

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Read Q&A pairs from a JSON array. Returns null when the file does not exist.
 * Items without a question are dropped and counted in `skipped`.
 */
export async function loadQaPairs(filePath: string): Promise<{ pairs: QaPair[]; skipped: number } | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }

  if (!raw.trim()) return { pairs: [], skipped: 0 };

  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error(`${filePath} must contain a JSON array of Q&A items`);
  }

  const pairs: QaPair[] = [];
  let skipped = 0;
  parsed.forEach((item, index) => {
    const result = qaItemSchema.safeParse(item);
    if (!result.success) {
      const reason = typeof item === "object" && item !== null ? "missing question" : "not an object";
      logWarn("qa_item_skipped", { index, reason });
      skipped += 1;
      return;
    }
    pairs.push({
      question: result.data.question,
      answer: result.data.answer ?? null,
      webinarTitle: result.data.webinar_title ?? null,
      webinarDate: result.data.webinar_date ?? null,
    });
  });

  return { pairs, skipped };
}

export async function ingestQaPairs(filePath: string = getIngestConfig().qaFilePath): Promise<QaIngestResult> {
  const { embedBatchSize } = getIngestConfig();
  const loaded = await loadQaPairs(filePath);
  if (!loaded) {
    logWarn("qa_file_missing", { filePath });
    return { status: "skipped", inserted: 0, skipped: 0, reason: `File not found: ${filePath}` };
  }

  const { pairs, skipped } = loaded;
  logInfo("qa_pairs_loaded", { filePath, pairs: pairs.length, skipped });
  if (pairs.length === 0) {
    return { status: "skipped", inserted: 0, skipped, reason: "No Q&A pairs with a question" };
  }

  const vectors = await embedInBatches(
    pairs.map((p) => p.question),
    embedBatchSize
  );

  const entries: QaEntryInput[] = pairs.map((p, i) => ({
    source: "webinar",
    questionText: p.question,
    answerText: p.answer,
    questionVector: vectors[i],
    sourceDetails: { webinarTitle: p.webinarTitle, webinarDate: p.webinarDate },
  }));

  const inserted = await replaceQaEntries(entries);
  logInfo("qa_pairs_ingested", { inserted, skipped });
  return { status: "ingested", inserted, skipped };
}
