import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { replaceQaEntries } from "../clients/db";
import { embedTexts } from "../clients/openai";
import { ingestQaPairs, loadQaPairs } from "../ingest/qaPairs";

vi.mock("../clients/db", () => ({
  replaceQaEntries: vi.fn(async (entries: unknown[]) => entries.length),
}));

vi.mock("../clients/openai", () => ({
  embedTexts: vi.fn(async (texts: string[]) => texts.map((_, i) => [i, 0.5])),
}));

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "qa-"));
});

afterEach(async () => {
  vi.clearAllMocks();
  await rm(dir, { recursive: true, force: true });
});

async function writeJson(name: string, value: unknown): Promise<string> {
  const file = join(dir, name);
  await writeFile(file, JSON.stringify(value));
  return file;
}

describe("loadQaPairs", () => {
  it("returns null for a missing file", async () => {
    expect(await loadQaPairs(join(dir, "missing.json"))).toBeNull();
  });

  it("skips items without a question", async () => {
    const file = await writeJson("qas.json", [
      { question: "How long is the trial?", answer: "14 days" },
      { answer: "orphan answer" },
      { question: "   ", answer: "blank question" },
      "not an object",
    ]);

    expect(await loadQaPairs(file)).toEqual({
      pairs: [{ question: "How long is the trial?", answer: "14 days", webinarTitle: null, webinarDate: null }],
      skipped: 3,
    });
  });

  it("keeps an item whose optional fields have the wrong type", async () => {
    const file = await writeJson("qas.json", [
      { question: " Where are the slides? ", answer: 42, webinar_title: ["Onboarding"], webinar_date: { day: 3 } },
    ]);

    expect(await loadQaPairs(file)).toEqual({
      pairs: [{ question: "Where are the slides?", answer: "42", webinarTitle: null, webinarDate: null }],
      skipped: 0,
    });
  });

  it("rejects a file that is not a JSON array", async () => {
    const file = await writeJson("qas.json", { question: "q" });
    await expect(loadQaPairs(file)).rejects.toThrow(`${file} must contain a JSON array of Q&A items`);
  });
});

describe("ingestQaPairs", () => {
  it("is a no-op when the file is missing", async () => {
    const file = join(dir, "missing.json");
    const result = await ingestQaPairs(file);

    expect(result).toEqual({ status: "skipped", inserted: 0, skipped: 0, reason: `File not found: ${file}` });
    expect(replaceQaEntries).not.toHaveBeenCalled();
    expect(embedTexts).not.toHaveBeenCalled();
  });

  it("is a no-op for an empty collection", async () => {
    const file = await writeJson("qas.json", []);
    const result = await ingestQaPairs(file);

    expect(result).toEqual({ status: "skipped", inserted: 0, skipped: 0, reason: "No Q&A pairs with a question" });
    expect(replaceQaEntries).not.toHaveBeenCalled();
  });

  it("embeds the questions and replaces the stored entries", async () => {
    const file = await writeJson("qas.json", [
      { question: "Is it recorded?", answer: "Yes.", webinar_title: "Kickoff", webinar_date: "2024-05-01" },
      { question: "Where are the slides?", answer: null },
      { answer: "no question" },
    ]);

    const result = await ingestQaPairs(file);

    expect(result).toEqual({ status: "ingested", inserted: 2, skipped: 1 });
    expect(embedTexts).toHaveBeenCalledWith(["Is it recorded?", "Where are the slides?"]);
    expect(replaceQaEntries).toHaveBeenCalledWith([
      {
        source: "webinar",
        questionText: "Is it recorded?",
        answerText: "Yes.",
        questionVector: [0, 0.5],
        sourceDetails: { webinarTitle: "Kickoff", webinarDate: "2024-05-01" },
      },
      {
        source: "webinar",
        questionText: "Where are the slides?",
        answerText: null,
        questionVector: [1, 0.5],
        sourceDetails: { webinarTitle: null, webinarDate: null },
      },
    ]);
  });
});
