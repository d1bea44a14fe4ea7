import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import {
  closePool,
  countChunksBySource,
  replaceChunksForSource,
  searchSimilarQuestions,
  toVectorLiteral,
} from "../clients/db";

type RecordedQuery = { text: string; params?: unknown[] };

const queries = vi.hoisted(() => [] as RecordedQuery[]);
const connection = vi.hoisted(() => ({ failRollback: false, release: vi.fn() }));

vi.mock("pg", () => {
  async function query(text: string, params?: unknown[]) {
    queries.push({ text, params });
    if (text === "rollback" && connection.failRollback) {
      throw new Error("connection lost");
    }
    if (text.startsWith("insert") && params?.[2] === "bad chunk") {
      throw new Error("insert failed");
    }
    if (text.startsWith("delete")) {
      return { rows: [], rowCount: 2 };
    }
    if (text.includes("question_vector <=>")) {
      return { rows: [{ question_text: "Is it recorded?", answer_text: "Yes.", score: "0.91" }], rowCount: 1 };
    }
    if (text.includes("group by source_name")) {
      return { rows: [{ source_name: "a.txt", chunks: "4" }], rowCount: 1 };
    }
    return { rows: [], rowCount: 1 };
  }

  class Pool {
    query = query;
    end = vi.fn(async () => undefined);
    async connect() {
      return { query, release: connection.release };
    }
  }

  return { Pool };
});

const firstWords = (text: string) => text.trim().split(/\s+/).slice(0, 3).join(" ");

const chunk = (content: string, chunk_number: number) => ({
  source_type: "transcript",
  source_name: "a.txt",
  content,
  content_vector: [0.5, 0.25],
  chunk_number,
});

beforeAll(() => {
  process.env.SUPABASE_DB_URL = "postgres://test@localhost/test";
});

beforeEach(() => {
  queries.length = 0;
  connection.failRollback = false;
  connection.release.mockClear();
});

afterAll(async () => {
  await closePool();
  delete process.env.SUPABASE_DB_URL;
});

describe("toVectorLiteral", () => {
  it("formats a pgvector literal", () => {
    expect(toVectorLiteral([0.1, -2, 3])).toBe("[0.1,-2,3]");
  });
});

describe("replaceChunksForSource", () => {
  it("deletes the source and inserts the new chunks in one transaction", async () => {
    const result = await replaceChunksForSource("a.txt", [chunk("first", 1), chunk("second", 2)]);

    expect(result).toEqual({ deleted: 2, inserted: 2 });
    expect(queries.map((q) => firstWords(q.text))).toEqual([
      "begin",
      "delete from knowledge_chunks",
      "insert into knowledge_chunks",
      "insert into knowledge_chunks",
      "commit",
    ]);
    expect(queries[1].params).toEqual(["a.txt"]);
    expect(queries[2].params).toEqual(["transcript", "a.txt", "first", "[0.5,0.25]", 1]);
  });

  it("rolls back when an insert fails", async () => {
    await expect(replaceChunksForSource("a.txt", [chunk("first", 1), chunk("bad chunk", 2)])).rejects.toThrow(
      "insert failed"
    );
    expect(queries[queries.length - 1].text).toBe("rollback");
    expect(queries.some((q) => q.text === "commit")).toBe(false);
    expect(connection.release).toHaveBeenCalledWith(undefined);
  });

  it("keeps the original error and discards the client when rollback fails", async () => {
    connection.failRollback = true;

    await expect(replaceChunksForSource("a.txt", [chunk("bad chunk", 1)])).rejects.toThrow("insert failed");
    expect(connection.release).toHaveBeenCalledTimes(1);
    expect(connection.release).toHaveBeenCalledWith(new Error("connection lost"));
  });
});

describe("searchSimilarQuestions", () => {
  it("sets the candidate count and maps rows to matches", async () => {
    const matches = await searchSimilarQuestions([1, 0], { numCandidates: 10, limit: 1 });

    expect(matches).toEqual([{ questionText: "Is it recorded?", answerText: "Yes.", score: 0.91 }]);
    expect(queries[1]).toEqual({ text: "select set_config('hnsw.ef_search', $1, true)", params: ["10"] });
    expect(queries[2].params).toEqual(["[1,0]", 1]);
    expect(queries[3].text).toBe("commit");
  });
});

describe("countChunksBySource", () => {
  it("converts counts to numbers", async () => {
    expect(await countChunksBySource()).toEqual([{ source_name: "a.txt", chunks: 4 }]);
  });
});
