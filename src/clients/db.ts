import { Pool, type PoolClient } from "pg";
import { getDbConfig } from "../utils/config";
import { errorFields, logError } from "../utils/logger";

let pool: Pool | null = null;

async function getPool(): Promise<Pool> {
  if (pool) return pool;
  const config = getDbConfig();
  if (!config.connectionString) {
    throw new Error("Missing SUPABASE_DB_URL environment variable");
  }
  pool = new Pool({
    connectionString: config.connectionString,
    max: 3,
    ssl: config.ssl
      ? {
          rejectUnauthorized: false, // Supabase uses self-signed certificates
        }
      : undefined,
  });
  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const p = pool;
  pool = null;
  await p.end();
}

export async function pingDb(): Promise<void> {
  const p = await getPool();
  await p.query("select 1");
}

async function withTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
  const p = await getPool();
  const client = await p.connect();
  // a client whose rollback failed is destroyed instead of going back to the pool
  let broken: Error | undefined;
  try {
    await client.query("begin");
    const result = await work(client);
    await client.query("commit");
    return result;
  } catch (err) {
    try {
      await client.query("rollback");
    } catch (rollbackErr) {
      broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
      logError("db_rollback_failed", errorFields(rollbackErr));
    }
    throw err;
  } finally {
    client.release(broken);
  }
}

export function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}

export type QaEntryInput = {
  source: string;
  questionText: string;
  answerText: string | null;
  questionVector: number[];
  sourceDetails: { webinarTitle: string | null; webinarDate: string | null };
};

export type KnowledgeChunkInput = {
  source_type: string;
  source_name: string;
  content: string;
  content_vector: number[];
  chunk_number: number;
};

export type QuestionMatch = {
  questionText: string;
  answerText: string | null;
  score: number;
};

export type ChunkHit = {
  source_name: string;
  chunk_number: number;
  content: string;
  score: number;
};

export type SearchOptions = { numCandidates: number; limit: number };

async function insertQaRows(client: PoolClient, table: string, entries: QaEntryInput[]): Promise<number> {
  for (const entry of entries) {
    await client.query(
      `insert into ${table} (source, question_text, answer_text, question_vector, source_details)
       values ($1, $2, $3, $4::vector, $5)`,
      [
        entry.source,
        entry.questionText,
        entry.answerText,
        toVectorLiteral(entry.questionVector),
        JSON.stringify(entry.sourceDetails),
      ]
    );
  }
  return entries.length;
}

async function insertChunkRows(client: PoolClient, table: string, chunks: KnowledgeChunkInput[]): Promise<number> {
  for (const chunk of chunks) {
    await client.query(
      `insert into ${table} (source_type, source_name, content, content_vector, chunk_number)
       values ($1, $2, $3, $4::vector, $5)`,
      [chunk.source_type, chunk.source_name, chunk.content, toVectorLiteral(chunk.content_vector), chunk.chunk_number]
    );
  }
  return chunks.length;
}

export async function replaceQaEntries(entries: QaEntryInput[]): Promise<number> {
  const { qaTable } = getDbConfig();
  return withTransaction(async (client) => {
    await client.query(`delete from ${qaTable}`);
    return insertQaRows(client, qaTable, entries);
  });
}

export async function deleteChunksBySource(sourceName: string): Promise<number> {
  const { chunksTable } = getDbConfig();
  const p = await getPool();
  const res = await p.query(`delete from ${chunksTable} where source_name = $1`, [sourceName]);
  return res.rowCount ?? 0;
}

export async function replaceChunksForSource(
  sourceName: string,
  chunks: KnowledgeChunkInput[]
): Promise<{ deleted: number; inserted: number }> {
  const { chunksTable } = getDbConfig();
  return withTransaction(async (client) => {
    const res = await client.query(`delete from ${chunksTable} where source_name = $1`, [sourceName]);
    const inserted = await insertChunkRows(client, chunksTable, chunks);
    return { deleted: res.rowCount ?? 0, inserted };
  });
}

export async function countChunksBySource(): Promise<Array<{ source_name: string; chunks: number }>> {
  const { chunksTable } = getDbConfig();
  const p = await getPool();
  const { rows } = await p.query<{ source_name: string; chunks: string }>(
    `select source_name, count(*) as chunks from ${chunksTable} group by source_name order by source_name`
  );
  return rows.map((r) => ({ source_name: r.source_name, chunks: Number(r.chunks) }));
}

export async function countQaEntries(): Promise<number> {
  const { qaTable } = getDbConfig();
  const p = await getPool();
  const { rows } = await p.query<{ total: string }>(`select count(*) as total from ${qaTable}`);
  return Number(rows[0]?.total ?? 0);
}

export async function searchSimilarQuestions(embedding: number[], options: SearchOptions): Promise<QuestionMatch[]> {
  const { qaTable } = getDbConfig();
  return withTransaction(async (client) => {
    // ef_search is the HNSW candidate list size, scoped to this transaction
    await client.query("select set_config('hnsw.ef_search', $1, true)", [String(options.numCandidates)]);
    const { rows } = await client.query<{ question_text: string; answer_text: string | null; score: number | string }>(
      `select question_text, answer_text,
              1 - (question_vector <=> $1::vector) as score
       from ${qaTable}
       order by question_vector <=> $1::vector
       limit $2`,
      [toVectorLiteral(embedding), options.limit]
    );
    return rows.map((r) => ({ questionText: r.question_text, answerText: r.answer_text, score: Number(r.score) }));
  });
}

export async function searchKnowledgeChunks(embedding: number[], limit: number): Promise<ChunkHit[]> {
  const { chunksTable } = getDbConfig();
  const p = await getPool();
  const { rows } = await p.query<{ source_name: string; chunk_number: number; content: string; score: number | string }>(
    `select source_name, chunk_number, content,
            1 - (content_vector <=> $1::vector) as score
     from ${chunksTable}
     order by content_vector <=> $1::vector
     limit $2`,
    [toVectorLiteral(embedding), limit]
  );
  return rows.map((r) => ({ ...r, score: Number(r.score) }));
}
