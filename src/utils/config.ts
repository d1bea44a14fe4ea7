// Simple config loader from environment variables
export function getConfig() {
  return {
    // Gmail OAuth
    GMAIL_CLIENT_ID: process.env.GMAIL_CLIENT_ID || "",
    GMAIL_CLIENT_SECRET: process.env.GMAIL_CLIENT_SECRET || "",
    GMAIL_REFRESH_TOKEN: process.env.GMAIL_REFRESH_TOKEN || "",

    // OpenAI embeddings
    OPENAI_API_KEY: process.env.OPENAI_API_KEY || "",
    EMBEDDING_MODEL: process.env.EMBEDDING_MODEL || "text-embedding-3-small",
    EMBEDDING_DIMENSIONS: Number(process.env.EMBEDDING_DIMENSIONS || "1536"),

    // Supabase Database (pgvector)
    SUPABASE_DB_URL: process.env.SUPABASE_DB_URL || "",
    DB_SSL: (process.env.DB_SSL || "true").toLowerCase() !== "false",
    QA_TABLE: process.env.QA_TABLE || "qa_entries",
    KNOWLEDGE_CHUNKS_TABLE: process.env.KNOWLEDGE_CHUNKS_TABLE || "knowledge_chunks",

    // Matching
    NUM_CANDIDATES: Number(process.env.NUM_CANDIDATES || "10"),
    AUTO_REPLY_THRESHOLD: Number(process.env.AUTO_REPLY_THRESHOLD || "0.95"),
    DRAFT_THRESHOLD: Number(process.env.DRAFT_THRESHOLD || "0.80"),

    // Ingestion
    QA_FILE_PATH: process.env.QA_FILE_PATH || "data/webinar_qas.json",
    TRANSCRIPTS_DIR: process.env.TRANSCRIPTS_DIR || "transcripts",
    CHUNK_SIZE: Number(process.env.CHUNK_SIZE || "1000"),
    CHUNK_OVERLAP: Number(process.env.CHUNK_OVERLAP || "100"),
    EMBED_BATCH_SIZE: Number(process.env.EMBED_BATCH_SIZE || "100"),

    // App config
    PORT: Number(process.env.PORT || "8000"),
    BATCH_SIZE: Number(process.env.BATCH_SIZE || "5"),
    GMAIL_LABEL_REPLIED: process.env.GMAIL_LABEL_REPLIED || "AI_REPLIED",
    GMAIL_LABEL_DRAFTED: process.env.GMAIL_LABEL_DRAFTED || "AI_DRAFTED",
    GMAIL_LABEL_ESCALATED: process.env.GMAIL_LABEL_ESCALATED || "AI_ESCALATED",
  };
}

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

function tableName(name: string, variable: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new Error(`${variable} must be a lowercase SQL identifier, got "${name}"`);
  }
  return name;
}

export function getEnvConfig() {
  const config = getConfig();
  return {
    batchSize: config.BATCH_SIZE,
    gmailLabelReplied: config.GMAIL_LABEL_REPLIED,
    gmailLabelDrafted: config.GMAIL_LABEL_DRAFTED,
    gmailLabelEscalated: config.GMAIL_LABEL_ESCALATED,
  };
}

export function getDbConfig() {
  const config = getConfig();
  return {
    connectionString: config.SUPABASE_DB_URL,
    ssl: config.DB_SSL,
    qaTable: tableName(config.QA_TABLE, "QA_TABLE"),
    chunksTable: tableName(config.KNOWLEDGE_CHUNKS_TABLE, "KNOWLEDGE_CHUNKS_TABLE"),
  };
}

export function getMatchConfig() {
  const config = getConfig();
  return {
    numCandidates: config.NUM_CANDIDATES,
    autoReplyThreshold: config.AUTO_REPLY_THRESHOLD,
    draftThreshold: config.DRAFT_THRESHOLD,
  };
}

export function getIngestConfig() {
  const config = getConfig();
  return {
    qaFilePath: config.QA_FILE_PATH,
    transcriptsDir: config.TRANSCRIPTS_DIR,
    chunkSize: config.CHUNK_SIZE,
    chunkOverlap: config.CHUNK_OVERLAP,
    embedBatchSize: config.EMBED_BATCH_SIZE,
  };
}
