import "dotenv/config";
import { closePool } from "../src/clients/db";
import { ingestQaPairs } from "../src/ingest/qaPairs";
import { getIngestConfig } from "../src/utils/config";

async function main() {
  const filePath = process.argv[2] || getIngestConfig().qaFilePath;
  console.log(`📖 Ingesting Q&A pairs from ${filePath}...`);

  const result = await ingestQaPairs(filePath);
  if (result.status === "skipped") {
    console.log(`⚠️  Nothing ingested: ${result.reason}`);
  } else {
    console.log(`✅ Inserted ${result.inserted} Q&A pairs`);
  }
  if (result.skipped > 0) {
    console.log(`   Skipped ${result.skipped} items without a question`);
  }
}

main()
  .then(() => closePool())
  .catch(async (e) => {
    console.error("❌ Q&A ingestion failed:", e instanceof Error ? e.message : e);
    await closePool();
    process.exit(1);
  });
