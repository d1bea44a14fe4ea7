import "dotenv/config";
import { closePool } from "../src/clients/db";
import { ingestTranscripts } from "../src/ingest/transcripts";
import { getIngestConfig } from "../src/utils/config";

async function main() {
  const dir = process.argv[2] || getIngestConfig().transcriptsDir;
  console.log(`📂 Ingesting transcripts from ${dir}/*.txt...`);

  const result = await ingestTranscripts(dir);
  if (result.files.length === 0) {
    console.log(`⚠️  No transcript files found in '${dir}'. Please check the path.`);
    return;
  }

  result.files.forEach((file, i) => {
    const icon = file.status === "failed" ? "❌" : file.status === "empty" ? "⚠️ " : "✅";
    const detail = file.error ? ` (${file.error})` : "";
    console.log(`  ${i + 1}. ${icon} ${file.sourceName}: ${file.chunks} chunks, replaced ${file.deleted}${detail}`);
  });
  console.log(`\n📊 ${result.totalChunks} chunks stored from ${result.files.length} files, ${result.failed} failed`);

  if (result.failed > 0) process.exitCode = 1;
}

main()
  .then(() => closePool())
  .catch(async (e) => {
    console.error("❌ Transcript ingestion failed:", e instanceof Error ? e.message : e);
    await closePool();
    process.exit(1);
  });
