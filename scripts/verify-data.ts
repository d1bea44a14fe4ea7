import "dotenv/config";
import { closePool, countChunksBySource, countQaEntries } from "../src/clients/db";

async function verifyData() {
  try {
    console.log("🔍 Verifying knowledge base...\n");

    const qaCount = await countQaEntries();
    console.log(`📋 Q&A entries: ${qaCount}`);
    if (qaCount === 0) {
      console.log("   ⚠️  No Q&A entries. Run ingest:qa first.");
    }

    const perSource = await countChunksBySource();
    console.log(`\n📚 Transcript chunks by source (${perSource.length} sources):`);
    perSource.forEach((row, i) => {
      console.log(`   ${i + 1}. ${row.source_name}: ${row.chunks} chunks`);
    });
    const total = perSource.reduce((sum, row) => sum + row.chunks, 0);
    console.log(`\n✅ ${total} chunks in total`);

    await closePool();
    process.exit(0);
  } catch (error) {
    console.error("❌ Verification failed:", error instanceof Error ? error.message : error);
    await closePool();
    process.exit(1);
  }
}

verifyData();
