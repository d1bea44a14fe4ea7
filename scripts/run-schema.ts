import "dotenv/config";
import { Pool } from "pg";
import { getDbConfig } from "../src/utils/config";
import { readFileSync } from "fs";
import { join } from "path";

async function runSchema() {
  const config = getDbConfig();
  if (!config.connectionString) {
    console.error("❌ Missing SUPABASE_DB_URL in .env file");
    process.exit(1);
  }

  const pool = new Pool({
    connectionString: config.connectionString,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
  });

  try {
    console.log("📖 Reading schema file...");
    const schemaPath = join(process.cwd(), "db", "schema.sql");
    const schemaSQL = readFileSync(schemaPath, "utf-8");

    console.log("🚀 Executing schema...");
    await pool.query(schemaSQL);

    console.log("✅ Schema executed successfully!");

    const tablesResult = await pool.query<{ table_name: string }>(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
        AND table_type = 'BASE TABLE'
      ORDER BY table_name
    `);

    console.log(`\n📊 ${tablesResult.rows.length} tables:`);
    tablesResult.rows.forEach((row, i) => {
      console.log(`  ${i + 1}. ${row.table_name}`);
    });

    const indexesResult = await pool.query<{ indexname: string; tablename: string }>(`
      SELECT indexname, tablename
      FROM pg_indexes
      WHERE schemaname = 'public'
        AND indexdef ILIKE '%USING hnsw%'
      ORDER BY indexname
    `);

    if (indexesResult.rows.length > 0) {
      console.log(`\n🧭 ${indexesResult.rows.length} vector indexes:`);
      indexesResult.rows.forEach((row, i) => {
        console.log(`  ${i + 1}. ${row.indexname} on ${row.tablename}`);
      });
    }

    await pool.end();
    process.exit(0);
  } catch (error) {
    console.error("❌ Error executing schema:", error instanceof Error ? error.message : error);
    if (error instanceof Error && "position" in error && error.position) {
      console.error(`   Error at position: ${String(error.position)}`);
    }
    await pool.end();
    process.exit(1);
  }
}

runSchema();
