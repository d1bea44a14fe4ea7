import "dotenv/config";
import { Pool } from "pg";
import { getDbConfig } from "../src/utils/config";

async function testConnection() {
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
    console.log("Testing database connection...");
    const result = await pool.query("SELECT version(), current_database(), current_user");
    console.log("✅ Connection successful!");
    console.log("\nDatabase Info:");
    console.log("- Version:", result.rows[0].version);
    console.log("- Database:", result.rows[0].current_database);
    console.log("- User:", result.rows[0].current_user);

    const extension = await pool.query<{ extversion: string }>(
      "SELECT extversion FROM pg_extension WHERE extname = 'vector'"
    );
    if (extension.rows.length === 0) {
      console.log("\n⚠️  pgvector extension is not installed. Run db:schema first.");
    } else {
      console.log(`\n🧭 pgvector ${extension.rows[0].extversion}`);
    }

    await pool.end();
    process.exit(0);
  } catch (error) {
    console.error("❌ Connection failed:", error instanceof Error ? error.message : error);
    await pool.end();
    process.exit(1);
  }
}

testConnection();
