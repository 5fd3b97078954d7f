import { config } from "./shared/config.js";
import { closePool, ensureSchema, getPool } from "./shared/db.js";

const run = async () => {
  if (!config.dbUrl) {
    throw new Error("DATABASE_URL is required");
  }
  try {
    await ensureSchema(getPool(config.dbUrl));
    console.log("Schema applied.");
  } finally {
    await closePool();
  }
};

run().catch((error) => {
  console.error("Migration failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
