import fs from "fs";
import path from "path";
import pg from "pg";
import { dataDir } from "./columns.js";
import { isCatalogError, StoreUnavailableError } from "./errors.js";

const { Pool } = pg;

let pool: pg.Pool | null = null;

const getSslConfig = (dbUrl: string): pg.PoolConfig["ssl"] | undefined => {
  let sslMode = process.env.DATABASE_SSLMODE ?? process.env.PGSSLMODE ?? "";

  try {
    const url = new URL(dbUrl);
    sslMode = sslMode || url.searchParams.get("sslmode") || "";
  } catch {
    // Not a URL (e.g. a bare socket path); the env setting alone decides.
  }

  if (!sslMode) return undefined;
  if (sslMode === "disable") return false;
  if (sslMode === "verify-full") return { rejectUnauthorized: true };
  return { rejectUnauthorized: false };
};

export const getPool = (dbUrl: string): pg.Pool => {
  if (!dbUrl) {
    throw new Error("DATABASE_URL is required");
  }
  if (!pool) {
    pool = new Pool({
      connectionString: dbUrl,
      ssl: getSslConfig(dbUrl)
    });
    // Idle clients can fail between requests; the next checkout reconnects.
    pool.on("error", (error) => {
      console.error("[db] idle client error:", error.message);
    });
  }
  return pool;
};

export const closePool = async () => {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
};

const describe = (error: unknown) => (error instanceof Error ? error.message : String(error));

export type Connectable = {
  connect: () => Promise<pg.PoolClient>;
};

/**
 * Runs `fn` on a client checked out of `db` and releases it on every exit path.
 * Failures that are not already catalog errors come back as StoreUnavailableError.
 */
export const withClient = async <T>(db: Connectable, fn: (client: pg.PoolClient) => Promise<T>): Promise<T> => {
  const client = await db.connect().catch((error: unknown) => {
    throw new StoreUnavailableError(`Record store connection failed: ${describe(error)}`, { cause: error });
  });

  try {
    return await fn(client);
  } catch (error) {
    if (isCatalogError(error)) throw error;
    throw new StoreUnavailableError(`Record store query failed: ${describe(error)}`, { cause: error });
  } finally {
    client.release();
  }
};

export const ensureSchema = async (db: Connectable) => {
  const schema = fs.readFileSync(path.join(dataDir, "schema.sql"), "utf-8");
  await withClient(db, async (client) => {
    await client.query(schema);
  });
};
