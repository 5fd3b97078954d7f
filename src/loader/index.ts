import fs from "fs";
import path from "path";
import { config, envInfo } from "../shared/config.js";
import { closePool, ensureSchema, getPool } from "../shared/db.js";
import { LoadError } from "../shared/errors.js";
import { createRecordStore, validateRecords } from "../shared/store.js";
import { assertCsvExport, readExport } from "./export.js";

type RunOptions = {
  file: string;
  dryRun: boolean;
};

const parseArgs = (argv: string[]): RunOptions => {
  const args = new Map<string, string | boolean>();
  for (const arg of argv) {
    if (arg === "--dry-run") {
      args.set("dry-run", true);
      continue;
    }
    if (arg.startsWith("--file=")) {
      args.set("file", arg.slice("--file=".length));
      continue;
    }
  }

  const file = args.get("file");
  return {
    file: typeof file === "string" && file ? file : config.exportFile,
    dryRun: Boolean(args.get("dry-run"))
  };
};

const run = async () => {
  const options = parseArgs(process.argv.slice(2));
  if (!options.file) {
    throw new Error("A CSV export is required (--file=<path.csv> or CATALOG_EXPORT_FILE)");
  }

  const filePath = path.resolve(process.cwd(), options.file);
  assertCsvExport(filePath);
  console.log(`Reading export ${filePath}`);
  const { records, ignoredHeaders } = readExport(fs.readFileSync(filePath, "utf-8"));
  if (ignoredHeaders.length > 0) {
    console.warn(`Ignoring ${ignoredHeaders.length} unknown columns: ${ignoredHeaders.join(", ")}`);
  }

  const valid = validateRecords(records);
  console.log(`Found ${valid.length} records`);

  if (options.dryRun) {
    console.log("Dry-run: nothing written");
    return;
  }

  if (!config.dbUrl) {
    const details = envInfo.envFileExists ? `Check ${envInfo.envFile}.` : `Expected ${envInfo.envFile} (not found).`;
    throw new Error(`DATABASE_URL is required. ${details}`);
  }

  const db = getPool(config.dbUrl);
  try {
    await ensureSchema(db);
    const written = await createRecordStore(db).load(valid);
    console.log(`Replaced catalog with ${written} records`);
  } finally {
    await closePool();
  }
};

run().catch((err) => {
  if (err instanceof LoadError && err.issues.length > 0) {
    console.error(`Load failed with ${err.issues.length} issue(s); the stored catalog is unchanged:`);
    for (const issue of err.issues) {
      console.error(`  ${issue}`);
    }
  } else {
    console.error("Load failed:", err instanceof Error ? err.message : err);
  }
  process.exitCode = 1;
});
