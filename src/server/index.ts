import { config, envInfo } from "../shared/config.js";
import { createCatalog } from "../shared/catalog.js";
import { closePool, getPool } from "../shared/db.js";
import { createRecordStore } from "../shared/store.js";
import { createApp } from "./app.js";

const start = () => {
  if (!config.dbUrl) {
    const details = envInfo.envFileExists ? `Check ${envInfo.envFile}.` : `Expected ${envInfo.envFile} (not found).`;
    console.error(`Missing DATABASE_URL in environment. ${details}`);
    process.exit(1);
  }

  const store = createRecordStore(getPool(config.dbUrl));
  const catalog = createCatalog(store, { pageSize: config.pageSize, maxPageSize: config.maxPageSize });
  const app = createApp(catalog);

  const server = app.listen(config.port, () => {
    console.log(`Catalog API listening on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down`);
    server.close(() => {
      closePool()
        .then(() => process.exit(0))
        .catch((error) => {
          console.error("Failed to close database pool:", error instanceof Error ? error.message : error);
          process.exit(1);
        });
    });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
};

start();
