import fs from "fs";
import path from "path";
import dotenv from "dotenv";

const isProdEnv = process.env.CATALOG_ENV === "prod" || process.env.NODE_ENV === "production";
const envFile = isProdEnv ? ".env.prod" : ".env.dev";
const envPath = path.resolve(process.cwd(), envFile);
const envFileExists = fs.existsSync(envPath);

if (envFileExists) {
  dotenv.config({ path: envPath });
}

export const envInfo = {
  envFile,
  envPath,
  envFileExists
};

const numberEnv = (key: string, fallback: number): number => {
  const raw = process.env[key];
  if (raw === undefined || raw === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${key} must be a positive integer (got "${raw}")`);
  }
  return parsed;
};

export const config = {
  port: numberEnv("PORT", 3000),
  dbUrl: process.env.DATABASE_URL ?? process.env.POSTGRES_URL ?? "",
  exportFile: process.env.CATALOG_EXPORT_FILE ?? "",
  pageSize: numberEnv("PAGE_SIZE", 20),
  maxPageSize: numberEnv("MAX_PAGE_SIZE", 100)
};
