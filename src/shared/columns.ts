import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { RECORD_COLUMNS, type RecordColumn } from "./record.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const dataDir = path.resolve(__dirname, "..", "..", "data");

const columnSchema = z.object({
  column: z.enum(RECORD_COLUMNS),
  label: z.string().min(1),
  header: z.string().min(1).optional()
});

export type ColumnInfo = {
  column: RecordColumn;
  label: string;
  // Header text in the spreadsheet export, where it differs from the label.
  header?: string;
};

let cached: ColumnInfo[] | null = null;

export const getColumnInfo = (): ColumnInfo[] => {
  if (!cached) {
    const raw: unknown = JSON.parse(fs.readFileSync(path.join(dataDir, "columns.json"), "utf-8"));
    cached = z.array(columnSchema).parse(raw);
  }
  return cached;
};
