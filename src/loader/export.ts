import path from "path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { getColumnInfo } from "../shared/columns.js";
import { LoadError } from "../shared/errors.js";
import { ID_COLUMN, RECORD_COLUMNS, type RecordColumn } from "../shared/record.js";

export type CellValue = string | number | null;

/** One export row keyed by record column; still unvalidated. */
export type RecordInput = Partial<Record<RecordColumn, CellValue>>;

export type ExportContents = {
  records: RecordInput[];
  // Header cells that matched no record column.
  ignoredHeaders: string[];
};

const tableSchema = z.array(z.array(z.string()));

const WORKBOOK_EXTENSIONS = new Set([".xlsx", ".xlsm", ".xls"]);

/** The loader reads CSV only; workbooks must be saved as CSV first. */
export const assertCsvExport = (filePath: string) => {
  if (WORKBOOK_EXTENSIONS.has(path.extname(filePath).toLowerCase())) {
    throw new LoadError(`${path.basename(filePath)} is a spreadsheet workbook; save the sheet as CSV and load that file`);
  }
};

const normalizeHeader = (value: string) => value.trim().toLowerCase().replace(/\s+/g, " ");

const headerIndex = (): Map<string, RecordColumn> => {
  const index = new Map<string, RecordColumn>();
  for (const info of getColumnInfo()) {
    for (const name of [info.column, info.label, info.header]) {
      if (name) index.set(normalizeHeader(name), info.column);
    }
  }
  return index;
};

// Spreadsheet exports write whole numbers as e.g. "12.0".
const parseCount = (value: string): number | string => {
  const match = value.match(/^(\d+)(?:\.0+)?$/);
  return match ? Number(match[1]) : value;
};

const toCell = (column: RecordColumn, raw: string | undefined): CellValue => {
  const value = (raw ?? "").trim();
  if (value === "") return null;
  return column === "sample_size" ? parseCount(value) : value;
};

export const mapHeaders = (header: readonly string[]): Array<RecordColumn | null> => {
  const index = headerIndex();
  const seen = new Map<RecordColumn, string>();

  return header.map((cell) => {
    const column = index.get(normalizeHeader(cell)) ?? null;
    if (column === null) return null;
    const previous = seen.get(column);
    if (previous !== undefined) {
      throw new LoadError(`Export headers "${previous}" and "${cell}" both map to column ${column}`);
    }
    seen.set(column, cell);
    return column;
  });
};

/**
 * Parses a CSV export into record inputs. Blank cells become null; blank rows
 * are skipped. Validation happens at load time.
 */
export const readExport = (content: string): ExportContents => {
  const table = tableSchema.parse(
    parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true
    })
  );

  const [header, ...rows] = table;
  if (!header) {
    throw new LoadError("Export is empty");
  }

  const columns = mapHeaders(header);
  if (!columns.includes(ID_COLUMN)) {
    throw new LoadError(`Export has no ${ID_COLUMN} column`);
  }

  const ignoredHeaders = header.filter((cell, index) => columns[index] === null && cell.trim() !== "");

  const records = rows
    .filter((row) => row.some((cell) => cell.trim() !== ""))
    .map((row) => {
      const record: RecordInput = {};
      for (const column of RECORD_COLUMNS) {
        record[column] = null;
      }
      columns.forEach((column, index) => {
        if (column !== null) record[column] = toCell(column, row[index]);
      });
      return record;
    });

  return { records, ignoredHeaders };
};
