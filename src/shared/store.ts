import { withClient, type Connectable } from "./db.js";
import { LoadError } from "./errors.js";
import {
  buildDistinctValues,
  buildGetById,
  buildInsert,
  buildSearchQueries,
  INSERT_BATCH_SIZE,
  RECORDS_TABLE,
  type SearchCriteria,
  type SqlRow
} from "./query.js";
import { FILTER_COLUMNS, RECORD_COLUMNS, recordSchema, type FilterKey, type StudyRecord } from "./record.js";

export type QueryPage = {
  records: StudyRecord[];
  total: number;
};

export type FilterOptions = Record<FilterKey, string[]>;

export type RecordStore = {
  /** Replaces the whole dataset; returns the number of records written. */
  load: (records: readonly StudyRecord[]) => Promise<number>;
  getById: (id: string) => Promise<StudyRecord | null>;
  query: (criteria: SearchCriteria) => Promise<QueryPage>;
  filterOptions: () => Promise<FilterOptions>;
};

const MAX_REPORTED_ISSUES = 20;

/**
 * Checks every record against the schema and the identifier uniqueness rule.
 * Throws a LoadError carrying all issues found; nothing is written in that case.
 */
export const validateRecords = (records: readonly unknown[]): StudyRecord[] => {
  const issues: string[] = [];
  const firstSeen = new Map<string, number>();
  const valid: StudyRecord[] = [];

  records.forEach((input, index) => {
    const position = index + 1;
    const parsed = recordSchema.safeParse(input);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        const field = issue.path.join(".") || "record";
        issues.push(`record ${position}: ${field}: ${issue.message}`);
      }
      return;
    }

    const id = parsed.data.gse_id;
    const first = firstSeen.get(id);
    if (first !== undefined) {
      issues.push(`record ${position}: duplicate gse_id "${id}" (first seen at record ${first})`);
      return;
    }
    firstSeen.set(id, position);
    valid.push(parsed.data);
  });

  if (issues.length > 0) {
    const shown = issues.slice(0, MAX_REPORTED_ISSUES);
    const more = issues.length > shown.length ? ` (+${issues.length - shown.length} more)` : "";
    throw new LoadError(`Load rejected: ${shown.join("; ")}${more}`, issues);
  }
  return valid;
};

const toRow = (record: StudyRecord): SqlRow => RECORD_COLUMNS.map((column) => record[column]);

const toRecord = (row: unknown): StudyRecord => recordSchema.parse(row);

export const createRecordStore = (db: Connectable): RecordStore => ({
  load: async (records) => {
    const valid = validateRecords(records);

    return withClient(db, async (client) => {
      await client.query("BEGIN");
      try {
        await client.query(`DELETE FROM ${RECORDS_TABLE}`);
        for (let start = 0; start < valid.length; start += INSERT_BATCH_SIZE) {
          const insert = buildInsert(valid.slice(start, start + INSERT_BATCH_SIZE).map(toRow));
          await client.query(insert.text, insert.values);
        }
        await client.query("COMMIT");
      } catch (error) {
        // Rethrow the write failure, not a rollback failure.
        await client.query("ROLLBACK").catch((rollbackError: unknown) => {
          console.error("[store] rollback failed:", rollbackError instanceof Error ? rollbackError.message : rollbackError);
        });
        throw error;
      }
      return valid.length;
    });
  },

  getById: (id) =>
    withClient(db, async (client) => {
      const query = buildGetById(id);
      const result = await client.query(query.text, query.values);
      return result.rows.length > 0 ? toRecord(result.rows[0]) : null;
    }),

  query: (criteria) =>
    withClient(db, async (client) => {
      const { select, count } = buildSearchQueries(criteria);
      const counted = await client.query<{ total: string | number }>(count.text, count.values);
      const total = Number(counted.rows[0]?.total ?? 0);
      if (criteria.limit === 0) {
        return { records: [], total };
      }
      const result = await client.query(select.text, select.values);
      return { records: result.rows.map(toRecord), total };
    }),

  filterOptions: () =>
    withClient(db, async (client) => {
      const distinct = async (key: FilterKey) => {
        const column = FILTER_COLUMNS[key];
        const query = buildDistinctValues(column);
        const result = await client.query<Record<string, unknown>>(query.text, query.values);
        return result.rows.map((row) => row[column]).filter((value): value is string => typeof value === "string");
      };

      return {
        organism: await distinct("organism"),
        dataType: await distinct("dataType"),
        libraryStrategy: await distinct("libraryStrategy"),
        platformId: await distinct("platformId"),
        pregnancyTrimester: await distinct("pregnancyTrimester")
      };
    })
});
