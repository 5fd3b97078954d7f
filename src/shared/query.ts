import {
  FILTER_COLUMNS,
  FILTER_KEYS,
  ID_COLUMN,
  KEYWORD_COLUMNS,
  RECORD_COLUMNS,
  type FilterColumn,
  type FilterKey,
  type KeywordColumn
} from "./record.js";

export const RECORDS_TABLE = "study_records";

export const SELECT_COLUMNS = RECORD_COLUMNS.join(", ");

export type SqlValue = string | number;

export type SqlQuery = {
  text: string;
  values: Array<SqlValue | null>;
};

export type SqlRow = ReadonlyArray<SqlValue | null>;

export type SampleSizeRange = {
  min: number | null;
  max: number | null;
};

/** Validated search input; see catalog.ts for how raw parameters become this. */
export type SearchCriteria = {
  keyword: string | null;
  filters: Partial<Record<FilterKey, string[]>>;
  sampleSize: SampleSizeRange;
  limit: number;
  offset: number;
};

export type Predicate =
  | { kind: "keyword"; term: string; columns: readonly KeywordColumn[] }
  | { kind: "oneOf"; column: FilterColumn; values: readonly string[] }
  | { kind: "range"; column: "sample_size"; min: number | null; max: number | null };

type PushParam = (value: SqlValue) => string;

// Backslash is the default LIKE escape character in PostgreSQL.
export const escapeLike = (term: string) => term.replace(/[\\%_]/g, (ch) => `\\${ch}`);

export const toPredicates = (criteria: SearchCriteria): Predicate[] => {
  const predicates: Predicate[] = [];

  if (criteria.keyword) {
    predicates.push({ kind: "keyword", term: criteria.keyword, columns: KEYWORD_COLUMNS });
  }

  for (const key of FILTER_KEYS) {
    const values = criteria.filters[key];
    if (values && values.length > 0) {
      predicates.push({ kind: "oneOf", column: FILTER_COLUMNS[key], values });
    }
  }

  const { min, max } = criteria.sampleSize;
  if (min !== null || max !== null) {
    predicates.push({ kind: "range", column: "sample_size", min, max });
  }

  return predicates;
};

const compilePredicate = (predicate: Predicate, pushParam: PushParam): string => {
  switch (predicate.kind) {
    case "keyword": {
      const ref = pushParam(`%${escapeLike(predicate.term)}%`);
      return `(${predicate.columns.map((column) => `${column} ILIKE ${ref}`).join(" OR ")})`;
    }
    case "oneOf": {
      if (predicate.values.length === 0) return "FALSE";
      return `${predicate.column} IN (${predicate.values.map((value) => pushParam(value)).join(", ")})`;
    }
    case "range": {
      const bounds: string[] = [];
      if (predicate.min !== null) bounds.push(`${predicate.column} >= ${pushParam(predicate.min)}`);
      if (predicate.max !== null) bounds.push(`${predicate.column} <= ${pushParam(predicate.max)}`);
      return bounds.length > 0 ? `(${bounds.join(" AND ")})` : "TRUE";
    }
  }
};

/** Folds the predicates into one AND-ed WHERE clause with positional parameters. */
export const buildWhere = (predicates: readonly Predicate[]) => {
  const values: SqlValue[] = [];
  const pushParam: PushParam = (value) => {
    values.push(value);
    return `$${values.length}`;
  };

  const clauses = predicates.map((predicate) => compilePredicate(predicate, pushParam));
  return {
    clause: clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "",
    values,
    pushParam
  };
};

export const buildSearchQueries = (criteria: SearchCriteria): { select: SqlQuery; count: SqlQuery } => {
  const where = buildWhere(toPredicates(criteria));
  const count: SqlQuery = {
    text: `SELECT COUNT(*) AS total FROM ${RECORDS_TABLE} ${where.clause}`.trim(),
    values: [...where.values]
  };

  const limitRef = where.pushParam(criteria.limit);
  const offsetRef = where.pushParam(criteria.offset);
  const select: SqlQuery = {
    text: [
      `SELECT ${SELECT_COLUMNS} FROM ${RECORDS_TABLE}`,
      where.clause,
      `ORDER BY ${ID_COLUMN}`,
      `LIMIT ${limitRef} OFFSET ${offsetRef}`
    ]
      .filter((part) => part.length > 0)
      .join(" "),
    values: where.values
  };

  return { select, count };
};

export const buildGetById = (id: string): SqlQuery => ({
  text: `SELECT ${SELECT_COLUMNS} FROM ${RECORDS_TABLE} WHERE ${ID_COLUMN} = $1 LIMIT 1`,
  values: [id]
});

export const buildDistinctValues = (column: FilterColumn): SqlQuery => ({
  text: `SELECT DISTINCT ${column} FROM ${RECORDS_TABLE} WHERE ${column} IS NOT NULL AND ${column} <> '' ORDER BY ${column}`,
  values: []
});

// PostgreSQL caps a statement at 65535 bind parameters.
export const INSERT_BATCH_SIZE = Math.floor(60000 / RECORD_COLUMNS.length);

export const buildInsert = (rows: readonly SqlRow[]): SqlQuery => {
  const values: Array<SqlValue | null> = [];
  const tuples = rows.map((row) => {
    const refs = row.map((value) => {
      values.push(value);
      return `$${values.length}`;
    });
    return `(${refs.join(", ")})`;
  });
  return {
    text: `INSERT INTO ${RECORDS_TABLE} (${SELECT_COLUMNS}) VALUES ${tuples.join(", ")}`,
    values
  };
};
