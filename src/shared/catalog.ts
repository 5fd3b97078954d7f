import { z } from "zod";
import { getColumnInfo, type ColumnInfo } from "./columns.js";
import { CatalogError, InvalidParameterError, StoreUnavailableError } from "./errors.js";
import type { SearchCriteria } from "./query.js";
import { FILTER_KEYS, MAX_SAMPLE_SIZE, type FilterKey, type StudyRecord } from "./record.js";
import type { FilterOptions, RecordStore } from "./store.js";

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;
export const MAX_KEYWORD_LENGTH = 200;

type ListValue = string | readonly string[];

// Repeated query keys arrive as lists; validation rejects them where one value is expected.
type RawValue = number | ListValue;

/** Raw, untrusted search input as it arrives from a request. */
export type SearchParams = Partial<Record<FilterKey, ListValue>> & {
  keyword?: ListValue;
  minSampleSize?: RawValue;
  maxSampleSize?: RawValue;
  limit?: RawValue;
  offset?: RawValue;
  page?: RawValue;
};

export type SearchPage = {
  records: StudyRecord[];
  total: number;
  limit: number;
  offset: number;
  page: number;
  totalPages: number;
};

export type SearchResult = { kind: "ok"; page: SearchPage } | { kind: "error"; error: CatalogError };

export type DetailResult =
  | { kind: "found"; record: StudyRecord }
  | { kind: "not_found"; id: string }
  | { kind: "error"; error: CatalogError };

export type FilterOptionsResult = { kind: "ok"; options: FilterOptions } | { kind: "error"; error: CatalogError };

export type Catalog = {
  search: (params: SearchParams) => Promise<SearchResult>;
  fetchDetail: (id: string) => Promise<DetailResult>;
  filterOptions: () => Promise<FilterOptionsResult>;
  columns: () => ColumnInfo[];
};

export type CatalogOptions = {
  pageSize?: number;
  maxPageSize?: number;
};

const toNumber = (value: unknown) => {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : Number(trimmed);
};

const wholeNumber = z
  .number({ invalid_type_error: "must be a number" })
  .int("must be an integer")
  .nonnegative("must not be negative");

const bounded = (max: number) => z.preprocess(toNumber, wholeNumber.max(max, `must be at most ${max}`).optional());

// Limits above the maximum page size are clamped rather than rejected.
const limitSchema = z.preprocess(toNumber, wholeNumber.optional());
const offsetSchema = bounded(Number.MAX_SAFE_INTEGER);
const sampleSizeSchema = bounded(MAX_SAMPLE_SIZE);

const filterValues = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => {
    const list = value === undefined ? [] : Array.isArray(value) ? value : [value];
    return [...new Set(list.map((entry) => entry.trim()).filter((entry) => entry.length > 0))];
  });

const paramsSchema = z
  .object({
    keyword: z
      .string({ invalid_type_error: "must be a single string" })
      .max(MAX_KEYWORD_LENGTH, `must be at most ${MAX_KEYWORD_LENGTH} characters`)
      .optional(),
    organism: filterValues,
    dataType: filterValues,
    libraryStrategy: filterValues,
    platformId: filterValues,
    pregnancyTrimester: filterValues,
    minSampleSize: sampleSizeSchema,
    maxSampleSize: sampleSizeSchema,
    limit: limitSchema,
    offset: offsetSchema,
    page: z.preprocess(
      toNumber,
      z
        .number({ invalid_type_error: "must be a number" })
        .int("must be an integer")
        .min(1, "must be at least 1")
        .max(Number.MAX_SAFE_INTEGER, `must be at most ${Number.MAX_SAFE_INTEGER}`)
        .optional()
    )
  })
  .refine(
    (params) =>
      params.minSampleSize === undefined ||
      params.maxSampleSize === undefined ||
      params.minSampleSize <= params.maxSampleSize,
    { message: "must not exceed maxSampleSize", path: ["minSampleSize"] }
  );

/**
 * Validates raw parameters and resolves defaults. Oversized limits are clamped;
 * everything else that fails validation raises InvalidParameterError.
 */
export const toCriteria = (params: SearchParams, options: Required<CatalogOptions>): SearchCriteria => {
  const parsed = paramsSchema.safeParse(params);
  if (!parsed.success) {
    throw new InvalidParameterError(
      parsed.error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    );
  }

  const data = parsed.data;
  const limit = Math.min(data.limit ?? options.pageSize, options.maxPageSize);
  const offset = data.offset ?? (data.page !== undefined ? (data.page - 1) * limit : 0);
  if (!Number.isSafeInteger(offset)) {
    throw new InvalidParameterError(["page: too large for the page size"]);
  }
  const keyword = data.keyword?.trim() ?? "";

  const filters: SearchCriteria["filters"] = {};
  for (const key of FILTER_KEYS) {
    const values = data[key];
    if (values.length > 0) filters[key] = values;
  }

  return {
    keyword: keyword.length > 0 ? keyword : null,
    filters,
    sampleSize: { min: data.minSampleSize ?? null, max: data.maxSampleSize ?? null },
    limit,
    offset
  };
};

const toPage = (criteria: SearchCriteria, records: StudyRecord[], total: number): SearchPage => ({
  records,
  total,
  limit: criteria.limit,
  offset: criteria.offset,
  page: criteria.limit > 0 ? Math.floor(criteria.offset / criteria.limit) + 1 : 1,
  totalPages: criteria.limit > 0 ? Math.ceil(total / criteria.limit) : 0
});

const asCatalogError = (error: unknown): CatalogError => {
  if (error instanceof CatalogError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new StoreUnavailableError(`Record store failure: ${message}`, { cause: error });
};

export const createCatalog = (store: RecordStore, options: CatalogOptions = {}): Catalog => {
  const resolved: Required<CatalogOptions> = {
    pageSize: options.pageSize ?? DEFAULT_PAGE_SIZE,
    maxPageSize: options.maxPageSize ?? MAX_PAGE_SIZE
  };

  return {
    search: async (params) => {
      try {
        const criteria = toCriteria(params, resolved);
        const { records, total } = await store.query(criteria);
        return { kind: "ok", page: toPage(criteria, records, total) };
      } catch (error) {
        return { kind: "error", error: asCatalogError(error) };
      }
    },

    fetchDetail: async (id) => {
      const trimmed = id.trim();
      if (!trimmed) {
        return { kind: "not_found", id };
      }
      try {
        const record = await store.getById(trimmed);
        return record ? { kind: "found", record } : { kind: "not_found", id: trimmed };
      } catch (error) {
        return { kind: "error", error: asCatalogError(error) };
      }
    },

    filterOptions: async () => {
      try {
        return { kind: "ok", options: await store.filterOptions() };
      } catch (error) {
        return { kind: "error", error: asCatalogError(error) };
      }
    },

    columns: () => getColumnInfo()
  };
};
