import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type pg from "pg";
import { createCatalog, toCriteria, type Catalog } from "./catalog.js";
import { InvalidParameterError, StoreUnavailableError } from "./errors.js";
import { createRecordStore, type RecordStore } from "./store.js";
import { createMemoryPool, makeRecord } from "./testing.js";

const defaults = { pageSize: 20, maxPageSize: 100 };

describe("toCriteria", () => {
  it("applies defaults when nothing is given", () => {
    expect(toCriteria({}, defaults)).toEqual({
      keyword: null,
      filters: {},
      sampleSize: { min: null, max: null },
      limit: 20,
      offset: 0
    });
  });

  it("clamps oversized limits instead of rejecting them", () => {
    expect(toCriteria({ limit: 5000 }, defaults).limit).toBe(100);
    expect(toCriteria({ limit: "250" }, defaults).limit).toBe(100);
    expect(toCriteria({ limit: "1e21" }, defaults).limit).toBe(100);
  });

  it("reads numeric strings", () => {
    const criteria = toCriteria({ limit: "10", offset: "30", minSampleSize: "5", maxSampleSize: " 9 " }, defaults);
    expect(criteria.limit).toBe(10);
    expect(criteria.offset).toBe(30);
    expect(criteria.sampleSize).toEqual({ min: 5, max: 9 });
  });

  it("derives the offset from a page number", () => {
    expect(toCriteria({ page: 3, limit: 10 }, defaults).offset).toBe(20);
    expect(toCriteria({ page: 3, offset: 4 }, defaults).offset).toBe(4);
  });

  it("treats blank values as absent", () => {
    const criteria = toCriteria({ keyword: "   ", organism: ["", " "], limit: "" }, defaults);
    expect(criteria.keyword).toBeNull();
    expect(criteria.filters).toEqual({});
    expect(criteria.limit).toBe(20);
  });

  it("trims and de-duplicates filter values", () => {
    const criteria = toCriteria({ organism: [" Homo sapiens", "Homo sapiens", "Mus musculus"], platformId: "GPL1" }, defaults);
    expect(criteria.filters).toEqual({ organism: ["Homo sapiens", "Mus musculus"], platformId: ["GPL1"] });
  });

  it.each([
    [{ limit: "ten" }, "limit: must be a number"],
    [{ limit: -1 }, "limit: must not be negative"],
    [{ limit: 2.5 }, "limit: must be an integer"],
    [{ offset: -20 }, "offset: must not be negative"],
    [{ page: 0 }, "page: must be at least 1"],
    [{ keyword: ["a", "b"] }, "keyword: must be a single string"],
    [{ keyword: "x".repeat(201) }, "keyword: must be at most 200 characters"],
    [{ minSampleSize: 10, maxSampleSize: 5 }, "minSampleSize: must not exceed maxSampleSize"],
    [{ offset: "1e21" }, "offset: must be at most 9007199254740991"],
    [{ minSampleSize: "3000000000" }, "minSampleSize: must be at most 2147483647"],
    [{ maxSampleSize: 2147483648 }, "maxSampleSize: must be at most 2147483647"],
    [{ page: "1e300" }, "page: must be at most 9007199254740991"],
    [{ page: 1e15, limit: 100 }, "page: too large for the page size"]
  ])("rejects %j", (params, detail) => {
    try {
      toCriteria(params, defaults);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidParameterError);
      if (error instanceof InvalidParameterError) {
        expect(error.details).toEqual([detail]);
      }
    }
  });
});

describe("Catalog", () => {
  let pool: pg.Pool;
  let catalog: Catalog;

  beforeAll(async () => {
    pool = await createMemoryPool();
    const store = createRecordStore(pool);
    await store.load([
      makeRecord("GSE1", { organism: "Human", title: "Term placenta" }),
      makeRecord("GSE2", { organism: "Human", title: "First trimester villi" }),
      makeRecord("GSE3", { organism: "Mouse", title: "Junctional zone" })
    ]);
    catalog = createCatalog(store);
  });

  afterAll(async () => {
    await pool.end();
  });

  it("filters by organism", async () => {
    const result = await catalog.search({ organism: "Human" });
    expect(result.kind).toBe("ok");
    if (result.kind === "ok") {
      expect(result.page.records.map((record) => record.gse_id)).toEqual(["GSE1", "GSE2"]);
      expect(result.page.total).toBe(2);
    }
  });

  it("matches keywords regardless of case", async () => {
    const result = await catalog.search({ keyword: "mouse" });
    expect(result.kind).toBe("ok");
    if (result.kind === "ok") {
      expect(result.page.records.map((record) => record.gse_id)).toEqual(["GSE3"]);
      expect(result.page.total).toBe(1);
    }
  });

  it("returns the first page of everything without parameters", async () => {
    const result = await catalog.search({});
    expect(result).toEqual({
      kind: "ok",
      page: expect.objectContaining({ total: 3, limit: 20, offset: 0, page: 1, totalPages: 1 })
    });
    if (result.kind === "ok") {
      expect(result.page.records).toHaveLength(3);
    }
  });

  it("returns no records but the full count for limit 0", async () => {
    const result = await catalog.search({ limit: 0 });
    expect(result).toEqual({
      kind: "ok",
      page: { records: [], total: 3, limit: 0, offset: 0, page: 1, totalPages: 0 }
    });
  });

  it("reports paging position", async () => {
    const result = await catalog.search({ limit: 2, page: 2 });
    expect(result.kind).toBe("ok");
    if (result.kind === "ok") {
      expect(result.page.records.map((record) => record.gse_id)).toEqual(["GSE3"]);
      expect(result.page).toMatchObject({ offset: 2, page: 2, totalPages: 2, total: 3 });
    }
  });

  it("does not let keyword text widen the result", async () => {
    const result = await catalog.search({ keyword: "Mouse' OR 'a'='a", organism: "Mouse" });
    expect(result).toEqual({
      kind: "ok",
      page: { records: [], total: 0, limit: 20, offset: 0, page: 1, totalPages: 0 }
    });
  });

  it("surfaces invalid parameters as an error result", async () => {
    const result = await catalog.search({ offset: -1 });
    expect(result.kind).toBe("error");
    if (result.kind === "error") {
      expect(result.error).toBeInstanceOf(InvalidParameterError);
      expect(result.error.statusCode).toBe(400);
    }
  });

  it("fetches a record by identifier", async () => {
    const result = await catalog.fetchDetail("GSE3");
    expect(result).toEqual({ kind: "found", record: makeRecord("GSE3", { organism: "Mouse", title: "Junctional zone" }) });
  });

  it("reports unknown identifiers as not found", async () => {
    expect(await catalog.fetchDetail("nonexistent-id")).toEqual({ kind: "not_found", id: "nonexistent-id" });
    expect(await catalog.fetchDetail("  ")).toEqual({ kind: "not_found", id: "  " });
  });

  it("lists filter options", async () => {
    const result = await catalog.filterOptions();
    expect(result.kind).toBe("ok");
    if (result.kind === "ok") {
      expect(result.options.organism).toEqual(["Human", "Mouse"]);
      expect(result.options.libraryStrategy).toEqual([]);
    }
  });

  it("exposes column labels", () => {
    const columns = catalog.columns();
    expect(columns[0]).toEqual({ column: "gse_id", label: "GEO Series ID", header: "GEO Series ID (GSE___)" });
  });
});

describe("Catalog with a failing store", () => {
  const failing: RecordStore = {
    load: () => Promise.reject(new Error("disk full")),
    getById: () => Promise.reject(new StoreUnavailableError("Record store connection failed: timeout")),
    query: () => Promise.reject(new Error("socket hang up")),
    filterOptions: () => Promise.reject(new Error("socket hang up"))
  };
  const catalog = createCatalog(failing);

  it("wraps unexpected search failures", async () => {
    const result = await catalog.search({ keyword: "placenta" });
    expect(result.kind).toBe("error");
    if (result.kind === "error") {
      expect(result.error).toBeInstanceOf(StoreUnavailableError);
      expect(result.error.message).toBe("Record store failure: socket hang up");
    }
  });

  it("passes store errors through for detail lookups", async () => {
    const result = await catalog.fetchDetail("GSE1");
    expect(result.kind).toBe("error");
    if (result.kind === "error") {
      expect(result.error.code).toBe("STORE_UNAVAILABLE");
      expect(result.error.message).toBe("Record store connection failed: timeout");
    }
  });

  it("wraps filter option failures", async () => {
    const result = await catalog.filterOptions();
    expect(result.kind).toBe("error");
  });

  it("still validates parameters before touching the store", async () => {
    const result = await catalog.search({ limit: "many" });
    expect(result.kind).toBe("error");
    if (result.kind === "error") {
      expect(result.error).toBeInstanceOf(InvalidParameterError);
    }
  });
});
