import express from "express";
import type { Catalog, SearchParams } from "../shared/catalog.js";
import { InvalidParameterError, type CatalogError } from "../shared/errors.js";
import { FILTER_COLUMNS, FILTER_KEYS } from "../shared/record.js";

type QueryValue = express.Request["query"][string];

const asList = (value: QueryValue): string | string[] | undefined => {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    return value.filter((entry): entry is string => typeof entry === "string");
  }
  return undefined;
};

// Query keys use the column names, e.g. ?organism=Human&library_strategy=RNA-Seq.
export const toSearchParams = (query: express.Request["query"]): SearchParams => {
  const params: SearchParams = {};

  params.keyword = asList(query.q ?? query.keyword);
  for (const key of FILTER_KEYS) {
    params[key] = asList(query[FILTER_COLUMNS[key]]);
  }
  params.minSampleSize = asList(query.min_sample_size);
  params.maxSampleSize = asList(query.max_sample_size);
  params.limit = asList(query.limit);
  params.offset = asList(query.offset);
  params.page = asList(query.page);
  return params;
};

const sendError = (res: express.Response, error: CatalogError) => {
  if (error instanceof InvalidParameterError) {
    return res.status(error.statusCode).json({ error: error.message, details: error.details });
  }
  console.error(`[catalog] ${error.code}: ${error.message}`);
  return res.status(error.statusCode).json({ error: error.message });
};

export const createApp = (catalog: Catalog) => {
  const app = express();
  app.disable("x-powered-by");

  app.get("/health", (_req, res) => {
    res.status(200).send("OK");
  });

  app.get("/records", async (req, res) => {
    const result = await catalog.search(toSearchParams(req.query));
    if (result.kind === "error") {
      return sendError(res, result.error);
    }
    const { page } = result;
    return res.json({
      total: page.total,
      limit: page.limit,
      offset: page.offset,
      page: page.page,
      total_pages: page.totalPages,
      count: page.records.length,
      records: page.records
    });
  });

  app.get("/records/filters", async (_req, res) => {
    const result = await catalog.filterOptions();
    if (result.kind === "error") {
      return sendError(res, result.error);
    }
    return res.json(result.options);
  });

  app.get("/records/columns", (_req, res) => {
    res.json(catalog.columns().map(({ column, label }) => ({ column, label })));
  });

  app.get("/records/:id", async (req, res) => {
    const result = await catalog.fetchDetail(req.params.id);
    switch (result.kind) {
      case "found":
        return res.json(result.record);
      case "not_found":
        return res.status(404).json({ error: "Not found", id: result.id });
      case "error":
        return sendError(res, result.error);
    }
  });

  return app;
};
