export type CatalogErrorCode = "LOAD_ERROR" | "INVALID_PARAMETER" | "STORE_UNAVAILABLE";

export class CatalogError extends Error {
  readonly code: CatalogErrorCode;
  readonly statusCode: number;

  constructor(code: CatalogErrorCode, message: string, statusCode: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

/** Raised by a bulk load; the previous dataset stays in place. */
export class LoadError extends CatalogError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("LOAD_ERROR", message, 500);
    this.issues = issues;
  }
}

export class InvalidParameterError extends CatalogError {
  readonly details: string[];

  constructor(details: string[]) {
    super("INVALID_PARAMETER", `Invalid search parameters: ${details.join("; ")}`, 400);
    this.details = details;
  }
}

export class StoreUnavailableError extends CatalogError {
  constructor(message: string, options?: ErrorOptions) {
    super("STORE_UNAVAILABLE", message, 503, options);
  }
}

export const isCatalogError = (error: unknown): error is CatalogError => error instanceof CatalogError;
