/**
 * errors.ts — Run-level failures
 *
 * Per-record problems (missing id, malformed field, filter match) are
 * outcome values returned by the RowValidator and never thrown. The classes
 * here are the failures that end a run or a collaborator call.
 */

/** The catalog file is unreadable or does not describe a usable schema. */
export class CatalogConfigError extends Error {
  override readonly name = "CatalogConfigError";
  readonly code = "CATALOG_CONFIG";
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

/** The data provider refused a token, manifest, or download request. */
export class RetrievalError extends Error {
  override readonly name = "RetrievalError";
  readonly code = "RETRIEVAL_FAILURE";
  readonly status: number | null;
  readonly entity: string | null;

  constructor(message: string, options: { status?: number; entity?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.status = options.status ?? null;
    this.entity = options.entity ?? null;
  }
}

/** A dump file exists but is not readable as delimited text. */
export class DumpReadError extends Error {
  override readonly name = "DumpReadError";
  readonly code = "DUMP_READ";
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`could not read dump ${path}: ${errorMessage(cause)}`, { cause });
    this.path = path;
  }
}

/** The merge for one entity failed; that entity was rolled back. */
export class StoreFailureError extends Error {
  override readonly name = "StoreFailureError";
  readonly code = "STORE_FAILURE";
  readonly entity: string;

  constructor(entity: string, cause: unknown) {
    super(`upsert failed for ${entity}: ${errorMessage(cause)}`, { cause });
    this.entity = entity;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
