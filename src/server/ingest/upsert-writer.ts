/**
 * upsert-writer.ts — Timestamp-gated merge into the catalog tables
 *
 *   INSERT INTO "igdb_games" ("id", "name", "updated_at") VALUES (...), (...)
 *   ON CONFLICT ("id") DO UPDATE SET "name" = EXCLUDED."name", ...
 *   WHERE "igdb_games"."updated_at" < EXCLUDED."updated_at"
 *   RETURNING (xmax = 0) AS inserted
 *
 * A NULL updated_at on either side makes the gate false: a stored row without
 * one is never overwritten, and an incoming one never overwrites.
 *
 * Tables without an updated_at column overwrite unconditionally. The accepted
 * set is collapsed to one row per id before batching, so the outcome is the
 * same whatever the page size, and re-running a set leaves the store as is.
 */

import { quoteIdent, type Queryable } from "../db.js";
import { log, type Logger } from "../logger.js";
import type { ParsedValue } from "./field-parsers.js";
import type { ParsedRecord } from "./row-validator.js";

/** Postgres caps a statement at 65535 bind parameters. */
export const MAX_BIND_PARAMETERS = 65535;
export const DEFAULT_PAGE_SIZE = 5000;
export const DEFAULT_TABLE_PREFIX = "igdb_";

const RECENCY_COLUMN = "updated_at";

export interface UpsertWriterOptions {
  tablePrefix?: string;
  pageSize?: number;
  logger?: Logger;
}

export interface UpsertResult {
  entity: string;
  table: string;
  /** Accepted records handed to the writer */
  submitted: number;
  /** Records folded into another with the same id */
  deduplicated: number;
  inserted: number;
  updated: number;
  /** Conflicting rows the recency gate left untouched */
  unchanged: number;
  batches: number;
}

export interface MergeStatement {
  text: string;
  values: unknown[];
}

// ─── Helpers ────────────────────────────────────────────────────

/** Value as bound to pg: empty strings become NULL, instants ISO-8601 UTC. */
export function toParam(value: ParsedValue | undefined): unknown {
  if (value === undefined || value === "") return null;
  if (value instanceof Date) return value.toISOString();
  return value;
}

function comparable(value: ParsedValue | undefined): number | string | null {
  if (value instanceof Date) return value.getTime();
  if (typeof value === "number" || typeof value === "string") return value;
  return null;
}

/**
 * Whether `incoming` is strictly more recent than `current`. Like the SQL
 * `<` gate, a comparison with null on either side is never true.
 */
function isNewer(incoming: ParsedValue | undefined, current: ParsedValue | undefined): boolean {
  const a = comparable(incoming);
  const b = comparable(current);
  if (a === null || b === null) return false;
  return a > b;
}

/**
 * One record per id. With a recency column a later record replaces the kept
 * one only when both carry an updated_at and the later one is strictly
 * greater, which is what the store gate does across runs; without one the
 * last occurrence wins. Output keeps first-seen id order.
 */
export function collapseById(records: readonly ParsedRecord[], useRecency: boolean): ParsedRecord[] {
  const byId = new Map<string, ParsedRecord>();
  for (const record of records) {
    const key = String(record.id);
    const current = byId.get(key);
    if (current && useRecency && !isNewer(record[RECENCY_COLUMN], current[RECENCY_COLUMN])) {
      continue;
    }
    byId.set(key, record);
  }
  return [...byId.values()];
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// ─── Writer ─────────────────────────────────────────────────────

export class UpsertWriter {
  readonly tablePrefix: string;
  readonly pageSize: number;
  private readonly logger: Logger;

  constructor(options: UpsertWriterOptions = {}) {
    this.tablePrefix = options.tablePrefix ?? DEFAULT_TABLE_PREFIX;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.logger = options.logger ?? log.store;
    if (!Number.isInteger(this.pageSize) || this.pageSize < 1) {
      throw new Error(`page size must be a positive integer, got ${this.pageSize}`);
    }
  }

  tableName(entity: string): string {
    return `${this.tablePrefix}${entity}`;
  }

  /** Rows per statement: the page size, capped by the bind-parameter limit. */
  rowsPerBatch(columnCount: number): number {
    return Math.max(1, Math.min(this.pageSize, Math.floor(MAX_BIND_PARAMETERS / columnCount)));
  }

  buildStatement(entity: string, columns: readonly string[], rows: readonly ParsedRecord[]): MergeStatement {
    const table = quoteIdent(this.tableName(entity));
    const width = columns.length;

    const values: unknown[] = [];
    const tuples = rows.map((row, r) => {
      for (const column of columns) values.push(toParam(row[column]));
      return `(${columns.map((_, c) => `$${r * width + c + 1}`).join(", ")})`;
    });

    const updates = columns.filter((column) => column !== "id");
    const lines = [
      `INSERT INTO ${table} (${columns.map(quoteIdent).join(", ")})`,
      `VALUES ${tuples.join(", ")}`,
    ];

    if (updates.length === 0) {
      lines.push(`ON CONFLICT ("id") DO NOTHING`);
    } else {
      lines.push(
        `ON CONFLICT ("id") DO UPDATE SET ${updates
          .map((column) => `${quoteIdent(column)} = EXCLUDED.${quoteIdent(column)}`)
          .join(", ")}`,
      );
      if (columns.includes(RECENCY_COLUMN)) {
        const recency = quoteIdent(RECENCY_COLUMN);
        lines.push(`WHERE ${table}.${recency} < EXCLUDED.${recency}`);
      }
    }

    lines.push("RETURNING (xmax = 0) AS inserted");
    return { text: lines.join("\n"), values };
  }

  /**
   * Merge one entity's accepted records. The caller owns the transaction;
   * every batch runs on the same client.
   */
  async upsertEntity(
    client: Queryable,
    entity: string,
    columns: readonly string[],
    records: readonly ParsedRecord[],
  ): Promise<UpsertResult> {
    if (!columns.includes("id")) {
      throw new Error(`cannot upsert ${entity}: column list has no "id"`);
    }

    const rows = collapseById(records, columns.includes(RECENCY_COLUMN));
    const batches = chunk(rows, this.rowsPerBatch(columns.length));
    const result: UpsertResult = {
      entity,
      table: this.tableName(entity),
      submitted: records.length,
      deduplicated: records.length - rows.length,
      inserted: 0,
      updated: 0,
      unchanged: 0,
      batches: batches.length,
    };

    for (const [index, batch] of batches.entries()) {
      const statement = this.buildStatement(entity, columns, batch);
      const res = await client.query<{ inserted: boolean }>(statement.text, statement.values);
      const inserted = res.rows.filter((row) => row.inserted).length;
      result.inserted += inserted;
      result.updated += res.rows.length - inserted;
      result.unchanged += batch.length - res.rows.length;
      this.logger.debug(
        { entity, batch: index + 1, of: batches.length, rows: batch.length },
        "batch merged",
      );
    }

    this.logger.info(
      {
        entity,
        inserted: result.inserted,
        updated: result.updated,
        unchanged: result.unchanged,
        deduplicated: result.deduplicated,
      },
      "entity merged",
    );
    return result;
  }
}
