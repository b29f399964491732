/**
 * dump-reader.ts — Delimited dump payload → raw records
 *
 * The header row names the columns. A blank-named column is dropped, extra
 * columns are kept (the validator only looks at schema fields) and a short
 * line leaves its trailing columns undefined. A quote inside an unquoted
 * field is kept as a literal character; a line the parser still cannot read
 * (a quote left open at the end of the file) is dropped on its own.
 */

import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { DumpReadError } from "../errors.js";
import type { RawRecord } from "./row-validator.js";

export interface DumpFile {
  path: string;
  records: RawRecord[];
}

function toRawRecord(header: readonly string[], cells: unknown): RawRecord {
  const record: RawRecord = {};
  if (!Array.isArray(cells)) return record;
  header.forEach((name, index) => {
    if (name === "") return;
    const cell: unknown = cells[index];
    record[name] = typeof cell === "string" ? cell : undefined;
  });
  return record;
}

export function parseDump(content: string | Buffer): RawRecord[] {
  const rows: unknown = parse(content, {
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
    skip_records_with_error: true,
  });
  if (!Array.isArray(rows) || rows.length === 0) return [];

  const [first, ...body] = rows;
  const header = Array.isArray(first) ? first.map((name) => String(name).trim()) : [];
  return body.map((cells) => toRawRecord(header, cells));
}

/** Reads `path`; null when the file does not exist. */
export async function readDump(path: string): Promise<DumpFile | null> {
  let content: Buffer;
  try {
    content = await readFile(path);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw new DumpReadError(path, err);
  }

  try {
    return { path, records: parseDump(content) };
  } catch (err) {
    throw new DumpReadError(path, err);
  }
}
