/**
 * Semantic types a catalog field can declare.
 *
 * Catalog files may use the short tags `int`, `int_array` and `bool`;
 * `resolveTypeTag` folds them onto the canonical names.
 */

export const SEMANTIC_TYPES = [
  "integer",
  "text",
  "timestamp",
  "integer_array",
  "float",
  "uuid",
  "boolean",
] as const;

export type SemanticType = (typeof SEMANTIC_TYPES)[number];

const TYPE_ALIASES: Record<string, SemanticType> = {
  int: "integer",
  integer: "integer",
  text: "text",
  timestamp: "timestamp",
  int_array: "integer_array",
  integer_array: "integer_array",
  float: "float",
  uuid: "uuid",
  bool: "boolean",
  boolean: "boolean",
};

/** Canonical type for a catalog tag, or null when no parser exists for it. */
export function resolveTypeTag(tag: string): SemanticType | null {
  const key = tag.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(TYPE_ALIASES, key) ? TYPE_ALIASES[key] : null;
}

/** Postgres column type used when bootstrapping a table for a field. */
export const COLUMN_TYPES: Record<SemanticType, string> = {
  integer: "bigint",
  text: "text",
  timestamp: "timestamptz",
  integer_array: "bigint[]",
  float: "double precision",
  uuid: "uuid",
  boolean: "boolean",
};

export function assertNever(value: never): never {
  throw new Error(`unhandled semantic type: ${String(value)}`);
}
