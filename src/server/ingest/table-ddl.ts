import type { CatalogConfig, EntityDeclaration } from "../catalog.js";
import { quoteIdent } from "../db.js";
import { COLUMN_TYPES } from "./semantic-types.js";

/**
 * CREATE TABLE IF NOT EXISTS for one entity. Existing tables are left as they
 * are; fields with no parser are stored as text.
 */
export function buildCreateTable(entity: EntityDeclaration, tablePrefix: string): string {
  const columns = entity.fields.map((field) => {
    const type = field.type ? COLUMN_TYPES[field.type] : "text";
    const key = field.name === "id" ? " PRIMARY KEY" : "";
    return `  ${quoteIdent(field.name)} ${type}${key}`;
  });
  return `CREATE TABLE IF NOT EXISTS ${quoteIdent(`${tablePrefix}${entity.name}`)} (\n${columns.join(",\n")}\n)`;
}

export function buildCreateTableStatements(catalog: CatalogConfig, tablePrefix: string): string[] {
  return [...catalog.entities.values()].map((entity) => buildCreateTable(entity, tablePrefix));
}
