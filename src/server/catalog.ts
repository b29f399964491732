/**
 * catalog.ts — Entity schemas and exclusion filters
 *
 * The catalog file (data/catalog.json) declares, per entity, an ordered
 * field → type-tag map and an optional field → excluded-integers map.
 * It is parsed once at startup into a frozen CatalogConfig that the
 * validator, the filter engine and the upsert writer all share read-only.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { CatalogConfigError, errorMessage } from "./errors.js";
import { resolveTypeTag, type SemanticType } from "./ingest/semantic-types.js";

// ─── Types ──────────────────────────────────────────────────────

export interface FieldDeclaration {
  readonly name: string;
  /** Tag as written in the catalog file */
  readonly tag: string;
  /** null when the tag names no known parser */
  readonly type: SemanticType | null;
}

export interface EntityDeclaration {
  readonly name: string;
  readonly fields: readonly FieldDeclaration[];
  readonly filters: ReadonlyMap<string, ReadonlySet<number>>;
}

export interface CatalogConfig {
  /** Entities in declaration order; this is also the import order. */
  readonly entities: ReadonlyMap<string, EntityDeclaration>;
}

// ─── File Schema ────────────────────────────────────────────────

const fieldName = z.string().min(1, "field names must not be empty");

const entitySchema = z.object({
  fields: z.record(fieldName, z.string().min(1)),
  filters: z.record(fieldName, z.array(z.number().int())).optional(),
});

const catalogFileSchema = z.object({
  entities: z.record(z.string().regex(/^[a-z][a-z0-9_]*$/, "entity names must be lowercase identifiers"), entitySchema),
});

// ─── Parsing ────────────────────────────────────────────────────

export function parseCatalog(input: unknown): CatalogConfig {
  const parsed = catalogFileSchema.safeParse(input);
  if (!parsed.success) {
    throw new CatalogConfigError(
      "invalid catalog",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    );
  }

  const issues: string[] = [];
  const entities = new Map<string, EntityDeclaration>();

  for (const [entityName, entity] of Object.entries(parsed.data.entities)) {
    const fields: FieldDeclaration[] = Object.entries(entity.fields).map(([name, tag]) =>
      Object.freeze({ name, tag, type: resolveTypeTag(tag) }),
    );

    if (!fields.some((field) => field.name === "id")) {
      issues.push(`entities.${entityName}: missing required field "id"`);
    }

    const filters = new Map<string, ReadonlySet<number>>();
    for (const [field, excluded] of Object.entries(entity.filters ?? {})) {
      if (!fields.some((declared) => declared.name === field)) {
        issues.push(`entities.${entityName}.filters.${field}: not a declared field`);
        continue;
      }
      filters.set(field, new Set(excluded));
    }

    entities.set(entityName, Object.freeze({ name: entityName, fields: Object.freeze(fields), filters }));
  }

  if (entities.size === 0) {
    issues.push("entities: at least one entity is required");
  }
  if (issues.length > 0) {
    throw new CatalogConfigError("invalid catalog", issues);
  }

  return Object.freeze({ entities });
}

export async function loadCatalog(path: string): Promise<CatalogConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    throw new CatalogConfigError(`cannot read catalog at ${path}: ${errorMessage(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new CatalogConfigError(`catalog at ${path} is not valid JSON: ${errorMessage(err)}`);
  }

  return parseCatalog(json);
}

/** Look up an entity, failing loudly for names the catalog does not declare. */
export function requireEntity(catalog: CatalogConfig, entity: string): EntityDeclaration {
  const declaration = catalog.entities.get(entity);
  if (!declaration) {
    const known = [...catalog.entities.keys()].join(", ");
    throw new CatalogConfigError(`unknown entity "${entity}" (catalog declares: ${known})`);
  }
  return declaration;
}
