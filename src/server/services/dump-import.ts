/**
 * dump-import.ts — Sequential per-entity import
 *
 * For each entity, in catalog order:
 *   read <dumpDir>/<entity>.csv → validate in memory → merge in one
 *   transaction → commit → next entity.
 *
 * A store failure rolls back the current entity and ends the run; entities
 * already committed stay committed. A missing dump file skips its entity.
 */

import { join } from "node:path";
import { requireEntity, type CatalogConfig } from "../catalog.js";
import { withTransaction, type Pool } from "../db.js";
import { StoreFailureError, errorMessage } from "../errors.js";
import { readDump } from "../ingest/dump-reader.js";
import { FilterEngine } from "../ingest/filter-engine.js";
import { RowValidator, type ValidationCounts } from "../ingest/row-validator.js";
import { TypeRegistry } from "../ingest/type-registry.js";
import type { UpsertResult, UpsertWriter } from "../ingest/upsert-writer.js";
import { log } from "../logger.js";

export interface ImportRunOptions {
  catalog: CatalogConfig;
  dumpDir: string;
  /** Subset of catalog entities, default all in catalog order */
  entities?: readonly string[];
  /** Required unless dryRun */
  pool?: Pool;
  writer?: UpsertWriter;
  /** Validate only; nothing is written */
  dryRun?: boolean;
}

export interface EntityImportResult {
  entity: string;
  path: string;
  counts: ValidationCounts;
  /** null on a dry run */
  upsert: UpsertResult | null;
}

export interface ImportRunResult {
  entities: EntityImportResult[];
  /** Entities whose dump file was not found */
  missing: string[];
}

export function selectEntities(catalog: CatalogConfig, requested?: readonly string[]): string[] {
  if (!requested || requested.length === 0) return [...catalog.entities.keys()];
  return requested.map((entity) => requireEntity(catalog, entity).name);
}

export async function runImport(options: ImportRunOptions): Promise<ImportRunResult> {
  const { catalog, dumpDir, pool, writer } = options;
  const dryRun = options.dryRun ?? false;
  if (!dryRun && (!pool || !writer)) {
    throw new Error("runImport needs a pool and a writer unless dryRun is set");
  }

  const entities = selectEntities(catalog, options.entities);
  const validator = new RowValidator({
    registry: new TypeRegistry(catalog),
    filters: new FilterEngine(catalog),
  });

  const result: ImportRunResult = { entities: [], missing: [] };

  for (const entity of entities) {
    const path = join(dumpDir, `${entity}.csv`);
    const dump = await readDump(path);
    if (!dump) {
      log.boot.warn({ entity, path }, "dump file not found, entity skipped");
      result.missing.push(entity);
      continue;
    }

    const outcome = validator.validateEntity(entity, dump.records);
    const entry: EntityImportResult = { entity, path, counts: outcome.counts, upsert: null };

    if (!dryRun && pool && writer) {
      const columns = requireEntity(catalog, entity).fields.map((field) => field.name);
      try {
        entry.upsert = await withTransaction(pool, (client) =>
          writer.upsertEntity(client, entity, columns, outcome.valid),
        );
      } catch (err) {
        log.store.error(
          { entity, err: errorMessage(err), committed: result.entities.map((e) => e.entity) },
          "upsert failed, run aborted",
        );
        throw new StoreFailureError(entity, err);
      }
      log.store.info({ entity }, "entity committed");
    }

    result.entities.push(entry);
  }

  return result;
}
