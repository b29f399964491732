#!/usr/bin/env node

import { loadCatalog, type CatalogConfig } from "../src/server/catalog.js";
import { resolveConfig, parsePositiveInt, type ConfigOverrides, type ImportConfig } from "../src/server/config.js";
import { createPool, healthCheck, initSchema } from "../src/server/db.js";
import { errorMessage } from "../src/server/errors.js";
import { buildCreateTableStatements } from "../src/server/ingest/table-ddl.js";
import { UpsertWriter } from "../src/server/ingest/upsert-writer.js";
import { log } from "../src/server/logger.js";
import { runImport, selectEntities, type ImportRunResult } from "../src/server/services/dump-import.js";
import { IgdbClient, type FetchDumpsResult } from "../src/server/services/igdb-client.js";

function parseFlag(args: string[], flag: string): string | undefined {
  const index = args.findIndex((value) => value === flag);
  if (index < 0) return undefined;
  return args[index + 1];
}

function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function parseEntities(args: string[]): string[] | undefined {
  const raw = parseFlag(args, "--entity");
  if (!raw) return undefined;
  return raw.split(",").map((entity) => entity.trim()).filter(Boolean);
}

function parseOverrides(args: string[]): ConfigOverrides {
  const pageSize = parseFlag(args, "--page-size");
  return {
    dumpDir: parseFlag(args, "--dump-dir"),
    catalogPath: parseFlag(args, "--catalog"),
    databaseUrl: parseFlag(args, "--db-url"),
    tablePrefix: parseFlag(args, "--table-prefix"),
    pageSize: pageSize === undefined ? undefined : parsePositiveInt(pageSize, "--page-size", 0),
  };
}

async function setup(args: string[]): Promise<{ config: Readonly<ImportConfig>; catalog: CatalogConfig }> {
  const config = resolveConfig(parseOverrides(args));
  const catalog = await loadCatalog(config.catalogPath);
  log.boot.debug({ catalog: config.catalogPath, entities: [...catalog.entities.keys()] }, "catalog loaded");
  return { config, catalog };
}

function printRunSummary(result: ImportRunResult): void {
  for (const entry of result.entities) {
    const { valid, invalid, skipped } = entry.counts;
    const merged = entry.upsert
      ? ` inserted=${entry.upsert.inserted} updated=${entry.upsert.updated} unchanged=${entry.upsert.unchanged}`
      : "";
    console.log(`${entry.entity}: valid=${valid} invalid=${invalid} skipped=${skipped}${merged}`);
  }
  for (const entity of result.missing) {
    console.log(`${entity}: no dump file`);
  }
}

async function fetchDumps(config: Readonly<ImportConfig>, entities: string[]): Promise<FetchDumpsResult | null> {
  if (!config.providerEnabled) {
    log.fetch.warn("IGDB_CLIENT_ID / IGDB_CLIENT_SECRET not set, using dumps already on disk");
    return null;
  }
  const client = new IgdbClient({
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    tokenUrl: config.tokenUrl,
    dumpsUrl: config.dumpsUrl,
  });
  try {
    return await client.fetchDumps(entities, config.dumpDir);
  } catch (err) {
    log.fetch.error({ err: errorMessage(err) }, "dump retrieval failed, using dumps already on disk");
    return null;
  }
}

async function load(config: Readonly<ImportConfig>, catalog: CatalogConfig, args: string[]): Promise<void> {
  const pool = createPool(config.databaseUrl);
  try {
    if (!(await healthCheck(pool))) {
      throw new Error("database is not reachable");
    }
    if (hasFlag(args, "--create-tables")) {
      await initSchema(pool, buildCreateTableStatements(catalog, config.tablePrefix));
    }
    const result = await runImport({
      catalog,
      dumpDir: config.dumpDir,
      entities: parseEntities(args),
      pool,
      writer: new UpsertWriter({ tablePrefix: config.tablePrefix, pageSize: config.pageSize }),
    });
    printRunSummary(result);
  } finally {
    await pool.end();
  }
}

async function cmdFetch(args: string[]): Promise<void> {
  const { config, catalog } = await setup(args);
  const result = await fetchDumps(config, selectEntities(catalog, parseEntities(args)));
  if (!result) {
    process.exitCode = 1;
    return;
  }
  console.log(JSON.stringify(result, null, 2));
  if (result.failed.length > 0) process.exitCode = 1;
}

async function cmdValidate(args: string[]): Promise<void> {
  const { config, catalog } = await setup(args);
  const result = await runImport({
    catalog,
    dumpDir: config.dumpDir,
    entities: parseEntities(args),
    dryRun: true,
  });
  printRunSummary(result);
}

async function cmdLoad(args: string[]): Promise<void> {
  const { config, catalog } = await setup(args);
  await load(config, catalog, args);
}

async function cmdRun(args: string[]): Promise<void> {
  const { config, catalog } = await setup(args);
  await fetchDumps(config, selectEntities(catalog, parseEntities(args)));
  await load(config, catalog, args);
}

async function cmdInitTables(args: string[]): Promise<void> {
  const { config, catalog } = await setup(args);
  const statements = buildCreateTableStatements(catalog, config.tablePrefix);
  if (hasFlag(args, "--print")) {
    console.log(statements.map((statement) => `${statement};`).join("\n\n"));
    return;
  }
  const pool = createPool(config.databaseUrl);
  try {
    await initSchema(pool, statements);
    console.log(`✅ ensured ${statements.length} tables`);
  } finally {
    await pool.end();
  }
}

function usage(): string {
  return [
    "Usage:",
    "  dumpsync fetch [--entity games,covers] [--dump-dir data/dumps]",
    "  dumpsync validate [--entity <names>] [--dump-dir <dir>] [--catalog data/catalog.json]",
    "  dumpsync load [--entity <names>] [--dump-dir <dir>] [--db-url <postgres-url>] [--page-size 5000] [--table-prefix igdb_] [--create-tables]",
    "  dumpsync run [same flags as load]",
    "  dumpsync init-tables [--db-url <postgres-url>] [--table-prefix igdb_] [--print]",
  ].join("\n");
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const rest = args.slice(1);

  switch (command) {
    case "fetch":
      return cmdFetch(rest);
    case "validate":
      return cmdValidate(rest);
    case "load":
      return cmdLoad(rest);
    case "run":
      return cmdRun(rest);
    case "init-tables":
      return cmdInitTables(rest);
    default:
      console.log(usage());
      process.exitCode = 1;
  }
}

main().catch((error) => {
  log.boot.fatal({ err: errorMessage(error) }, "run failed");
  console.error(errorMessage(error));
  process.exitCode = 1;
});
