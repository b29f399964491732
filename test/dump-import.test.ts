import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { CatalogConfigError, StoreFailureError } from "../src/server/errors.js";
import { UpsertWriter } from "../src/server/ingest/upsert-writer.js";
import { runImport, selectEntities } from "../src/server/services/dump-import.js";
import { makeCatalog } from "./helpers/catalog.js";
import { createFakePool } from "./helpers/fake-pg.js";

const GAMES_CSV = [
  "id,name,themes,game_type,rating,checksum,updated_at,",
  '5001,Test Game,"{1,2}",0,,,2020-01-01T00:00:00Z,',
  '5002,Filtered,"{42,18}",0,,,2020-01-01T00:00:00Z,',
  ",No Id,{},0,,,,",
  "5003,Bad Rating,{},0,high,,,",
].join("\n");

const COVERS_CSV = ["id,url,alpha_channel,animated,game", "10,//img/10.jpg,f,t,5001"].join("\n");

describe("runImport", () => {
  const dirs: string[] = [];

  afterEach(async () => {
    for (const dir of dirs) {
      await rm(dir, { recursive: true, force: true });
    }
    dirs.length = 0;
  });

  async function dumpDir(files: Record<string, string>): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), "dumpsync-import-"));
    dirs.push(dir);
    for (const [name, content] of Object.entries(files)) {
      await writeFile(join(dir, name), content);
    }
    return dir;
  }

  it("validates, merges and commits each entity, skipping missing dumps", async () => {
    const dir = await dumpDir({ "games.csv": GAMES_CSV });
    const pool = createFakePool();

    const result = await runImport({
      catalog: makeCatalog(),
      dumpDir: dir,
      pool: pool as never,
      writer: new UpsertWriter(),
    });

    expect(result.missing).toEqual(["covers"]);
    expect(result.entities).toHaveLength(1);
    expect(result.entities[0]?.counts).toEqual({ valid: 1, invalid: 2, skipped: 1 });
    expect(result.entities[0]?.upsert).toMatchObject({ inserted: 1, updated: 0, unchanged: 0 });

    expect(pool.rowsOf("igdb_games")).toEqual([
      {
        id: 5001,
        name: "Test Game",
        themes: [1, 2],
        game_type: 0,
        rating: null,
        checksum: null,
        updated_at: "2020-01-01T00:00:00.000Z",
      },
    ]);
    expect(pool.statements[0]).toBe("BEGIN");
    expect(pool.statements[2]).toBe("COMMIT");
    expect(pool.released).toBe(1);
  });

  it("leaves the store unchanged when the same dumps are imported again", async () => {
    const dir = await dumpDir({ "games.csv": GAMES_CSV, "covers.csv": COVERS_CSV });
    const pool = createFakePool();
    const options = { catalog: makeCatalog(), dumpDir: dir, pool: pool as never, writer: new UpsertWriter() };

    await runImport(options);
    const before = structuredClone([pool.rowsOf("igdb_games"), pool.rowsOf("igdb_covers")]);
    const again = await runImport(options);

    expect(again.entities.map((entry) => entry.upsert?.inserted)).toEqual([0, 0]);
    expect([pool.rowsOf("igdb_games"), pool.rowsOf("igdb_covers")]).toEqual(before);
    expect(pool.rowsOf("igdb_covers")).toEqual([
      { id: 10, url: "//img/10.jpg", alpha_channel: false, animated: true, game: 5001 },
    ]);
  });

  it("keeps earlier entities committed when a later entity fails", async () => {
    const dir = await dumpDir({ "games.csv": GAMES_CSV, "covers.csv": COVERS_CSV });
    const pool = createFakePool();
    pool.failTables.add("igdb_covers");

    const run = runImport({ catalog: makeCatalog(), dumpDir: dir, pool: pool as never, writer: new UpsertWriter() });

    await expect(run).rejects.toBeInstanceOf(StoreFailureError);
    await expect(run).rejects.toMatchObject({ entity: "covers" });
    expect(pool.rowsOf("igdb_games")).toHaveLength(1);
    expect(pool.rowsOf("igdb_covers")).toEqual([]);
    expect(pool.statements.at(-1)).toBe("ROLLBACK");
    expect(pool.released).toBe(2);
  });

  it("treats a stray quote and an out-of-range year as record-level problems", async () => {
    const games = [
      "id,name,themes,game_type,rating,checksum,updated_at",
      '6001,The "Quoted" Game,{},0,,,2021-01-01T00:00:00Z',
      "6002,Year Zero,{},0,,,0000-01-01T00:00:00Z",
    ].join("\n");
    const dir = await dumpDir({ "games.csv": games, "covers.csv": COVERS_CSV });
    const pool = createFakePool();

    const result = await runImport({ catalog: makeCatalog(), dumpDir: dir, pool: pool as never, writer: new UpsertWriter() });

    expect(result.entities.map((entry) => [entry.entity, entry.counts])).toEqual([
      ["games", { valid: 1, invalid: 1, skipped: 0 }],
      ["covers", { valid: 1, invalid: 0, skipped: 0 }],
    ]);
    expect(pool.rowsOf("igdb_games").map((row) => [row.id, row.name])).toEqual([[6001, 'The "Quoted" Game']]);
    expect(pool.rowsOf("igdb_covers")).toHaveLength(1);
  });

  it("only validates on a dry run", async () => {
    const dir = await dumpDir({ "games.csv": GAMES_CSV, "covers.csv": COVERS_CSV });

    const result = await runImport({ catalog: makeCatalog(), dumpDir: dir, dryRun: true });

    expect(result.entities.map((entry) => [entry.entity, entry.counts, entry.upsert])).toEqual([
      ["games", { valid: 1, invalid: 2, skipped: 1 }, null],
      ["covers", { valid: 1, invalid: 0, skipped: 0 }, null],
    ]);
  });

  it("imports only the requested entities", async () => {
    const dir = await dumpDir({ "games.csv": GAMES_CSV, "covers.csv": COVERS_CSV });
    const pool = createFakePool();

    const result = await runImport({
      catalog: makeCatalog(),
      dumpDir: dir,
      entities: ["covers"],
      pool: pool as never,
      writer: new UpsertWriter(),
    });

    expect(result.entities.map((entry) => entry.entity)).toEqual(["covers"]);
    expect(pool.tables.has("igdb_games")).toBe(false);
  });

  it("needs a pool and writer unless dry-running", async () => {
    await expect(runImport({ catalog: makeCatalog(), dumpDir: "unused" })).rejects.toThrow(
      "runImport needs a pool and a writer unless dryRun is set",
    );
  });
});

describe("selectEntities", () => {
  it("defaults to catalog order and rejects unknown names", () => {
    const catalog = makeCatalog();
    expect(selectEntities(catalog)).toEqual(["games", "covers"]);
    expect(selectEntities(catalog, ["covers", "games"])).toEqual(["covers", "games"]);
    expect(() => selectEntities(catalog, ["platforms"])).toThrow(CatalogConfigError);
  });
});
