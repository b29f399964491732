import { describe, expect, it } from "vitest";
import { FilterEngine, intersect, toIntegerSet } from "../src/server/ingest/filter-engine.js";
import { makeCatalog } from "./helpers/catalog.js";

describe("toIntegerSet", () => {
  it("normalizes scalars, arrays and absent values", () => {
    expect([...toIntegerSet(5)]).toEqual([5]);
    expect([...toIntegerSet([1, 2, 2])]).toEqual([1, 2]);
    expect(toIntegerSet(null).size).toBe(0);
    expect(toIntegerSet("42").size).toBe(0);
    expect(toIntegerSet(4.5).size).toBe(0);
  });

  it("intersects in ascending order", () => {
    expect(intersect(new Set([9, 3, 1]), new Set([1, 9]))).toEqual([1, 9]);
    expect(intersect(new Set([1]), new Set())).toEqual([]);
  });
});

describe("FilterEngine", () => {
  const filters = new FilterEngine(makeCatalog());

  it("knows which fields carry a rule", () => {
    expect(filters.hasRule("games", "themes")).toBe(true);
    expect(filters.hasRule("games", "name")).toBe(false);
    expect(filters.hasRule("covers", "game")).toBe(false);
  });

  it("matches array values that contain an excluded member", () => {
    expect(filters.matches("games", "themes", [42, 18])).toEqual([42]);
    expect(filters.isFiltered("games", "themes", [1, 2])).toBe(false);
    expect(filters.isFiltered("games", "themes", [])).toBe(false);
  });

  it("matches scalar values as one-element sets", () => {
    expect(filters.isFiltered("games", "game_type", 5)).toBe(true);
    expect(filters.isFiltered("games", "game_type", 0)).toBe(false);
    expect(filters.isFiltered("games", "game_type", null)).toBe(false);
  });

  it("never matches fields or entities without rules", () => {
    expect(filters.isFiltered("covers", "game", 42)).toBe(false);
    expect(filters.isFiltered("platforms", "themes", [42])).toBe(false);
  });
});
