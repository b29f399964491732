import type { CatalogConfig } from "../catalog.js";
import type { ParsedValue } from "./field-parsers.js";

/**
 * Integer members of a parsed value. Scalars become a one-element set,
 * arrays their elements; absent and non-integer values contribute nothing.
 */
export function toIntegerSet(value: ParsedValue): Set<number> {
  if (Array.isArray(value)) return new Set(value.filter(Number.isInteger));
  if (typeof value === "number" && Number.isInteger(value)) return new Set([value]);
  return new Set();
}

export function intersect(a: ReadonlySet<number>, b: ReadonlySet<number>): number[] {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  return [...small].filter((member) => large.has(member)).sort((x, y) => x - y);
}

/** Per-entity exclusion rules: field → excluded integers. */
export class FilterEngine {
  constructor(private readonly catalog: CatalogConfig) {}

  hasRule(entity: string, field: string): boolean {
    return this.catalog.entities.get(entity)?.filters.has(field) ?? false;
  }

  /** Excluded values present in `value`; empty when the record may stay. */
  matches(entity: string, field: string, value: ParsedValue): number[] {
    const excluded = this.catalog.entities.get(entity)?.filters.get(field);
    if (!excluded || excluded.size === 0) return [];
    return intersect(toIntegerSet(value), excluded);
  }

  isFiltered(entity: string, field: string, value: ParsedValue): boolean {
    return this.matches(entity, field, value).length > 0;
  }
}
