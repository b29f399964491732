/**
 * row-validator.ts — Per-record parse + filter pass
 *
 * Each record walks: Start → Skipped (no usable id)
 *                          → Identified → FieldLoop → Accepted
 *                                                   → Rejected(parse-error)
 *                                                   → Rejected(filter-match)
 *
 * Fields are visited in schema order and the first failure ends the record.
 * Skipped records are counted apart from invalid ones.
 */

import { log, type Logger } from "../logger.js";
import { isSentinel, parseField, type ParsedValue } from "./field-parsers.js";
import type { FilterEngine } from "./filter-engine.js";
import type { SemanticType } from "./semantic-types.js";
import type { TypeRegistry } from "./type-registry.js";

// ─── Types ──────────────────────────────────────────────────────

/** One line of a dump; `undefined` marks a column the line did not carry. */
export type RawRecord = Record<string, string | undefined>;

/** Every schema field, in schema order, mapped to its typed value. */
export type ParsedRecord = Record<string, ParsedValue>;

export type Rejection =
  | {
      kind: "parse-error";
      entity: string;
      id: string;
      field: string;
      type: SemanticType;
      raw: string;
    }
  | {
      kind: "filter-match";
      entity: string;
      id: string;
      field: string;
      matched: number[];
    };

export type RecordOutcome =
  | { status: "skipped" }
  | { status: "accepted"; record: ParsedRecord }
  | { status: "rejected"; rejection: Rejection };

export interface ValidationCounts {
  valid: number;
  invalid: number;
  skipped: number;
}

export interface ValidationOutcome {
  entity: string;
  valid: ParsedRecord[];
  invalid: Rejection[];
  counts: ValidationCounts;
}

export interface RowValidatorOptions {
  registry: TypeRegistry;
  filters: FilterEngine;
  logger?: Logger;
}

// ─── Validator ──────────────────────────────────────────────────

export class RowValidator {
  private readonly registry: TypeRegistry;
  private readonly filters: FilterEngine;
  private readonly logger: Logger;
  /** `entity.field` pairs already reported as having no parser */
  private readonly reportedUnknown = new Set<string>();

  constructor(options: RowValidatorOptions) {
    this.registry = options.registry;
    this.filters = options.filters;
    this.logger = options.logger ?? log.validate;
  }

  validateRecord(entity: string, raw: RawRecord): RecordOutcome {
    const id = raw.id;
    if (isSentinel(id) || id.trim() === "") {
      return { status: "skipped" };
    }

    const record: ParsedRecord = {};
    for (const field of this.registry.fieldsOf(entity)) {
      const value = raw[field];
      const lookup = this.registry.typeOf(entity, field);

      if (!lookup.known) {
        this.reportUnknown(entity, field, lookup.tag);
        record[field] = isSentinel(value) ? null : value;
        continue;
      }

      const result = parseField(lookup.type, value);
      if (!result.ok) {
        return {
          status: "rejected",
          rejection: { kind: "parse-error", entity, id, field, type: result.type, raw: result.raw },
        };
      }

      if (this.filters.hasRule(entity, field)) {
        const matched = this.filters.matches(entity, field, result.value);
        if (matched.length > 0) {
          return {
            status: "rejected",
            rejection: { kind: "filter-match", entity, id, field, matched },
          };
        }
      }

      record[field] = result.value;
    }

    return { status: "accepted", record };
  }

  validateEntity(entity: string, rows: Iterable<RawRecord>): ValidationOutcome {
    const outcome: ValidationOutcome = {
      entity,
      valid: [],
      invalid: [],
      counts: { valid: 0, invalid: 0, skipped: 0 },
    };

    let line = 0;
    for (const raw of rows) {
      line++;
      const result = this.validateRecord(entity, raw);

      switch (result.status) {
        case "skipped":
          outcome.counts.skipped++;
          this.logger.debug({ entity, line }, "record without id skipped");
          break;
        case "accepted":
          outcome.counts.valid++;
          outcome.valid.push(result.record);
          break;
        case "rejected":
          outcome.counts.invalid++;
          outcome.invalid.push(result.rejection);
          this.logRejection(result.rejection);
          break;
      }
    }

    this.logger.info({ entity, ...outcome.counts }, "entity validated");
    return outcome;
  }

  private logRejection(rejection: Rejection): void {
    const { entity, id, field } = rejection;
    if (rejection.kind === "parse-error") {
      this.logger.info({ entity, id, field, type: rejection.type, raw: rejection.raw }, "field parse failed");
    } else {
      this.logger.info({ entity, id, field, matched: rejection.matched }, "record excluded by filter");
    }
  }

  private reportUnknown(entity: string, field: string, tag: string | null): void {
    const key = `${entity}.${field}`;
    if (this.reportedUnknown.has(key)) return;
    this.reportedUnknown.add(key);
    this.logger.warn({ entity, field, tag }, "no parser for field type, value kept unparsed");
  }
}
