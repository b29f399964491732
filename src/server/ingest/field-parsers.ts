/**
 * field-parsers.ts — Raw dump text → typed values
 *
 * Every parser is pure and returns a ParseResult instead of throwing.
 * The sentinel inputs (missing column, "", "None", "null") mean "absent"
 * for every type except boolean, where they read as false.
 */

import { assertNever, type SemanticType } from "./semantic-types.js";

export type ParsedValue = number | string | boolean | Date | number[] | null;

export type ParseResult =
  | { ok: true; value: ParsedValue }
  | { ok: false; type: SemanticType; raw: string };

type RawValue = string | undefined;

const SENTINELS: ReadonlySet<string> = new Set(["", "None", "null"]);

export function isSentinel(raw: RawValue): raw is undefined | "" | "None" | "null" {
  return raw === undefined || SENTINELS.has(raw);
}

const ABSENT: ParseResult = { ok: true, value: null };

function ok(value: ParsedValue): ParseResult {
  return { ok: true, value };
}

function fail(type: SemanticType, raw: string): ParseResult {
  return { ok: false, type, raw };
}

// ─── Integer ────────────────────────────────────────────────────

const INTEGER_PATTERN = /^[+-]?\d+$/;

export function parseInteger(raw: RawValue): ParseResult {
  if (isSentinel(raw)) return ABSENT;
  const text = raw.trim();
  if (!INTEGER_PATTERN.test(text)) return fail("integer", raw);
  const value = Number(text);
  return Number.isSafeInteger(value) ? ok(value) : fail("integer", raw);
}

// ─── Text ───────────────────────────────────────────────────────

export function parseText(raw: RawValue): ParseResult {
  if (isSentinel(raw)) return ABSENT;
  return ok(raw);
}

// ─── Timestamp ──────────────────────────────────────────────────

const MONTH_ABBREVIATIONS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/** UTC instant for calendar parts, or null if any part is out of range. */
export function utcInstant(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): Date | null {
  // timestamptz has no year 0
  if (year < 1) return null;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;
  const date = new Date(0);
  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);
  return date;
}

interface TimestampFormat {
  pattern: RegExp;
  build(match: RegExpExecArray): Date | null;
}

/** Tried in order; the first format that yields a valid instant wins. */
const TIMESTAMP_FORMATS: TimestampFormat[] = [
  {
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
    build: (m) => utcInstant(Number(m[1]), Number(m[2]), Number(m[3])),
  },
  {
    pattern: /^([A-Za-z]{3}) (\d{1,2}), (\d{4})$/,
    build: (m) => {
      const month = MONTH_ABBREVIATIONS.indexOf(m[1].toLowerCase());
      return month < 0 ? null : utcInstant(Number(m[3]), month + 1, Number(m[2]));
    },
  },
  {
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})Z$/,
    build: (m) =>
      utcInstant(Number(m[1]), Number(m[2]), Number(m[3]), Number(m[4]), Number(m[5]), Number(m[6])),
  },
];

/** Malformed timestamps are rejected, never silently treated as absent. */
export function parseTimestamp(raw: RawValue): ParseResult {
  if (isSentinel(raw)) return ABSENT;
  const text = raw.trim();
  for (const format of TIMESTAMP_FORMATS) {
    const match = format.pattern.exec(text);
    if (!match) continue;
    const instant = format.build(match);
    if (instant) return ok(instant);
  }
  return fail("timestamp", raw);
}

// ─── Integer Array ──────────────────────────────────────────────

const INTEGER_ARRAY_PATTERN = /^\{\s*(?:[+-]?\d+(?:\s*,\s*[+-]?\d+)*)?\s*\}$/;

export function parseIntegerArray(raw: RawValue): ParseResult {
  if (isSentinel(raw)) return ABSENT;
  const text = raw.trim();
  if (!INTEGER_ARRAY_PATTERN.test(text)) return fail("integer_array", raw);

  const body = text.slice(1, -1).trim();
  if (body === "") return ok([]);

  const values = body.split(",").map((part) => Number(part.trim()));
  return values.every(Number.isSafeInteger) ? ok(values) : fail("integer_array", raw);
}

// ─── Float ──────────────────────────────────────────────────────

const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function parseFloatValue(raw: RawValue): ParseResult {
  if (isSentinel(raw)) return ABSENT;
  const text = raw.trim();
  if (!FLOAT_PATTERN.test(text)) return fail("float", raw);
  const value = Number(text);
  return Number.isFinite(value) ? ok(value) : fail("float", raw);
}

// ─── UUID ───────────────────────────────────────────────────────

const HEX32_PATTERN = /^[0-9a-f]{32}$/;

/** Accepts hyphenated, bare-hex, braced and urn:uuid: forms. */
export function parseUuid(raw: RawValue): ParseResult {
  if (isSentinel(raw)) return ABSENT;
  let text = raw.trim().toLowerCase();
  if (text.startsWith("urn:uuid:")) text = text.slice("urn:uuid:".length);
  if (text.startsWith("{") && text.endsWith("}")) text = text.slice(1, -1);
  const hex = text.replace(/-/g, "");
  if (!HEX32_PATTERN.test(hex)) return fail("uuid", raw);
  return ok(
    `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`,
  );
}

// ─── Boolean ────────────────────────────────────────────────────

const TRUE_VALUES: ReadonlySet<string> = new Set([
  "t", "true", "yes", "y", "1", "x", "on", "enabled", "active", "✓", "✔",
]);
const FALSE_VALUES: ReadonlySet<string> = new Set([
  "f", "false", "no", "n", "0", "", "off", "disabled", "inactive", "none", "null",
]);

/** Never absent: a missing or empty value reads as false. */
export function parseBoolean(raw: RawValue): ParseResult {
  if (raw === undefined) return ok(false);
  const key = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(key)) return ok(true);
  if (FALSE_VALUES.has(key)) return ok(false);
  return fail("boolean", raw);
}

// ─── Dispatch ───────────────────────────────────────────────────

export function parseField(type: SemanticType, raw: RawValue): ParseResult {
  switch (type) {
    case "integer":
      return parseInteger(raw);
    case "text":
      return parseText(raw);
    case "timestamp":
      return parseTimestamp(raw);
    case "integer_array":
      return parseIntegerArray(raw);
    case "float":
      return parseFloatValue(raw);
    case "uuid":
      return parseUuid(raw);
    case "boolean":
      return parseBoolean(raw);
    default:
      return assertNever(type);
  }
}
