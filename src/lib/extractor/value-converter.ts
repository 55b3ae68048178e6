/**
 * Text to typed value conversion with per-value STRING fallback
 */

import type { SemanticType, TypedValue } from "../../types/data-model.js";
import { NULL_VALUE } from "../../types/data-model.js";
import {
  DATE_PATTERNS,
  DOUBLE_PATTERN,
  FALSE_WORDS,
  INT32_MAX,
  INT32_MIN,
  INT64_MAX,
  INT64_MIN,
  TIME_PATTERN,
  TIMESTAMP_PATTERN,
  TRUE_WORDS,
  parseIntegerLiteral,
} from "../detector/scalar-detectors.js";

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) {
    return 29;
  }
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

function formatDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

function formatTime(hour: number, minute: number, second: number, fraction: string): string | null {
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  return `${pad(hour)}:${pad(minute)}:${pad(second)}${fraction}`;
}

/**
 * Normalize any accepted date shape to YYYY-MM-DD, or null
 */
export function normalizeDate(text: string): string | null {
  for (const [index, pattern] of DATE_PATTERNS.entries()) {
    const match = pattern.exec(text);
    if (!match) continue;
    const [a, b, c] = [match[1], match[2], match[3]].map(Number);
    if (a === undefined || b === undefined || c === undefined) return null;
    // Patterns 0 and 2 lead with the year, 1 and 3 end with it
    return index % 2 === 0 ? formatDate(a, b, c) : formatDate(c, a, b);
  }
  const timestamp = TIMESTAMP_PATTERN.exec(text);
  if (timestamp) {
    return formatDate(Number(timestamp[1]), Number(timestamp[2]), Number(timestamp[3]));
  }
  return null;
}

/**
 * Normalize HH:MM[:SS[.fff]] to HH:MM:SS[.fff], or null
 */
export function normalizeTime(text: string): string | null {
  const match = TIME_PATTERN.exec(text);
  if (!match) return null;
  return formatTime(Number(match[1]), Number(match[2]), Number(match[3] ?? 0), match[4] ?? "");
}

/**
 * Normalize a timestamp (or a bare date) to "YYYY-MM-DD HH:MM:SS[.fff]", or null
 */
export function normalizeTimestamp(text: string): string | null {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) {
    const date = normalizeDate(text);
    return date ? `${date} 00:00:00` : null;
  }
  const date = formatDate(Number(match[1]), Number(match[2]), Number(match[3]));
  const time = formatTime(Number(match[4]), Number(match[5]), Number(match[6]), match[7] ?? "");
  return date && time ? `${date} ${time}` : null;
}

function convertScalar(text: string, type: SemanticType): TypedValue | null {
  switch (type.type) {
    case "BOOLEAN": {
      const lower = text.toLowerCase();
      if (TRUE_WORDS.has(lower)) return { type: "BOOLEAN", value: true };
      if (FALSE_WORDS.has(lower)) return { type: "BOOLEAN", value: false };
      return null;
    }
    case "INTEGER": {
      const parsed = parseIntegerLiteral(text);
      return parsed !== null && parsed >= INT32_MIN && parsed <= INT32_MAX
        ? { type: "INTEGER", value: Number(parsed) }
        : null;
    }
    case "BIGINT": {
      const parsed = parseIntegerLiteral(text);
      return parsed !== null && parsed >= INT64_MIN && parsed <= INT64_MAX
        ? { type: "BIGINT", value: parsed }
        : null;
    }
    case "DOUBLE": {
      const parsed = Number(text);
      return DOUBLE_PATTERN.test(text) && Number.isFinite(parsed)
        ? { type: "DOUBLE", value: parsed }
        : null;
    }
    case "DATE": {
      const value = normalizeDate(text);
      return value ? { type: "DATE", value } : null;
    }
    case "TIME": {
      const value = normalizeTime(text);
      return value ? { type: "TIME", value } : null;
    }
    case "TIMESTAMP": {
      const value = normalizeTimestamp(text);
      return value ? { type: "TIMESTAMP", value } : null;
    }
    case "STRING":
      return { type: "STRING", value: text };
    case "XML":
      return { type: "XML", value: text };
    case "XML_FRAGMENT":
      return { type: "XML_FRAGMENT", value: text };
    default:
      return null;
  }
}

/**
 * Convert text to a value of `type`. Empty text is NULL; text that does
 * not fit the type comes back as STRING.
 */
export function convertToValue(text: string, type: SemanticType): TypedValue {
  const trimmed = text.trim();
  if (trimmed === "") {
    return NULL_VALUE;
  }
  return convertScalar(trimmed, type) ?? { type: "STRING", value: trimmed };
}
