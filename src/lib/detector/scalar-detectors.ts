/**
 * Scalar type detectors, checked in priority order per sample
 */

import type { ScalarTypeName } from "../../types/data-model.js";
import type { DetectionOptions, DetectorFamily, ScalarDetector } from "./types.js";

export const TRUE_WORDS: ReadonlySet<string> = new Set(["true", "yes", "1", "on"]);
export const FALSE_WORDS: ReadonlySet<string> = new Set(["false", "no", "0", "off"]);

export const INTEGER_PATTERN = /^[+-]?\d+$/;
export const DOUBLE_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

// Shape only: month/day order is not checked here
export const DATE_PATTERNS: readonly RegExp[] = [
  /^(\d{4})-(\d{2})-(\d{2})$/, // YYYY-MM-DD
  /^(\d{2})\/(\d{2})\/(\d{4})$/, // MM/DD/YYYY
  /^(\d{4})\/(\d{2})\/(\d{2})$/, // YYYY/MM/DD
  /^(\d{2})-(\d{2})-(\d{4})$/, // MM-DD-YYYY
];

export const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(\.\d+)?Z?$/;
export const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?$/;

export const INT32_MIN = -(2n ** 31n);
export const INT32_MAX = 2n ** 31n - 1n;
export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

/**
 * Parse a full-string integer literal, or null
 */
export function parseIntegerLiteral(value: string): bigint | null {
  if (!INTEGER_PATTERN.test(value)) {
    return null;
  }
  return BigInt(value.startsWith("+") ? value.slice(1) : value);
}

function integerWithin(value: string, min: bigint, max: bigint): boolean {
  const parsed = parseIntegerLiteral(value);
  return parsed !== null && parsed >= min && parsed <= max;
}

const BOOLEAN_DETECTOR: ScalarDetector = {
  type: "BOOLEAN",
  family: "boolean",
  matches: (v) => {
    const lower = v.toLowerCase();
    return TRUE_WORDS.has(lower) || FALSE_WORDS.has(lower);
  },
  priority: 1,
};

const INTEGER_DETECTOR: ScalarDetector = {
  type: "INTEGER",
  family: "numeric",
  matches: (v) => integerWithin(v, INT32_MIN, INT32_MAX),
  priority: 2,
};

const BIGINT_DETECTOR: ScalarDetector = {
  type: "BIGINT",
  family: "numeric",
  matches: (v) => integerWithin(v, INT64_MIN, INT64_MAX),
  priority: 3,
};

const DOUBLE_DETECTOR: ScalarDetector = {
  type: "DOUBLE",
  family: "numeric",
  matches: (v) => DOUBLE_PATTERN.test(v) && Number.isFinite(Number(v)),
  priority: 4,
};

const DATE_DETECTOR: ScalarDetector = {
  type: "DATE",
  family: "temporal",
  matches: (v) => DATE_PATTERNS.some((pattern) => pattern.test(v)),
  priority: 5,
};

const TIMESTAMP_DETECTOR: ScalarDetector = {
  type: "TIMESTAMP",
  family: "temporal",
  matches: (v) => TIMESTAMP_PATTERN.test(v),
  priority: 6,
};

const TIME_DETECTOR: ScalarDetector = {
  type: "TIME",
  family: "temporal",
  matches: (v) => TIME_PATTERN.test(v),
  priority: 7,
};

/**
 * Built-in detectors
 */
export const BUILTIN_DETECTORS: readonly ScalarDetector[] = [
  BOOLEAN_DETECTOR,
  INTEGER_DETECTOR,
  BIGINT_DETECTOR,
  DOUBLE_DETECTOR,
  DATE_DETECTOR,
  TIMESTAMP_DETECTOR,
  TIME_DETECTOR,
];

function familyEnabled(
  family: DetectorFamily,
  options: Omit<DetectionOptions, "majorityThreshold">,
): boolean {
  switch (family) {
    case "boolean":
      return options.booleanDetection;
    case "numeric":
      return options.numericDetection;
    case "temporal":
      return options.temporalDetection;
  }
}

/**
 * Classify one non-empty sample; the first enabled detector that matches wins
 */
export function classifySample(
  sample: string,
  options: Omit<DetectionOptions, "majorityThreshold">,
  detectors: readonly ScalarDetector[] = BUILTIN_DETECTORS,
): ScalarTypeName {
  const sorted = [...detectors].sort((a, b) => a.priority - b.priority);
  for (const detector of sorted) {
    if (familyEnabled(detector.family, options) && detector.matches(sample)) {
      return detector.type;
    }
  }
  return "STRING";
}
