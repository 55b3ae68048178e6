/**
 * Detector module - scalar type inference from sampled text
 */

import { scalar, type ScalarType, type ScalarTypeName } from "../../types/data-model.js";
import { DEFAULT_SCHEMA_OPTIONS } from "../../types/config.js";
import type { DetectionOptions, TypeVote } from "./types.js";
import { BUILTIN_DETECTORS, classifySample } from "./scalar-detectors.js";

export * from "./types.js";
export * from "./scalar-detectors.js";

const DEFAULT_OPTIONS: DetectionOptions = {
  booleanDetection: DEFAULT_SCHEMA_OPTIONS.booleanDetection,
  numericDetection: DEFAULT_SCHEMA_OPTIONS.numericDetection,
  temporalDetection: DEFAULT_SCHEMA_OPTIONS.temporalDetection,
  majorityThreshold: DEFAULT_SCHEMA_OPTIONS.majorityThreshold,
};

/**
 * Tally per-sample classifications. Empty samples are skipped and do not
 * count towards the shares.
 */
export function tallyTypes(
  samples: readonly string[],
  options: Partial<DetectionOptions> = {},
): { votes: TypeVote[]; total: number } {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const counts = new Map<ScalarTypeName, number>();
  let total = 0;

  for (const sample of samples) {
    const value = sample.trim();
    if (value === "") {
      continue;
    }
    const type = classifySample(value, opts, BUILTIN_DETECTORS);
    counts.set(type, (counts.get(type) ?? 0) + 1);
    total++;
  }

  const votes = Array.from(counts.entries()).map(([type, count]) => ({
    type,
    count,
    share: count / total,
  }));
  return { votes, total };
}

/**
 * Infer the semantic type of a column from its sampled values.
 *
 * A type wins when it holds at least `majorityThreshold` of the non-empty
 * samples; anything else is STRING. INTEGER and BIGINT vote together.
 * "0" and "1" vote BOOLEAN.
 *
 * @example
 * inferScalarType(["true", "false"]) // { type: "BOOLEAN" }
 * inferScalarType(["1", "2", "x"]) // { type: "STRING" }
 * inferScalarType(["0", "1", "5"]) // { type: "STRING" }
 */
export function inferScalarType(
  samples: readonly string[],
  options: Partial<DetectionOptions> = {},
): ScalarType {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const { votes, total } = tallyTypes(samples, opts);

  if (total === 0) {
    return scalar("STRING");
  }

  const countOf = (type: ScalarTypeName): number =>
    votes.find((vote) => vote.type === type)?.count ?? 0;

  const integers = countOf("INTEGER");
  const bigints = countOf("BIGINT");
  if (integers + bigints > 0) {
    const familyShare = (integers + bigints) / total;
    if (familyShare >= opts.majorityThreshold) {
      return scalar(bigints > 0 ? "BIGINT" : "INTEGER");
    }
  }

  for (const vote of votes) {
    if (vote.share >= opts.majorityThreshold) {
      return scalar(vote.type);
    }
  }

  return scalar("STRING");
}
