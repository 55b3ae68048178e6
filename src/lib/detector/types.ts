/**
 * Detector module types
 */

import type { ScalarTypeName } from "../../types/data-model.js";
import type { SchemaOptions } from "../../types/config.js";

export type DetectorFamily = "boolean" | "numeric" | "temporal";

export interface ScalarDetector {
  type: ScalarTypeName;
  family: DetectorFamily;
  matches: (value: string) => boolean;
  priority: number; // Lower = checked first
}

export type DetectionOptions = Pick<
  SchemaOptions,
  "booleanDetection" | "numericDetection" | "temporalDetection" | "majorityThreshold"
>;

export interface TypeVote {
  type: ScalarTypeName;
  count: number;
  share: number; // 0.0 to 1.0 of non-empty samples
}
