/**
 * Recursive LIST / RECORD inference for container elements
 */

import {
  listOf,
  recordOf,
  scalar,
  type RecordField,
  type SemanticType,
  type ShapeRecord,
} from "../../types/data-model.js";
import { inferScalarType } from "../detector/index.js";
import { shapeKind } from "../analyzer/index.js";
import type { NestedTypeOptions } from "./types.js";

/**
 * Returned when no structured type fits; callers fall back to the opaque
 * XML types.
 */
export const NESTED_TYPE_FAILURE: SemanticType = Object.freeze(scalar("STRING"));

export function isNestedTypeFailure(type: SemanticType): boolean {
  return type.type === "STRING";
}

/**
 * Type of one child: detected scalar for leaves, recursive for containers.
 * Null when a container's structure cannot be typed, including children
 * beyond the depth limit.
 */
function childType(
  childName: string,
  allShapes: ReadonlyMap<string, ShapeRecord>,
  options: NestedTypeOptions,
  visiting: Set<string>,
): SemanticType | null {
  const child = allShapes.get(childName);
  if (!child) {
    return null;
  }
  if (!child.hasChildren) {
    return child.hasText ? inferScalarType(child.sampleValues, options) : scalar("STRING");
  }
  return structuredType(child, allShapes, options, visiting);
}

function structuredType(
  shape: ShapeRecord,
  allShapes: ReadonlyMap<string, ShapeRecord>,
  options: NestedTypeOptions,
  visiting: Set<string>,
): SemanticType | null {
  if (visiting.has(shape.name)) {
    return null;
  }
  const childNames = Array.from(shape.childMaxPerInstance.keys());

  visiting.add(shape.name);
  try {
    switch (shapeKind(shape)) {
      case "array":
        return arrayType(childNames, allShapes, options, visiting);
      case "record":
        return recordType(shape, childNames, allShapes, options, visiting);
      case "mixed": {
        // forceList promotes a lone child seen once per instance
        const [childName, ...others] = childNames;
        const forced =
          childName !== undefined && others.length === 0 && options.forceList.includes(childName);
        return forced ? arrayType(childNames, allShapes, options, visiting) : null;
      }
      default:
        return null;
    }
  } finally {
    visiting.delete(shape.name);
  }
}

function arrayType(
  childNames: readonly string[],
  allShapes: ReadonlyMap<string, ShapeRecord>,
  options: NestedTypeOptions,
  visiting: Set<string>,
): SemanticType | null {
  const [childName] = childNames;
  if (childName === undefined) {
    return null;
  }
  const element = childType(childName, allShapes, options, visiting);
  return element ? listOf(element) : null;
}

function recordType(
  shape: ShapeRecord,
  childNames: readonly string[],
  allShapes: ReadonlyMap<string, ShapeRecord>,
  options: NestedTypeOptions,
  visiting: Set<string>,
): SemanticType | null {
  const fields: RecordField[] = [];
  for (const childName of childNames) {
    const type = childType(childName, allShapes, options, visiting);
    if (!type) continue;
    fields.push({
      name: childName,
      type: options.forceList.includes(childName) ? listOf(type) : type,
    });
  }
  if (fields.length === 0) {
    return null;
  }
  if (shape.hasText && !fields.some((field) => field.name === options.textContentKey)) {
    fields.push({
      name: options.textContentKey,
      type: inferScalarType(shape.sampleValues, options),
    });
  }
  return recordOf(fields);
}

/**
 * Infer a LIST or RECORD type for a container element.
 *
 * One child name repeating within an instance (or named in `forceList`)
 * gives `LIST<T>`; several child names, each at most once per instance,
 * give a RECORD. Anything else fails with {@link NESTED_TYPE_FAILURE}.
 */
export function inferNestedType(
  shape: ShapeRecord,
  allShapes: ReadonlyMap<string, ShapeRecord>,
  options: NestedTypeOptions,
): SemanticType {
  return structuredType(shape, allShapes, options, new Set()) ?? NESTED_TYPE_FAILURE;
}
