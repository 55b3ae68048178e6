/**
 * Shape statistics accumulation over record subtrees
 */

import type { ShapeKind, ShapeRecord } from "../../types/data-model.js";
import type { TreeNode } from "../tree/types.js";
import type { AnalyzerOptions } from "./types.js";
import { cleanText } from "../../utils/text.js";

export function createShapeRecord(name: string): ShapeRecord {
  return {
    name,
    occurrenceCount: 0,
    hasText: false,
    sampleValues: [],
    attributeCounts: new Map(),
    hasChildren: false,
    childElementCounts: new Map(),
    childMaxPerInstance: new Map(),
  };
}

/**
 * Accumulator for per-name shape statistics. Records sit at level 1 and
 * nodes deeper than `depthLimit` are not visited.
 */
export class ShapeAccumulator {
  private shapes = new Map<string, ShapeRecord>();

  constructor(private readonly options: AnalyzerOptions) {}

  /**
   * Add one record subtree to the accumulation
   */
  addRecord(record: TreeNode): void {
    if (this.options.depthLimit < 1) return;
    this.visit(record, 1);
  }

  private shapeFor(name: string): ShapeRecord {
    let shape = this.shapes.get(name);
    if (!shape) {
      shape = createShapeRecord(name);
      this.shapes.set(name, shape);
    }
    return shape;
  }

  private visit(node: TreeNode, level: number): void {
    const shape = this.shapeFor(node.name);
    shape.occurrenceCount++;

    const text = cleanText(node.text);
    if (text !== "") {
      shape.hasText = true;
      if (shape.sampleValues.length < this.options.maxSamples) {
        shape.sampleValues.push(text);
      }
    }

    for (const attribute of node.attributes) {
      shape.attributeCounts.set(
        attribute.name,
        (shape.attributeCounts.get(attribute.name) ?? 0) + 1,
      );
    }

    if (node.children.length === 0) return;
    shape.hasChildren = true;

    if (level + 1 > this.options.depthLimit) return;

    const perInstance = new Map<string, number>();
    for (const child of node.children) {
      perInstance.set(child.name, (perInstance.get(child.name) ?? 0) + 1);
    }

    for (const [childName, count] of perInstance) {
      shape.childElementCounts.set(
        childName,
        (shape.childElementCounts.get(childName) ?? 0) + count,
      );
      shape.childMaxPerInstance.set(
        childName,
        Math.max(shape.childMaxPerInstance.get(childName) ?? 0, count),
      );
    }

    for (const child of node.children) {
      this.visit(child, level + 1);
    }
  }

  getShapes(): Map<string, ShapeRecord> {
    return this.shapes;
  }
}

/**
 * Exactly one child name that repeats within an instance, or every child
 * name at most once per instance
 */
export function isHomogeneous(shape: ShapeRecord): boolean {
  const maxima = Array.from(shape.childMaxPerInstance.values());
  if (maxima.length === 1) {
    return true;
  }
  return maxima.every((max) => max <= 1);
}

/**
 * Container classification. A single child name seen at most once per
 * instance, or children beyond the depth limit, classify as mixed.
 */
export function shapeKind(shape: ShapeRecord): ShapeKind {
  if (!shape.hasChildren) {
    return "leaf";
  }
  if (!isHomogeneous(shape)) {
    return "mixed";
  }
  const maxima = Array.from(shape.childMaxPerInstance.values());
  if (maxima.length === 1 && (maxima[0] ?? 0) > 1) {
    return "array";
  }
  return maxima.length > 1 ? "record" : "mixed";
}
