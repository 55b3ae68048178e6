/**
 * Attribute column generation per attribute mode
 */

import {
  recordOf,
  scalar,
  type ColumnDescriptor,
  type ShapeRecord,
} from "../../types/data-model.js";
import type { SchemaOptions } from "../../types/config.js";

/**
 * Prefix applied to attribute column names
 */
export function attributeColumnPrefix(
  options: Pick<SchemaOptions, "attributeMode" | "attributePrefix">,
): string {
  if (options.attributeMode === "prefixed-columns" && options.attributePrefix === "") {
    return "@";
  }
  return options.attributePrefix;
}

/**
 * Attribute columns for one element shape. `path` is the element's
 * selector relative to the record ("" for the record itself).
 */
export function attributeColumnsFor(
  shape: ShapeRecord,
  path: string,
  options: Pick<SchemaOptions, "attributeMode" | "attributePrefix">,
): ColumnDescriptor[] {
  if (shape.attributeCounts.size === 0 || options.attributeMode === "discard") {
    return [];
  }
  const base = path === "" ? "" : `${path}/`;

  if (options.attributeMode === "map") {
    return [
      {
        name: `${shape.name}_attributes`,
        type: recordOf(
          Array.from(shape.attributeCounts.keys()).map((name) => ({
            name,
            type: scalar("STRING"),
          })),
        ),
        isAttribute: true,
        selector: `${base}@*`,
        frequency: 1,
        repeated: false,
      },
    ];
  }

  const prefix = attributeColumnPrefix(options);
  return Array.from(shape.attributeCounts.entries()).map(([attribute, count]) => ({
    name: `${prefix}${shape.name}_${attribute}`,
    type: scalar("STRING"),
    isAttribute: true,
    selector: `${base}@${attribute}`,
    frequency: shape.occurrenceCount > 0 ? count / shape.occurrenceCount : 0,
    repeated: false,
  }));
}
