/**
 * TypedValue to JSON-safe value conversion
 */

import type { Row, TypedValue } from "../../types/data-model.js";
import type { PlainRow, PlainValue } from "./types.js";

/**
 * Map a typed value to a JSON-safe value. BIGINT values outside the safe
 * integer range become decimal strings.
 */
export function toPlainValue(value: TypedValue): PlainValue {
  switch (value.type) {
    case "NULL":
      return null;
    case "BIGINT": {
      const asNumber = Number(value.value);
      return Number.isSafeInteger(asNumber) ? asNumber : value.value.toString();
    }
    case "LIST":
      return value.items.map(toPlainValue);
    case "RECORD": {
      const result: { [key: string]: PlainValue } = {};
      for (const field of value.fields) {
        result[field.name] = toPlainValue(field.value);
      }
      return result;
    }
    default:
      return value.value;
  }
}

/**
 * Key a row's values by column name
 */
export function rowToObject(columnNames: readonly string[], row: Row): PlainRow {
  const result: PlainRow = {};
  columnNames.forEach((name, index) => {
    const value = row[index];
    result[name] = value === undefined ? null : toPlainValue(value);
  });
  return result;
}
