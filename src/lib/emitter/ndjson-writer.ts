/**
 * NDJSON Writer - Transform stream that converts extracted rows to NDJSON
 */

import { Transform, TransformCallback } from "stream";
import type { Row } from "../../types/data-model.js";
import { rowToObject } from "./plain-value.js";

export function isRow(chunk: unknown): chunk is Row {
  return (
    Array.isArray(chunk) &&
    chunk.every((value) => typeof value === "object" && value !== null && "type" in value)
  );
}

/**
 * Transform stream that writes each row as one JSON object per line,
 * keyed by column name
 */
export class NDJSONWriter extends Transform {
  constructor(private readonly columnNames: readonly string[]) {
    super({
      writableObjectMode: true, // Input is rows
      readableObjectMode: false, // Output is strings
    });
  }

  _transform(chunk: unknown, _encoding: BufferEncoding, callback: TransformCallback): void {
    if (!isRow(chunk)) {
      callback(new TypeError("NDJSONWriter expects rows of typed values"));
      return;
    }
    this.push(JSON.stringify(rowToObject(this.columnNames, chunk)) + "\n");
    callback();
  }
}

/**
 * Create NDJSON writer transform stream
 */
export function createNDJSONWriter(columnNames: readonly string[]): Transform {
  return new NDJSONWriter(columnNames);
}
