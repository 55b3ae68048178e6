/**
 * JSON array writer - Transform stream that converts extracted rows to a JSON array
 */

import { Transform, TransformCallback } from "stream";
import { rowToObject } from "./plain-value.js";
import { isRow } from "./ndjson-writer.js";

/**
 * Transform stream that writes rows as a JSON array of objects.
 * Writes [ at start, comma-separated row objects, and ] at end
 */
export class JSONWriter extends Transform {
  private isFirstItem = true;

  constructor(private readonly columnNames: readonly string[]) {
    super({
      writableObjectMode: true, // Input is rows
      readableObjectMode: false, // Output is strings
    });
  }

  _construct(callback: (error?: Error | null) => void): void {
    this.push("[\n");
    callback();
  }

  _transform(chunk: unknown, _encoding: BufferEncoding, callback: TransformCallback): void {
    if (!isRow(chunk)) {
      callback(new TypeError("JSONWriter expects rows of typed values"));
      return;
    }
    const json = JSON.stringify(rowToObject(this.columnNames, chunk));
    this.push(this.isFirstItem ? `  ${json}` : `,\n  ${json}`);
    this.isFirstItem = false;
    callback();
  }

  _flush(callback: TransformCallback): void {
    this.push(this.isFirstItem ? "]\n" : "\n]\n");
    callback();
  }
}

/**
 * Create a JSON array writer transform stream
 */
export function createJSONWriter(columnNames: readonly string[]): Transform {
  return new JSONWriter(columnNames);
}
