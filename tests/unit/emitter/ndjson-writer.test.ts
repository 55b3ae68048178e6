/**
 * NDJSON Writer Tests
 */

import { describe, it, expect } from 'vitest';
import { Readable } from 'stream';
import { createNDJSONWriter, isRow } from '../../../src/lib/emitter/ndjson-writer.js';
import type { Row } from '../../../src/types/data-model.js';

async function collectChunks(rows: unknown[], columnNames: string[]): Promise<string[]> {
  const objectStream = Readable.from(rows, { objectMode: true });
  const ndjsonWriter = createNDJSONWriter(columnNames);

  const chunks: string[] = [];
  ndjsonWriter.on('data', (chunk) => {
    chunks.push(String(chunk));
  });

  await new Promise<void>((resolve, reject) => {
    ndjsonWriter.on('end', resolve);
    ndjsonWriter.on('error', reject);
    objectStream.pipe(ndjsonWriter);
  });

  return chunks;
}

describe('NDJSONWriter', () => {
  it('should write one object per row keyed by column name', async () => {
    const rows: Row[] = [
      [{ type: 'INTEGER', value: 1 }, { type: 'STRING', value: 'Alice' }],
      [{ type: 'INTEGER', value: 2 }, { type: 'STRING', value: 'Bob' }],
      [{ type: 'INTEGER', value: 3 }, { type: 'NULL' }],
    ];

    const chunks = await collectChunks(rows, ['id', 'name']);

    expect(chunks).toEqual([
      '{"id":1,"name":"Alice"}\n',
      '{"id":2,"name":"Bob"}\n',
      '{"id":3,"name":null}\n',
    ]);
  });

  it('should handle empty stream', async () => {
    expect(await collectChunks([], ['id'])).toEqual([]);
  });

  it('should write large BIGINT values as strings', async () => {
    const rows: Row[] = [[{ type: 'BIGINT', value: 9007199254740993n }]];
    expect(await collectChunks(rows, ['n'])).toEqual(['{"n":"9007199254740993"}\n']);
  });

  it('should reject chunks that are not rows', async () => {
    await expect(collectChunks(['not a row'], ['id'])).rejects.toThrow(
      'NDJSONWriter expects rows of typed values',
    );
  });
});

describe('isRow', () => {
  it('should accept arrays of typed values only', () => {
    expect(isRow([{ type: 'NULL' }])).toBe(true);
    expect(isRow([])).toBe(true);
    expect(isRow([1, 2])).toBe(false);
    expect(isRow({ type: 'NULL' })).toBe(false);
  });
});
