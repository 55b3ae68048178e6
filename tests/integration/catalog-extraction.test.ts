/**
 * End-to-end inference and extraction over a catalog with attributes,
 * optional fields and nested lists
 */

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { XmlTab } from '../../src/lib/pipeline/index.js';
import { formatSemanticType } from '../../src/lib/inferencer/index.js';
import { rowToObject } from '../../src/lib/emitter/plain-value.js';
import { listOf, scalar } from '../../src/types/data-model.js';

const CATALOG = readFileSync(
  fileURLToPath(new URL('../fixtures/documents/catalog.xml', import.meta.url)),
  'utf-8',
);

describe('Catalog extraction', () => {
  it('should infer typed columns with attribute columns first', () => {
    const { columns, metadata } = new XmlTab().infer(CATALOG);

    expect(columns.map((column) => `${column.name}: ${formatSemanticType(column.type)}`)).toEqual([
      'book_id: STRING',
      'book_format: STRING',
      'title: STRING',
      'price: DOUBLE',
      'published: DATE',
      'inStock: BOOLEAN',
      'tags: LIST<STRING>',
    ]);
    expect(metadata).toEqual({
      recordsAnalyzed: 3,
      shapesFound: 7,
      columnsInferred: 7,
      prunedFields: [],
      usedFallback: false,
    });
  });

  it('should produce one row per record with one value per column', () => {
    const { columnNames, rows } = new XmlTab().extract(CATALOG);

    expect(rows).toHaveLength(3);
    for (const row of rows) {
      expect(row).toHaveLength(columnNames.length);
    }
    expect(rows.map((row) => rowToObject(columnNames, row))).toEqual([
      {
        book_id: 'b1',
        book_format: 'hardcover',
        title: 'Placeholder One',
        price: 12.5,
        published: '2021-06-01',
        inStock: true,
        tags: ['fiction', 'classic'],
      },
      {
        book_id: 'b2',
        book_format: null,
        title: 'Placeholder Two',
        price: 8,
        published: '2019-11-20',
        inStock: false,
        tags: ['essay', 'notes'],
      },
      {
        book_id: 'b3',
        book_format: null,
        title: 'Placeholder Three',
        price: 15.75,
        published: null,
        inStock: true,
        tags: [],
      },
    ]);
  });

  it('should extract declared columns without inference', () => {
    const { columnNames, rows } = new XmlTab().extract(CATALOG, [
      { name: 'id', type: scalar('STRING') },
      { name: 'price', type: scalar('INTEGER') },
      { name: 'tags', type: listOf(scalar('STRING')) },
    ]);

    expect(rows.map((row) => rowToObject(columnNames, row))).toEqual([
      { id: 'b1', price: '12.50', tags: ['fiction', 'classic'] },
      { id: 'b2', price: '8.00', tags: ['essay', 'notes'] },
      { id: 'b3', price: '15.75', tags: [] },
    ]);
  });

  it('should produce NULL, the declared type or STRING for every value', () => {
    const prices = ['1.5', '2.25', '3.5', '4.75', 'n/a', '6.5', '7.5', '8.5', '9.5', ''];
    const xml = `<prices>${prices.map((price) => `<row><price>${price}</price></row>`).join('')}</prices>`;
    const { columnNames, rows } = new XmlTab().extract(xml);

    expect(columnNames).toEqual(['price']);
    expect(rows.map(([value]) => value?.type)).toEqual([
      'DOUBLE',
      'DOUBLE',
      'DOUBLE',
      'DOUBLE',
      'STRING',
      'DOUBLE',
      'DOUBLE',
      'DOUBLE',
      'DOUBLE',
      'NULL',
    ]);
  });

  it('should produce the same schema on every run', () => {
    const xmltab = new XmlTab({ attributeMode: 'map' });
    expect(xmltab.infer(CATALOG).columns).toEqual(xmltab.infer(CATALOG).columns);
  });
});
