import { describe, it, expect } from 'vitest';
import { rowToObject, toPlainValue } from '../../../src/lib/emitter/plain-value.js';

describe('toPlainValue', () => {
  it('should map scalars to their values', () => {
    expect(toPlainValue({ type: 'NULL' })).toBeNull();
    expect(toPlainValue({ type: 'BOOLEAN', value: false })).toBe(false);
    expect(toPlainValue({ type: 'DOUBLE', value: 2.5 })).toBe(2.5);
    expect(toPlainValue({ type: 'TIMESTAMP', value: '2024-03-14 10:20:30' })).toBe('2024-03-14 10:20:30');
    expect(toPlainValue({ type: 'XML', value: '<a/>' })).toBe('<a/>');
  });

  it('should keep safe BIGINT values numeric', () => {
    expect(toPlainValue({ type: 'BIGINT', value: 3000000000n })).toBe(3000000000);
    expect(toPlainValue({ type: 'BIGINT', value: -9223372036854775808n })).toBe('-9223372036854775808');
  });

  it('should map lists and records recursively', () => {
    expect(
      toPlainValue({
        type: 'LIST',
        element: { type: 'RECORD', fields: [{ name: 'n', type: { type: 'INTEGER' } }] },
        items: [
          { type: 'RECORD', fields: [{ name: 'n', value: { type: 'INTEGER', value: 1 } }] },
          { type: 'RECORD', fields: [{ name: 'n', value: { type: 'NULL' } }] },
        ],
      }),
    ).toEqual([{ n: 1 }, { n: null }]);
  });
});

describe('rowToObject', () => {
  it('should key values by column name and fill short rows with null', () => {
    expect(rowToObject(['a', 'b'], [{ type: 'STRING', value: 'x' }])).toEqual({ a: 'x', b: null });
  });
});
