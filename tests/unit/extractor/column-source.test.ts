import { describe, it, expect } from 'vitest';
import { parseColumnSelector } from '../../../src/lib/extractor/column-source.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('parseColumnSelector', () => {
  it('should parse the special selectors', () => {
    expect(parseColumnSelector('.')).toEqual({ kind: 'self' });
    expect(parseColumnSelector('#document')).toEqual({ kind: 'document' });
  });

  it('should parse element and attribute selectors', () => {
    expect(parseColumnSelector('title')).toEqual({ kind: 'element', element: 'title' });
    expect(parseColumnSelector('@id')).toEqual({ kind: 'attribute', element: null, attribute: 'id' });
    expect(parseColumnSelector('title/@lang')).toEqual({
      kind: 'attribute',
      element: 'title',
      attribute: 'lang',
    });
  });

  it('should parse attribute map selectors', () => {
    expect(parseColumnSelector('@*')).toEqual({ kind: 'attributes', element: null });
    expect(parseColumnSelector('title/@*')).toEqual({ kind: 'attributes', element: 'title' });
  });

  it('should split namespaced names on the last attribute step', () => {
    expect(parseColumnSelector('{http://example.com/ns}item/@id')).toEqual({
      kind: 'attribute',
      element: '{http://example.com/ns}item',
      attribute: 'id',
    });
  });

  it('should reject malformed selectors', () => {
    expect(() => parseColumnSelector('')).toThrow(ConfigError);
    expect(() => parseColumnSelector('@')).toThrow(ConfigError);
    expect(() => parseColumnSelector('/@id')).toThrow(ConfigError);
  });
});
