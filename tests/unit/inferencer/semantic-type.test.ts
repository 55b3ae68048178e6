import { describe, it, expect } from 'vitest';
import {
  formatSemanticType,
  parseSemanticType,
} from '../../../src/lib/inferencer/semantic-type.js';
import { listOf, recordOf, scalar } from '../../../src/types/data-model.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('formatSemanticType', () => {
  it('should render nested types', () => {
    const type = listOf(
      recordOf([
        { name: 'title', type: scalar('STRING') },
        { name: 'views', type: scalar('INTEGER') },
      ]),
    );
    expect(formatSemanticType(type)).toBe('LIST<RECORD<title: STRING, views: INTEGER>>');
  });

  it('should quote field names that are not plain identifiers', () => {
    const type = recordOf([{ name: 'first name', type: scalar('STRING') }]);
    expect(formatSemanticType(type)).toBe('RECORD<"first name": STRING>');
  });
});

describe('parseSemanticType', () => {
  it('should parse the canonical form', () => {
    expect(parseSemanticType('LIST<RECORD<title: STRING, views: INTEGER>>')).toEqual(
      listOf(
        recordOf([
          { name: 'title', type: scalar('STRING') },
          { name: 'views', type: scalar('INTEGER') },
        ]),
      ),
    );
  });

  it('should accept aliases case-insensitively', () => {
    expect(parseSemanticType('varchar')).toEqual(scalar('STRING'));
    expect(parseSemanticType('Int')).toEqual(scalar('INTEGER'));
    expect(parseSemanticType('FLOAT')).toEqual(scalar('DOUBLE'));
    expect(parseSemanticType('bool')).toEqual(scalar('BOOLEAN'));
    expect(parseSemanticType('datetime')).toEqual(scalar('TIMESTAMP'));
  });

  it('should read T[] as LIST<T>', () => {
    expect(parseSemanticType('INT[]')).toEqual(listOf(scalar('INTEGER')));
    expect(parseSemanticType('TEXT[][]')).toEqual(listOf(listOf(scalar('STRING'))));
  });

  it('should accept STRUCT with parentheses and space-separated fields', () => {
    expect(parseSemanticType('STRUCT(a INT, b VARCHAR)')).toEqual(
      recordOf([
        { name: 'a', type: scalar('INTEGER') },
        { name: 'b', type: scalar('STRING') },
      ]),
    );
  });

  it('should read quoted field names', () => {
    expect(parseSemanticType('record<"first name": text>')).toEqual(
      recordOf([{ name: 'first name', type: scalar('STRING') }]),
    );
  });

  it('should round-trip formatted types', () => {
    const text = 'RECORD<id: BIGINT, tags: LIST<STRING>, body: XML_FRAGMENT>';
    expect(formatSemanticType(parseSemanticType(text))).toBe(text);
  });

  it('should reject malformed input', () => {
    expect(() => parseSemanticType('LIST<FOO>')).toThrow(ConfigError);
    expect(() => parseSemanticType('LIST<STRING')).toThrow(ConfigError);
    expect(() => parseSemanticType('STRING x')).toThrow(ConfigError);
    expect(() => parseSemanticType('')).toThrow(ConfigError);
  });
});
